/**
 * Token Store
 * 權杖儲存服務 - 每種權杖一筆紀錄，附帶到期時間
 *
 * FileTokenStore 將整組紀錄寫成單一 JSON 檔（僅擁有者可讀），
 * MemoryTokenStore 提供相同契約給測試與內嵌使用。
 */

import fs from 'node:fs';
import path from 'node:path';
import * as v from 'valibot';
import { StorageError } from '../lib/errors.js';
import { loggers } from '../lib/logger.js';
import { tokenStoreWritesTotal } from '../lib/metrics.js';
import {
  TOKEN_KINDS,
  isUsable,
  keyId,
  type Clock,
  type StoredEntry,
  type StoredToken,
  type TokenKey,
  type TokenState,
} from '../types/auth.js';

const DOCUMENT_VERSION = 1;

export interface TokenStore {
  /** 取得可用的權杖；不存在或已過期時回傳 null */
  get(key: TokenKey): StoredToken | null;
  /** 覆寫一筆紀錄並同步寫入 */
  set(key: TokenKey, token: StoredToken): void;
  /** 在同一次寫入中覆寫多筆紀錄 */
  setMany(entries: StoredEntry[]): void;
  /** 移除所有紀錄；重複呼叫不會出錯 */
  clear(): void;
  /** 列出所有紀錄（包含已過期的） */
  list(): StoredEntry[];
}

export interface TokenStoreOptions {
  now?: Clock;
}

/**
 * 共用的記憶體模型；子類別負責持久化
 */
abstract class BaseTokenStore implements TokenStore {
  protected records = new Map<string, StoredEntry>();
  protected readonly now: Clock;

  constructor(options: TokenStoreOptions = {}) {
    this.now = options.now ?? Date.now;
  }

  protected abstract persist(records: Map<string, StoredEntry>): void;
  protected abstract removeAll(): void;

  get(key: TokenKey): StoredToken | null {
    const entry = this.records.get(keyId(key));
    if (!entry) {
      return null;
    }
    if (!isUsable(key.kind, entry.token, this.now())) {
      return null;
    }
    return { ...entry.token };
  }

  set(key: TokenKey, token: StoredToken): void {
    this.setMany([{ key, token }]);
  }

  setMany(entries: StoredEntry[]): void {
    const next = new Map(this.records);
    for (const { key, token } of entries) {
      next.set(keyId(key), { key: { ...key }, token: { ...token } });
    }

    try {
      this.persist(next);
    } catch (error) {
      tokenStoreWritesTotal.inc({ outcome: 'failed' });
      throw error;
    }

    tokenStoreWritesTotal.inc({ outcome: 'success' });
    this.records = next;
  }

  clear(): void {
    this.removeAll();
    this.records = new Map();
  }

  list(): StoredEntry[] {
    return [...this.records.values()]
      .map((entry) => ({ key: { ...entry.key }, token: { ...entry.token } }))
      .sort((a, b) => TOKEN_KINDS.indexOf(a.key.kind) - TOKEN_KINDS.indexOf(b.key.kind));
  }
}

export interface TokenStatusEntry {
  key: TokenKey;
  state: Exclude<TokenState, 'absent'>;
  expiresAt?: number;
  userHash?: string;
}

/**
 * 列出已儲存紀錄在 now 時的狀態（valid / expired）
 */
export function describeTokens(store: TokenStore, now: number = Date.now()): TokenStatusEntry[] {
  return store.list().map(({ key, token }) => ({
    key,
    state: isUsable(key.kind, token, now) ? 'valid' : 'expired',
    expiresAt: token.expiresAt,
    userHash: token.userHash,
  }));
}

/**
 * 單一鍵的狀態：absent / valid / expired
 */
export function describeToken(store: TokenStore, key: TokenKey, now: number = Date.now()): TokenState {
  const id = keyId(key);
  const entry = describeTokens(store, now).find((item) => keyId(item.key) === id);
  return entry ? entry.state : 'absent';
}

/**
 * 記憶體內的權杖儲存
 */
export class MemoryTokenStore extends BaseTokenStore {
  protected persist(): void {
    // 紀錄只存在於記憶體
  }

  protected removeAll(): void {
    // 同上
  }
}

const TokenBlockSchema = v.object({
  value: v.string(),
  expiresAt: v.optional(v.pipe(v.string(), v.isoTimestamp())),
  userHash: v.optional(v.string()),
});

const TokenDocumentSchema = v.object({
  version: v.literal(DOCUMENT_VERSION),
  refresh: v.optional(TokenBlockSchema),
  access: v.optional(TokenBlockSchema),
  user: v.optional(TokenBlockSchema),
  xsts: v.optional(v.record(v.string(), TokenBlockSchema)),
  service: v.optional(TokenBlockSchema),
});

type TokenBlock = v.InferOutput<typeof TokenBlockSchema>;
type TokenDocument = v.InferOutput<typeof TokenDocumentSchema>;

function toBlock(token: StoredToken): TokenBlock {
  const block: TokenBlock = { value: token.value };
  if (token.expiresAt !== undefined) {
    block.expiresAt = new Date(token.expiresAt).toISOString();
  }
  if (token.userHash !== undefined) {
    block.userHash = token.userHash;
  }
  return block;
}

function fromBlock(block: TokenBlock): StoredToken {
  const token: StoredToken = { value: block.value };
  if (block.expiresAt !== undefined) {
    token.expiresAt = Date.parse(block.expiresAt);
  }
  if (block.userHash !== undefined) {
    token.userHash = block.userHash;
  }
  return token;
}

export function serializeRecords(records: Iterable<StoredEntry>): TokenDocument {
  const document: TokenDocument = { version: DOCUMENT_VERSION };
  for (const { key, token } of records) {
    if (key.kind === 'xsts') {
      document.xsts = { ...document.xsts, [key.relyingParty]: toBlock(token) };
    } else {
      document[key.kind] = toBlock(token);
    }
  }
  return document;
}

export function deserializeRecords(document: TokenDocument): StoredEntry[] {
  const entries: StoredEntry[] = [];
  for (const kind of ['refresh', 'access', 'user', 'service'] as const) {
    const block = document[kind];
    if (block) {
      entries.push({ key: { kind }, token: fromBlock(block) });
    }
  }
  for (const [relyingParty, block] of Object.entries(document.xsts ?? {})) {
    entries.push({ key: { kind: 'xsts', relyingParty }, token: fromBlock(block) });
  }
  return entries;
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * 檔案型權杖儲存
 */
export class FileTokenStore extends BaseTokenStore {
  private readonly filePath: string;

  constructor(filePath: string, options: TokenStoreOptions = {}) {
    super(options);
    this.filePath = filePath;
    for (const entry of this.load()) {
      this.records.set(keyId(entry.key), entry);
    }
  }

  /**
   * 讀取權杖檔；檔案不存在視為冷啟動
   */
  private load(): StoredEntry[] {
    let content: string;
    try {
      content = fs.readFileSync(this.filePath, 'utf-8');
    } catch (error) {
      if (isNotFound(error)) {
        return [];
      }
      throw new StorageError(`Failed to read token file ${this.filePath}`, this.filePath, error);
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      loggers.store.warn('Token file is not valid JSON, starting empty', {
        file: this.filePath,
        reason: error instanceof Error ? error.message : String(error),
      });
      return [];
    }

    const result = v.safeParse(TokenDocumentSchema, parsed);
    if (!result.success) {
      loggers.store.warn('Token file has an unknown layout, starting empty', {
        file: this.filePath,
        reason: v.summarize(result.issues),
      });
      return [];
    }

    return deserializeRecords(result.output);
  }

  /**
   * 原子寫入：暫存檔 → rename，權限 0600
   */
  protected persist(records: Map<string, StoredEntry>): void {
    const document = serializeRecords(records.values());
    const dir = path.dirname(this.filePath);
    const tempPath = `${this.filePath}.${process.pid}.tmp`;

    try {
      fs.mkdirSync(dir, { recursive: true, mode: 0o700 });
      fs.writeFileSync(tempPath, JSON.stringify(document, null, 2), { encoding: 'utf-8', mode: 0o600 });
      fs.renameSync(tempPath, this.filePath);
    } catch (error) {
      if (fs.existsSync(tempPath)) {
        fs.rmSync(tempPath, { force: true });
      }
      throw new StorageError(`Failed to write token file ${this.filePath}`, this.filePath, error);
    }

    loggers.store.debug('Token file written', { file: this.filePath, records: records.size });
  }

  protected removeAll(): void {
    try {
      fs.rmSync(this.filePath, { force: true });
    } catch (error) {
      throw new StorageError(`Failed to remove token file ${this.filePath}`, this.filePath, error);
    }
    loggers.store.info('Token file cleared', { file: this.filePath });
  }
}
