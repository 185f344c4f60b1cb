/**
 * Command helpers
 * 指令共用：建立設定、權杖檔與解析器，並將錯誤轉為結束碼
 */

import {
  CancelledError,
  NeedsInteractiveAuthError,
  isBrokerError,
} from '../lib/errors.js';
import { loggers } from '../lib/logger.js';
import { ConfigService } from '../services/config.js';
import { TokenResolver } from '../services/token-resolver.js';
import { FileTokenStore, type TokenStore } from '../services/token-store.js';
import { XboxAuthClient, type TokenExchanger } from '../services/xbox-auth.js';

export const EXIT_USAGE = 1;
export const EXIT_FAILURE = 2;
export const EXIT_NEEDS_LOGIN = 3;
export const EXIT_INTERRUPTED = 130;

/**
 * 未設定 Azure 應用程式的 client id
 */
export class MissingClientIdError extends Error {
  constructor() {
    super('No client id configured, run `xtb config set clientId <id>` or set XTB_CLIENT_ID');
    this.name = 'MissingClientIdError';
  }
}

export interface StoreContext {
  config: ConfigService;
  store: TokenStore;
}

export interface BrokerContext extends StoreContext {
  exchanger: TokenExchanger;
  resolver: TokenResolver;
}

/**
 * 只需要權杖檔的指令（status、logout）
 */
export function openStore(config: ConfigService = new ConfigService()): StoreContext {
  return { config, store: new FileTokenStore(config.getTokenFile()) };
}

/**
 * 需要呼叫上游的指令；沒有 client id 時拋出 MissingClientIdError
 */
export function createBroker(config: ConfigService = new ConfigService()): BrokerContext {
  const clientId = config.getClientId();
  if (!clientId) {
    throw new MissingClientIdError();
  }

  const { store } = openStore(config);
  const exchanger = new XboxAuthClient({ clientId });
  return { config, store, exchanger, resolver: new TokenResolver(store, exchanger) };
}

export function exitCodeFor(error: unknown): number {
  if (error instanceof NeedsInteractiveAuthError || error instanceof MissingClientIdError) {
    return EXIT_NEEDS_LOGIN;
  }
  if (error instanceof CancelledError) {
    return EXIT_INTERRUPTED;
  }
  if (isBrokerError(error)) {
    return EXIT_FAILURE;
  }
  return EXIT_USAGE;
}

/**
 * 輸出錯誤訊息並設定結束碼
 */
export function reportError(error: unknown): void {
  const message = error instanceof Error ? error.message : String(error);
  const code = exitCodeFor(error);

  if (code === EXIT_INTERRUPTED) {
    console.error('⚠️  已中斷');
  } else {
    console.error(`❌ ${message}`);
  }
  if (error instanceof Error) {
    loggers.cli.error('Command failed', error, { exitCode: code });
  }
  process.exitCode = code;
}

/**
 * 包裝指令 action：錯誤統一交給 reportError
 */
export function runAction<A extends unknown[]>(
  action: (...args: A) => Promise<void>
): (...args: A) => Promise<void> {
  return async (...args: A) => {
    try {
      await action(...args);
    } catch (error) {
      reportError(error);
    }
  };
}

/**
 * 在 Ctrl-C 時中斷的 signal 下執行工作
 */
export async function withInterrupt<T>(work: (signal: AbortSignal) => Promise<T>): Promise<T> {
  const controller = new AbortController();
  const onInterrupt = (): void => controller.abort(new Error('Interrupted by SIGINT'));
  process.once('SIGINT', onInterrupt);
  try {
    return await work(controller.signal);
  } finally {
    process.removeListener('SIGINT', onInterrupt);
  }
}
