/**
 * Token Resolver
 * 權杖鏈解析 - 回傳目前有效的權杖，只重新推導過期或缺少的那一段
 *
 *   refresh → access → user → xsts[relyingParty] → service
 *
 * 1. 快取有效：直接返回，不發任何請求
 * 2. 否則取得該鍵的互斥鎖，再檢查一次快取
 * 3. 遞迴確保上一層有效，呼叫一次交換，寫入後返回
 *
 * refresh token 不會自動推導；沒有或被拒絕時拋出 NeedsInteractiveAuthError，
 * 由呼叫端另外執行 bootstrap（裝置碼登入）。
 */

import { ensureNotAborted } from '../lib/abortable.js';
import {
  MalformedResponseError,
  NeedsInteractiveAuthError,
  UpstreamRejectedError,
} from '../lib/errors.js';
import { KeyedLock } from '../lib/keyed-lock.js';
import { loggers } from '../lib/logger.js';
import { tokenCacheHitsTotal, tokenCacheMissesTotal } from '../lib/metrics.js';
import {
  RELYING_PARTIES,
  describeKey,
  isUsable,
  keyId,
  type Clock,
  type ExchangedToken,
  type OAuthTokens,
  type StoredToken,
  type TokenKey,
} from '../types/auth.js';
import type { DeviceCodeFlow } from './device-flow.js';
import type { TokenStore } from './token-store.js';
import { formatIdentityToken, type TokenExchanger } from './xbox-auth.js';

export interface EnsureOptions {
  signal?: AbortSignal;
}

export interface TokenResolverOptions {
  now?: Clock;
}

const ACCESS_KEY: TokenKey = { kind: 'access' };
const REFRESH_KEY: TokenKey = { kind: 'refresh' };

export class TokenResolver {
  private store: TokenStore;
  private exchanger: TokenExchanger;
  private now: Clock;
  private locks = new KeyedLock();

  constructor(store: TokenStore, exchanger: TokenExchanger, options: TokenResolverOptions = {}) {
    this.store = store;
    this.exchanger = exchanger;
    this.now = options.now ?? Date.now;
  }

  /**
   * 取得有效的權杖，必要時推導並寫入
   */
  async ensure(key: TokenKey, options: EnsureOptions = {}): Promise<StoredToken> {
    const cached = this.store.get(key);
    if (cached) {
      tokenCacheHitsTotal.inc({ kind: key.kind });
      return cached;
    }
    tokenCacheMissesTotal.inc({ kind: key.kind });

    return this.locks.runExclusive(keyId(key), async () => {
      ensureNotAborted(options.signal);

      // 等待鎖的期間可能已被其他呼叫推導完成
      const fresh = this.store.get(key);
      if (fresh) {
        return fresh;
      }

      return this.derive(key, options.signal);
    }, options.signal);
  }

  private async derive(key: TokenKey, signal?: AbortSignal): Promise<StoredToken> {
    switch (key.kind) {
      case 'refresh':
        throw new NeedsInteractiveAuthError('No refresh token stored, run `xtb login`');

      case 'access':
        return this.deriveAccess(signal);

      case 'user': {
        const access = await this.ensure(ACCESS_KEY, { signal });
        const token = await this.exchanger.requestUserToken(access.value, signal);
        return this.save(key, token);
      }

      case 'xsts': {
        const user = await this.ensure({ kind: 'user' }, { signal });
        const token = await this.exchanger.requestXstsToken(user.value, key.relyingParty, signal);
        return this.save(key, token);
      }

      case 'service': {
        const xsts = await this.ensure({ kind: 'xsts', relyingParty: RELYING_PARTIES.gameServices }, { signal });
        if (!xsts.userHash) {
          throw new MalformedResponseError('Stored XSTS token has no user hash');
        }
        const token = await this.exchanger.requestServiceToken(
          { value: xsts.value, userHash: xsts.userHash },
          signal
        );
        return this.save(key, token);
      }
    }
  }

  /**
   * refresh token → access token
   * 4xx 拒絕視為需要重新登入（不移除已儲存的 refresh token）；5xx 等其他錯誤原樣拋出
   */
  private async deriveAccess(signal?: AbortSignal): Promise<StoredToken> {
    const refresh = await this.ensure(REFRESH_KEY, { signal });

    let tokens: OAuthTokens;
    try {
      tokens = await this.exchanger.refreshAccessToken(refresh.value, signal);
    } catch (error) {
      if (error instanceof UpstreamRejectedError && error.status >= 400 && error.status < 500) {
        loggers.auth.warn('Refresh token rejected', { token: 'refresh', statusCode: error.status });
        throw new NeedsInteractiveAuthError('Refresh token was rejected, run `xtb login`', error);
      }
      throw error;
    }

    const access: StoredToken = { value: tokens.accessToken, expiresAt: tokens.expiresAt };
    this.assertUsable(ACCESS_KEY, access);
    this.store.setMany([
      { key: ACCESS_KEY, token: access },
      { key: REFRESH_KEY, token: { value: tokens.refreshToken } },
    ]);
    loggers.auth.info('Token derived', { token: 'access', expiresAt: new Date(tokens.expiresAt).toISOString() });

    return { ...access };
  }

  private save(key: TokenKey, exchanged: ExchangedToken): StoredToken {
    const token: StoredToken = { value: exchanged.value, expiresAt: exchanged.expiresAt };
    if (exchanged.userHash !== undefined) {
      token.userHash = exchanged.userHash;
    }
    this.assertUsable(key, token);
    this.store.set(key, token);
    loggers.auth.info('Token derived', {
      token: describeKey(key),
      expiresAt: new Date(exchanged.expiresAt).toISOString(),
    });
    return { ...token };
  }

  /**
   * 上游回傳已過期的權杖時不寫入
   */
  private assertUsable(key: TokenKey, token: StoredToken): void {
    if (!isUsable(key.kind, token, this.now())) {
      throw new MalformedResponseError(`Upstream issued an already expired ${describeKey(key)} token`);
    }
  }

  /**
   * 執行裝置碼登入，並同時寫入 access 與 refresh token
   */
  async bootstrap(flow: DeviceCodeFlow, options: EnsureOptions = {}): Promise<OAuthTokens> {
    const tokens = await flow.run(options.signal);

    await this.locks.runExclusive(keyId(ACCESS_KEY), async () => {
      this.store.setMany([
        { key: ACCESS_KEY, token: { value: tokens.accessToken, expiresAt: tokens.expiresAt } },
        { key: REFRESH_KEY, token: { value: tokens.refreshToken } },
      ]);
    }, options.signal);
    loggers.auth.info('Signed in', { expiresAt: new Date(tokens.expiresAt).toISOString() });

    return tokens;
  }

  async getAccessToken(options?: EnsureOptions): Promise<string> {
    return (await this.ensure(ACCESS_KEY, options)).value;
  }

  async getUserToken(options?: EnsureOptions): Promise<StoredToken> {
    return this.ensure({ kind: 'user' }, options);
  }

  async getXstsToken(relyingParty: string, options?: EnsureOptions): Promise<StoredToken> {
    return this.ensure({ kind: 'xsts', relyingParty }, options);
  }

  async getServiceToken(options?: EnsureOptions): Promise<string> {
    return (await this.ensure({ kind: 'service' }, options)).value;
  }

  /**
   * 產生 `XBL3.0 x=<userHash>;<xsts>` 身分標頭
   */
  async getIdentityHeader(relyingParty: string, options?: EnsureOptions): Promise<string> {
    const xsts = await this.getXstsToken(relyingParty, options);
    if (!xsts.userHash) {
      throw new MalformedResponseError('Stored XSTS token has no user hash');
    }
    return formatIdentityToken(xsts.userHash, xsts.value);
  }
}
