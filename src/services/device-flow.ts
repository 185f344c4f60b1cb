/**
 * Device Code Flow
 * 裝置碼登入流程：使用者在其他裝置輸入代碼，本機定期輪詢直到授權完成
 *
 * Requested → Polling → Authorized | Expired | Denied
 */

import { delay } from '../lib/abortable.js';
import { AuthorizationDeniedError, DeviceCodeExpiredError } from '../lib/errors.js';
import { loggers } from '../lib/logger.js';
import type { Clock, DeviceCode, OAuthTokens } from '../types/auth.js';
import type { TokenExchanger } from './xbox-auth.js';

/** slow_down 時增加的輪詢間隔 (RFC 8628 §3.5) */
export const SLOW_DOWN_STEP_MS = 5000;

export interface DeviceCodeFlowOptions {
  now?: Clock;
  /** 取得裝置碼後呼叫，用來顯示登入網址與代碼 */
  onPrompt?: (code: DeviceCode) => void;
}

export class DeviceCodeFlow {
  private exchanger: TokenExchanger;
  private now: Clock;
  private onPrompt?: (code: DeviceCode) => void;

  constructor(exchanger: TokenExchanger, options: DeviceCodeFlowOptions = {}) {
    this.exchanger = exchanger;
    this.now = options.now ?? Date.now;
    this.onPrompt = options.onPrompt;
  }

  /**
   * 執行完整流程，回傳 access / refresh token
   * 裝置碼過期或使用者拒絕時拋出錯誤，需要重新開始整個流程
   */
  async run(signal?: AbortSignal): Promise<OAuthTokens> {
    const code = await this.exchanger.requestDeviceCode(signal);
    loggers.auth.info('Device code issued', {
      verificationUri: code.verificationUri,
      expiresAt: new Date(code.expiresAt).toISOString(),
    });
    this.onPrompt?.(code);

    let intervalMs = code.intervalMs;
    let attempts = 0;

    for (;;) {
      const remaining = code.expiresAt - this.now();
      if (remaining <= 0) {
        throw new DeviceCodeExpiredError();
      }

      await delay(Math.min(intervalMs, remaining), signal);

      if (this.now() >= code.expiresAt) {
        throw new DeviceCodeExpiredError();
      }

      attempts++;
      const result = await this.exchanger.pollDeviceCode(code.deviceCode, signal);

      switch (result.status) {
        case 'authorized':
          loggers.auth.info('Device code authorized', { attempts });
          return result.tokens;
        case 'pending':
          break;
        case 'slow_down':
          intervalMs += SLOW_DOWN_STEP_MS;
          loggers.auth.debug('Polling slowed down', { intervalMs });
          break;
        case 'denied':
          throw new AuthorizationDeniedError(result.description);
        case 'expired':
          throw new DeviceCodeExpiredError(result.description);
      }
    }
  }
}
