/**
 * Fake Exchanger
 * 測試用的 TokenExchanger：記錄每次呼叫，依序產生 token 值，不發出任何請求
 */

import type {
  DeviceCode,
  DevicePollResult,
  ExchangedToken,
  OAuthTokens,
} from '../../src/types/auth.js';
import type { TokenExchanger } from '../../src/services/xbox-auth.js';

export type ExchangeCall =
  | { op: 'requestDeviceCode' }
  | { op: 'pollDeviceCode'; deviceCode: string }
  | { op: 'refreshAccessToken'; refreshToken: string }
  | { op: 'requestUserToken'; accessToken: string }
  | { op: 'requestXstsToken'; userToken: string; relyingParty: string }
  | { op: 'requestServiceToken'; xsts: string; userHash: string };

export const HOUR_MS = 60 * 60 * 1000;

export class FakeExchanger implements TokenExchanger {
  readonly calls: ExchangeCall[] = [];
  /** 每個 op 的下一次失敗；觸發後移除 */
  readonly failures = new Map<ExchangeCall['op'], Error>();
  /** 交換前等待的 promise，用來讓並行測試重疊 */
  gate: Promise<void> = Promise.resolve();
  /** 交換產生權杖的有效時間 */
  lifetimeMs = HOUR_MS;
  /** refreshAccessToken 是否換發新的 refresh token */
  rotateRefresh = false;
  pollResults: DevicePollResult[] = [];
  deviceCode: DeviceCode | null = null;

  private counter = 0;

  constructor(private readonly now: () => number) {}

  count(op: ExchangeCall['op']): number {
    return this.calls.filter((call) => call.op === op).length;
  }

  private async begin(call: ExchangeCall): Promise<void> {
    this.calls.push(call);
    await this.gate;
    const failure = this.failures.get(call.op);
    if (failure) {
      this.failures.delete(call.op);
      throw failure;
    }
  }

  private next(prefix: string): string {
    this.counter++;
    return `${prefix}-${this.counter}`;
  }

  async requestDeviceCode(): Promise<DeviceCode> {
    await this.begin({ op: 'requestDeviceCode' });
    if (!this.deviceCode) {
      throw new Error('FakeExchanger.deviceCode not set');
    }
    return this.deviceCode;
  }

  async pollDeviceCode(deviceCode: string): Promise<DevicePollResult> {
    await this.begin({ op: 'pollDeviceCode', deviceCode });
    return this.pollResults.shift() ?? { status: 'pending' };
  }

  async refreshAccessToken(refreshToken: string): Promise<OAuthTokens> {
    await this.begin({ op: 'refreshAccessToken', refreshToken });
    return {
      accessToken: this.next('access'),
      refreshToken: this.rotateRefresh ? this.next('refresh') : refreshToken,
      expiresAt: this.now() + this.lifetimeMs,
    };
  }

  async requestUserToken(accessToken: string): Promise<ExchangedToken> {
    await this.begin({ op: 'requestUserToken', accessToken });
    return { value: this.next('user'), expiresAt: this.now() + this.lifetimeMs, userHash: 'uhs-test' };
  }

  async requestXstsToken(userToken: string, relyingParty: string): Promise<ExchangedToken> {
    await this.begin({ op: 'requestXstsToken', userToken, relyingParty });
    return { value: this.next('xsts'), expiresAt: this.now() + this.lifetimeMs, userHash: 'uhs-test' };
  }

  async requestServiceToken(xsts: { value: string; userHash: string }): Promise<ExchangedToken> {
    await this.begin({ op: 'requestServiceToken', xsts: xsts.value, userHash: xsts.userHash });
    return { value: this.next('service'), expiresAt: this.now() + this.lifetimeMs };
  }
}

/**
 * 可手動前進的時鐘
 */
export function createClock(start: number = Date.UTC(2024, 0, 1)): { now: () => number; advance(ms: number): void } {
  let current = start;
  return {
    now: () => current,
    advance(ms: number) {
      current += ms;
    },
  };
}
