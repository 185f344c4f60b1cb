/**
 * Token chain types
 * 權杖鏈的資料模型：refresh → access → user → xsts[rp] → service
 */

export type TokenKind = 'refresh' | 'access' | 'user' | 'xsts' | 'service';

export const TOKEN_KINDS: readonly TokenKind[] = ['refresh', 'access', 'user', 'xsts', 'service'];

/**
 * 權杖鍵值；只有 XSTS 額外以 relying party 區分
 */
export type TokenKey =
  | { kind: Exclude<TokenKind, 'xsts'> }
  | { kind: 'xsts'; relyingParty: string };

/**
 * 儲存的權杖紀錄
 */
export interface StoredToken {
  value: string;
  /** Unix timestamp (ms)；refresh token 沒有到期時間 */
  expiresAt?: number;
  /** user / xsts 權杖附帶的 user hash */
  userHash?: string;
}

export interface StoredEntry {
  key: TokenKey;
  token: StoredToken;
}

export type TokenState = 'absent' | 'valid' | 'expired';

/**
 * 交換後產生的新權杖
 */
export interface ExchangedToken {
  value: string;
  expiresAt: number;
  userHash?: string;
}

/**
 * OAuth token endpoint 回傳的基礎權杖組
 */
export interface OAuthTokens {
  accessToken: string;
  refreshToken: string;
  /** access token 到期時間 (ms) */
  expiresAt: number;
  scope?: string;
}

export interface DeviceCode {
  deviceCode: string;
  userCode: string;
  verificationUri: string;
  message: string;
  /** 裝置碼失效時間 (ms) */
  expiresAt: number;
  intervalMs: number;
}

export type DevicePollResult =
  | { status: 'pending' }
  | { status: 'slow_down' }
  | { status: 'denied'; description?: string }
  | { status: 'expired'; description?: string }
  | { status: 'authorized'; tokens: OAuthTokens };

export type Clock = () => number;

/**
 * Xbox 服務的 relying party
 */
export const RELYING_PARTIES = {
  /** Xbox Live API（個人資料、搜尋） */
  gaming: 'http://xboxlive.com',
  /** Minecraft services API */
  gameServices: 'rp://api.minecraftservices.com/',
} as const;

/** user token 請求使用的 relying party，不會進入 XSTS 快取 */
export const USER_TOKEN_RELYING_PARTY = 'http://auth.xboxlive.com';

export function describeKey(key: TokenKey): string {
  return key.kind === 'xsts' ? `xsts[${key.relyingParty}]` : key.kind;
}

export function keyId(key: TokenKey): string {
  return key.kind === 'xsts' ? `xsts:${key.relyingParty}` : key.kind;
}

/**
 * 判斷紀錄在 now 時是否可用
 */
export function isUsable(kind: TokenKind, token: StoredToken, now: number): boolean {
  if (kind === 'refresh') {
    return token.value.length > 0;
  }
  return token.expiresAt !== undefined && now < token.expiresAt;
}
