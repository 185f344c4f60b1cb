/**
 * Xbox Auth Client
 * 權杖交換服務 - Microsoft 帳號 OAuth、Xbox user / XSTS 權杖、Minecraft 登入
 *
 * 每個方法都是單純的請求/回應轉換：輸入上游權杖，回傳新權杖與到期時間。
 * 這裡不讀寫 TokenStore，也不重試；重試策略由呼叫端決定。
 */

import { ofetch, FetchError } from 'ofetch';
import * as v from 'valibot';
import {
  CancelledError,
  MalformedResponseError,
  NetworkError,
  UpstreamRejectedError,
} from '../lib/errors.js';
import { loggers } from '../lib/logger.js';
import { recordExchange } from '../lib/metrics.js';
import {
  USER_TOKEN_RELYING_PARTY,
  type Clock,
  type DeviceCode,
  type DevicePollResult,
  type ExchangedToken,
  type OAuthTokens,
} from '../types/auth.js';

export const ENDPOINTS = {
  deviceCode: 'https://login.microsoftonline.com/consumers/oauth2/v2.0/devicecode',
  token: 'https://login.microsoftonline.com/consumers/oauth2/v2.0/token',
  userToken: 'https://user.auth.xboxlive.com/user/authenticate',
  xsts: 'https://xsts.auth.xboxlive.com/xsts/authorize',
  serviceToken: 'https://api.minecraftservices.com/authentication/login_with_xbox',
} as const;

export const DEFAULT_SCOPE = 'XboxLive.signin offline_access';

const DEVICE_CODE_GRANT = 'urn:ietf:params:oauth:grant-type:device_code';
const DEFAULT_POLL_INTERVAL_SECONDS = 5;

/**
 * 已知的 XSTS XErr 代碼
 */
const XBOX_ERROR_MESSAGES: Record<string, string> = {
  '2148916233': 'This Microsoft account has no Xbox profile; sign in at xbox.com to create one',
  '2148916235': 'Xbox Live is not available in the country of this account',
  '2148916236': 'This account needs adult verification on the Xbox website',
  '2148916237': 'This account needs adult verification on the Xbox website',
  '2148916238': 'This is a child account and must be added to a Family by an adult',
};

/**
 * 交換操作介面；TokenResolver 與 DeviceCodeFlow 只依賴此介面
 */
export interface TokenExchanger {
  requestDeviceCode(signal?: AbortSignal): Promise<DeviceCode>;
  pollDeviceCode(deviceCode: string, signal?: AbortSignal): Promise<DevicePollResult>;
  refreshAccessToken(refreshToken: string, signal?: AbortSignal): Promise<OAuthTokens>;
  requestUserToken(accessToken: string, signal?: AbortSignal): Promise<ExchangedToken>;
  requestXstsToken(userToken: string, relyingParty: string, signal?: AbortSignal): Promise<ExchangedToken>;
  requestServiceToken(xsts: { value: string; userHash: string }, signal?: AbortSignal): Promise<ExchangedToken>;
}

export interface XboxAuthClientOptions {
  /** Azure 應用程式 (client) ID */
  clientId: string;
  scope?: string;
  now?: Clock;
}

// --- 回應結構 ---

const DeviceCodeResponseSchema = v.object({
  device_code: v.pipe(v.string(), v.minLength(1)),
  user_code: v.pipe(v.string(), v.minLength(1)),
  verification_uri: v.pipe(v.string(), v.minLength(1)),
  expires_in: v.number(),
  interval: v.optional(v.number()),
  message: v.optional(v.string()),
});

const OAuthTokenResponseSchema = v.object({
  access_token: v.pipe(v.string(), v.minLength(1)),
  refresh_token: v.optional(v.string()),
  expires_in: v.number(),
  token_type: v.optional(v.string()),
  scope: v.optional(v.string()),
});

const XboxTokenResponseSchema = v.object({
  IssueInstant: v.optional(v.string()),
  NotAfter: v.string(),
  Token: v.pipe(v.string(), v.minLength(1)),
  DisplayClaims: v.optional(
    v.object({
      xui: v.optional(v.array(v.record(v.string(), v.unknown()))),
    })
  ),
});

const ServiceTokenResponseSchema = v.object({
  username: v.optional(v.string()),
  access_token: v.pipe(v.string(), v.minLength(1)),
  token_type: v.optional(v.string()),
  expires_in: v.number(),
});

const OAuthErrorBodySchema = v.object({
  error: v.string(),
  error_description: v.optional(v.string()),
});

const XboxErrorBodySchema = v.object({
  Identity: v.optional(v.string()),
  XErr: v.number(),
  Message: v.optional(v.string()),
  Redirect: v.optional(v.string()),
});

export type XboxTokenResponse = v.InferOutput<typeof XboxTokenResponseSchema>;

/**
 * 依結構驗證回應；不符時拋出 MalformedResponseError
 */
export function decode<TSchema extends v.GenericSchema>(
  schema: TSchema,
  data: unknown,
  label: string
): v.InferOutput<TSchema> {
  const result = v.safeParse(schema, data);
  if (!result.success) {
    throw new MalformedResponseError(
      `Unexpected ${label} response`,
      result.issues.map((issue) => {
        const at = issue.path?.map((item) => String(item.key)).join('.');
        return at ? `${at}: ${issue.message}` : issue.message;
      })
    );
  }
  return result.output;
}

/**
 * 從 DisplayClaims.xui 取出 user hash；缺少時視為回應格式錯誤
 */
export function extractUserHash(claims: XboxTokenResponse['DisplayClaims']): string {
  const xui = claims?.xui;
  if (!xui || xui.length === 0) {
    throw new MalformedResponseError('Xbox token response has no xui claims');
  }
  const entry = xui.find((claim) => 'uhs' in claim);
  const uhs = entry?.uhs;
  if (typeof uhs !== 'string' || uhs.length === 0) {
    throw new MalformedResponseError('Xbox token response has no user hash (uhs) claim');
  }
  return uhs;
}

/**
 * 解析 Xbox 的時間字串（小數秒可能超過 3 位）
 */
export function parseInstant(value: string): number {
  const ms = Date.parse(value.replace(/(\.\d{3})\d+/, '$1'));
  if (Number.isNaN(ms)) {
    throw new MalformedResponseError(`Invalid timestamp "${value}"`);
  }
  return ms;
}

function bodyText(data: unknown): string | undefined {
  if (data === undefined || data === null) return undefined;
  if (typeof data === 'string') return data;
  return JSON.stringify(data);
}

/**
 * 將上游錯誤本體轉成 UpstreamRejectedError
 */
export function toUpstreamRejected(label: string, status: number, data: unknown, cause?: unknown): UpstreamRejectedError {
  const oauth = v.safeParse(OAuthErrorBodySchema, data);
  if (oauth.success) {
    const description = oauth.output.error_description ?? oauth.output.error;
    return new UpstreamRejectedError(
      `${label} rejected (${status} ${oauth.output.error}): ${description}`,
      { status, errorCode: oauth.output.error, body: bodyText(data) },
      cause
    );
  }

  const xbox = v.safeParse(XboxErrorBodySchema, data);
  if (xbox.success && xbox.output.XErr !== 0) {
    const code = String(xbox.output.XErr);
    const description = XBOX_ERROR_MESSAGES[code] ?? xbox.output.Message ?? 'unknown Xbox error';
    return new UpstreamRejectedError(
      `${label} rejected (${status} XErr ${code}): ${description}`,
      { status, errorCode: code, body: bodyText(data) },
      cause
    );
  }

  const text = bodyText(data);
  return new UpstreamRejectedError(
    `${label} failed: ${status}${text ? ` - ${text}` : ''}`,
    { status, body: text },
    cause
  );
}

/**
 * 將 ofetch 拋出的錯誤分類
 */
export function classifyFetchError(error: unknown, label: string, url: string, signal?: AbortSignal): Error {
  if (signal?.aborted) {
    return new CancelledError(`${label} cancelled`, signal.reason);
  }
  if (error instanceof FetchError) {
    const status = error.statusCode ?? error.status;
    if (status !== undefined) {
      return toUpstreamRejected(label, status, error.data, error);
    }
    return new NetworkError(`${label} request failed: ${error.message}`, url, error);
  }
  const message = error instanceof Error ? error.message : String(error);
  return new NetworkError(`${label} request failed: ${message}`, url, error);
}

export class XboxAuthClient implements TokenExchanger {
  private clientId: string;
  private scope: string;
  private now: Clock;

  constructor(options: XboxAuthClientOptions) {
    this.clientId = options.clientId;
    this.scope = options.scope ?? DEFAULT_SCOPE;
    this.now = options.now ?? Date.now;
  }

  /**
   * 申請裝置碼
   */
  async requestDeviceCode(signal?: AbortSignal): Promise<DeviceCode> {
    const data = await this.send('device_code', 'Device code request', ENDPOINTS.deviceCode, {
      form: { client_id: this.clientId, scope: this.scope },
      signal,
    });
    const response = decode(DeviceCodeResponseSchema, data, 'device code');
    const intervalSeconds = response.interval ?? DEFAULT_POLL_INTERVAL_SECONDS;

    return {
      deviceCode: response.device_code,
      userCode: response.user_code,
      verificationUri: response.verification_uri,
      message:
        response.message ??
        `To sign in, open ${response.verification_uri} and enter the code ${response.user_code}`,
      expiresAt: this.now() + response.expires_in * 1000,
      intervalMs: intervalSeconds * 1000,
    };
  }

  /**
   * 輪詢一次裝置碼授權狀態
   */
  async pollDeviceCode(deviceCode: string, signal?: AbortSignal): Promise<DevicePollResult> {
    let data: unknown;
    try {
      data = await this.send('device_poll', 'Device code poll', ENDPOINTS.token, {
        form: { grant_type: DEVICE_CODE_GRANT, client_id: this.clientId, device_code: deviceCode },
        signal,
      });
    } catch (error) {
      if (error instanceof UpstreamRejectedError) {
        switch (error.errorCode) {
          case 'authorization_pending':
            return { status: 'pending' };
          case 'slow_down':
            return { status: 'slow_down' };
          case 'authorization_declined':
          case 'access_denied':
            return { status: 'denied', description: error.message };
          case 'expired_token':
          case 'code_expired':
            return { status: 'expired', description: error.message };
        }
      }
      throw error;
    }

    const response = decode(OAuthTokenResponseSchema, data, 'device token');
    if (!response.refresh_token) {
      throw new MalformedResponseError('Device token response has no refresh_token', [
        'request the offline_access scope',
      ]);
    }

    return {
      status: 'authorized',
      tokens: {
        accessToken: response.access_token,
        refreshToken: response.refresh_token,
        expiresAt: this.now() + response.expires_in * 1000,
        scope: response.scope,
      },
    };
  }

  /**
   * refresh token → access token（可能同時換發新的 refresh token）
   */
  async refreshAccessToken(refreshToken: string, signal?: AbortSignal): Promise<OAuthTokens> {
    const data = await this.send('access', 'Token refresh', ENDPOINTS.token, {
      form: {
        grant_type: 'refresh_token',
        client_id: this.clientId,
        refresh_token: refreshToken,
        scope: this.scope,
      },
      signal,
    });
    const response = decode(OAuthTokenResponseSchema, data, 'token refresh');

    return {
      accessToken: response.access_token,
      refreshToken: response.refresh_token || refreshToken,
      expiresAt: this.now() + response.expires_in * 1000,
      scope: response.scope,
    };
  }

  /**
   * access token → Xbox user token
   */
  async requestUserToken(accessToken: string, signal?: AbortSignal): Promise<ExchangedToken> {
    const data = await this.send('user', 'User token request', ENDPOINTS.userToken, {
      json: {
        RelyingParty: USER_TOKEN_RELYING_PARTY,
        TokenType: 'JWT',
        Properties: {
          AuthMethod: 'RPS',
          SiteName: 'user.auth.xboxlive.com',
          RpsTicket: `d=${accessToken}`,
        },
      },
      headers: { 'x-xbl-contract-version': '1' },
      signal,
    });
    return this.toXboxToken(data, 'user token');
  }

  /**
   * user token → 指定 relying party 的 XSTS token
   */
  async requestXstsToken(userToken: string, relyingParty: string, signal?: AbortSignal): Promise<ExchangedToken> {
    const data = await this.send('xsts', `XSTS token request (${relyingParty})`, ENDPOINTS.xsts, {
      json: {
        RelyingParty: relyingParty,
        TokenType: 'JWT',
        Properties: {
          UserTokens: [userToken],
          SandboxId: 'RETAIL',
        },
      },
      headers: { 'x-xbl-contract-version': '1' },
      signal,
    });
    return this.toXboxToken(data, 'XSTS token');
  }

  /**
   * XSTS token → Minecraft services access token
   */
  async requestServiceToken(xsts: { value: string; userHash: string }, signal?: AbortSignal): Promise<ExchangedToken> {
    const data = await this.send('service', 'Game services login', ENDPOINTS.serviceToken, {
      json: { identityToken: formatIdentityToken(xsts.userHash, xsts.value) },
      headers: { Accept: 'application/json' },
      signal,
    });
    const response = decode(ServiceTokenResponseSchema, data, 'game services login');

    return {
      value: response.access_token,
      expiresAt: this.now() + response.expires_in * 1000,
    };
  }

  private toXboxToken(data: unknown, label: string): ExchangedToken {
    const response = decode(XboxTokenResponseSchema, data, label);
    return {
      value: response.Token,
      expiresAt: parseInstant(response.NotAfter),
      userHash: extractUserHash(response.DisplayClaims),
    };
  }

  /**
   * 送出 POST 請求；表單以 urlencoded 送出，json 以 JSON 送出
   */
  private async send(
    operation: string,
    label: string,
    url: string,
    request: {
      form?: Record<string, string>;
      json?: Record<string, unknown>;
      headers?: Record<string, string>;
      signal?: AbortSignal;
    }
  ): Promise<unknown> {
    if (request.signal?.aborted) {
      throw new CancelledError(`${label} cancelled`, request.signal.reason);
    }

    const startTime = Date.now();
    const headers: Record<string, string> = { ...request.headers };
    let body: string | Record<string, unknown> | undefined;

    if (request.form) {
      headers['Content-Type'] = 'application/x-www-form-urlencoded';
      body = new URLSearchParams(request.form).toString();
    } else {
      headers['Content-Type'] = 'application/json';
      body = request.json;
    }

    loggers.exchange.debug('Exchange request started', { url, operation });

    try {
      const data = await ofetch<unknown>(url, {
        method: 'POST',
        headers,
        body,
        signal: request.signal,
        retry: 0,
      });
      const duration = Date.now() - startTime;
      recordExchange(operation, 'success', duration);
      loggers.exchange.debug('Exchange request completed', { url, operation, duration });
      return data;
    } catch (error) {
      const duration = Date.now() - startTime;
      recordExchange(operation, 'failed', duration);
      const classified = classifyFetchError(error, label, url, request.signal);
      loggers.exchange.debug('Exchange request failed', {
        url,
        operation,
        duration,
        reason: classified.message,
      });
      throw classified;
    }
  }
}

/**
 * Xbox 身分憑證格式：XBL3.0 x=<userHash>;<xstsToken>
 */
export function formatIdentityToken(userHash: string, xstsToken: string): string {
  return `XBL3.0 x=${userHash};${xstsToken}`;
}
