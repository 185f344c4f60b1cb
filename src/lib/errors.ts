/**
 * Broker Errors
 * 權杖代理的錯誤分類，每個錯誤帶有穩定的 code
 */

export type BrokerErrorCode =
  | 'STORAGE_ERROR'
  | 'NETWORK_ERROR'
  | 'UPSTREAM_REJECTED'
  | 'MALFORMED_RESPONSE'
  | 'NEEDS_INTERACTIVE_AUTH'
  | 'DEVICE_CODE_EXPIRED'
  | 'AUTHORIZATION_DENIED'
  | 'CANCELLED';

export abstract class BrokerError extends Error {
  public abstract readonly code: BrokerErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * 權杖檔案讀寫或權限失敗
 */
export class StorageError extends BrokerError {
  public readonly code = 'STORAGE_ERROR';
  public readonly filePath?: string;

  constructor(message: string, filePath?: string, cause?: unknown) {
    super(message, { cause });
    this.filePath = filePath;
  }
}

/**
 * 交換呼叫的傳輸層失敗（連線、DNS、逾時）
 */
export class NetworkError extends BrokerError {
  public readonly code = 'NETWORK_ERROR';
  public readonly url: string;

  constructor(message: string, url: string, cause?: unknown) {
    super(message, { cause });
    this.url = url;
  }
}

/**
 * 上游端點回傳結構化的拒絕
 */
export class UpstreamRejectedError extends BrokerError {
  public readonly code = 'UPSTREAM_REJECTED';
  /** HTTP 狀態碼 */
  public readonly status: number;
  /** 上游錯誤代碼（OAuth `error` 或 Xbox `XErr`），無法解析時為 undefined */
  public readonly errorCode?: string;
  public readonly body?: string;

  constructor(
    message: string,
    details: { status: number; errorCode?: string; body?: string },
    cause?: unknown
  ) {
    super(message, { cause });
    this.status = details.status;
    this.errorCode = details.errorCode;
    this.body = details.body;
  }
}

/**
 * 回應無法解碼或欄位不符，代表上游契約改變
 */
export class MalformedResponseError extends BrokerError {
  public readonly code = 'MALFORMED_RESPONSE';
  public readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.issues = issues;
  }
}

/**
 * 沒有 refresh token 或 refresh token 被拒絕；需要重新執行 login
 */
export class NeedsInteractiveAuthError extends BrokerError {
  public readonly code = 'NEEDS_INTERACTIVE_AUTH';

  constructor(message: string = 'Interactive sign-in required, run `xtb login`', cause?: unknown) {
    super(message, { cause });
  }
}

export class DeviceCodeExpiredError extends BrokerError {
  public readonly code = 'DEVICE_CODE_EXPIRED';

  constructor(message: string = 'Device code expired before sign-in completed') {
    super(message);
  }
}

export class AuthorizationDeniedError extends BrokerError {
  public readonly code = 'AUTHORIZATION_DENIED';

  constructor(message: string = 'Sign-in was declined') {
    super(message);
  }
}

export class CancelledError extends BrokerError {
  public readonly code = 'CANCELLED';

  constructor(message: string = 'Operation cancelled', cause?: unknown) {
    super(message, { cause });
  }
}

export function isBrokerError(error: unknown): error is BrokerError {
  return error instanceof BrokerError;
}
