import type { LogLevel } from '../lib/logger.js';

/**
 * 設定檔結構
 */
export interface AppConfig {
  /** Azure 應用程式 (client) ID，用於 Microsoft 帳號 OAuth */
  clientId?: string;
  /** 權杖檔路徑 */
  tokenFile?: string;
  /** 日誌級別 */
  logLevel?: LogLevel;
}

/**
 * 設定鍵值
 */
export type ConfigKey = keyof AppConfig;

export const CONFIG_KEYS: readonly ConfigKey[] = ['clientId', 'tokenFile', 'logLevel'];
