/**
 * Config Service
 * 設定管理服務 - 處理設定檔讀寫與環境變數
 */

import fs from 'node:fs';
import path from 'node:path';
import os from 'node:os';
import { isLogLevel, loggers, type LogLevel } from '../lib/logger.js';
import { CONFIG_KEYS, type AppConfig, type ConfigKey } from '../types/config.js';

const DEFAULT_CONFIG_DIR = path.join(os.homedir(), '.config', 'xbl-token-broker');
const DEFAULT_CONFIG_FILE = 'config.json';
const DEFAULT_TOKEN_FILE = path.join(os.homedir(), '.cache', 'xbl-token-broker', 'tokens.json');
const DEFAULT_LOG_LEVEL: LogLevel = 'warn';

export class ConfigService {
  private configPath: string;
  private config: AppConfig;

  constructor(configPath?: string) {
    this.configPath = configPath || path.join(DEFAULT_CONFIG_DIR, DEFAULT_CONFIG_FILE);
    this.config = this.load();
  }

  /**
   * 載入設定檔；無法解析時使用空設定
   */
  private load(): AppConfig {
    if (!fs.existsSync(this.configPath)) {
      return {};
    }

    try {
      const parsed: unknown = JSON.parse(fs.readFileSync(this.configPath, 'utf-8'));
      return ConfigService.sanitize(parsed);
    } catch (error) {
      loggers.cli.warn('Config file could not be read, using defaults', {
        file: this.configPath,
        reason: error instanceof Error ? error.message : String(error),
      });
      return {};
    }
  }

  /**
   * 只保留已知且型別正確的設定值
   */
  private static sanitize(value: unknown): AppConfig {
    const config: AppConfig = {};
    if (typeof value !== 'object' || value === null) {
      return config;
    }
    const record: Record<string, unknown> = { ...value };
    if (typeof record.clientId === 'string') config.clientId = record.clientId;
    if (typeof record.tokenFile === 'string') config.tokenFile = record.tokenFile;
    if (typeof record.logLevel === 'string' && isLogLevel(record.logLevel)) config.logLevel = record.logLevel;
    return config;
  }

  /**
   * 儲存設定檔
   */
  private save(): void {
    const dir = path.dirname(this.configPath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true, mode: 0o700 });
    }
    fs.writeFileSync(this.configPath, JSON.stringify(this.config, null, 2), 'utf-8');
  }

  get<K extends ConfigKey>(key: K): AppConfig[K] {
    return this.config[key];
  }

  set<K extends ConfigKey>(key: K, value: AppConfig[K]): void {
    this.config[key] = value;
    this.save();
  }

  /**
   * 由字串設定值（CLI 使用），驗證鍵與值
   */
  setFromString(key: string, value: string): void {
    switch (key) {
      case 'clientId':
      case 'tokenFile':
        this.set(key, value);
        return;
      case 'logLevel':
        if (!isLogLevel(value)) {
          throw new Error(`Invalid log level "${value}" (expected debug, info, warn or error)`);
        }
        this.set('logLevel', value);
        return;
      default:
        throw new Error(`Unknown config key "${key}" (expected ${CONFIG_KEYS.join(', ')})`);
    }
  }

  getAll(): AppConfig {
    return { ...this.config };
  }

  delete(key: ConfigKey): void {
    delete this.config[key];
    this.save();
  }

  getConfigPath(): string {
    return this.configPath;
  }

  /**
   * 取得 Client ID（優先環境變數）
   */
  getClientId(): string | undefined {
    const envValue = process.env.XTB_CLIENT_ID;
    if (envValue && envValue.length > 0) {
      return envValue;
    }
    return this.config.clientId;
  }

  /**
   * 取得權杖檔路徑（優先環境變數）
   */
  getTokenFile(): string {
    const envValue = process.env.XTB_TOKEN_FILE;
    if (envValue && envValue.length > 0) {
      return envValue;
    }
    return this.config.tokenFile || DEFAULT_TOKEN_FILE;
  }

  /**
   * 取得日誌級別（優先環境變數，無效值忽略）
   */
  getLogLevel(): LogLevel {
    const envValue = process.env.XTB_LOG_LEVEL?.toLowerCase();
    if (envValue && isLogLevel(envValue)) {
      return envValue;
    }
    return this.config.logLevel || DEFAULT_LOG_LEVEL;
  }
}
