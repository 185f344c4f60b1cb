/**
 * Config Command
 * 設定檔管理：clientId、tokenFile、logLevel
 */

import { Command } from 'commander';
import { ConfigService } from '../services/config.js';
import { CONFIG_KEYS, type ConfigKey } from '../types/config.js';
import { runAction } from './shared.js';

function isConfigKey(value: string): value is ConfigKey {
  return CONFIG_KEYS.some((key) => key === value);
}

export const configCommand = new Command('config')
  .description('管理設定');

/**
 * xtb config get <key>
 */
configCommand
  .command('get')
  .description('讀取設定值')
  .argument('<key>', `設定鍵: ${CONFIG_KEYS.join(' | ')}`)
  .action(
    runAction(async (key: string) => {
      if (!isConfigKey(key)) {
        throw new Error(`Unknown config key "${key}" (expected ${CONFIG_KEYS.join(', ')})`);
      }
      const value = new ConfigService().get(key);
      console.log(value ?? '');
    })
  );

/**
 * xtb config set <key> <value>
 */
configCommand
  .command('set')
  .description('寫入設定值')
  .argument('<key>', `設定鍵: ${CONFIG_KEYS.join(' | ')}`)
  .argument('<value>', '設定值')
  .action(
    runAction(async (key: string, value: string) => {
      new ConfigService().setFromString(key, value);
      console.error(`✅ 已設定 ${key}`);
    })
  );

/**
 * xtb config list
 */
configCommand
  .command('list')
  .description('列出所有設定與生效中的值')
  .action(
    runAction(async () => {
      const config = new ConfigService();
      console.log(
        JSON.stringify(
          {
            file: config.getAll(),
            effective: {
              clientId: config.getClientId() ?? null,
              tokenFile: config.getTokenFile(),
              logLevel: config.getLogLevel(),
            },
          },
          null,
          2
        )
      );
    })
  );

/**
 * xtb config path
 */
configCommand
  .command('path')
  .description('顯示設定檔路徑')
  .action(
    runAction(async () => {
      console.log(new ConfigService().getConfigPath());
    })
  );
