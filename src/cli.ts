import { Command } from 'commander';
import { beginRequest, endRequest, isLogLevel, setLogLevel } from './lib/logger.js';
import { ConfigService } from './services/config.js';
import { configCommand } from './commands/config.js';
import { loginCommand } from './commands/login.js';
import { logoutCommand } from './commands/logout.js';
import { profileCommand, searchCommand } from './commands/profile.js';
import { statusCommand } from './commands/status.js';
import { tokenCommand } from './commands/token.js';

type GlobalOptions = {
  verbose?: boolean;
  logLevel?: string;
};

export const cli = new Command();

cli
  .name('xtb')
  .description('Xbox Live / Minecraft token broker')
  .version('0.1.0');

// 全域選項
cli
  .option('-v, --verbose', '詳細模式（debug 日誌）')
  .option('--log-level <level>', '日誌級別: debug | info | warn | error');

// 每個指令一個 requestId；日誌級別：--verbose > --log-level > 設定檔 / XTB_LOG_LEVEL
cli.hook('preAction', () => {
  const options = cli.opts<GlobalOptions>();
  let level = new ConfigService().getLogLevel();
  if (options.logLevel !== undefined) {
    if (!isLogLevel(options.logLevel)) {
      cli.error(`error: invalid log level "${options.logLevel}"`, { exitCode: 1 });
    } else {
      level = options.logLevel;
    }
  }
  if (options.verbose) {
    level = 'debug';
  }
  setLogLevel(level);
  beginRequest();
});

cli.hook('postAction', () => {
  endRequest();
});

// 註冊指令
cli.addCommand(loginCommand);
cli.addCommand(tokenCommand);
cli.addCommand(statusCommand);
cli.addCommand(logoutCommand);
cli.addCommand(profileCommand);
cli.addCommand(searchCommand);
cli.addCommand(configCommand);
