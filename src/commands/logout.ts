/**
 * Logout Command
 * 清除所有已儲存的權杖
 */

import { Command } from 'commander';
import { openStore, runAction } from './shared.js';

export const logoutCommand = new Command('logout')
  .description('清除所有已儲存的權杖')
  .action(
    runAction(async () => {
      const { store } = openStore();
      store.clear();
      console.error('✅ 已登出');
    })
  );
