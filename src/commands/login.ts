/**
 * Login Command
 * 裝置碼登入：顯示網址與代碼，授權後寫入 access / refresh token
 */

import { Command } from 'commander';
import { DeviceCodeFlow } from '../services/device-flow.js';
import type { DeviceCode } from '../types/auth.js';
import { createBroker, runAction, withInterrupt } from './shared.js';

function showPrompt(code: DeviceCode): void {
  console.error(`\n🔐 ${code.message}`);
  console.error(`   網址: ${code.verificationUri}`);
  console.error(`   代碼: ${code.userCode}\n`);
}

/**
 * xtb login
 */
export const loginCommand = new Command('login')
  .description('以裝置碼登入 Microsoft 帳號')
  .action(
    runAction(async () => {
      const { resolver, exchanger } = createBroker();
      const flow = new DeviceCodeFlow(exchanger, { onPrompt: showPrompt });

      const tokens = await withInterrupt((signal) => resolver.bootstrap(flow, { signal }));
      console.error(`✅ 登入成功，access token 有效至 ${new Date(tokens.expiresAt).toISOString()}`);
    })
  );
