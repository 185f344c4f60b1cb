/**
 * Status Command
 * 列出已儲存的權杖與狀態；不發出任何請求，也不輸出權杖值
 */

import { Command } from 'commander';
import Table from 'cli-table3';
import { describeTokens, type TokenStatusEntry } from '../services/token-store.js';
import { describeKey } from '../types/auth.js';
import { openStore, runAction } from './shared.js';

interface StatusOptions {
  json?: boolean;
}

/**
 * 剩餘時間，例如 59m、2h05m；已過期顯示 -
 */
export function formatRemaining(expiresAt: number | undefined, now: number): string {
  if (expiresAt === undefined) {
    return '∞';
  }
  const remaining = expiresAt - now;
  if (remaining <= 0) {
    return '-';
  }
  const minutes = Math.floor(remaining / 60_000);
  if (minutes < 60) {
    return `${minutes}m`;
  }
  const hours = Math.floor(minutes / 60);
  return `${hours}h${String(minutes % 60).padStart(2, '0')}m`;
}

export function renderStatusTable(entries: TokenStatusEntry[], now: number): string {
  const table = new Table({
    head: ['權杖', '狀態', '到期', '剩餘'],
    style: { head: ['cyan'] },
  });

  for (const entry of entries) {
    table.push([
      describeKey(entry.key),
      entry.state === 'valid' ? '✅ valid' : '⏰ expired',
      entry.expiresAt === undefined ? '-' : new Date(entry.expiresAt).toISOString(),
      formatRemaining(entry.expiresAt, now),
    ]);
  }

  return table.toString();
}

/**
 * xtb status [--json]
 */
export const statusCommand = new Command('status')
  .description('顯示已儲存權杖的狀態')
  .option('--json', '輸出 JSON 格式')
  .action(
    runAction(async (options: StatusOptions) => {
      const { store } = openStore();
      const now = Date.now();
      const entries = describeTokens(store, now);

      if (options.json) {
        console.log(
          JSON.stringify(
            entries.map((entry) => ({
              token: describeKey(entry.key),
              state: entry.state,
              expiresAt: entry.expiresAt === undefined ? null : new Date(entry.expiresAt).toISOString(),
            })),
            null,
            2
          )
        );
        return;
      }

      if (entries.length === 0) {
        console.log('尚未登入，請執行: xtb login');
        return;
      }
      console.log(renderStatusTable(entries, now));
    })
  );
