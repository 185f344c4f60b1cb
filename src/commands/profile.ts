/**
 * Profile / Search Commands
 * 以解析後的權杖查詢 Minecraft 個人資料與 Xbox 玩家
 */

import { Command } from 'commander';
import { GameServicesClient } from '../services/game-services.js';
import { createBroker, runAction, withInterrupt } from './shared.js';

interface ProfileOptions {
  entitlements?: boolean;
}

interface SearchOptions {
  max?: string;
}

/**
 * xtb profile [--entitlements]
 */
export const profileCommand = new Command('profile')
  .description('顯示 Minecraft 個人資料')
  .option('--entitlements', '一併列出授權項目')
  .action(
    runAction(async (options: ProfileOptions) => {
      const { resolver } = createBroker();
      const client = new GameServicesClient(resolver);

      const result = await withInterrupt(async (signal) => {
        const profile = await client.getProfile({ signal });
        if (!options.entitlements) {
          return { profile };
        }
        const entitlements = await client.getEntitlements({ signal });
        return { profile, entitlements: entitlements.items };
      });

      console.log(JSON.stringify(result, null, 2));
    })
  );

export function parseMaxItems(value: string | undefined): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  const parsed = Number.parseInt(value, 10);
  if (!Number.isInteger(parsed) || parsed < 1 || parsed > 100) {
    throw new Error(`Invalid --max "${value}" (expected 1-100)`);
  }
  return parsed;
}

/**
 * xtb search <query> [--max <n>]
 */
export const searchCommand = new Command('search')
  .description('以玩家代號搜尋 Xbox 玩家')
  .argument('<query>', '玩家代號')
  .option('--max <n>', '最多回傳筆數 (1-100)')
  .action(
    runAction(async (query: string, options: SearchOptions) => {
      const maxItems = parseMaxItems(options.max);
      const { resolver } = createBroker();
      const client = new GameServicesClient(resolver);

      const result = await withInterrupt((signal) => client.searchPeople(query, { maxItems, signal }));
      console.log(
        JSON.stringify(
          result.people.map((person) => ({ xuid: person.xuid, gamertag: person.gamertag })),
          null,
          2
        )
      );
    })
  );
