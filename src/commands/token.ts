/**
 * Token Command
 * 取得目前有效的權杖；快取有效時不發出任何請求
 *
 *   xtb token service          → stdout 只輸出權杖值
 *   xtb token xsts --rp gaming → XSTS 權杖
 *   xtb token user --json      → { token, value, userHash, expiresAt }
 */

import { Command } from 'commander';
import { getMetricsText } from '../lib/metrics.js';
import { RELYING_PARTIES, describeKey, type TokenKey } from '../types/auth.js';
import { createBroker, runAction, withInterrupt } from './shared.js';

const RESOLVABLE_KINDS = ['access', 'user', 'xsts', 'service'] as const;
type ResolvableKind = (typeof RESOLVABLE_KINDS)[number];

interface TokenOptions {
  rp?: string;
  json?: boolean;
  metrics?: boolean;
}

const RELYING_PARTY_ALIASES: Record<string, string> = {
  gaming: RELYING_PARTIES.gaming,
  'game-services': RELYING_PARTIES.gameServices,
};

function isResolvableKind(value: string): value is ResolvableKind {
  return RESOLVABLE_KINDS.some((kind) => kind === value);
}

/**
 * 將 CLI 參數轉為權杖鍵；--rp 接受別名或完整的 relying party
 */
export function parseTokenKey(kind: string, rp?: string): TokenKey {
  if (!isResolvableKind(kind)) {
    throw new Error(`Unknown token kind "${kind}" (expected ${RESOLVABLE_KINDS.join(', ')})`);
  }
  if (kind === 'xsts') {
    const relyingParty = rp ?? RELYING_PARTIES.gaming;
    return { kind, relyingParty: RELYING_PARTY_ALIASES[relyingParty] ?? relyingParty };
  }
  if (rp !== undefined) {
    throw new Error('--rp only applies to xsts tokens');
  }
  return { kind };
}

/**
 * xtb token <kind> [--rp <relyingParty>] [--json] [--metrics]
 */
export const tokenCommand = new Command('token')
  .description('取得有效的權杖（access | user | xsts | service）')
  .argument('<kind>', `權杖種類: ${RESOLVABLE_KINDS.join(' | ')}`)
  .option('--rp <relyingParty>', 'XSTS relying party（gaming | game-services | URL）')
  .option('--json', '輸出 JSON 格式')
  .option('--metrics', '完成後將 Prometheus 指標輸出到 stderr')
  .action(
    runAction(async (kind: string, options: TokenOptions) => {
      const key = parseTokenKey(kind, options.rp);
      const { resolver } = createBroker();

      try {
        const token = await withInterrupt((signal) => resolver.ensure(key, { signal }));

        if (options.json) {
          console.log(
            JSON.stringify(
              {
                token: describeKey(key),
                value: token.value,
                userHash: token.userHash ?? null,
                expiresAt: token.expiresAt === undefined ? null : new Date(token.expiresAt).toISOString(),
              },
              null,
              2
            )
          );
        } else {
          console.log(token.value);
        }
      } finally {
        if (options.metrics) {
          console.error(await getMetricsText());
        }
      }
    })
  );
