/**
 * Game Services Client
 * 以解析後的權杖呼叫下游 API：Minecraft 個人資料、授權項目，以及 Xbox 玩家搜尋
 */

import { ofetch } from 'ofetch';
import * as v from 'valibot';
import { UpstreamRejectedError } from '../lib/errors.js';
import { loggers } from '../lib/logger.js';
import { RELYING_PARTIES } from '../types/auth.js';
import type { EnsureOptions, TokenResolver } from './token-resolver.js';
import { classifyFetchError, decode } from './xbox-auth.js';

const PROFILE_ENDPOINT = 'https://api.minecraftservices.com/minecraft/profile';
const ENTITLEMENTS_ENDPOINT = 'https://api.minecraftservices.com/entitlements/mcstore';
const PEOPLE_SEARCH_ENDPOINT =
  'https://peoplehub.xboxlive.com/users/me/people/search/decoration/detail,preferredColor';

const DEFAULT_SEARCH_LIMIT = 25;

// 只驗證 CLI 會用到的欄位，其餘欄位原樣保留
const ProfileSchema = v.looseObject({
  id: v.string(),
  name: v.string(),
});

const EntitlementsSchema = v.looseObject({
  items: v.array(
    v.looseObject({
      name: v.string(),
      source: v.optional(v.string()),
    })
  ),
});

const PeopleSearchSchema = v.looseObject({
  people: v.array(
    v.looseObject({
      xuid: v.string(),
      gamertag: v.string(),
    })
  ),
});

export type GameProfile = v.InferOutput<typeof ProfileSchema>;
export type Entitlements = v.InferOutput<typeof EntitlementsSchema>;
export type PeopleSearchResult = v.InferOutput<typeof PeopleSearchSchema>;

export class GameServicesClient {
  private resolver: TokenResolver;

  constructor(resolver: TokenResolver) {
    this.resolver = resolver;
  }

  /**
   * 取得 Minecraft Java 版個人資料；404 代表帳號沒有購買
   */
  async getProfile(options: EnsureOptions = {}): Promise<GameProfile> {
    const token = await this.resolver.getServiceToken(options);
    try {
      const data = await this.get(PROFILE_ENDPOINT, 'Profile request', { Authorization: `Bearer ${token}` }, options.signal);
      return decode(ProfileSchema, data, 'profile');
    } catch (error) {
      if (error instanceof UpstreamRejectedError && error.status === 404) {
        throw new UpstreamRejectedError(
          'No game profile found, the account may not own Minecraft Java Edition',
          { status: 404, errorCode: error.errorCode, body: error.body },
          error
        );
      }
      throw error;
    }
  }

  async getEntitlements(options: EnsureOptions = {}): Promise<Entitlements> {
    const token = await this.resolver.getServiceToken(options);
    const data = await this.get(
      ENTITLEMENTS_ENDPOINT,
      'Entitlements request',
      { Authorization: `Bearer ${token}` },
      options.signal
    );
    return decode(EntitlementsSchema, data, 'entitlements');
  }

  /**
   * 以玩家代號搜尋 Xbox 玩家
   */
  async searchPeople(
    query: string,
    options: EnsureOptions & { maxItems?: number } = {}
  ): Promise<PeopleSearchResult> {
    const identity = await this.resolver.getIdentityHeader(RELYING_PARTIES.gaming, options);
    const params = new URLSearchParams({
      q: query,
      maxItems: String(options.maxItems ?? DEFAULT_SEARCH_LIMIT),
    });
    const data = await this.get(
      `${PEOPLE_SEARCH_ENDPOINT}?${params.toString()}`,
      'People search',
      {
        Authorization: identity,
        'x-xbl-contract-version': '3',
        'Accept-Language': 'en-US',
      },
      options.signal
    );
    return decode(PeopleSearchSchema, data, 'people search');
  }

  private async get(
    url: string,
    label: string,
    headers: Record<string, string>,
    signal?: AbortSignal
  ): Promise<unknown> {
    loggers.exchange.debug('Lookup request started', { url });
    try {
      return await ofetch<unknown>(url, {
        method: 'GET',
        headers: { Accept: 'application/json', ...headers },
        signal,
        retry: 0,
      });
    } catch (error) {
      throw classifyFetchError(error, label, url, signal);
    }
  }
}
