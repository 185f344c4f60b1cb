import { describe, it, expect, beforeEach, vi } from 'vitest';

vi.mock('ofetch', async (importOriginal) => {
  const actual = await importOriginal<typeof import('ofetch')>();
  return { ...actual, ofetch: vi.fn() };
});

import { ofetch, FetchError } from 'ofetch';
import { MalformedResponseError, NeedsInteractiveAuthError, UpstreamRejectedError } from '../../src/lib/errors.js';
import { GameServicesClient } from '../../src/services/game-services.js';
import { TokenResolver } from '../../src/services/token-resolver.js';
import { MemoryTokenStore } from '../../src/services/token-store.js';
import { RELYING_PARTIES } from '../../src/types/auth.js';
import { FakeExchanger, HOUR_MS, createClock } from '../helpers/fake-exchanger.js';

const mockedFetch = vi.mocked(ofetch);

describe('GameServicesClient', () => {
  let store: MemoryTokenStore;
  let exchanger: FakeExchanger;
  let client: GameServicesClient;

  beforeEach(() => {
    mockedFetch.mockReset();
    const clock = createClock();
    store = new MemoryTokenStore({ now: clock.now });
    exchanger = new FakeExchanger(clock.now);
    client = new GameServicesClient(new TokenResolver(store, exchanger, { now: clock.now }));

    store.setMany([
      { key: { kind: 'service' }, token: { value: 'test-service', expiresAt: clock.now() + HOUR_MS } },
      {
        key: { kind: 'xsts', relyingParty: RELYING_PARTIES.gaming },
        token: { value: 'test-xsts', expiresAt: clock.now() + HOUR_MS, userHash: 'uhs-test' },
      },
    ]);
  });

  describe('getProfile', () => {
    it('should call the profile endpoint with the service token', async () => {
      mockedFetch.mockResolvedValueOnce({ id: 'profile-id', name: 'Tester', skins: [] });

      const profile = await client.getProfile();

      expect(profile).toEqual({ id: 'profile-id', name: 'Tester', skins: [] });
      expect(mockedFetch).toHaveBeenCalledWith('https://api.minecraftservices.com/minecraft/profile', {
        method: 'GET',
        headers: { Accept: 'application/json', Authorization: 'Bearer test-service' },
        signal: undefined,
        retry: 0,
      });
      expect(exchanger.calls).toHaveLength(0);
    });

    it('should explain a missing profile', async () => {
      const notFound = new FetchError('[GET] profile: 404');
      notFound.statusCode = 404;
      notFound.data = { path: '/minecraft/profile', error: 'NOT_FOUND' };
      mockedFetch.mockRejectedValueOnce(notFound);

      const error = await client.getProfile().catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(UpstreamRejectedError);
      expect(error).toMatchObject({
        status: 404,
        errorCode: 'NOT_FOUND',
        message: 'No game profile found, the account may not own Minecraft Java Edition',
      });
    });

    it('should reject a profile without an id', async () => {
      mockedFetch.mockResolvedValueOnce({ name: 'Tester' });

      await expect(client.getProfile()).rejects.toBeInstanceOf(MalformedResponseError);
    });

    it('should require sign-in when no token can be derived', async () => {
      store.clear();

      await expect(client.getProfile()).rejects.toBeInstanceOf(NeedsInteractiveAuthError);
      expect(mockedFetch).not.toHaveBeenCalled();
    });
  });

  describe('getEntitlements', () => {
    it('should return the entitlement items', async () => {
      mockedFetch.mockResolvedValueOnce({
        items: [{ name: 'game_minecraft', source: 'PURCHASE' }, { name: 'product_minecraft' }],
        signature: 'test-signature',
      });

      const entitlements = await client.getEntitlements();

      expect(entitlements.items.map((item) => item.name)).toEqual(['game_minecraft', 'product_minecraft']);
    });
  });

  describe('searchPeople', () => {
    it('should send the identity header for the gaming relying party', async () => {
      mockedFetch.mockResolvedValueOnce({ people: [{ xuid: '1234', gamertag: 'Test Player', isFollowingCaller: false }] });

      const result = await client.searchPeople('Test Player', { maxItems: 5 });

      expect(result.people).toEqual([{ xuid: '1234', gamertag: 'Test Player', isFollowingCaller: false }]);
      expect(mockedFetch).toHaveBeenCalledWith(
        'https://peoplehub.xboxlive.com/users/me/people/search/decoration/detail,preferredColor?q=Test+Player&maxItems=5',
        expect.objectContaining({
          headers: {
            Accept: 'application/json',
            Authorization: 'XBL3.0 x=uhs-test;test-xsts',
            'x-xbl-contract-version': '3',
            'Accept-Language': 'en-US',
          },
        })
      );
    });

    it('should default to 25 results', async () => {
      mockedFetch.mockResolvedValueOnce({ people: [] });

      await client.searchPeople('tester');

      expect(mockedFetch.mock.calls[0]?.[0]).toBe(
        'https://peoplehub.xboxlive.com/users/me/people/search/decoration/detail,preferredColor?q=tester&maxItems=25'
      );
    });
  });
});
