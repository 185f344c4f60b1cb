import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import {
  CancelledError,
  NeedsInteractiveAuthError,
  NetworkError,
  StorageError,
} from '../../src/lib/errors.js';
import { loggers } from '../../src/lib/logger.js';
import {
  EXIT_FAILURE,
  EXIT_INTERRUPTED,
  EXIT_NEEDS_LOGIN,
  EXIT_USAGE,
  MissingClientIdError,
  createBroker,
  exitCodeFor,
  openStore,
  runAction,
  withInterrupt,
} from '../../src/commands/shared.js';
import { ConfigService } from '../../src/services/config.js';

describe('command helpers', () => {
  let tempDir: string;
  let config: ConfigService;

  beforeEach(() => {
    vi.stubEnv('XTB_CLIENT_ID', '');
    vi.stubEnv('XTB_TOKEN_FILE', '');
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'xtb-shared-'));
    config = new ConfigService(path.join(tempDir, 'config.json'));
    config.set('tokenFile', path.join(tempDir, 'tokens.json'));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
    process.exitCode = undefined;
  });

  describe('exitCodeFor', () => {
    it.each([
      [new NeedsInteractiveAuthError(), EXIT_NEEDS_LOGIN],
      [new MissingClientIdError(), EXIT_NEEDS_LOGIN],
      [new CancelledError(), EXIT_INTERRUPTED],
      [new NetworkError('offline', 'https://example.test'), EXIT_FAILURE],
      [new StorageError('read-only'), EXIT_FAILURE],
      [new Error('Unknown token kind "foo"'), EXIT_USAGE],
    ])('%s → %i', (error, code) => {
      expect(exitCodeFor(error)).toBe(code);
    });
  });

  describe('createBroker', () => {
    it('should require a client id', () => {
      expect(() => createBroker(config)).toThrow(MissingClientIdError);
    });

    it('should accept the client id from the environment', () => {
      vi.stubEnv('XTB_CLIENT_ID', 'test-client');

      const broker = createBroker(config);

      expect(broker.config).toBe(config);
      expect(broker.store.list()).toEqual([]);
    });
  });

  describe('openStore', () => {
    it('should open the configured token file without a client id', () => {
      const { store } = openStore(config);
      store.set({ kind: 'refresh' }, { value: 'test-refresh' });

      expect(fs.existsSync(path.join(tempDir, 'tokens.json'))).toBe(true);
    });
  });

  describe('runAction', () => {
    it('should print the error and set the exit code', async () => {
      const stderr = vi.spyOn(console, 'error').mockImplementation(() => undefined);
      vi.spyOn(loggers.cli, 'error').mockImplementation(() => undefined);

      await runAction(async () => {
        throw new NeedsInteractiveAuthError();
      })();

      expect(stderr).toHaveBeenCalledWith('❌ Interactive sign-in required, run `xtb login`');
      expect(process.exitCode).toBe(EXIT_NEEDS_LOGIN);
    });

    it('should print a short notice when interrupted', async () => {
      const stderr = vi.spyOn(console, 'error').mockImplementation(() => undefined);
      vi.spyOn(loggers.cli, 'error').mockImplementation(() => undefined);

      await runAction(async () => {
        throw new CancelledError();
      })();

      expect(stderr).toHaveBeenCalledWith('⚠️  已中斷');
      expect(process.exitCode).toBe(EXIT_INTERRUPTED);
    });
  });

  describe('withInterrupt', () => {
    it('should remove its SIGINT listener when done', async () => {
      const before = process.listenerCount('SIGINT');

      const aborted = await withInterrupt(async (signal) => {
        expect(process.listenerCount('SIGINT')).toBe(before + 1);
        return signal.aborted;
      });

      expect(aborted).toBe(false);
      expect(process.listenerCount('SIGINT')).toBe(before);
    });
  });
});
