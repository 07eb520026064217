import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import {
  noopLogger,
  consoleLogger,
  createPrefixedLogger,
  createRecordingLogger,
  type Logger,
} from '../../src/core/logger.js';
import { Chain } from '../../src/chain/chain.js';
import { HyperlaneAdapter } from '../../src/bridge/protocols/hyperlane-adapter.js';
import { MockMailbox } from '../mocks/transports.js';
import { send } from '../helpers.js';

describe('Logger', () => {
  it('noopLogger accepts every level', () => {
    expect(() => noopLogger.debug('test')).not.toThrow();
    expect(() => noopLogger.error('test', { error: 'something' })).not.toThrow();
  });

  describe('consoleLogger', () => {
    let infoSpy: ReturnType<typeof vi.spyOn>;
    let errorSpy: ReturnType<typeof vi.spyOn>;

    beforeEach(() => {
      infoSpy = vi.spyOn(console, 'info').mockImplementation(() => {});
      errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    });

    afterEach(() => {
      vi.restoreAllMocks();
    });

    it('writes the level tag and passes context through', () => {
      consoleLogger.info('info message', { count: 42 });
      expect(infoSpy).toHaveBeenCalledWith('[INFO] info message', { count: 42 });
    });

    it('omits the context argument when there is none', () => {
      consoleLogger.error('error message');
      expect(errorSpy).toHaveBeenCalledWith('[ERROR] error message');
    });
  });

  describe('createPrefixedLogger', () => {
    it('nests prefixes', () => {
      const mockLogger: Logger = {
        debug: vi.fn(),
        info: vi.fn(),
        warn: vi.fn(),
        error: vi.fn(),
      };

      const child = createPrefixedLogger(createPrefixedLogger(mockLogger, 'Parent'), 'Child');
      child.warn('message', { key: 'value' });
      expect(mockLogger.warn).toHaveBeenCalledWith('[Parent] [Child] message', { key: 'value' });
    });
  });

  describe('createRecordingLogger', () => {
    it('keeps entries in order', () => {
      const { logger, entries } = createRecordingLogger();
      logger.debug('first');
      logger.warn('second', { n: 2 });
      expect(entries).toEqual([
        { level: 'debug', message: 'first' },
        { level: 'warn', message: 'second', context: { n: 2 } },
      ]);
    });

    it('receives contract logs prefixed with chain and contract', () => {
      const { logger, entries } = createRecordingLogger();
      const chain = new Chain({ chainId: 1, logger });
      const owner = chain.createAccount('owner');
      const adapter = new HyperlaneAdapter(chain, {
        name: 'Hyperlane',
        owner,
        treasury: chain.createAccount('treasury'),
        chainIds: [],
        domainIds: [],
        mailbox: new MockMailbox(chain),
      });

      send(owner, adapter, () => {
        adapter.configureRoutes([{ chainId: 10, domainId: 10n, trustedAdapter: chain.createAccount('remote') }]);
      });

      expect(entries).toContainEqual({
        level: 'info',
        message: '[chain 1] [Hyperlane] Configured routes',
        context: { chainIds: [10] },
      });
    });
  });
});
