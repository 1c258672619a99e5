import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { TeamSnapClient } from '../../src/services/client.js';
import { StaticTokenProvider } from '../../src/services/auth.js';
import { StructuredLogger } from '../../src/lib/logger.js';
import { FakeTransport, envelope, ok } from '../helpers/fake-transport.js';

// Mock 共用的 API client
vi.mock('../../src/lib/api-client.js', () => ({
  getApiClient: vi.fn(),
  clearApiClientCache: vi.fn(),
}));

import { getApiClient } from '../../src/lib/api-client.js';
import { cli } from '../../src/cli.js';

const run = (...args: string[]) => cli.parseAsync(['node', 'teamsnap', ...args]);
const spyOnLog = () => vi.spyOn(console, 'log').mockImplementation(() => {});

describe('CLI commands', () => {
  let transport: FakeTransport;
  let log: ReturnType<typeof spyOnLog>;
  const printedJSON = (index = 0): unknown => JSON.parse(String(log.mock.calls[index][0]));

  beforeEach(() => {
    vi.clearAllMocks();
    transport = new FakeTransport();
    const client = new TeamSnapClient(new StaticTokenProvider('test-access'), {
      transport,
      logger: new StructuredLogger('API', { sink: () => {} }),
    });
    vi.mocked(getApiClient).mockReturnValue(client);
    log = spyOnLog();
  });

  afterEach(() => {
    vi.restoreAllMocks();
    process.exitCode = undefined;
  });

  describe('members', () => {
    it('should print members as JSON', async () => {
      transport.reply(
        ok(envelope([{ fields: { id: 1, first_name: 'Ana', last_name: 'Lopez', is_manager: true } }]))
      );

      await run('-f', 'json', 'members', '--team', '456');

      expect(printedJSON()).toEqual([{ id: 1, first_name: 'Ana', last_name: 'Lopez', is_manager: true }]);
      expect(transport.requests[0].query).toEqual({ team_id: 456 });
    });

    it('should print API errors as a JSON payload and set the exit code', async () => {
      transport.reply(ok({ collection: { error: { message: 'Forbidden' } } }, 403));

      await run('-f', 'json', 'members', '--team', '456');

      expect(printedJSON()).toEqual({
        success: false,
        error: {
          code: 'API_ERROR',
          message: 'GET /members/search failed with 403: Forbidden',
          hint: 'The authorized user lacks permission for this resource.',
        },
      });
      expect(process.exitCode).toBe(1);
    });
  });

  describe('teams', () => {
    it('should look up the authorized user when --user is omitted', async () => {
      transport.reply(
        ok(envelope([{ fields: { id: 77, first_name: 'Ana' } }])),
        ok(envelope([{ fields: { id: 456, name: 'Tigers' } }]))
      );

      await run('-f', 'table', 'teams');

      expect(transport.requests[0].url).toBe('https://api.teamsnap.com/v3/me');
      expect(transport.requests[1].query).toEqual({ user_id: 77 });
      expect(log.mock.calls[1][0]).toBe('\n1 result(s)');
    });
  });

  describe('events', () => {
    it('should pass the date filters', async () => {
      transport.reply(ok(envelope([])));

      await run('-f', 'json', 'events', '--team', '456', '--after', '2025-01-01T00:00:00Z');

      expect(transport.requests[0]).toMatchObject({
        url: 'https://api.teamsnap.com/v3/events/search',
        query: { team_id: 456, started_after: '2025-01-01T00:00:00Z' },
      });
      expect(printedJSON()).toEqual([]);
    });
  });

  describe('api', () => {
    it('should decode a generic request', async () => {
      transport.reply(ok(envelope([{ fields: { id: 3, title: 'Carpool' } }], { version: '3.867.0' })));

      await run('-f', 'json', 'api', 'request', 'get', '/forum_topics/search', '-q', 'team_id=456');

      expect(transport.requests[0]).toMatchObject({ method: 'GET', query: { team_id: '456' } });
      expect(printedJSON()).toEqual({
        status: 200,
        version: '3.867.0',
        records: [{ id: 3, title: 'Carpool' }],
        links: {},
      });
    });

    it('should list deprecated links', async () => {
      transport.reply(
        ok(
          envelope([], {
            links: [{ rel: 'old_teams', href: 'https://api.teamsnap.com/v3/old_teams', deprecated: true }],
          })
        )
      );

      await run('-f', 'table', 'api', 'deprecations');

      expect(log.mock.calls.map((call) => call[0])).toEqual([
        '⚠️  1 deprecated link(s) on /:',
        '  - old_teams: https://api.teamsnap.com/v3/old_teams',
      ]);
    });
  });
});
