import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'node:fs';
import path from 'node:path';
import os from 'node:os';
import { AssistantClient } from '../../src/services/assistant-client.js';
import { ModeGate } from '../../src/services/mode-gate.js';
import { StaticTokenProvider } from '../../src/services/auth.js';
import { StructuredLogger } from '../../src/lib/logger.js';
import { ConfigurationError, WriteDisabledError } from '../../src/lib/errors.js';
import { FakeTransport, envelope, ok } from '../helpers/fake-transport.js';

const silent = new StructuredLogger('API', { sink: () => {} });

describe('AssistantClient', () => {
  let transport: FakeTransport;

  beforeEach(() => {
    transport = new FakeTransport();
  });

  describe('read-only mode', () => {
    let tokens: StaticTokenProvider;
    let client: AssistantClient;

    beforeEach(() => {
      tokens = new StaticTokenProvider('test-access');
      vi.spyOn(tokens, 'ensureValidToken');
      client = new AssistantClient(tokens, new ModeGate('read-only', silent), { transport, logger: silent });
    });

    it('should block every write before any token or HTTP call', async () => {
      await expect(
        client.events.create({ team_id: 456, name: 'Practice', start_date: '2025-01-15T14:00:00Z' })
      ).rejects.toThrow(WriteDisabledError);
      await expect(client.events.update(31, { name: 'Scrimmage' })).rejects.toThrow(WriteDisabledError);
      await expect(client.members.delete(12)).rejects.toThrow(WriteDisabledError);
      await expect(client.availabilities.update(5, { status: 'yes' })).rejects.toThrow(WriteDisabledError);
      await expect(client.request('POST', '/events')).rejects.toThrow(
        'Write operation blocked: POST /events is not allowed in read-only mode'
      );

      expect(transport.send).not.toHaveBeenCalled();
      expect(tokens.ensureValidToken).not.toHaveBeenCalled();
    });

    it('should still allow reads', async () => {
      transport.reply(ok(envelope([{ fields: { id: 456, name: 'Tigers' } }])));

      const team = await client.teams.get(456);

      expect(team.data.name).toBe('Tigers');
      expect(client.mode).toBe('read-only');
      expect(client.isReadOnly()).toBe(true);
    });

    it('should allow GET through the generic request', async () => {
      transport.reply(ok({ ok: true }));

      await expect(client.request('GET', '/health')).resolves.toEqual({
        kind: 'raw',
        status: 200,
        body: { ok: true },
      });
    });
  });

  it('should send writes in read-write mode', async () => {
    const client = new AssistantClient(
      new StaticTokenProvider('test-access'),
      new ModeGate('read-write', silent),
      { transport, logger: silent }
    );
    transport.reply(ok(envelope([{ fields: { id: 31, name: 'Practice' } }]), 201));

    const event = await client.events.create({ team_id: 456, name: 'Practice', start_date: '2025-01-15T14:00:00Z' });

    expect(event.data.id).toBe(31);
    expect(transport.requests[0].headers.Authorization).toBe('Bearer test-access');
  });

  describe('fromEnv', () => {
    let testDir: string;

    beforeEach(() => {
      testDir = fs.mkdtempSync(path.join(os.tmpdir(), 'teamsnap-assistant-'));
    });

    afterEach(() => {
      fs.rmSync(testDir, { recursive: true, force: true });
    });

    it('should use the access token override and default to read-only', async () => {
      const client = AssistantClient.fromEnv(
        { TEAMSNAP_ACCESS_TOKEN: 'test-access', TEAMSNAP_CONFIG: path.join(testDir, 'missing.json') },
        { transport, logger: silent }
      );
      transport.reply(ok(envelope([])));

      await client.getRoot();

      expect(client.mode).toBe('read-only');
      expect(transport.requests[0].headers.Authorization).toBe('Bearer test-access');
    });

    it('should honour TEAMSNAP_READONLY=false', () => {
      const client = AssistantClient.fromEnv(
        { TEAMSNAP_ACCESS_TOKEN: 'test-access', TEAMSNAP_READONLY: 'false' },
        { transport, logger: silent }
      );

      expect(client.mode).toBe('read-write');
    });

    it('should require credentials without a token override', () => {
      expect(() =>
        AssistantClient.fromEnv({ TEAMSNAP_CONFIG: path.join(testDir, 'missing.json') }, { logger: silent })
      ).toThrow(ConfigurationError);
    });

    it('should read stored tokens from the config file', async () => {
      const configPath = path.join(testDir, 'config.json');
      fs.writeFileSync(
        configPath,
        JSON.stringify({
          teamsnap: {
            client_id: 'test-client-id',
            client_secret: 'test-secret',
            access_token: 'stored-access',
          },
        })
      );
      const client = AssistantClient.fromEnv({ TEAMSNAP_CONFIG: configPath }, { transport, logger: silent });
      transport.reply(ok(envelope([])));

      await client.getRoot();

      expect(transport.requests[0].headers.Authorization).toBe('Bearer stored-access');
    });
  });
});
