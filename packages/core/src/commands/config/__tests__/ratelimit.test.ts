/**
 * @fileoverview Tests for the ratelimit command
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
  createFakeTransferApi,
  RecordingIO,
  type FakeTransferApi,
} from '../../../__tests__/helpers/fake-transfer-api.js';
import { createContext, type RuntimeContext } from '../../../runtime/index.js';
import { parseDirections } from '../ratelimit.js';

describe('parseDirections', () => {
  it('should accept up, down and dn', () => {
    expect(parseDirections('up')).toEqual(['up']);
    expect(parseDirections('DN,up,down')).toEqual(['down', 'up']);
  });

  it('should reject anything else', () => {
    expect(() => parseDirections('up,left')).toThrow("Invalid direction: 'left'");
  });
});

describe('ratelimit command', () => {
  let api: FakeTransferApi;
  let io: RecordingIO;
  let context: RuntimeContext;

  beforeEach(() => {
    api = createFakeTransferApi();
    io = new RecordingIO();
    context = createContext({ api, io });
  });

  afterEach(() => {
    context.dispose();
  });

  describe('global limits', () => {
    it('should show both limits by default', async () => {
      expect(await context.run('ratelimit')).toBe(true);
      expect(io.outputs).toEqual(['Global upload rate limit: 50B', 'Global download rate limit: ∞']);
    });

    it('should show limits in the configured unit', async () => {
      await context.run('set unit.bandwidth bit');
      expect(await context.run('rl up show')).toBe(true);
      expect(io.outputs).toEqual(['Global upload rate limit: 400b']);
    });

    it('should set limits', async () => {
      expect(await context.run('ratelimit up 1M')).toBe(true);
      expect(api.settings.state.rateLimitUp).toBe(1000000);
      expect(io.infos).toEqual(['Global upload rate limit: 1MB']);
    });

    it('should lift limits', async () => {
      expect(await context.run('ratelimit up,dn off global')).toBe(true);
      expect(api.settings.state.rateLimitUp).toBeNull();
      expect(api.settings.state.rateLimitDown).toBeNull();
      expect(io.infos).toEqual(['Global upload rate limit: ∞', 'Global download rate limit: ∞']);
    });

    it('should adjust limits', async () => {
      expect(await context.run('ratelimit up +=100')).toBe(true);
      expect(api.settings.state.rateLimitUp).toBe(150);
    });

    it('should be quiet on request', async () => {
      expect(await context.run('ratelimit --quiet up 1M')).toBe(true);
      expect(io.infos).toEqual([]);
    });

    it('should report invalid limits', async () => {
      expect(await context.run('ratelimit up -5')).toBe(false);
      expect(io.errors).toEqual(['srv.limit.rate.up = -5: Too small (minimum is 0)']);
    });

    it('should keep going when one direction fails', async () => {
      expect(await context.run('ratelimit down,up -5')).toBe(false);
      expect(io.errors).toEqual([
        'srv.limit.rate.down = -5: Too small (minimum is 0)',
        'srv.limit.rate.up = -5: Too small (minimum is 0)',
      ]);
    });
  });

  describe('torrent limits', () => {
    it('should send limits to matching torrents', async () => {
      expect(await context.run('ratelimit up 100k id=1')).toBe(true);
      expect(api.torrent.requests).toEqual([
        { method: 'setLimitRate', filter: 'id=1', direction: 'up', value: '100k' },
      ]);
      expect(io.infos).toEqual(['Limited upload rate of id=1 to 100k']);
    });

    it('should send relative changes as signed numbers', async () => {
      expect(await context.run('ratelimit dn +=10k ubuntu iso')).toBe(true);
      expect(api.torrent.requests).toEqual([
        { method: 'adjustLimitRate', filter: 'ubuntu iso', direction: 'down', value: '+10k' },
      ]);
      expect(io.infos).toEqual(['Adjusted download rate of ubuntu iso by +10k']);
    });

    it('should fail when no torrents match', async () => {
      api.torrent.success = false;
      expect(await context.run('ratelimit up,down 1M id=2')).toBe(false);
      expect(io.errors).toEqual(['No matching torrents', 'No matching torrents']);
      expect(api.torrent.requests).toHaveLength(2);
    });

    it('should show limits of matching torrents', async () => {
      api.torrent.torrentList = [
        { name: 'debian.iso', 'limit-rate-up': '1MB', 'limit-rate-down': '∞' },
      ];
      expect(await context.run('ratelimit up,down show debian')).toBe(true);
      expect(api.torrent.requests).toEqual([{ method: 'torrents', filter: 'debian' }]);
      expect(io.outputs).toEqual([
        'debian.iso upload rate limit: 1MB',
        'debian.iso download rate limit: ∞',
      ]);
    });
  });

  it('should reject invalid directions', async () => {
    expect(await context.run('ratelimit sideways 1M')).toBe(false);
    expect(io.errors).toEqual(["Invalid direction: 'sideways'"]);
  });
});
