/**
 * @fileoverview Tests for the reset command
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { createFakeTransferApi, RecordingIO } from '../../../__tests__/helpers/fake-transfer-api.js';
import { createContext, type RuntimeContext } from '../../../runtime/index.js';

describe('reset command', () => {
  let io: RecordingIO;
  let context: RuntimeContext;

  beforeEach(() => {
    io = new RecordingIO();
    context = createContext({ api: createFakeTransferApi(), io });
    context.local.set('tui.poll', 1);
    context.local.set('connect.port', 8080);
  });

  afterEach(() => {
    context.dispose();
  });

  it('should reset every named setting', async () => {
    expect(await context.run('reset tui.poll, connect.port')).toBe(true);
    expect(context.settings.get('tui.poll').toString()).toBe('5');
    expect(context.settings.get('connect.port').toString()).toBe('9091');
  });

  it('should reset the remaining settings when one fails', async () => {
    expect(await context.run('reset srv.port nope tui.poll')).toBe(false);
    expect(io.errors).toEqual(['Remote settings cannot be reset: srv.port', 'Unknown setting: nope']);
    expect(context.settings.get('tui.poll').toString()).toBe('5');
  });

  it('should require a name', async () => {
    expect(await context.run('reset')).toBe(false);
    expect(io.errors).toEqual(['Missing setting name']);
  });
});
