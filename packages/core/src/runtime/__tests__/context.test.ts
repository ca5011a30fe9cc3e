/**
 * @fileoverview Tests for the runtime context
 */

import { describe, it, expect } from 'vitest';
import { createFakeTransferApi, RecordingIO } from '../../__tests__/helpers/fake-transfer-api.js';
import { createContext } from '../context.js';

describe('createContext', () => {
  it('should register local and remote settings', () => {
    const context = createContext({ api: createFakeTransferApi(), io: new RecordingIO() });
    expect(context.settings.has('connect.host')).toBe(true);
    expect(context.settings.isRemote('srv.dht')).toBe(true);
    context.dispose();
  });

  it('should keep the converter in sync with unit settings', async () => {
    const context = createContext({ api: createFakeTransferApi(), io: new RecordingIO() });
    expect(context.converter.unit).toBe('B');
    expect(context.converter.prefix).toBe('metric');

    await context.run('set unit.bandwidth bit');
    await context.run('set unitprefix.bandwidth binary');
    expect(context.converter.unit).toBe('b');
    expect(context.converter.prefix).toBe('binary');

    context.dispose();
    await context.run('set unit.bandwidth byte');
    expect(context.converter.unit).toBe('b');
  });

  it('should convert remote rate limits with the current unit', async () => {
    const context = createContext({ api: createFakeTransferApi(), io: new RecordingIO() });
    await context.run('set unit.bandwidth bit');
    await context.settings.update();
    expect(context.settings.get('srv.limit.rate.up').toString()).toBe('400b');
    context.dispose();
  });

  it('should hand the interface name to commands', async () => {
    const io = new RecordingIO();
    const context = createContext({
      api: createFakeTransferApi(),
      io,
      interface: 'tui',
      customCommands: [{
        name: 'where',
        description: 'Print the interface',
        usage: ['where'],
        interfaces: ['tui'],
        handler: async (_args, ctx) => {
          ctx.io.output(ctx.interface);
        },
      }],
    });
    expect(await context.run('where')).toBe(true);
    expect(io.outputs).toEqual(['tui']);
    context.dispose();
  });
});
