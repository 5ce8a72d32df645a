import { describe, it, expect, vi, beforeEach } from 'vitest';
import { CommandDispatcher } from '../../src/engine/CommandDispatcher';
import { EntityReconciler } from '../../src/engine/EntityReconciler';
import { AuthError, TransportError } from '../../src/utils/errors';
import { Capability } from '../../src/engine/capabilities';
import { createFakeClient, playbackState } from '../helpers/fixtures';
import type { FakeClient } from '../helpers/fixtures';

// Mock the logger
vi.mock('../../src/core/Logger', () => ({
  createLogger: () => ({
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  }),
}));

function apiCalls(client: FakeClient): number {
  return (
    client.sendPlaystateCommand.mock.calls.length +
    client.sendGeneralCommand.mock.calls.length +
    client.sendMessage.mock.calls.length
  );
}

describe('CommandDispatcher', () => {
  let client: FakeClient;
  let reconciler: EntityReconciler;
  let dispatcher: CommandDispatcher;
  let tick: number;

  beforeEach(() => {
    client = createFakeClient();
    reconciler = new EntityReconciler();
    reconciler.reconcile([playbackState()], 1);
    tick = 1;
    dispatcher = new CommandDispatcher(reconciler, client, {
      staleTolerancePolls: 1,
      currentTick: () => tick,
    });
  });

  describe('rejections', () => {
    it('should reject an unknown entity without calling the API', async () => {
      const result = await dispatcher.dispatch('nobody', { type: 'pause' });

      expect(result).toEqual({
        ok: false,
        error: { code: 'UnknownEntity', message: 'No media player for user nobody' },
      });
      expect(apiCalls(client)).toBe(0);
    });

    it('should reject an Idle entity with NoActiveSession', async () => {
      reconciler.reconcile([], 2);
      const result = await dispatcher.dispatch('user-1', { type: 'pause' });

      expect(result).toEqual({
        ok: false,
        error: { code: 'NoActiveSession', message: 'Nothing is playing for user user-1 (last session session-1)' },
      });
      expect(apiCalls(client)).toBe(0);
    });

    it('should reject a command the client cannot perform', async () => {
      reconciler.reconcile(
        [playbackState({ capabilityMask: Capability.CanPause, client: 'Kodi', deviceName: 'Living Room' })],
        2
      );
      tick = 2;
      const result = await dispatcher.dispatch('user-1', { type: 'seek', seconds: 30 });

      expect(result).toEqual({
        ok: false,
        error: { code: 'Unsupported', message: 'Kodi on Living Room does not support seek' },
      });
      expect(apiCalls(client)).toBe(0);
    });

    it('should reject a non-finite seek position', async () => {
      const result = await dispatcher.dispatch('user-1', { type: 'seek', seconds: Number.NaN });

      expect(result.ok ? null : result.error.code).toBe('InvalidArgument');
      expect(apiCalls(client)).toBe(0);
    });
  });

  describe('api calls', () => {
    it('should map play and pause to Unpause and Pause', async () => {
      await dispatcher.dispatch('user-1', { type: 'play' });
      await dispatcher.dispatch('user-1', { type: 'pause' });

      expect(client.sendPlaystateCommand.mock.calls).toEqual([
        ['session-1', 'Unpause'],
        ['session-1', 'Pause'],
      ]);
    });

    it('should send exactly one call per command', async () => {
      const result = await dispatcher.dispatch('user-1', { type: 'next' });

      expect(result).toEqual({ ok: true, sessionId: 'session-1' });
      expect(apiCalls(client)).toBe(1);
      expect(client.sendPlaystateCommand).toHaveBeenCalledWith('session-1', 'NextTrack');
    });

    it('should convert seek seconds to ticks', async () => {
      await dispatcher.dispatch('user-1', { type: 'seek', seconds: 90.5 });

      expect(client.sendPlaystateCommand).toHaveBeenCalledWith('session-1', 'Seek', {
        seekPositionTicks: 905_000_000,
      });
    });

    it('should clamp negative seek positions to 0', async () => {
      await dispatcher.dispatch('user-1', { type: 'seek', seconds: -10 });

      expect(client.sendPlaystateCommand).toHaveBeenCalledWith('session-1', 'Seek', {
        seekPositionTicks: 0,
      });
    });

    it('should round and clamp the volume', async () => {
      await dispatcher.dispatch('user-1', { type: 'setVolume', percent: 133.3 });
      await dispatcher.dispatch('user-1', { type: 'setVolume', percent: 44.5 });

      expect(client.sendGeneralCommand.mock.calls).toEqual([
        ['session-1', { Name: 'SetVolume', Arguments: { Volume: '100' } }],
        ['session-1', { Name: 'SetVolume', Arguments: { Volume: '45' } }],
      ]);
    });

    it('should send Mute or Unmute', async () => {
      await dispatcher.dispatch('user-1', { type: 'mute', muted: true });
      await dispatcher.dispatch('user-1', { type: 'mute', muted: false });

      expect(client.sendGeneralCommand.mock.calls).toEqual([
        ['session-1', { Name: 'Mute' }],
        ['session-1', { Name: 'Unmute' }],
      ]);
    });

    it('should target the currently tracked session', async () => {
      reconciler.reconcile([playbackState({ sessionId: 'session-2' })], 2);
      tick = 2;
      const result = await dispatcher.dispatch('user-1', { type: 'stop' });

      expect(result).toEqual({ ok: true, sessionId: 'session-2' });
      expect(client.sendPlaystateCommand).toHaveBeenCalledWith('session-2', 'Stop');
    });
  });

  describe('staleness', () => {
    it('should not warn within the tolerance', async () => {
      tick = 2;
      const result = await dispatcher.dispatch('user-1', { type: 'playPause' });
      expect(result).toEqual({ ok: true, sessionId: 'session-1' });
    });

    it('should warn and still send when the session was not seen recently', async () => {
      tick = 3;
      const result = await dispatcher.dispatch('user-1', { type: 'playPause' });

      expect(result).toEqual({
        ok: true,
        sessionId: 'session-1',
        warning: { code: 'StaleSession', message: 'Session session-1 was last seen 2 polls ago' },
      });
      expect(client.sendPlaystateCommand).toHaveBeenCalledWith('session-1', 'PlayPause');
    });
  });

  describe('api failures', () => {
    it('should return TransportError as a value', async () => {
      client.sendPlaystateCommand.mockRejectedValueOnce(new TransportError('connection refused'));
      const result = await dispatcher.dispatch('user-1', { type: 'pause' });

      expect(result).toEqual({
        ok: false,
        error: { code: 'TransportError', message: 'connection refused' },
      });
    });

    it('should return AuthError as a value', async () => {
      client.sendGeneralCommand.mockRejectedValueOnce(new AuthError('HTTP 401'));
      const result = await dispatcher.dispatch('user-1', { type: 'mute', muted: true });

      expect(result.ok ? null : result.error.code).toBe('AuthError');
    });
  });
});
