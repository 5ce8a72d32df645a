import { createLogger } from '../core/Logger';
import { AuthError } from '../utils/errors';
import { hasCapability } from './capabilities';
import type { CapabilityName } from './capabilities';
import { secondsToTicks } from './SessionNormalizer';
import type { EntityReconciler } from './EntityReconciler';
import type { JellyfinApi } from '../jellyfin/JellyfinClient';
import { isIdle } from '../types/playback.types';
import type {
  CommandError,
  CommandErrorCode,
  CommandResult,
  EntityCommand,
  EntityCommandType,
} from '../types/command.types';

const REQUIRED_CAPABILITY: Record<EntityCommandType, CapabilityName> = {
  play: 'CanPause',
  pause: 'CanPause',
  playPause: 'CanPause',
  stop: 'CanStop',
  next: 'CanSkipNext',
  previous: 'CanSkipPrevious',
  seek: 'CanSeek',
  setVolume: 'CanSetVolume',
  mute: 'CanMute',
};

export interface CommandDispatcherOptions {
  /** Polls an entity may go unseen before a command carries a StaleSession warning */
  staleTolerancePolls: number;
  /** Current poll tick of the coordinator */
  currentTick: () => number;
}

function failure(code: CommandErrorCode, message: string): CommandResult {
  return { ok: false, error: { code, message } };
}

/**
 * Resolves entity commands to the entity's current session and issues exactly
 * one API call, or none when the command is rejected up front.
 * Every outcome is returned as a CommandResult; nothing is thrown.
 */
export class CommandDispatcher {
  private readonly logger = createLogger('CommandDispatcher');

  constructor(
    private readonly reconciler: EntityReconciler,
    private readonly client: JellyfinApi,
    private readonly options: CommandDispatcherOptions
  ) {}

  async dispatch(entityKey: string, command: EntityCommand): Promise<CommandResult> {
    const record = this.reconciler.get(entityKey);
    if (!record) {
      return failure('UnknownEntity', `No media player for user ${entityKey}`);
    }

    const state = record.currentState;
    if (isIdle(state)) {
      const last = record.previousSessionId ? ` (last session ${record.previousSessionId})` : '';
      return failure('NoActiveSession', `Nothing is playing for user ${entityKey}${last}`);
    }

    const invalid = validateArguments(command);
    if (invalid) {
      return failure('InvalidArgument', invalid);
    }

    const capability = REQUIRED_CAPABILITY[command.type];
    if (!hasCapability(state.capabilityMask, capability)) {
      return failure(
        'Unsupported',
        `${state.client || 'Client'} on ${state.deviceName || 'unknown device'} does not support ${command.type}`
      );
    }

    let warning: CommandError | undefined;
    const pollsSinceSeen = this.reconciler.pollsSinceSeen(entityKey, this.options.currentTick()) ?? 0;
    if (pollsSinceSeen > this.options.staleTolerancePolls) {
      warning = {
        code: 'StaleSession',
        message: `Session ${state.sessionId} was last seen ${pollsSinceSeen} polls ago`,
      };
      this.logger.warn(`${warning.message}, sending ${command.type} anyway`);
    }

    const sessionId = state.sessionId;
    try {
      await this.send(sessionId, command);
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      this.logger.error(`Command ${command.type} for user ${entityKey} failed: ${message}`);
      return failure(error instanceof AuthError ? 'AuthError' : 'TransportError', message);
    }

    this.logger.debug(`Sent ${command.type} to session ${sessionId} (user ${entityKey})`);
    return warning ? { ok: true, sessionId, warning } : { ok: true, sessionId };
  }

  private async send(sessionId: string, command: EntityCommand): Promise<void> {
    switch (command.type) {
      case 'play':
        return this.client.sendPlaystateCommand(sessionId, 'Unpause');
      case 'pause':
        return this.client.sendPlaystateCommand(sessionId, 'Pause');
      case 'playPause':
        return this.client.sendPlaystateCommand(sessionId, 'PlayPause');
      case 'stop':
        return this.client.sendPlaystateCommand(sessionId, 'Stop');
      case 'next':
        return this.client.sendPlaystateCommand(sessionId, 'NextTrack');
      case 'previous':
        return this.client.sendPlaystateCommand(sessionId, 'PreviousTrack');
      case 'seek':
        return this.client.sendPlaystateCommand(sessionId, 'Seek', {
          seekPositionTicks: secondsToTicks(command.seconds),
        });
      case 'setVolume':
        return this.client.sendGeneralCommand(sessionId, {
          Name: 'SetVolume',
          Arguments: { Volume: String(Math.min(100, Math.max(0, Math.round(command.percent)))) },
        });
      case 'mute':
        return this.client.sendGeneralCommand(sessionId, { Name: command.muted ? 'Mute' : 'Unmute' });
    }
  }
}

function validateArguments(command: EntityCommand): string | undefined {
  if (command.type === 'seek' && !Number.isFinite(command.seconds)) {
    return 'seek requires a finite number of seconds';
  }
  if (command.type === 'setVolume' && !Number.isFinite(command.percent)) {
    return 'setVolume requires a finite percentage';
  }
  return undefined;
}
