/**
 * Entity commands and their results
 */

export type EntityCommand =
  | { type: 'play' }
  | { type: 'pause' }
  | { type: 'playPause' }
  | { type: 'stop' }
  | { type: 'next' }
  | { type: 'previous' }
  | { type: 'seek'; seconds: number }
  | { type: 'setVolume'; percent: number }
  | { type: 'mute'; muted: boolean };

export type EntityCommandType = EntityCommand['type'];

export type CommandErrorCode =
  | 'UnknownEntity'
  | 'NoActiveSession'
  | 'Unsupported'
  | 'StaleSession'
  | 'InvalidArgument'
  | 'TransportError'
  | 'AuthError';

export interface CommandError {
  code: CommandErrorCode;
  message: string;
}

export type CommandResult =
  | { ok: true; sessionId: string; warning?: CommandError }
  | { ok: false; error: CommandError };

export type ServerAction = 'rescan' | 'restart' | 'shutdown';

export type ActionResult = { ok: true } | { ok: false; error: CommandError };

export interface BroadcastResult {
  sent: number;
  failed: number;
}
