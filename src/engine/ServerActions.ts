import { createLogger } from '../core/Logger';
import { AuthError } from '../utils/errors';
import type { JellyfinApi } from '../jellyfin/JellyfinClient';
import type { ActionResult, BroadcastResult, ServerAction } from '../types/command.types';

const logger = createLogger('ServerActions');

export const DEFAULT_MESSAGE_HEADER = 'Message';
export const DEFAULT_MESSAGE_TIMEOUT_MS = 5000;

export interface BroadcastMessage {
  text: string;
  header?: string;
  timeoutMs?: number;
}

/**
 * Server-wide actions: library rescan, restart, shutdown and message broadcast.
 */
export class ServerActions {
  constructor(
    private readonly client: JellyfinApi,
    private readonly sessionIds: () => string[]
  ) {}

  async run(action: ServerAction): Promise<ActionResult> {
    try {
      switch (action) {
        case 'rescan':
          await this.client.refreshLibrary();
          break;
        case 'restart':
          await this.client.restartServer();
          break;
        case 'shutdown':
          await this.client.shutdownServer();
          break;
      }
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      logger.error(`Server action ${action} failed: ${message}`);
      return {
        ok: false,
        error: { code: error instanceof AuthError ? 'AuthError' : 'TransportError', message },
      };
    }

    logger.info(`Server action ${action} sent`);
    return { ok: true };
  }

  /**
   * Send a message to every session seen in the last poll. Sessions are
   * messaged one after the other; a failure is counted and the rest still run.
   */
  async broadcast(message: BroadcastMessage): Promise<BroadcastResult> {
    const result: BroadcastResult = { sent: 0, failed: 0 };
    const payload = {
      text: message.text,
      header: message.header ?? DEFAULT_MESSAGE_HEADER,
      timeoutMs: message.timeoutMs ?? DEFAULT_MESSAGE_TIMEOUT_MS,
    };

    for (const sessionId of this.sessionIds()) {
      try {
        await this.client.sendMessage(sessionId, payload);
        result.sent++;
      } catch (error) {
        result.failed++;
        const reason = error instanceof Error ? error.message : 'Unknown error';
        logger.warn(`Failed to send message to session ${sessionId}: ${reason}`);
      }
    }

    logger.info(`Broadcast message to ${result.sent} session(s), ${result.failed} failed`);
    return result;
  }
}
