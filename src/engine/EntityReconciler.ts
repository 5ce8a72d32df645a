import { isDeepStrictEqual } from 'util';
import { createLogger } from '../core/Logger';
import { IDLE, isIdle } from '../types/playback.types';
import type {
  EntityRecord,
  EntityState,
  EntityUpdate,
  PlaybackState,
  ReconcileResult,
} from '../types/playback.types';

/**
 * Owns the userId → EntityRecord table across poll cycles.
 *
 * Identity policy (single entity per user, session displacement): a user is
 * one media player no matter how many clients they run. When several sessions
 * of the same user are reported in one poll, the one whose playback position
 * advanced the most since the previous poll is tracked; on a tie, or when none
 * of them was seen before, the first one in server order wins. The others are
 * reported as displaced and never become entities of their own.
 *
 * Records are never removed: a user without an active session goes Idle.
 */
export class EntityReconciler {
  private records: Map<string, EntityRecord> = new Map();
  private lastPositions: Map<string, number> = new Map();
  private tick = 0;
  private readonly logger = createLogger('EntityReconciler');

  /**
   * Apply one poll's normalized sessions and return the entities that changed.
   * The whole table is swapped in a single step at the end.
   */
  reconcile(states: readonly PlaybackState[], tick?: number): ReconcileResult {
    const pollTick = this.nextTick(tick);
    const groups = new Map<string, PlaybackState[]>();
    let skipped = 0;

    for (const state of states) {
      if (!state.entityKey || !state.sessionId) {
        skipped++;
        this.logger.warn(
          `Skipping malformed session record (user: '${state.entityKey}', session: '${state.sessionId}', device: '${state.deviceName}')`
        );
        continue;
      }
      const group = groups.get(state.entityKey);
      if (group) {
        group.push(state);
      } else {
        groups.set(state.entityKey, [state]);
      }
    }

    const staging = new Map(this.records);
    const updates: EntityUpdate[] = [];
    const displaced: string[] = [];

    for (const [entityKey, candidates] of groups) {
      const selected = this.selectSession(candidates);
      for (const candidate of candidates) {
        if (candidate !== selected) {
          displaced.push(candidate.sessionId);
        }
      }
      if (candidates.length > 1) {
        this.logger.debug(
          `User ${selected.userName || entityKey} has ${candidates.length} sessions, tracking ${selected.sessionId}`
        );
      }

      const existing = staging.get(entityKey);
      if (!existing) {
        const created: EntityRecord = {
          entityKey,
          userName: selected.userName,
          createdAtTick: pollTick,
          lastSeenPollTick: pollTick,
          currentState: selected,
          previousSessionId: null,
        };
        staging.set(entityKey, created);
        updates.push({ type: 'create', entityKey, record: created });
        continue;
      }

      const trackedSessionId = isIdle(existing.currentState) ? null : existing.currentState.sessionId;
      const next: EntityRecord = {
        ...existing,
        userName: selected.userName || existing.userName,
        lastSeenPollTick: pollTick,
        currentState: selected,
        previousSessionId:
          trackedSessionId !== null && trackedSessionId !== selected.sessionId
            ? trackedSessionId
            : existing.previousSessionId,
      };
      staging.set(entityKey, next);
      if (!sameState(existing.currentState, selected)) {
        updates.push({ type: 'update', entityKey, record: next });
      }
    }

    for (const [entityKey, record] of this.records) {
      if (groups.has(entityKey) || isIdle(record.currentState)) {
        continue;
      }
      const last = record.currentState;
      if (last.isPlaying) {
        this.logger.info(
          `Session ${last.sessionId} of ${last.userName || entityKey} vanished while playing (last seen at poll ${record.lastSeenPollTick})`
        );
      }
      const idle: EntityRecord = {
        ...record,
        currentState: IDLE,
        previousSessionId: last.sessionId,
      };
      staging.set(entityKey, idle);
      updates.push({ type: 'update', entityKey, record: idle });
    }

    this.records = staging;
    this.tick = pollTick;
    this.lastPositions = new Map(
      [...groups.values()].flat().map((state) => [state.sessionId, state.positionSeconds])
    );

    return { tick: pollTick, updates, skipped, displaced };
  }

  get(entityKey: string): Readonly<EntityRecord> | undefined {
    return this.records.get(entityKey);
  }

  list(): Readonly<EntityRecord>[] {
    return [...this.records.values()];
  }

  get size(): number {
    return this.records.size;
  }

  get lastTick(): number {
    return this.tick;
  }

  /**
   * Polls elapsed since the entity last had an active session, or undefined
   * for an unknown entity.
   */
  pollsSinceSeen(entityKey: string, currentTick: number = this.tick): number | undefined {
    const record = this.records.get(entityKey);
    return record ? currentTick - record.lastSeenPollTick : undefined;
  }

  private nextTick(tick: number | undefined): number {
    const candidate = tick ?? this.tick + 1;
    if (candidate <= this.tick) {
      this.logger.warn(`Poll tick ${candidate} is not after ${this.tick}, using ${this.tick + 1}`);
      return this.tick + 1;
    }
    return candidate;
  }

  private selectSession(candidates: PlaybackState[]): PlaybackState {
    let selected = candidates[0];
    let bestProgress: number | undefined;

    for (const candidate of candidates) {
      const previous = this.lastPositions.get(candidate.sessionId);
      if (previous === undefined) {
        continue;
      }
      const progress = candidate.positionSeconds - previous;
      if (bestProgress === undefined || progress > bestProgress) {
        bestProgress = progress;
        selected = candidate;
      }
    }

    return selected;
  }
}

function sameState(previous: EntityState, next: EntityState): boolean {
  return isDeepStrictEqual(previous, next);
}
