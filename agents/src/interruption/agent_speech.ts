// SPDX-FileCopyrightText: 2025 LiveKit, Inc.
//
// SPDX-License-Identifier: Apache-2.0
import { Mutex } from '@livekit/mutex';
import type { TypedEventEmitter as TypedEmitter } from '@livekit/typed-emitter';
import { EventEmitter } from 'node:events';
import { InvalidStateError } from '../_exceptions.js';
import { log } from '../log.js';
import type { AgentSpeechState } from './types.js';

export type AgentSpeechStopReason = 'stopped' | 'timeout' | 'replaced';

export interface AgentSpeechStartedEvent {
  segmentId: string;
  startedAt: number;
}

export interface AgentSpeechStoppedEvent {
  segmentId: string;
  reason: AgentSpeechStopReason;
  durationMs: number;
}

export type AgentSpeechCallbacks = {
  agent_speech_started: (ev: AgentSpeechStartedEvent) => void;
  agent_speech_stopped: (ev: AgentSpeechStoppedEvent) => void;
};

export interface AgentSpeechTrackerOptions {
  /**
   * Ceiling, in milliseconds, after which a segment that was never stopped is considered
   * finished.
   */
  maxSpeechDuration?: number;
}

const SILENT: AgentSpeechState = Object.freeze({
  isSpeaking: false,
  utteranceId: null,
  startedAt: null,
});

/**
 * Owns the agent's speaking state for one session.
 *
 * Writers serialize on a mutex; readers get the current frozen snapshot, which is replaced on
 * every transition and never mutated.
 */
export class AgentSpeechTracker extends (EventEmitter as new () => TypedEmitter<AgentSpeechCallbacks>) {
  #state: AgentSpeechState = SILENT;
  #lock = new Mutex();
  #maxSpeechDuration?: number;
  #safetyTimer?: ReturnType<typeof setTimeout>;
  #logger = log();

  constructor({ maxSpeechDuration }: AgentSpeechTrackerOptions = {}) {
    super();
    if (maxSpeechDuration !== undefined && !(maxSpeechDuration > 0)) {
      throw new RangeError('maxSpeechDuration must be a positive number of milliseconds');
    }
    this.#maxSpeechDuration = maxSpeechDuration;
  }

  /**
   * Marks the agent as speaking segment `utteranceId`. Starting the segment that is already
   * playing is a no-op.
   *
   * @param options.force - replace a different segment that is still playing
   * @throws {@link InvalidStateError} if another segment is playing and `force` is not set
   */
  async startSpeaking(utteranceId: string, { force = false }: { force?: boolean } = {}) {
    if (!utteranceId) {
      throw new TypeError('utteranceId cannot be empty');
    }

    const unlock = await this.#lock.lock();
    try {
      const current = this.#state;
      if (current.isSpeaking) {
        if (current.utteranceId === utteranceId) {
          return;
        }
        if (!force) {
          throw new InvalidStateError(
            `agent is already speaking ${current.utteranceId}, cannot start ${utteranceId}`,
          );
        }
        this.transitionToSilent('replaced');
      }

      const startedAt = Date.now();
      this.#state = Object.freeze({ isSpeaking: true, utteranceId, startedAt });
      this.armSafetyTimer(utteranceId);

      this.#logger.debug({ utteranceId }, 'agent started speaking');
      this.emit('agent_speech_started', { segmentId: utteranceId, startedAt });
    } finally {
      unlock();
    }
  }

  /** Marks the agent as silent. Idempotent. */
  async stopSpeaking() {
    const unlock = await this.#lock.lock();
    try {
      this.transitionToSilent('stopped');
    } finally {
      unlock();
    }
  }

  /** Returns to the initial silent state and disarms the safety timeout. */
  async reset() {
    await this.stopSpeaking();
  }

  getState(): AgentSpeechState {
    return this.#state;
  }

  /** Milliseconds since the current segment started, `null` while silent. */
  speechDuration(now: number = Date.now()): number | null {
    const { startedAt } = this.#state;
    return startedAt === null ? null : now - startedAt;
  }

  private armSafetyTimer(utteranceId: string) {
    if (this.#maxSpeechDuration === undefined) {
      return;
    }
    const timeout = this.#maxSpeechDuration;
    this.#safetyTimer = setTimeout(() => {
      this.#safetyTimer = undefined;
      void this.#lock.lock().then((unlock) => {
        try {
          if (this.#state.utteranceId !== utteranceId) {
            return;
          }
          this.#logger.warn(
            { utteranceId, maxSpeechDuration: timeout },
            'agent speech was never stopped, forcing silent state',
          );
          this.transitionToSilent('timeout');
        } finally {
          unlock();
        }
      });
    }, timeout);
  }

  // must be called with the lock held
  private transitionToSilent(reason: AgentSpeechStopReason) {
    if (this.#safetyTimer) {
      clearTimeout(this.#safetyTimer);
      this.#safetyTimer = undefined;
    }

    const { isSpeaking, utteranceId, startedAt } = this.#state;
    this.#state = SILENT;
    if (!isSpeaking || utteranceId === null || startedAt === null) {
      return;
    }

    const durationMs = Date.now() - startedAt;
    this.#logger.debug({ utteranceId, durationMs, reason }, 'agent stopped speaking');
    this.emit('agent_speech_stopped', { segmentId: utteranceId, reason, durationMs });
  }
}
