// SPDX-FileCopyrightText: 2025 LiveKit, Inc.
//
// SPDX-License-Identifier: Apache-2.0
import type { Logger } from 'pino';
import { log } from '../log.js';
import { toError } from '../utils.js';
import type { Decision } from './types.js';

/**
 * The host's speech-control surface. Implementations may be synchronous or return a promise.
 */
export interface SpeechControl {
  /** Stop the agent's current speech output. */
  interrupt(): void | Promise<void>;
  /** Hand the buffered user input to the agent as a new turn. */
  commitUserTurn(): void | Promise<void>;
  /** Drop the buffered user input. */
  clearUserTurn(): void | Promise<void>;
}

export interface ActionDispatcherOptions {
  clearUserTurnOnIgnore?: boolean;
}

/**
 * Translates decisions into calls on the host's {@link SpeechControl}. Calls are made
 * synchronously and never awaited, so a slow or stuck host cannot hold back later decisions.
 * Host failures, thrown or rejected, are logged and never rethrown.
 */
export class ActionDispatcher {
  readonly #control: SpeechControl;
  readonly #clearUserTurnOnIgnore: boolean;
  #logger: Logger = log();

  constructor(control: SpeechControl, { clearUserTurnOnIgnore = false }: ActionDispatcherOptions = {}) {
    this.#control = control;
    this.#clearUserTurnOnIgnore = clearUserTurnOnIgnore;
  }

  dispatch(decision: Decision): void {
    switch (decision.action) {
      case 'interrupt':
        this.call('interrupt', decision);
        this.call('commitUserTurn', decision);
        break;
      case 'respond':
        this.call('commitUserTurn', decision);
        break;
      case 'ignore':
        if (this.#clearUserTurnOnIgnore && !decision.provisional) {
          this.call('clearUserTurn', decision);
        }
        break;
    }
  }

  private call(method: keyof SpeechControl, decision: Decision) {
    try {
      const result = this.#control[method]();
      if (result instanceof Promise) {
        result.catch((error: unknown) => this.onFailure(error, method, decision));
      }
    } catch (error) {
      this.onFailure(error, method, decision);
    }
  }

  private onFailure(error: unknown, method: keyof SpeechControl, decision: Decision) {
    this.#logger.error(
      { err: toError(error), method, utteranceId: decision.utteranceId },
      'speech control call failed',
    );
  }
}
