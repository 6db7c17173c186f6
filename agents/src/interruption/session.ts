// SPDX-FileCopyrightText: 2025 LiveKit, Inc.
//
// SPDX-License-Identifier: Apache-2.0
import type { TypedEventEmitter as TypedEmitter } from '@livekit/typed-emitter';
import { EventEmitter } from 'node:events';
import type { Logger } from 'pino';
import { log } from '../log.js';
import { AsyncIterableQueue, Task, shortuuid, toError } from '../utils.js';
import { AgentSpeechTracker } from './agent_speech.js';
import type { AgentSpeechStartedEvent, AgentSpeechStoppedEvent } from './agent_speech.js';
import { type Classifier, createClassifier } from './classifier.js';
import {
  type InterruptionHandlingConfig,
  type PartialInterruptionHandlingConfig,
  resolveInterruptionConfig,
} from './config.js';
import { DecisionCoordinator } from './coordinator.js';
import { ActionDispatcher, type SpeechControl } from './dispatcher.js';
import { buildLexicons } from './lexicon.js';
import { type DecisionMetrics, DecisionStatsCollector, type DecisionSummary } from './metrics.js';
import type { AgentSpeechState, CoordinatorInput, Decision, TranscriptEvent } from './types.js';

export interface InterruptionSessionOptions {
  control: SpeechControl;
  config?: PartialInterruptionHandlingConfig;
  /** Replaces the lexical classifier built from the configured word lists. */
  classifier?: Classifier;
}

export type InterruptionSessionCallbacks = {
  decision: (decision: Decision) => void;
  metrics_collected: (metrics: DecisionMetrics) => void;
};

/**
 * Wires the speech tracker, the decision coordinator and the action dispatcher together for
 * one conversation.
 *
 * Every input (user speech starts, transcripts and agent speech transitions) goes through one
 * ordered channel consumed by a single task, so the coordinator never sees two inputs at once.
 *
 * @example
 * ```ts
 * const session = new InterruptionSession({ control: host });
 * await session.startSpeaking('seg-1');
 * session.pushUserSpeechStarted('utt-1');
 * session.pushTranscript({ text: 'yeah', isFinal: true, utteranceId: 'utt-1' });
 * // -> 'decision' { action: 'ignore', ... }
 * await session.close();
 * ```
 */
export class InterruptionSession extends (EventEmitter as new () => TypedEmitter<InterruptionSessionCallbacks>) {
  readonly config: InterruptionHandlingConfig;

  private tracker: AgentSpeechTracker;
  private coordinator: DecisionCoordinator;
  private dispatcher: ActionDispatcher;
  private stats = new DecisionStatsCollector();
  private channel = new AsyncIterableQueue<CoordinatorInput>();
  private mainTask: Task<void>;
  private closed = false;
  private logger: Logger = log();

  /**
   * @throws {@link ConfigurationError} if `config` is invalid
   */
  constructor({ control, config = {}, classifier }: InterruptionSessionOptions) {
    super();
    this.config = resolveInterruptionConfig(config);

    this.tracker = new AgentSpeechTracker({
      maxSpeechDuration: this.config.maxAgentSpeechDuration,
    });
    this.coordinator = new DecisionCoordinator({
      classifier:
        classifier ??
        createClassifier(buildLexicons(this.config), {
          fuzzyMatching: this.config.fuzzyMatching,
          fuzzyThreshold: this.config.fuzzyThreshold,
        }),
      getAgentState: () => this.tracker.getState(),
      transcriptWaitTimeout: this.config.transcriptWaitTimeout,
      timeoutFallback: this.config.timeoutFallback,
      enabled: this.config.enabled,
      logAllDecisions: this.config.logAllDecisions,
    });
    this.dispatcher = new ActionDispatcher(control, {
      clearUserTurnOnIgnore: this.config.clearUserTurnOnIgnore,
    });

    this.tracker.on('agent_speech_started', this.onAgentSpeechStarted);
    this.tracker.on('agent_speech_stopped', this.onAgentSpeechStopped);
    this.coordinator.on('decision', this.onDecision);
    this.coordinator.on('metrics_collected', this.onMetricsCollected);

    this.mainTask = Task.from(() => this.mainTaskImpl(), 'session_main');
  }

  get agentState(): AgentSpeechState {
    return this.tracker.getState();
  }

  get summary(): DecisionSummary {
    return this.stats.getSummary();
  }

  /** Marks the agent as speaking. Returns the segment id, generated when omitted. */
  async startSpeaking(
    segmentId: string = shortuuid('seg_'),
    options: { force?: boolean } = {},
  ): Promise<string> {
    this.ensureOpen();
    await this.tracker.startSpeaking(segmentId, options);
    return segmentId;
  }

  async stopSpeaking(): Promise<void> {
    this.ensureOpen();
    await this.tracker.stopSpeaking();
  }

  /** Reports a VAD speech start. Returns the utterance id, generated when omitted. */
  pushUserSpeechStarted(
    utteranceId: string = shortuuid('utt_'),
    timestamp: number = Date.now(),
  ): string {
    this.ensureOpen();
    this.channel.put({ type: 'user-speech-started', utteranceId, timestamp });
    return utteranceId;
  }

  pushTranscript(transcript: TranscriptEvent): void {
    this.ensureOpen();
    this.channel.put({ type: 'user-transcript', transcript });
  }

  /**
   * Processes every input already queued, then releases timers and resets the speech state.
   * Host calls still in flight are not awaited.
   */
  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.channel.close();
    await this.mainTask.result;

    this.coordinator.close();

    this.tracker.off('agent_speech_started', this.onAgentSpeechStarted);
    this.tracker.off('agent_speech_stopped', this.onAgentSpeechStopped);
    await this.tracker.reset();

    this.coordinator.off('decision', this.onDecision);
    this.coordinator.off('metrics_collected', this.onMetricsCollected);
    this.logger.debug({ summary: this.stats.getSummary() }, 'interruption session closed');
  }

  private async mainTaskImpl(): Promise<void> {
    for await (const input of this.channel) {
      try {
        this.coordinator.handle(input);
      } catch (error) {
        // a failing input is logged and skipped
        this.logger.error({ err: toError(error), input: input.type }, 'failed to process session input');
      }
    }
  }

  private ensureOpen() {
    if (this.closed) {
      throw new Error('interruption session is closed');
    }
  }

  private onAgentSpeechStarted = (ev: AgentSpeechStartedEvent) => {
    if (!this.channel.closed) {
      this.channel.put({ type: 'agent-speech-started', segmentId: ev.segmentId });
    }
  };

  private onAgentSpeechStopped = (ev: AgentSpeechStoppedEvent) => {
    if (!this.channel.closed) {
      this.channel.put({ type: 'agent-speech-ended', segmentId: ev.segmentId });
    }
  };

  private onDecision = (decision: Decision) => {
    this.emit('decision', decision);
    this.dispatcher.dispatch(decision);
  };

  private onMetricsCollected = (metrics: DecisionMetrics) => {
    this.stats.collect(metrics);
    this.emit('metrics_collected', metrics);
  };
}
