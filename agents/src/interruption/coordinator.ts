// SPDX-FileCopyrightText: 2025 LiveKit, Inc.
//
// SPDX-License-Identifier: Apache-2.0
import type { TypedEventEmitter as TypedEmitter } from '@livekit/typed-emitter';
import { EventEmitter } from 'node:events';
import type { Logger } from 'pino';
import { log } from '../log.js';
import { toError } from '../utils.js';
import type { Classifier } from './classifier.js';
import type { TimeoutFallback } from './config.js';
import {
  RESOLVED_UTTERANCE_CACHE_SIZE,
  TRANSCRIPT_WAIT_TIMEOUT_MS,
} from './defaults.js';
import { normalize } from './lexicon.js';
import type { DecisionMetrics } from './metrics.js';
import type {
  AgentSpeechState,
  Category,
  ClassificationResult,
  CoordinatorInput,
  Decision,
  DecisionAction,
  TranscriptEvent,
  Utterance,
} from './types.js';
import { BoundedCache } from './utils.js';

export interface Verdict {
  action: DecisionAction;
  reason: string;
}

const formatMatches = (tokens: ReadonlySet<string>) => [...tokens].join(', ');

/**
 * Maps the agent state and a classification to an action. Returns `null` for text without any
 * token, which never produces a decision.
 */
export function decide(
  state: Pick<AgentSpeechState, 'isSpeaking'>,
  classification: ClassificationResult,
): Verdict | null {
  if (classification.tokens.length === 0) {
    return null;
  }
  if (!state.isSpeaking) {
    return { action: 'respond', reason: 'agent is not speaking, processing as a new turn' };
  }

  switch (classification.category) {
    case 'command':
      return {
        action: 'interrupt',
        reason: `command detected (${formatMatches(classification.matchedCommandTokens)})`,
      };
    case 'mixed':
      return {
        action: 'interrupt',
        reason: `command overrides backchannel (${formatMatches(classification.matchedCommandTokens)})`,
      };
    case 'backchannel':
      return {
        action: 'ignore',
        reason: `backchannel while agent is speaking (${formatMatches(classification.matchedBackchannelTokens)})`,
      };
    case 'other':
      return { action: 'interrupt', reason: 'substantive speech while agent is speaking' };
  }
}

export function toUtterance(event: TranscriptEvent & { utteranceId: string }): Utterance {
  return {
    rawText: event.text,
    normalizedText: normalize(event.text),
    isFinal: event.isFinal,
    receivedAt: event.timestamp ?? Date.now(),
    sourceUtteranceId: event.utteranceId,
  };
}

type UtteranceStatus = 'awaiting_text' | 'provisional';

interface PendingUtterance {
  utteranceId: string;
  status: UtteranceStatus;
  /** Agent segment the utterance overlaps; cleared once that segment ends. */
  segmentId: string | null;
  openedAt: number;
  timer?: ReturnType<typeof setTimeout>;
  lastAction?: DecisionAction;
}

interface ResolvedUtterance {
  resolvedAt: number;
  action: DecisionAction | null;
}

export interface DecisionCoordinatorOptions {
  classifier: Classifier;
  getAgentState: () => AgentSpeechState;
  transcriptWaitTimeout?: number;
  timeoutFallback?: TimeoutFallback;
  enabled?: boolean;
  logAllDecisions?: boolean;
  resolvedCacheSize?: number;
}

export type DecisionCoordinatorCallbacks = {
  decision: (decision: Decision) => void;
  metrics_collected: (metrics: DecisionMetrics) => void;
};

interface EmitContext {
  category: Category | null;
  provisional: boolean;
  isFinal: boolean;
  timedOut: boolean;
}

/**
 * Reconciles user speech starts (VAD) with interim and final transcripts for each user
 * utterance and emits `decision` events.
 *
 * An utterance moves through `awaiting_text -> provisional -> resolved`. Only a backchannel, or
 * an `ignore` timeout fallback, leaves it provisional; every other decision resolves it, and
 * events for a resolved id are dropped.
 */
export class DecisionCoordinator extends (EventEmitter as new () => TypedEmitter<DecisionCoordinatorCallbacks>) {
  private readonly classifier: Classifier;
  private readonly getAgentState: () => AgentSpeechState;
  private readonly transcriptWaitTimeout: number;
  private readonly timeoutFallback: TimeoutFallback;
  private readonly enabled: boolean;
  private readonly logAllDecisions: boolean;

  private pending: BoundedCache<string, PendingUtterance>;
  private resolved: BoundedCache<string, ResolvedUtterance>;
  private logger: Logger = log();

  constructor({
    classifier,
    getAgentState,
    transcriptWaitTimeout = TRANSCRIPT_WAIT_TIMEOUT_MS,
    timeoutFallback = 'interrupt',
    enabled = true,
    logAllDecisions = false,
    resolvedCacheSize = RESOLVED_UTTERANCE_CACHE_SIZE,
  }: DecisionCoordinatorOptions) {
    super();
    if (!(transcriptWaitTimeout > 0)) {
      throw new RangeError('transcriptWaitTimeout must be a positive number of milliseconds');
    }

    this.classifier = classifier;
    this.getAgentState = getAgentState;
    this.transcriptWaitTimeout = transcriptWaitTimeout;
    this.timeoutFallback = timeoutFallback;
    this.enabled = enabled;
    this.logAllDecisions = logAllDecisions;
    this.pending = new BoundedCache(resolvedCacheSize, (_, entry) => {
      if (entry.timer) clearTimeout(entry.timer);
    });
    this.resolved = new BoundedCache(resolvedCacheSize);
  }

  /** Number of utterances that are not resolved yet. */
  get pendingCount(): number {
    return this.pending.size;
  }

  handle(input: CoordinatorInput): void {
    switch (input.type) {
      case 'user-speech-started':
        this.onUserSpeechStarted(input.utteranceId, input.timestamp);
        break;
      case 'user-transcript':
        this.onTranscript(input.transcript);
        break;
      case 'agent-speech-started':
        this.logger.debug({ segmentId: input.segmentId }, 'agent speech segment opened');
        break;
      case 'agent-speech-ended':
        this.onAgentSpeechEnded(input.segmentId);
        break;
    }
  }

  onUserSpeechStarted(utteranceId: string, timestamp: number = Date.now()): void {
    const known = this.pending.get(utteranceId);
    if (known && known.status === 'awaiting_text' && !known.timer && this.isOverlapping(known)) {
      // opened by a transcript without text; the wait starts with the speech signal
      if (this.enabled) {
        this.armWait(known);
      } else {
        this.emitDecision(
          known,
          { action: 'interrupt', reason: 'interruption filtering is disabled' },
          { category: null, provisional: false, isFinal: false, timedOut: false },
        );
        this.resolve(known);
      }
      return;
    }
    if (known || this.resolved.has(utteranceId)) {
      this.logger.debug({ utteranceId }, 'speech start for a known utterance, ignoring');
      return;
    }

    const state = this.getAgentState();
    const entry: PendingUtterance = {
      utteranceId,
      status: 'awaiting_text',
      segmentId: state.utteranceId,
      openedAt: timestamp,
    };

    if (!state.isSpeaking) {
      this.emitDecision(
        entry,
        { action: 'respond', reason: 'agent is not speaking, processing as a new turn' },
        { category: null, provisional: false, isFinal: false, timedOut: false },
      );
      this.resolve(entry);
      return;
    }

    if (!this.enabled) {
      this.emitDecision(
        entry,
        { action: 'interrupt', reason: 'interruption filtering is disabled' },
        { category: null, provisional: false, isFinal: false, timedOut: false },
      );
      this.resolve(entry);
      return;
    }

    this.pending.set(utteranceId, entry);
    this.armWait(entry);
  }

  onTranscript(event: TranscriptEvent): void {
    const { utteranceId } = event;
    if (typeof utteranceId !== 'string' || utteranceId.trim() === '') {
      this.logger.warn(
        { utteranceId, isFinal: event.isFinal },
        'dropping transcript without a valid utterance id',
      );
      return;
    }
    if (this.resolved.has(utteranceId)) {
      this.logger.debug({ utteranceId, isFinal: event.isFinal }, 'late transcript, ignoring');
      return;
    }

    const utterance = toUtterance({ ...event, utteranceId });
    let entry = this.pending.get(utteranceId);
    if (!entry) {
      // the transcript won the race against the speech start signal
      const state = this.getAgentState();
      entry = {
        utteranceId,
        status: 'awaiting_text',
        segmentId: state.isSpeaking ? state.utteranceId : null,
        openedAt: utterance.receivedAt,
      };
      this.pending.set(utteranceId, entry);
    }

    const classification = this.classifier.classify(utterance.normalizedText);
    if (classification.tokens.length === 0) {
      // empty text keeps the wait running; a final one closes the utterance without a decision
      if (utterance.isFinal) {
        this.logger.debug({ utteranceId }, 'empty final transcript, closing utterance');
        this.resolve(entry);
      }
      return;
    }

    this.clearTimer(entry);
    const speaking = this.isOverlapping(entry);
    const context: EmitContext = {
      category: classification.category,
      provisional: false,
      isFinal: utterance.isFinal,
      timedOut: false,
    };

    if (speaking && !this.enabled) {
      this.emitDecision(
        entry,
        { action: 'interrupt', reason: 'interruption filtering is disabled' },
        { ...context, category: null },
      );
      this.resolve(entry);
      return;
    }

    const verdict = decide({ isSpeaking: speaking }, classification);
    if (!verdict) {
      return;
    }

    if (verdict.action === 'ignore' && !utterance.isFinal) {
      const alreadyIgnored = entry.status === 'provisional' && entry.lastAction === 'ignore';
      entry.status = 'provisional';
      if (!alreadyIgnored) {
        this.emitDecision(entry, verdict, { ...context, provisional: true });
      }
      return;
    }

    this.emitDecision(entry, verdict, context);
    this.resolve(entry);
  }

  onAgentSpeechEnded(segmentId: string): void {
    for (const entry of this.pending.values()) {
      if (entry.segmentId !== segmentId) {
        continue;
      }
      this.clearTimer(entry);
      entry.segmentId = null;
      this.logger.debug(
        { utteranceId: entry.utteranceId, segmentId, status: entry.status },
        'agent stopped speaking before utterance resolved',
      );
    }
  }

  /** Cancels every pending wait. Pending utterances are forgotten. */
  close(): void {
    for (const entry of this.pending.values()) {
      this.clearTimer(entry);
    }
    this.pending.clear();
  }

  private armWait(entry: PendingUtterance) {
    const { utteranceId } = entry;
    entry.timer = setTimeout(() => {
      try {
        this.onWaitTimeout(utteranceId);
      } catch (error) {
        this.logger.error({ err: toError(error), utteranceId }, 'error while applying timeout fallback');
      }
    }, this.transcriptWaitTimeout);
    this.logger.debug(
      { utteranceId, segmentId: entry.segmentId, timeout: this.transcriptWaitTimeout },
      'user speech over agent, awaiting transcript',
    );
  }

  private onWaitTimeout(utteranceId: string) {
    const entry = this.pending.get(utteranceId);
    if (!entry || entry.status !== 'awaiting_text') {
      return;
    }
    entry.timer = undefined;
    if (!this.isOverlapping(entry)) {
      return;
    }

    const context: EmitContext = {
      category: null,
      provisional: this.timeoutFallback === 'ignore',
      isFinal: false,
      timedOut: true,
    };
    this.emitDecision(
      entry,
      {
        action: this.timeoutFallback,
        reason: `no transcript within ${this.transcriptWaitTimeout}ms, applying ${this.timeoutFallback} fallback`,
      },
      context,
    );

    if (this.timeoutFallback === 'ignore') {
      entry.status = 'provisional';
    } else {
      this.resolve(entry);
    }
  }

  private isOverlapping(entry: PendingUtterance): boolean {
    if (entry.segmentId === null) {
      return false;
    }
    const state = this.getAgentState();
    return state.isSpeaking && state.utteranceId === entry.segmentId;
  }

  private clearTimer(entry: PendingUtterance) {
    if (entry.timer) {
      clearTimeout(entry.timer);
      entry.timer = undefined;
    }
  }

  private resolve(entry: PendingUtterance) {
    this.clearTimer(entry);
    this.pending.delete(entry.utteranceId);
    this.resolved.set(entry.utteranceId, {
      resolvedAt: Date.now(),
      action: entry.lastAction ?? null,
    });
  }

  private emitDecision(entry: PendingUtterance, verdict: Verdict, context: EmitContext) {
    const now = Date.now();
    const decision: Decision = {
      ...verdict,
      utteranceId: entry.utteranceId,
      segmentId: entry.segmentId,
      category: context.category,
      provisional: context.provisional,
      createdAt: now,
    };
    const superseded = entry.lastAction ?? null;
    entry.lastAction = verdict.action;

    const fields = {
      utteranceId: decision.utteranceId,
      segmentId: decision.segmentId,
      action: decision.action,
      category: decision.category,
      provisional: decision.provisional,
      isFinal: context.isFinal,
      reason: decision.reason,
    };
    if (this.logAllDecisions) {
      this.logger.info(fields, 'interruption decision');
    } else {
      this.logger.debug(fields, 'interruption decision');
    }

    this.emit('decision', decision);
    this.emit('metrics_collected', {
      type: 'interruption_decision_metrics',
      utteranceId: entry.utteranceId,
      timestamp: now,
      action: decision.action,
      category: decision.category,
      provisional: decision.provisional,
      isFinal: context.isFinal,
      timedOut: context.timedOut,
      latencyMs: Math.max(0, now - entry.openedAt),
      superseded,
    });
  }
}
