// SPDX-FileCopyrightText: 2025 LiveKit, Inc.
//
// SPDX-License-Identifier: Apache-2.0

/**
 * Snapshot of the agent's speech output, as tracked by {@link AgentSpeechTracker}.
 */
export interface AgentSpeechState {
  readonly isSpeaking: boolean;
  /** Identifier of the speech segment currently playing, `null` while silent. */
  readonly utteranceId: string | null;
  /** Epoch milliseconds at which the current segment started, `null` while silent. */
  readonly startedAt: number | null;
}

/**
 * One interim or final transcript of a user utterance, after normalization.
 */
export interface Utterance {
  rawText: string;
  normalizedText: string;
  isFinal: boolean;
  receivedAt: number;
  sourceUtteranceId: string;
}

export type Category = 'backchannel' | 'command' | 'mixed' | 'other';

export interface ClassificationResult {
  category: Category;
  /** Backchannel lexicon entries that matched, in their normalized form. */
  matchedBackchannelTokens: ReadonlySet<string>;
  /** Command lexicon entries that matched, in their normalized form. */
  matchedCommandTokens: ReadonlySet<string>;
  tokens: readonly string[];
  /** Tokens that matched neither lexicon. */
  contentTokens: readonly string[];
}

export type DecisionAction = 'ignore' | 'interrupt' | 'respond';

export interface Decision {
  action: DecisionAction;
  reason: string;
  utteranceId: string;
  /** Agent speech segment the decision applies to; `null` when the agent was silent. */
  segmentId: string | null;
  /** `null` when the decision was reached without classifying any text. */
  category: Category | null;
  /** A provisional decision may still be superseded by a later transcript. */
  provisional: boolean;
  createdAt: number;
}

/**
 * Transcript event as delivered by the host's STT integration.
 */
export interface TranscriptEvent {
  text: string;
  isFinal: boolean;
  /** Kept loose on purpose: events without a usable id are dropped, not rejected. */
  utteranceId?: string | null;
  timestamp?: number;
}

// Channel inputs consumed by the decision coordinator

export interface UserSpeechStarted {
  type: 'user-speech-started';
  utteranceId: string;
  timestamp: number;
}

export interface UserTranscript {
  type: 'user-transcript';
  transcript: TranscriptEvent;
}

export interface AgentSpeechStarted {
  type: 'agent-speech-started';
  segmentId: string;
}

export interface AgentSpeechEnded {
  type: 'agent-speech-ended';
  segmentId: string;
}

/**
 * Union type for every input delivered over a session's ordered channel.
 */
export type CoordinatorInput =
  | UserSpeechStarted
  | UserTranscript
  | AgentSpeechStarted
  | AgentSpeechEnded;
