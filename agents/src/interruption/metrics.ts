// SPDX-FileCopyrightText: 2024 LiveKit, Inc.
//
// SPDX-License-Identifier: Apache-2.0
import type { Category, DecisionAction } from './types.js';

export type DecisionMetrics = {
  type: 'interruption_decision_metrics';
  utteranceId: string;
  timestamp: number;
  action: DecisionAction;
  category: Category | null;
  provisional: boolean;
  /** Whether the decision came from a final transcript. */
  isFinal: boolean;
  /** Whether the decision is the fallback applied after the transcript wait ran out. */
  timedOut: boolean;
  /** Time from the utterance being opened to this decision, in milliseconds. */
  latencyMs: number;
  /** Action of the earlier decision for the same utterance that this one replaces. */
  superseded: DecisionAction | null;
};

export interface DecisionSummary {
  decisions: number;
  ignored: number;
  interrupted: number;
  responded: number;
  byCategory: Record<Category, number>;
  /** Provisional ignores later turned into an interrupt or a response. */
  provisionalOverrides: number;
  timeouts: number;
  meanLatencyMs: number;
}

export class DecisionStatsCollector {
  private summary: DecisionSummary;
  private totalLatencyMs = 0;

  constructor() {
    this.summary = {
      decisions: 0,
      ignored: 0,
      interrupted: 0,
      responded: 0,
      byCategory: { backchannel: 0, command: 0, mixed: 0, other: 0 },
      provisionalOverrides: 0,
      timeouts: 0,
      meanLatencyMs: 0,
    };
  }

  collect(metrics: DecisionMetrics): void {
    this.summary.decisions += 1;
    if (metrics.action === 'ignore') {
      this.summary.ignored += 1;
    } else if (metrics.action === 'interrupt') {
      this.summary.interrupted += 1;
    } else {
      this.summary.responded += 1;
    }

    if (metrics.category) {
      this.summary.byCategory[metrics.category] += 1;
    }
    if (metrics.superseded === 'ignore' && metrics.action !== 'ignore') {
      this.summary.provisionalOverrides += 1;
    }
    if (metrics.timedOut) {
      this.summary.timeouts += 1;
    }

    this.totalLatencyMs += metrics.latencyMs;
    this.summary.meanLatencyMs = this.totalLatencyMs / this.summary.decisions;
  }

  getSummary(): DecisionSummary {
    return { ...this.summary, byCategory: { ...this.summary.byCategory } };
  }
}
