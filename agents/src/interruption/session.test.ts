// SPDX-FileCopyrightText: 2025 LiveKit, Inc.
//
// SPDX-License-Identifier: Apache-2.0
import { beforeAll, describe, expect, it } from 'vitest';
import { ConfigurationError } from '../_exceptions.js';
import { initializeLogger } from '../log.js';
import { delay } from '../utils.js';
import type { Classifier } from './classifier.js';
import type { SpeechControl } from './dispatcher.js';
import type { DecisionMetrics } from './metrics.js';
import { InterruptionSession, type InterruptionSessionOptions } from './session.js';
import type { Decision } from './types.js';

class FakeSpeechControl implements SpeechControl {
  calls: string[] = [];

  interrupt() {
    this.calls.push('interrupt');
  }

  commitUserTurn() {
    this.calls.push('commitUserTurn');
  }

  clearUserTurn() {
    this.calls.push('clearUserTurn');
  }
}

const createSession = (options: Omit<InterruptionSessionOptions, 'control'> = {}) => {
  const control = new FakeSpeechControl();
  const session = new InterruptionSession({ control, ...options });
  const decisions: Decision[] = [];
  session.on('decision', (decision) => decisions.push(decision));
  return { session, control, decisions };
};

describe('InterruptionSession', () => {
  beforeAll(() => {
    initializeLogger({ pretty: false, level: 'silent' });
  });

  it('ignores a backchannel while the agent speaks', async () => {
    const { session, control, decisions } = createSession();
    await session.startSpeaking('seg-1');
    session.pushUserSpeechStarted('u1');
    session.pushTranscript({ text: 'yeah', isFinal: true, utteranceId: 'u1' });
    await session.close();

    expect(decisions.map((d) => [d.action, d.segmentId])).toEqual([['ignore', 'seg-1']]);
    expect(control.calls).toEqual([]);
  });

  it('interrupts the agent and commits the turn on a command', async () => {
    const { session, control, decisions } = createSession();
    await session.startSpeaking('seg-1');
    session.pushUserSpeechStarted('u1');
    session.pushTranscript({ text: 'Wait, stop!', isFinal: false, utteranceId: 'u1' });
    await session.close();

    expect(decisions.map((d) => d.action)).toEqual(['interrupt']);
    expect(control.calls).toEqual(['interrupt', 'commitUserTurn']);
  });

  it('commits the turn when the agent is silent', async () => {
    const { session, control, decisions } = createSession();
    session.pushUserSpeechStarted('u1');
    session.pushTranscript({ text: 'yeah', isFinal: true, utteranceId: 'u1' });
    await session.close();

    expect(decisions.map((d) => d.action)).toEqual(['respond']);
    expect(control.calls).toEqual(['commitUserTurn']);
  });

  it('applies the timeout fallback', async () => {
    const { session, control, decisions } = createSession({ config: { transcriptWaitTimeout: 20 } });
    await session.startSpeaking('seg-1');
    session.pushUserSpeechStarted('u1');
    await delay(80);
    await session.close();

    expect(decisions.map((d) => d.action)).toEqual(['interrupt']);
    expect(control.calls).toEqual(['interrupt', 'commitUserTurn']);
    expect(session.summary.timeouts).toBe(1);
  });

  it('treats speech as a new turn once the agent stops', async () => {
    const { session, control, decisions } = createSession({ config: { transcriptWaitTimeout: 20 } });
    await session.startSpeaking('seg-1');
    session.pushUserSpeechStarted('u1');
    await session.stopSpeaking();
    session.pushTranscript({ text: 'okay', isFinal: true, utteranceId: 'u1' });
    await delay(60);
    await session.close();

    expect(decisions.map((d) => d.action)).toEqual(['respond']);
    expect(control.calls).toEqual(['commitUserTurn']);
  });

  it('clears the user turn after a final ignore when configured', async () => {
    const { session, control } = createSession({ config: { clearUserTurnOnIgnore: true } });
    await session.startSpeaking('seg-1');
    session.pushUserSpeechStarted('u1');
    session.pushTranscript({ text: 'mm hmm', isFinal: false, utteranceId: 'u1' });
    session.pushTranscript({ text: 'mm hmm', isFinal: true, utteranceId: 'u1' });
    await session.close();

    expect(control.calls).toEqual(['clearUserTurn']);
  });

  it('interrupts on every speech start when disabled', async () => {
    const { session, decisions } = createSession({ config: { enabled: false } });
    await session.startSpeaking('seg-1');
    session.pushUserSpeechStarted('u1');
    await session.close();

    expect(decisions.map((d) => d.reason)).toEqual(['interruption filtering is disabled']);
  });

  it('uses a custom classifier', async () => {
    const classifier: Classifier = {
      classify: (normalizedText) => ({
        category: 'command',
        matchedBackchannelTokens: new Set(),
        matchedCommandTokens: new Set(['anything']),
        tokens: [normalizedText],
        contentTokens: [],
      }),
    };
    const { session, decisions } = createSession({ classifier });
    await session.startSpeaking('seg-1');
    session.pushTranscript({ text: 'yeah', isFinal: false, utteranceId: 'u1' });
    await session.close();

    expect(decisions.map((d) => d.reason)).toEqual(['command detected (anything)']);
  });

  it('keeps deciding while a host call never settles', async () => {
    const control = new FakeSpeechControl();
    control.interrupt = () => {
      control.calls.push('interrupt');
      return new Promise<void>(() => {});
    };
    const session = new InterruptionSession({ control });
    const decisions: Decision[] = [];
    session.on('decision', (decision) => decisions.push(decision));

    await session.startSpeaking('seg-1');
    session.pushUserSpeechStarted('u1');
    session.pushTranscript({ text: 'stop', isFinal: true, utteranceId: 'u1' });
    await delay(10);
    await session.stopSpeaking();
    session.pushUserSpeechStarted('u2');
    await session.close();

    expect(decisions.map((d) => [d.utteranceId, d.action])).toEqual([
      ['u1', 'interrupt'],
      ['u2', 'respond'],
    ]);
    expect(control.calls).toEqual(['interrupt', 'commitUserTurn', 'commitUserTurn']);
  });

  it('keeps processing inputs after one fails', async () => {
    const classifier: Classifier = {
      classify: (normalizedText) => {
        if (normalizedText === 'boom') {
          throw new Error('classifier failed');
        }
        return {
          category: 'other',
          matchedBackchannelTokens: new Set(),
          matchedCommandTokens: new Set(),
          tokens: [normalizedText],
          contentTokens: [normalizedText],
        };
      },
    };
    const { session, control, decisions } = createSession({ classifier });
    await session.startSpeaking('seg-1');
    session.pushTranscript({ text: 'boom', isFinal: true, utteranceId: 'u1' });
    session.pushTranscript({ text: 'hello', isFinal: true, utteranceId: 'u2' });
    await session.close();

    expect(decisions.map((d) => [d.utteranceId, d.action, d.reason])).toEqual([
      ['u2', 'interrupt', 'substantive speech while agent is speaking'],
    ]);
    expect(control.calls).toEqual(['interrupt', 'commitUserTurn']);
  });

  it('reports metrics for every decision', async () => {
    const { session } = createSession();
    const metrics: DecisionMetrics[] = [];
    session.on('metrics_collected', (m) => metrics.push(m));

    await session.startSpeaking('seg-1');
    session.pushUserSpeechStarted('u1');
    session.pushTranscript({ text: 'yeah', isFinal: false, utteranceId: 'u1' });
    session.pushTranscript({ text: 'yeah hold on', isFinal: true, utteranceId: 'u1' });
    await session.close();

    expect(metrics.map((m) => [m.action, m.provisional, m.isFinal])).toEqual([
      ['ignore', true, false],
      ['interrupt', false, true],
    ]);
    expect(session.summary).toMatchObject({
      decisions: 2,
      ignored: 1,
      interrupted: 1,
      provisionalOverrides: 1,
      byCategory: { backchannel: 1, command: 0, mixed: 1, other: 0 },
    });
  });

  it('tracks the agent speech state', async () => {
    const { session } = createSession({ config: { maxAgentSpeechDuration: 20 } });
    const segmentId = await session.startSpeaking();
    expect(segmentId).toMatch(/^seg_/);
    expect(session.agentState.utteranceId).toBe(segmentId);

    await delay(80);
    expect(session.agentState.isSpeaking).toBe(false);
    await session.close();
  });

  it('generates utterance ids when none is given', async () => {
    const { session } = createSession();
    expect(session.pushUserSpeechStarted()).toMatch(/^utt_/);
    await session.close();
  });

  it('rejects an invalid configuration', () => {
    expect(() => createSession({ config: { fuzzyThreshold: 2 } })).toThrow(ConfigurationError);
  });

  it('refuses input once closed', async () => {
    const { session } = createSession();
    await session.close();
    await session.close();

    expect(() => session.pushTranscript({ text: 'stop', isFinal: true, utteranceId: 'u1' })).toThrow(
      'interruption session is closed',
    );
    await expect(session.startSpeaking('seg-1')).rejects.toThrow('interruption session is closed');
  });
});
