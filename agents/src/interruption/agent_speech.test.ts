// SPDX-FileCopyrightText: 2025 LiveKit, Inc.
//
// SPDX-License-Identifier: Apache-2.0
import { afterEach, beforeAll, describe, expect, it, vi } from 'vitest';
import { InvalidStateError } from '../_exceptions.js';
import { initializeLogger } from '../log.js';
import {
  AgentSpeechTracker,
  type AgentSpeechStartedEvent,
  type AgentSpeechStoppedEvent,
} from './agent_speech.js';

const record = (tracker: AgentSpeechTracker) => {
  const started: AgentSpeechStartedEvent[] = [];
  const stopped: AgentSpeechStoppedEvent[] = [];
  tracker.on('agent_speech_started', (ev) => started.push(ev));
  tracker.on('agent_speech_stopped', (ev) => stopped.push(ev));
  return { started, stopped };
};

describe('AgentSpeechTracker', () => {
  beforeAll(() => {
    initializeLogger({ pretty: false, level: 'silent' });
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('starts silent', () => {
    const tracker = new AgentSpeechTracker();
    expect(tracker.getState()).toEqual({ isSpeaking: false, utteranceId: null, startedAt: null });
    expect(tracker.speechDuration()).toBeNull();
  });

  it('tracks a speech segment from start to stop', async () => {
    vi.useFakeTimers();
    vi.setSystemTime(10_000);
    const tracker = new AgentSpeechTracker();
    const { started, stopped } = record(tracker);

    await tracker.startSpeaking('seg-1');
    expect(tracker.getState()).toEqual({ isSpeaking: true, utteranceId: 'seg-1', startedAt: 10_000 });
    expect(started).toEqual([{ segmentId: 'seg-1', startedAt: 10_000 }]);

    vi.setSystemTime(10_250);
    expect(tracker.speechDuration()).toBe(250);

    await tracker.stopSpeaking();
    expect(tracker.getState().isSpeaking).toBe(false);
    expect(tracker.getState().utteranceId).toBeNull();
    expect(stopped).toEqual([{ segmentId: 'seg-1', reason: 'stopped', durationMs: 250 }]);
  });

  it('returns immutable snapshots', async () => {
    const tracker = new AgentSpeechTracker();
    await tracker.startSpeaking('seg-1');
    const snapshot = tracker.getState();
    await tracker.stopSpeaking();

    expect(Object.isFrozen(snapshot)).toBe(true);
    expect(snapshot.isSpeaking).toBe(true);
    expect(snapshot.utteranceId).toBe('seg-1');
  });

  it('treats restarting the current segment as a no-op', async () => {
    const tracker = new AgentSpeechTracker();
    const { started } = record(tracker);
    await tracker.startSpeaking('seg-1');
    const snapshot = tracker.getState();
    await tracker.startSpeaking('seg-1');

    expect(started).toHaveLength(1);
    expect(tracker.getState()).toBe(snapshot);
  });

  it('refuses to start another segment while speaking', async () => {
    const tracker = new AgentSpeechTracker();
    await tracker.startSpeaking('seg-1');

    await expect(tracker.startSpeaking('seg-2')).rejects.toThrow(InvalidStateError);
    expect(tracker.getState().utteranceId).toBe('seg-1');
  });

  it('serializes concurrent starts', async () => {
    const tracker = new AgentSpeechTracker();
    const [first, second] = await Promise.allSettled([
      tracker.startSpeaking('seg-1'),
      tracker.startSpeaking('seg-2'),
    ]);

    expect(first.status).toBe('fulfilled');
    expect(second.status).toBe('rejected');
    expect(second.status === 'rejected' && second.reason).toBeInstanceOf(InvalidStateError);
    expect(tracker.getState().utteranceId).toBe('seg-1');
  });

  it('replaces the current segment when forced', async () => {
    const tracker = new AgentSpeechTracker();
    const { started, stopped } = record(tracker);
    await tracker.startSpeaking('seg-1');
    await tracker.startSpeaking('seg-2', { force: true });

    expect(tracker.getState().utteranceId).toBe('seg-2');
    expect(started.map((ev) => ev.segmentId)).toEqual(['seg-1', 'seg-2']);
    expect(stopped.map((ev) => [ev.segmentId, ev.reason])).toEqual([['seg-1', 'replaced']]);
  });

  it('rejects an empty segment id', async () => {
    const tracker = new AgentSpeechTracker();
    await expect(tracker.startSpeaking('')).rejects.toThrow(TypeError);
  });

  it('stops idempotently', async () => {
    const tracker = new AgentSpeechTracker();
    const { stopped } = record(tracker);
    await tracker.stopSpeaking();
    await tracker.startSpeaking('seg-1');
    await tracker.stopSpeaking();
    await tracker.stopSpeaking();

    expect(stopped).toHaveLength(1);
  });

  it('falls back to silent after the maximum speech duration', async () => {
    vi.useFakeTimers();
    vi.setSystemTime(0);
    const tracker = new AgentSpeechTracker({ maxSpeechDuration: 1000 });
    const { stopped } = record(tracker);
    await tracker.startSpeaking('seg-1');

    await vi.advanceTimersByTimeAsync(999);
    expect(tracker.getState().isSpeaking).toBe(true);

    await vi.advanceTimersByTimeAsync(1);
    expect(tracker.getState().isSpeaking).toBe(false);
    expect(stopped).toEqual([{ segmentId: 'seg-1', reason: 'timeout', durationMs: 1000 }]);
  });

  it('disarms the safety timeout on stop and reset', async () => {
    vi.useFakeTimers();
    const tracker = new AgentSpeechTracker({ maxSpeechDuration: 1000 });
    const { stopped } = record(tracker);

    await tracker.startSpeaking('seg-1');
    await tracker.stopSpeaking();
    await tracker.startSpeaking('seg-2');
    await tracker.reset();
    await vi.advanceTimersByTimeAsync(5000);

    expect(stopped.map((ev) => ev.reason)).toEqual(['stopped', 'stopped']);
    expect(tracker.getState().isSpeaking).toBe(false);
  });

  it('rejects a non-positive maximum speech duration', () => {
    expect(() => new AgentSpeechTracker({ maxSpeechDuration: 0 })).toThrow(RangeError);
  });
});
