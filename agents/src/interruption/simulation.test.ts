// SPDX-FileCopyrightText: 2025 LiveKit, Inc.
//
// SPDX-License-Identifier: Apache-2.0
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterAll, beforeAll, describe, expect, it } from 'vitest';
import { ConfigurationError } from '../_exceptions.js';
import { initializeLogger } from '../log.js';
import type { SpeechControl } from './dispatcher.js';
import { InterruptionSession } from './session.js';
import { parseSessionScript, readSessionScript, replaySessionScript } from './simulation.js';

const noop: SpeechControl = {
  interrupt: () => {},
  commitUserTurn: () => {},
  clearUserTurn: () => {},
};

describe('session scripts', () => {
  let dir: string;

  beforeAll(() => {
    initializeLogger({ pretty: false, level: 'silent' });
    dir = mkdtempSync(join(tmpdir(), 'session-script-'));
  });

  afterAll(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  describe('parseSessionScript', () => {
    it('orders steps by offset and fills defaults', () => {
      const script = parseSessionScript({
        name: 'ordering',
        steps: [
          { at: 10, type: 'user_speech', utteranceId: 'u1' },
          { at: 0, type: 'agent_start' },
          { at: 10, type: 'transcript', utteranceId: 'u1', text: 'yeah' },
        ],
      });

      expect(script.steps).toEqual([
        { at: 0, type: 'agent_start' },
        { at: 10, type: 'user_speech', utteranceId: 'u1' },
        { at: 10, type: 'transcript', utteranceId: 'u1', text: 'yeah', isFinal: false },
      ]);
    });

    it('reports invalid steps', () => {
      let caught: unknown;
      try {
        parseSessionScript({ steps: [{ type: 'agent_start' }] }, 'inline');
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(ConfigurationError);
      expect(caught instanceof ConfigurationError && caught.issues).toEqual(['steps.0.at: Required']);
      expect(caught instanceof ConfigurationError && caught.source).toBe('inline');
    });
  });

  describe('readSessionScript', () => {
    it('reads a script from disk', async () => {
      const path = join(dir, 'script.json');
      writeFileSync(path, JSON.stringify({ steps: [{ at: 0, type: 'agent_stop' }] }));
      expect(await readSessionScript(path)).toEqual({ steps: [{ at: 0, type: 'agent_stop' }] });
    });

    it('rejects malformed JSON', async () => {
      const path = join(dir, 'broken.json');
      writeFileSync(path, '{ "steps": [');
      await expect(readSessionScript(path)).rejects.toThrow(`cannot load session script ${path}`);
    });
  });

  describe('replaySessionScript', () => {
    it('replays steps against a session and returns its decisions', async () => {
      const session = new InterruptionSession({ control: noop });
      const script = parseSessionScript({
        steps: [
          { at: 0, type: 'agent_start', segmentId: 'seg-1' },
          { at: 5, type: 'user_speech', utteranceId: 'u1' },
          { at: 5, type: 'transcript', utteranceId: 'u1', text: 'yeah', isFinal: true },
          { at: 10, type: 'user_speech', utteranceId: 'u2' },
          { at: 10, type: 'transcript', utteranceId: 'u2', text: 'hold on' },
          { at: 15, type: 'agent_stop' },
          { at: 20, type: 'user_speech', utteranceId: 'u3' },
        ],
      });

      const decisions = await replaySessionScript(session, script, { settle: 30 });
      await session.close();

      expect(decisions.map((d) => [d.utteranceId, d.action])).toEqual([
        ['u1', 'ignore'],
        ['u2', 'interrupt'],
        ['u3', 'respond'],
      ]);
    });

    it('stops when aborted', async () => {
      const session = new InterruptionSession({ control: noop });
      const controller = new AbortController();
      controller.abort(new Error('stopped by test'));
      const script = parseSessionScript({ steps: [{ at: 1000, type: 'agent_start' }] });

      await expect(
        replaySessionScript(session, script, { signal: controller.signal }),
      ).rejects.toThrow('stopped by test');
      expect(session.agentState.isSpeaking).toBe(false);
      await session.close();
    });
  });
});
