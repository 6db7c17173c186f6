// SPDX-FileCopyrightText: 2025 LiveKit, Inc.
//
// SPDX-License-Identifier: Apache-2.0
import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { ConfigurationError } from '../_exceptions.js';
import { log } from '../log.js';
import { delay } from '../utils.js';
import type { InterruptionSession } from './session.js';
import type { Decision } from './types.js';

const offset = z.number().int().nonnegative();

const stepSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('agent_start'),
    at: offset,
    segmentId: z.string().min(1).optional(),
    force: z.boolean().optional(),
  }),
  z.object({ type: z.literal('agent_stop'), at: offset }),
  z.object({ type: z.literal('user_speech'), at: offset, utteranceId: z.string().min(1) }),
  z.object({
    type: z.literal('transcript'),
    at: offset,
    utteranceId: z.string().nullable().optional(),
    text: z.string(),
    isFinal: z.boolean().default(false),
  }),
]);

const scriptSchema = z
  .object({
    name: z.string().optional(),
    steps: z.array(stepSchema),
  })
  .strict();

export type SessionScriptStep = z.infer<typeof stepSchema>;
export type SessionScript = z.infer<typeof scriptSchema>;

/**
 * Validates a session script. Steps are returned ordered by their `at` offset, keeping the
 * written order for steps at the same offset.
 *
 * @throws {@link ConfigurationError} if the script does not match the expected shape
 */
export function parseSessionScript(data: unknown, source = 'script'): SessionScript {
  const result = scriptSchema.safeParse(data);
  if (!result.success) {
    throw new ConfigurationError(`invalid session script ${source}`, {
      source,
      issues: result.error.issues.map(
        (issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`,
      ),
    });
  }
  const steps = [...result.data.steps].sort((a, b) => a.at - b.at);
  return { ...result.data, steps };
}

export async function readSessionScript(path: string): Promise<SessionScript> {
  let data: unknown;
  try {
    data = JSON.parse(await readFile(path, 'utf8'));
  } catch (error) {
    throw new ConfigurationError(`cannot load session script ${path}`, { source: path, cause: error });
  }
  return parseSessionScript(data, path);
}

export interface ReplayOptions {
  /** How long to keep listening after the last step, in milliseconds. Defaults to the session's transcript wait timeout. */
  settle?: number;
  signal?: AbortSignal;
}

/**
 * Feeds every step of `script` to `session` at its offset and returns the decisions emitted
 * while replaying. The session is left open.
 */
export async function replaySessionScript(
  session: InterruptionSession,
  script: SessionScript,
  { settle = session.config.transcriptWaitTimeout, signal }: ReplayOptions = {},
): Promise<Decision[]> {
  const logger = log();
  const decisions: Decision[] = [];
  const onDecision = (decision: Decision) => {
    decisions.push(decision);
  };
  session.on('decision', onDecision);

  try {
    const startedAt = Date.now();
    for (const step of script.steps) {
      const wait = step.at - (Date.now() - startedAt);
      if (wait > 0) {
        await delay(wait, { signal });
      }
      logger.debug({ step }, 'replaying step');

      switch (step.type) {
        case 'agent_start':
          await session.startSpeaking(step.segmentId, { force: step.force });
          break;
        case 'agent_stop':
          await session.stopSpeaking();
          break;
        case 'user_speech':
          session.pushUserSpeechStarted(step.utteranceId);
          break;
        case 'transcript':
          session.pushTranscript({
            text: step.text,
            isFinal: step.isFinal,
            utteranceId: step.utteranceId,
          });
          break;
      }
    }
    await delay(settle, { signal });
  } finally {
    session.off('decision', onDecision);
  }
  return decisions;
}
