// SPDX-FileCopyrightText: 2025 LiveKit, Inc.
//
// SPDX-License-Identifier: Apache-2.0
import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { ConfigurationError } from '../_exceptions.js';
import { log } from '../log.js';
import {
  DEFAULT_BACKCHANNEL_WORDS,
  DEFAULT_COMMAND_WORDS,
  ENV_PREFIX,
  FUZZY_THRESHOLD,
  TRANSCRIPT_WAIT_TIMEOUT_MS,
} from './defaults.js';
import { buildLexicons } from './lexicon.js';

export type TimeoutFallback = 'interrupt' | 'ignore';

/**
 * Configuration for context-aware interruption handling.
 */
export interface InterruptionHandlingConfig {
  /**
   * When `false`, every user speech start while the agent speaks interrupts it and transcripts
   * are not classified.
   * @defaultValue true
   */
  enabled: boolean;
  /**
   * Acknowledgements ignored while the agent is speaking.
   */
  backchannelWords: readonly string[];
  /**
   * Words and phrases that always interrupt the agent.
   */
  commandWords: readonly string[];
  /**
   * Whether tokens that miss both lexicons are compared by edit similarity.
   * @defaultValue true
   */
  fuzzyMatching: boolean;
  /**
   * Minimum similarity, in [0, 1], for a fuzzy match.
   * @defaultValue 0.8
   */
  fuzzyThreshold: number;
  /**
   * How long to wait for the first transcript after user speech starts over the agent, in
   * milliseconds.
   * @defaultValue 500
   */
  transcriptWaitTimeout: number;
  /**
   * Decision applied when no transcript arrives within `transcriptWaitTimeout`.
   * @defaultValue 'interrupt'
   */
  timeoutFallback: TimeoutFallback;
  /**
   * If set, agent speech that is never stopped is considered finished after this many
   * milliseconds. Set to `undefined` to disable.
   * @defaultValue undefined
   */
  maxAgentSpeechDuration: number | undefined;
  /**
   * Clear the buffered user turn when a backchannel is finally ignored.
   * @defaultValue false
   */
  clearUserTurnOnIgnore: boolean;
  /**
   * Log every decision at `info` instead of `debug`.
   * @defaultValue false
   */
  logAllDecisions: boolean;
}

export const defaultInterruptionHandlingConfig = {
  enabled: true,
  backchannelWords: DEFAULT_BACKCHANNEL_WORDS,
  commandWords: DEFAULT_COMMAND_WORDS,
  fuzzyMatching: true,
  fuzzyThreshold: FUZZY_THRESHOLD,
  transcriptWaitTimeout: TRANSCRIPT_WAIT_TIMEOUT_MS,
  timeoutFallback: 'interrupt',
  maxAgentSpeechDuration: undefined,
  clearUserTurnOnIgnore: false,
  logAllDecisions: false,
} as const satisfies InterruptionHandlingConfig;

const configSchema = z
  .object({
    enabled: z.boolean(),
    backchannelWords: z.array(z.string()),
    commandWords: z.array(z.string()),
    fuzzyMatching: z.boolean(),
    fuzzyThreshold: z.number().min(0).max(1),
    transcriptWaitTimeout: z.number().positive().finite(),
    timeoutFallback: z.enum(['interrupt', 'ignore']),
    maxAgentSpeechDuration: z.number().positive().finite().optional(),
    clearUserTurnOnIgnore: z.boolean(),
    logAllDecisions: z.boolean(),
  })
  .strict();

const fileSchema = configSchema.partial();

const wordListSchema = z.array(z.string());

export type PartialInterruptionHandlingConfig = Partial<InterruptionHandlingConfig>;

/** Remove keys whose value is `undefined` so they don't shadow defaults when spread. */
export function stripUndefined<T extends object>(obj: T): Partial<T> {
  return Object.fromEntries(Object.entries(obj).filter(([, v]) => v !== undefined)) as Partial<T>;
}

export function mergeWithDefaults(
  config: PartialInterruptionHandlingConfig,
): InterruptionHandlingConfig {
  return { ...defaultInterruptionHandlingConfig, ...stripUndefined(config) };
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`);
}

/**
 * Merges `config` over the defaults and validates the result, lexicons included.
 *
 * @throws {@link ConfigurationError} when a value is out of range or a lexicon is corrupt
 */
export function resolveInterruptionConfig(
  config: PartialInterruptionHandlingConfig = {},
  source = 'options',
): InterruptionHandlingConfig {
  const result = configSchema.safeParse(mergeWithDefaults(config));
  if (!result.success) {
    throw new ConfigurationError('invalid interruption handling configuration', {
      source,
      issues: formatIssues(result.error),
    });
  }

  const resolved: InterruptionHandlingConfig = {
    ...result.data,
    maxAgentSpeechDuration: result.data.maxAgentSpeechDuration,
  };
  buildLexicons(resolved);
  return resolved;
}

/**
 * Reads a JSON configuration file whose top-level keys are those of
 * {@link InterruptionHandlingConfig}, all optional.
 */
export function readConfigFile(path: string): PartialInterruptionHandlingConfig {
  let raw: string;
  try {
    raw = readFileSync(path, 'utf8');
  } catch (error) {
    throw new ConfigurationError(`cannot read configuration file ${path}`, {
      source: path,
      cause: error,
    });
  }

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (error) {
    throw new ConfigurationError(`configuration file ${path} is not valid JSON`, {
      source: path,
      cause: error,
    });
  }

  const result = fileSchema.safeParse(data);
  if (!result.success) {
    throw new ConfigurationError(`invalid configuration file ${path}`, {
      source: path,
      issues: formatIssues(result.error),
    });
  }
  return result.data;
}

const TRUE_VALUES = new Set(['true', '1', 'yes', 'on']);
const FALSE_VALUES = new Set(['false', '0', 'no', 'off']);

/**
 * Reads the `INTERRUPTION_*` environment variables. Unset or empty variables are skipped.
 *
 * @throws {@link ConfigurationError} listing every variable that could not be parsed
 */
export function readConfigEnv(
  env: NodeJS.ProcessEnv = process.env,
): PartialInterruptionHandlingConfig {
  const issues: string[] = [];
  const read = (name: string) => {
    const value = env[`${ENV_PREFIX}${name}`]?.trim();
    return value ? value : undefined;
  };

  const bool = (name: string): boolean | undefined => {
    const value = read(name)?.toLowerCase();
    if (value === undefined) return undefined;
    if (TRUE_VALUES.has(value)) return true;
    if (FALSE_VALUES.has(value)) return false;
    issues.push(`${ENV_PREFIX}${name}: expected a boolean, got ${JSON.stringify(value)}`);
    return undefined;
  };

  const num = (name: string): number | undefined => {
    const value = read(name);
    if (value === undefined) return undefined;
    const parsed = Number(value);
    if (Number.isNaN(parsed)) {
      issues.push(`${ENV_PREFIX}${name}: expected a number, got ${JSON.stringify(value)}`);
      return undefined;
    }
    return parsed;
  };

  const words = (name: string): string[] | undefined => {
    const value = read(name);
    if (value === undefined) return undefined;
    if (value.startsWith('[')) {
      let parsed: unknown;
      try {
        parsed = JSON.parse(value);
      } catch {
        issues.push(`${ENV_PREFIX}${name}: malformed JSON array`);
        return undefined;
      }
      const result = wordListSchema.safeParse(parsed);
      if (!result.success) {
        issues.push(`${ENV_PREFIX}${name}: expected an array of strings`);
        return undefined;
      }
      return result.data;
    }
    return value
      .split(',')
      .map((word) => word.trim())
      .filter((word) => word.length > 0);
  };

  const fallback = read('TIMEOUT_FALLBACK')?.toLowerCase();
  let timeoutFallback: TimeoutFallback | undefined;
  if (fallback === 'interrupt' || fallback === 'ignore') {
    timeoutFallback = fallback;
  } else if (fallback !== undefined) {
    issues.push(
      `${ENV_PREFIX}TIMEOUT_FALLBACK: expected "interrupt" or "ignore", got ${JSON.stringify(fallback)}`,
    );
  }

  const config: PartialInterruptionHandlingConfig = {
    enabled: bool('ENABLED'),
    backchannelWords: words('IGNORE_WORDS'),
    commandWords: words('COMMAND_WORDS'),
    fuzzyMatching: bool('FUZZY_ENABLED'),
    fuzzyThreshold: num('FUZZY_THRESHOLD'),
    transcriptWaitTimeout: num('TRANSCRIPT_TIMEOUT_MS'),
    timeoutFallback,
    maxAgentSpeechDuration: num('MAX_SPEECH_MS'),
    clearUserTurnOnIgnore: bool('CLEAR_ON_IGNORE'),
    logAllDecisions: bool('LOG_ALL_DECISIONS'),
  };

  if (issues.length > 0) {
    throw new ConfigurationError('invalid interruption handling environment', {
      source: 'env',
      issues,
    });
  }
  return stripUndefined(config);
}

export interface LoadInterruptionConfigOptions {
  /** JSON file to read; falls back to `INTERRUPTION_CONFIG_FILE`. */
  configFile?: string;
  env?: NodeJS.ProcessEnv;
  /** Direct values, applied last. */
  overrides?: PartialInterruptionHandlingConfig;
}

/**
 * Loads the configuration once, at session start. Precedence, lowest first: defaults,
 * configuration file, environment, `overrides`.
 *
 * @throws {@link ConfigurationError} if any source is invalid
 */
export function loadInterruptionConfig({
  configFile,
  env = process.env,
  overrides = {},
}: LoadInterruptionConfigOptions = {}): InterruptionHandlingConfig {
  const logger = log();
  const path = configFile ?? env[`${ENV_PREFIX}CONFIG_FILE`];
  const fromFile = path ? readConfigFile(path) : {};
  const fromEnv = readConfigEnv(env);

  const config = resolveInterruptionConfig(
    { ...fromFile, ...fromEnv, ...stripUndefined(overrides) },
    path ?? 'env',
  );

  logger.debug(
    {
      configFile: path,
      enabled: config.enabled,
      backchannelWords: config.backchannelWords.length,
      commandWords: config.commandWords.length,
      fuzzyMatching: config.fuzzyMatching,
      fuzzyThreshold: config.fuzzyThreshold,
      transcriptWaitTimeout: config.transcriptWaitTimeout,
      timeoutFallback: config.timeoutFallback,
    },
    'interruption handling configuration loaded',
  );
  return config;
}
