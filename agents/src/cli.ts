// SPDX-FileCopyrightText: 2024 LiveKit, Inc.
//
// SPDX-License-Identifier: Apache-2.0
import { Command, Option } from 'commander';
import { loadInterruptionConfig } from './interruption/config.js';
import type { SpeechControl } from './interruption/dispatcher.js';
import { InterruptionSession } from './interruption/session.js';
import { readSessionScript, replaySessionScript } from './interruption/simulation.js';
import type { Decision } from './interruption/types.js';
import { initializeLogger, log } from './log.js';
import { toError } from './utils.js';
import { version } from './version.js';

type Writer = (line: string) => void;

export type SimulateArgs = {
  script: string;
  config?: string;
  logLevel: string;
  pretty: boolean;
  env?: NodeJS.ProcessEnv;
  write?: Writer;
};

const formatDecision = (decision: Decision) =>
  `${decision.utteranceId} -> ${decision.action}${decision.provisional ? ' (provisional)' : ''}: ${decision.reason}`;

/** Host surface that prints every call instead of controlling real audio. */
class PrintingSpeechControl implements SpeechControl {
  #write: Writer;
  #startedAt = Date.now();

  constructor(write: Writer) {
    this.#write = write;
  }

  interrupt() {
    this.print('interrupt()');
  }

  commitUserTurn() {
    this.print('commitUserTurn()');
  }

  clearUserTurn() {
    this.print('clearUserTurn()');
  }

  private print(call: string) {
    this.#write(`  [+${Date.now() - this.#startedAt}ms] host.${call}`);
  }
}

/**
 * Replays a session script against a fresh session and prints decisions, host calls and the
 * decision summary. Returns the process exit code.
 */
export const runSimulation = async ({
  script: scriptPath,
  config: configFile,
  logLevel,
  pretty,
  env = process.env,
  write = console.log,
}: SimulateArgs): Promise<number> => {
  initializeLogger({ pretty, level: logLevel });
  const logger = log();

  try {
    const config = loadInterruptionConfig({ configFile, env });
    const script = await readSessionScript(scriptPath);
    const session = new InterruptionSession({ control: new PrintingSpeechControl(write), config });
    session.on('decision', (decision) => write(formatDecision(decision)));

    write(`replaying ${script.name ?? scriptPath} (${script.steps.length} steps)`);
    await replaySessionScript(session, script);
    await session.close();

    const summary = session.summary;
    write(
      `decisions: ${summary.decisions}, ignored: ${summary.ignored}, interrupted: ${summary.interrupted}, ` +
        `responded: ${summary.responded}, provisional overrides: ${summary.provisionalOverrides}, ` +
        `timeouts: ${summary.timeouts}`,
    );
    return 0;
  } catch (error) {
    logger.fatal({ err: toError(error) }, 'simulation failed');
    write(`error: ${toError(error).toString()}`);
    return 1;
  }
};

const logLevelOption = () =>
  new Option('--log-level <level>', 'Set the logging level')
    .choices(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'])
    .default('info')
    .env('LOG_LEVEL');

export const createProgram = (write: Writer = console.log) => {
  const program = new Command()
    .name('bargein')
    .description('Context-aware interruption handling for voice agents')
    .version(version);

  program
    .command('simulate')
    .description('Replay a timed session script and print every interruption decision')
    .argument('<script>', 'JSON session script')
    .option('--config <path>', 'JSON configuration file')
    .addOption(logLevelOption())
    .option('--pretty', 'Pretty-print logs', false)
    .action(async (script: string, options: { config?: string; logLevel: string; pretty: boolean }) => {
      process.exitCode = await runSimulation({ script, ...options, write });
    });

  return program;
};

/**
 * Entry point of the `bargein` binary.
 *
 * @example
 * ```
 * bargein simulate examples/scripts/backchannel_demo.json --log-level debug --pretty
 * ```
 */
export const runCli = async (argv: readonly string[] = process.argv) => {
  await createProgram().parseAsync([...argv]);
};
