// SPDX-FileCopyrightText: 2025 LiveKit, Inc.
//
// SPDX-License-Identifier: Apache-2.0
import { ConfigurationError } from '../_exceptions.js';

const NON_WORD_CHARS = /[^\p{L}\p{N}\s]/gu;
const WHITESPACE_RUN = /\s+/g;

/**
 * Lowercases `text`, strips everything that is not a letter, digit or whitespace, collapses
 * whitespace runs to a single space and trims. `normalize(normalize(s)) === normalize(s)`.
 *
 * @example
 * ```ts
 * normalize('  Uh-huh... OK!  '); // 'uhhuh ok'
 * ```
 */
export function normalize(text: string): string {
  return text.toLowerCase().replace(NON_WORD_CHARS, '').replace(WHITESPACE_RUN, ' ').trim();
}

export function tokenize(normalizedText: string): string[] {
  return normalizedText.split(' ').filter((token) => token.length > 0);
}

/**
 * An immutable set of normalized words and phrases. Built once at configuration time.
 */
export class Lexicon {
  readonly label: string;
  /** Every entry, normalized. */
  readonly entries: ReadonlySet<string>;
  /** Single-token entries. */
  readonly words: ReadonlySet<string>;
  /** Multi-token entries split into tokens, longest first. */
  readonly phrases: readonly (readonly string[])[];

  private constructor(label: string, entries: Set<string>) {
    this.label = label;
    this.entries = entries;
    this.words = new Set([...entries].filter((entry) => !entry.includes(' ')));
    this.phrases = Object.freeze(
      [...entries]
        .filter((entry) => entry.includes(' '))
        .map((entry) => Object.freeze(tokenize(entry)))
        .sort((a, b) => b.length - a.length),
    );
  }

  /**
   * @throws {@link ConfigurationError} if an entry is blank once normalized
   */
  static fromWords(words: Iterable<string>, label: string): Lexicon {
    const entries = new Set<string>();
    const issues: string[] = [];

    for (const word of words) {
      const entry = normalize(word);
      if (!entry) {
        issues.push(`${label}: entry ${JSON.stringify(word)} is empty after normalization`);
        continue;
      }
      entries.add(entry);
    }

    if (issues.length > 0) {
      throw new ConfigurationError(`invalid ${label} lexicon`, { source: label, issues });
    }
    return new Lexicon(label, entries);
  }

  has(entry: string): boolean {
    return this.entries.has(entry);
  }

  get size(): number {
    return this.entries.size;
  }
}

export interface LexiconPair {
  backchannel: Lexicon;
  command: Lexicon;
}

/**
 * Builds the backchannel/command pair and checks that no entry belongs to both.
 *
 * @throws {@link ConfigurationError} on a blank or shared entry
 */
export function buildLexicons({
  backchannelWords,
  commandWords,
}: {
  backchannelWords: Iterable<string>;
  commandWords: Iterable<string>;
}): LexiconPair {
  const backchannel = Lexicon.fromWords(backchannelWords, 'backchannel');
  const command = Lexicon.fromWords(commandWords, 'command');

  const shared = [...backchannel.entries].filter((entry) => command.has(entry));
  if (shared.length > 0) {
    throw new ConfigurationError('backchannel and command lexicons overlap', {
      source: 'lexicon',
      issues: shared.map((entry) => `${JSON.stringify(entry)} is in both lexicons`),
    });
  }

  return { backchannel, command };
}
