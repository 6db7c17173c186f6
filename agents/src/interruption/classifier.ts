// SPDX-FileCopyrightText: 2025 LiveKit, Inc.
//
// SPDX-License-Identifier: Apache-2.0
import { FUZZY_MIN_LENGTH, FUZZY_THRESHOLD } from './defaults.js';
import { Lexicon, type LexiconPair, buildLexicons, tokenize } from './lexicon.js';
import { similarity } from './similarity.js';
import type { Category, ClassificationResult } from './types.js';

export type LexiconKind = 'backchannel' | 'command';

export interface LexiconMatch {
  lexicon: LexiconKind;
  /** The lexicon entry the token matched. */
  entry: string;
  score: number;
}

/**
 * One tier of token matching. Tiers run in order; the first one that returns a match wins.
 */
export interface MatchStrategy {
  readonly name: string;
  match(token: string, lexicons: LexiconPair): LexiconMatch | undefined;
}

export interface Classifier {
  classify(normalizedText: string): ClassificationResult;
}

export class ExactMatchStrategy implements MatchStrategy {
  readonly name = 'exact';

  match(token: string, { backchannel, command }: LexiconPair): LexiconMatch | undefined {
    if (command.words.has(token)) {
      return { lexicon: 'command', entry: token, score: 1 };
    }
    if (backchannel.words.has(token)) {
      return { lexicon: 'backchannel', entry: token, score: 1 };
    }
    return undefined;
  }
}

export interface FuzzyMatchOptions {
  /** Tokens and entries shorter than this are never compared. */
  minLength?: number;
  /** Only compare a token with entries that start with the same character. */
  anchorFirstChar?: boolean;
}

export class FuzzyMatchStrategy implements MatchStrategy {
  readonly name = 'fuzzy';
  readonly threshold: number;
  readonly minLength: number;
  readonly anchorFirstChar: boolean;

  constructor(
    threshold: number = FUZZY_THRESHOLD,
    { minLength = FUZZY_MIN_LENGTH, anchorFirstChar = true }: FuzzyMatchOptions = {},
  ) {
    if (!(threshold >= 0 && threshold <= 1)) {
      throw new RangeError('fuzzy threshold must be between 0 and 1');
    }
    this.threshold = threshold;
    this.minLength = minLength;
    this.anchorFirstChar = anchorFirstChar;
  }

  match(token: string, { backchannel, command }: LexiconPair): LexiconMatch | undefined {
    if (token.length < this.minLength) {
      return undefined;
    }
    const commandMatch = this.best(token, command, 'command');
    const backchannelMatch = this.best(token, backchannel, 'backchannel');

    if (commandMatch && backchannelMatch) {
      // ties go to the command lexicon
      return backchannelMatch.score > commandMatch.score ? backchannelMatch : commandMatch;
    }
    return commandMatch ?? backchannelMatch;
  }

  private best(token: string, lexicon: Lexicon, kind: LexiconKind): LexiconMatch | undefined {
    let best: LexiconMatch | undefined;
    for (const entry of lexicon.entries) {
      if (entry.length < this.minLength || (this.anchorFirstChar && entry[0] !== token[0])) {
        continue;
      }
      const score = similarity(token, entry);
      if (score >= this.threshold && (!best || score > best.score)) {
        best = { lexicon: kind, entry, score };
      }
    }
    return best;
  }
}

/**
 * Picks the category from how many tokens each lexicon claimed. A single command token wins
 * over any number of backchannel tokens.
 */
export function categorize({
  commandTokens,
  backchannelTokens,
  contentTokens,
}: {
  commandTokens: number;
  backchannelTokens: number;
  contentTokens: number;
}): Category {
  if (commandTokens > 0) {
    return backchannelTokens > 0 ? 'mixed' : 'command';
  }
  if (backchannelTokens > 0 && contentTokens === 0) {
    return 'backchannel';
  }
  return 'other';
}

/**
 * Lexical classifier: command phrases and words first, then backchannel phrases, then each
 * remaining token through the configured strategies (exact, then fuzzy, by default). Tokens no
 * strategy claims are content.
 */
export class TieredClassifier implements Classifier {
  readonly lexicons: LexiconPair;
  readonly strategies: readonly MatchStrategy[];

  constructor(
    lexicons: LexiconPair,
    strategies: readonly MatchStrategy[] = [new ExactMatchStrategy(), new FuzzyMatchStrategy()],
  ) {
    this.lexicons = lexicons;
    this.strategies = Object.freeze([...strategies]);
  }

  classify(normalizedText: string): ClassificationResult {
    const tokens = tokenize(normalizedText);
    const owners: (LexiconKind | undefined)[] = tokens.map(() => undefined);
    const matchedCommandTokens = new Set<string>();
    const matchedBackchannelTokens = new Set<string>();

    // command phrases and words claim their tokens unconditionally, backchannel phrases only
    // unclaimed ones
    for (const phrase of this.lexicons.command.phrases) {
      for (const start of findPhrase(tokens, phrase)) {
        owners.fill('command', start, start + phrase.length);
        matchedCommandTokens.add(phrase.join(' '));
      }
    }
    tokens.forEach((token, i) => {
      if (owners[i] === undefined && this.lexicons.command.words.has(token)) {
        owners[i] = 'command';
        matchedCommandTokens.add(token);
      }
    });
    for (const phrase of this.lexicons.backchannel.phrases) {
      for (const start of findPhrase(tokens, phrase)) {
        const span = owners.slice(start, start + phrase.length);
        if (span.every((owner) => owner === undefined)) {
          owners.fill('backchannel', start, start + phrase.length);
          matchedBackchannelTokens.add(phrase.join(' '));
        }
      }
    }

    const contentTokens: string[] = [];
    tokens.forEach((token, i) => {
      if (owners[i] !== undefined) {
        return;
      }
      const match = this.matchToken(token);
      if (!match) {
        contentTokens.push(token);
        return;
      }
      owners[i] = match.lexicon;
      if (match.lexicon === 'command') {
        matchedCommandTokens.add(match.entry);
      } else {
        matchedBackchannelTokens.add(match.entry);
      }
    });

    const category = categorize({
      commandTokens: owners.filter((owner) => owner === 'command').length,
      backchannelTokens: owners.filter((owner) => owner === 'backchannel').length,
      contentTokens: contentTokens.length,
    });

    return {
      category,
      matchedBackchannelTokens,
      matchedCommandTokens,
      tokens: Object.freeze(tokens),
      contentTokens: Object.freeze(contentTokens),
    };
  }

  private matchToken(token: string): LexiconMatch | undefined {
    for (const strategy of this.strategies) {
      const match = strategy.match(token, this.lexicons);
      if (match) {
        return match;
      }
    }
    return undefined;
  }
}

function findPhrase(tokens: readonly string[], phrase: readonly string[]): number[] {
  const starts: number[] = [];
  for (let i = 0; i + phrase.length <= tokens.length; i++) {
    if (phrase.every((word, j) => tokens[i + j] === word)) {
      starts.push(i);
    }
  }
  return starts;
}

export interface ClassifierOptions {
  fuzzyMatching: boolean;
  fuzzyThreshold: number;
}

export function createClassifier(
  lexicons: LexiconPair,
  { fuzzyMatching, fuzzyThreshold }: ClassifierOptions,
): TieredClassifier {
  const strategies: MatchStrategy[] = [new ExactMatchStrategy()];
  if (fuzzyMatching) {
    strategies.push(new FuzzyMatchStrategy(fuzzyThreshold));
  }
  return new TieredClassifier(lexicons, strategies);
}

/**
 * One-shot classification against two word lists.
 *
 * @example
 * ```ts
 * classify('yeah okay but wait', ['yeah', 'okay'], ['but', 'wait']).category; // 'mixed'
 * ```
 */
export function classify(
  normalizedText: string,
  backchannel: Lexicon | Iterable<string>,
  command: Lexicon | Iterable<string>,
  fuzzyThreshold: number = FUZZY_THRESHOLD,
): ClassificationResult {
  const lexicons =
    backchannel instanceof Lexicon && command instanceof Lexicon
      ? { backchannel, command }
      : buildLexicons({
          backchannelWords: backchannel instanceof Lexicon ? backchannel.entries : backchannel,
          commandWords: command instanceof Lexicon ? command.entries : command,
        });
  return createClassifier(lexicons, { fuzzyMatching: true, fuzzyThreshold }).classify(
    normalizedText,
  );
}
