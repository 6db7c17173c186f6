// SPDX-FileCopyrightText: 2025 LiveKit, Inc.
//
// SPDX-License-Identifier: Apache-2.0

export const FUZZY_THRESHOLD = 0.8;
/** Tokens and entries shorter than this are matched exactly or not at all. */
export const FUZZY_MIN_LENGTH = 3;
/** Bounded wait for the first transcript after a VAD start while the agent speaks. */
export const TRANSCRIPT_WAIT_TIMEOUT_MS = 500;
/** Number of resolved utterance ids remembered to keep late events idempotent. */
export const RESOLVED_UTTERANCE_CACHE_SIZE = 64;

export const ENV_PREFIX = 'INTERRUPTION_';

/** Acknowledgements that signal listening, not a bid for the turn. */
export const DEFAULT_BACKCHANNEL_WORDS = [
  'yeah',
  'yea',
  'yes',
  'yep',
  'yup',
  'ok',
  'okay',
  'alright',
  'all right',
  'right',
  'sure',
  'hmm',
  'hm',
  'mm',
  'mmm',
  'mhm',
  'mm hmm',
  'uh huh',
  'uh-huh',
  'uh',
  'um',
  'umm',
  'ah',
  'oh',
  'i see',
  'got it',
  'gotcha',
  'makes sense',
  'cool',
  'nice',
  'understood',
] as const;

/** Words and phrases that always take the floor from the agent. */
export const DEFAULT_COMMAND_WORDS = [
  'stop',
  'wait',
  'pause',
  'hold',
  'hold on',
  'hang on',
  'hold up',
  'cancel',
  'no',
  'nope',
  'but',
  'actually',
  'never mind',
  'nevermind',
  'one second',
  'one sec',
  'one moment',
  'excuse me',
  'sorry',
  'pardon',
  'quiet',
  'enough',
  'shut up',
  'slow down',
  'repeat',
] as const;
