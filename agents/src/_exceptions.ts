// SPDX-FileCopyrightText: 2025 LiveKit, Inc.
//
// SPDX-License-Identifier: Apache-2.0
/**
 * Raised when the agent speech lifecycle is driven out of order, e.g. starting a new speech
 * segment while another one is still playing.
 */
export class InvalidStateError extends Error {
  constructor(message = 'Invalid agent speech state transition') {
    super(message);
    this.name = 'InvalidStateError';
    Error.captureStackTrace(this, InvalidStateError);
  }
}

/**
 * Interface for configuration error options
 */
interface ConfigurationErrorOptions {
  /** Where the offending value came from (a file path, an environment variable, ...). */
  source?: string;
  issues?: string[];
  cause?: unknown;
}

/**
 * Raised when the interruption handling configuration or one of its lexicons cannot be loaded.
 * Always thrown at load time, never while deciding.
 */
export class ConfigurationError extends Error {
  readonly source: string | null;
  readonly issues: string[];

  constructor(message: string, { source, issues = [], cause }: ConfigurationErrorOptions = {}) {
    super(message, { cause });
    this.name = 'ConfigurationError';

    this.source = source ?? null;
    this.issues = issues;
    Error.captureStackTrace(this, ConfigurationError);
  }

  toString(): string {
    const issues = this.issues.length > 0 ? ` [${this.issues.join('; ')}]` : '';
    return `${this.name}: ${this.message} (source=${this.source})${issues}`;
  }
}
