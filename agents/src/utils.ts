// SPDX-FileCopyrightText: 2024 LiveKit, Inc.
//
// SPDX-License-Identifier: Apache-2.0
import { v4 as uuidv4 } from 'uuid';
import { log } from './log.js';

/** @internal Unbounded FIFO whose `get` waits for the next `put` when empty. */
export class Queue<T> {
  #items: { value: T }[] = [];
  #waiters: ((value: T) => void)[] = [];

  get size(): number {
    return this.#items.length;
  }

  async get(): Promise<T> {
    const head = this.#items.shift();
    if (head) {
      return head.value;
    }
    return new Promise<T>((resolve) => {
      this.#waiters.push(resolve);
    });
  }

  put(value: T): void {
    const waiter = this.#waiters.shift();
    if (waiter) {
      waiter(value);
    } else {
      this.#items.push({ value });
    }
  }
}

/** @internal */
export class Future<T = void> {
  #await: Promise<T>;
  #resolvePromise!: (value: T) => void;
  #rejectPromise!: (error: Error) => void;
  #done: boolean = false;

  constructor() {
    this.#await = new Promise<T>((resolve, reject) => {
      this.#resolvePromise = resolve;
      this.#rejectPromise = reject;
    });
  }

  get await() {
    return this.#await;
  }

  get done() {
    return this.#done;
  }

  resolve(value: T) {
    this.#done = true;
    this.#resolvePromise(value);
  }

  reject(error: Error) {
    this.#done = true;
    this.#rejectPromise(error);
  }
}

/** @internal Single-consumer channel; iteration ends once it is closed and drained. */
export class AsyncIterableQueue<T> implements AsyncIterableIterator<T> {
  private static readonly CLOSE_SENTINEL = Symbol('CLOSE_SENTINEL');
  #queue = new Queue<T | typeof AsyncIterableQueue.CLOSE_SENTINEL>();
  #closed = false;

  get closed(): boolean {
    return this.#closed;
  }

  put(item: T): void {
    if (this.#closed) {
      throw new Error('Queue is closed');
    }
    this.#queue.put(item);
  }

  close(): void {
    if (this.#closed) {
      return;
    }
    this.#closed = true;
    this.#queue.put(AsyncIterableQueue.CLOSE_SENTINEL);
  }

  async next(): Promise<IteratorResult<T>> {
    if (this.#closed && this.#queue.size === 0) {
      return { value: undefined, done: true };
    }
    const item = await this.#queue.get();
    if (item === AsyncIterableQueue.CLOSE_SENTINEL) {
      return { value: undefined, done: true };
    }
    return { value: item, done: false };
  }

  [Symbol.asyncIterator](): AsyncIterableQueue<T> {
    return this;
  }
}

/**
 * Starts an async function at once and keeps its outcome. A rejection with a non-error value is
 * wrapped by {@link toError}.
 *
 * @example
 * ```ts
 * const task = Task.from(async () => {
 *   for await (const ev of channel) handle(ev);
 * }, 'consumer');
 * channel.close();
 * await task.result;
 * ```
 */
export class Task<T> {
  readonly name?: string;
  #result = new Future<T>();
  #logger = log();

  private constructor(fn: () => Promise<T>, name?: string) {
    this.name = name;
    void this.run(fn);
  }

  static from<T>(fn: () => Promise<T>, name?: string): Task<T> {
    return new Task(fn, name);
  }

  private async run(fn: () => Promise<T>) {
    if (this.name) {
      this.#logger.debug({ task: this.name }, 'task started');
    }
    try {
      this.#result.resolve(await fn());
    } catch (error) {
      this.#result.reject(toError(error));
    } finally {
      if (this.name) {
        this.#logger.debug({ task: this.name }, 'task done');
      }
    }
  }

  get result(): Promise<T> {
    return this.#result.await;
  }

  get done(): boolean {
    return this.#result.done;
  }
}

/**
 * Generates a short UUID with a prefix.
 *
 * @param prefix - The prefix to add to the UUID.
 * @returns A short UUID with the prefix.
 */
export function shortuuid(prefix: string = ''): string {
  return `${prefix}${uuidv4().slice(0, 12)}`;
}

export class InvalidErrorType extends Error {
  readonly error: unknown;

  constructor(error: unknown) {
    super(`Expected error, got ${error} (${typeof error})`);
    this.error = error;
    Error.captureStackTrace(this, InvalidErrorType);
  }
}

/**
 * In JS an error can be any arbitrary value.
 * This function converts an unknown thrown value to an Error, wrapping non-errors in an
 * {@link InvalidErrorType} that keeps the original value.
 *
 * @param error - The error to convert.
 * @returns An Error.
 */
export function toError(error: unknown): Error {
  if (error instanceof Error) {
    return error;
  }
  return new InvalidErrorType(error);
}

export type DelayOptions = {
  signal?: AbortSignal;
};

/**
 * Delay for a given number of milliseconds.
 *
 * @param ms - The number of milliseconds to delay.
 * @param options - The options for the delay.
 * @returns A promise that resolves after the delay.
 */
export function delay(ms: number, options: DelayOptions = {}): Promise<void> {
  const { signal } = options;
  if (signal?.aborted) return Promise.reject(signal.reason);
  return new Promise((resolve, reject) => {
    const abort = () => {
      clearTimeout(i);
      reject(signal?.reason);
    };
    const done = () => {
      signal?.removeEventListener('abort', abort);
      resolve();
    };
    const i = setTimeout(done, ms);
    signal?.addEventListener('abort', abort, { once: true });
  });
}
