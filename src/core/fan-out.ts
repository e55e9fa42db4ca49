/**
 * Fan-out coordination for batch tool calls.
 *
 * Runs one catalog lookup per batch element through a bounded worker pool
 * and assembles results by input index, never by completion order.
 *
 * The two batch operations differ in failure policy:
 *   - `resolveMany` is all-or-nothing: the first name without hits fails
 *     the whole batch and in-flight siblings are aborted.
 *   - `fetchMany` is best-effort: an id without documentation gets a
 *     placeholder string at its index and the rest of the batch proceeds.
 */

import type { CallerIdentity, LookupOutcome } from '../types/catalog.js';
import type { CatalogClient } from './catalog-client.js';
import { formatSearchResults } from './result-formatter.js';
import { LibraryNotFoundError, ValidationError } from './tool-error.js';
import { createLogger, type Logger } from './logger.js';

// ---------------------------------------------------------------------------
// Worker pool
// ---------------------------------------------------------------------------

/** A unit of work for index `index`. `signal` aborts when the pool halts. */
export type PoolTask<R> = (index: number, signal: AbortSignal) => Promise<R>;

export type PoolResult<R> =
  | { completed: true; results: R[] }
  | { completed: false; index: number; halted: R };

/**
 * Run `count` tasks with at most `maxConcurrency` in flight.
 *
 * Results land in a fixed-size array at their task's index. When
 * `haltWhen` matches a result, no further tasks start, the shared signal
 * aborts, and the pool resolves immediately with that result; anything
 * the remaining in-flight tasks produce is dropped. A rejected task
 * rejects the pool the same way.
 */
export function runPool<R>(
  count: number,
  maxConcurrency: number,
  task: PoolTask<R>,
  haltWhen: (result: R) => boolean = () => false,
): Promise<PoolResult<R>> {
  if (!Number.isInteger(maxConcurrency) || maxConcurrency < 1) {
    return Promise.reject(new RangeError('maxConcurrency must be a positive integer'));
  }

  const results = new Array<R>(count);
  const controller = new AbortController();
  let cursor = 0;
  let active = 0;
  let settled = 0;
  let stopped = false;

  return new Promise<PoolResult<R>>((resolve, reject) => {
    if (count === 0) {
      resolve({ completed: true, results: [] });
      return;
    }

    const halt = (): void => {
      stopped = true;
      controller.abort();
    };

    const launch = (): void => {
      while (!stopped && active < maxConcurrency && cursor < count) {
        const index = cursor++;
        active++;
        void task(index, controller.signal).then(
          (result) => {
            active--;
            if (stopped) return;
            if (haltWhen(result)) {
              halt();
              resolve({ completed: false, index, halted: result });
              return;
            }
            results[index] = result;
            settled++;
            if (settled === count) {
              resolve({ completed: true, results });
            } else {
              launch();
            }
          },
          (error: unknown) => {
            active--;
            if (stopped) return;
            halt();
            reject(error);
          },
        );
      }
    };

    launch();
  });
}

// ---------------------------------------------------------------------------
// FanOutCoordinator
// ---------------------------------------------------------------------------

export interface FanOutOptions {
  client: CatalogClient;
  /** Upper bound on simultaneous upstream calls per batch. */
  maxConcurrency: number;
  logger?: Logger;
}

/** Placeholder used by `fetchMany` for an id with no documentation. */
export function missingDocsPlaceholder(libraryId: string, topic: string): string {
  return `Documentation not found for ${libraryId} with topic '${topic}'.`;
}

export class FanOutCoordinator {
  private readonly client: CatalogClient;
  private readonly maxConcurrency: number;
  private readonly logger: Logger;

  constructor(options: FanOutOptions) {
    this.client = options.client;
    this.maxConcurrency = options.maxConcurrency;
    this.logger = options.logger ?? createLogger('fan-out');
  }

  /**
   * Resolve every name to its formatted search summary, in input order.
   *
   * @throws LibraryNotFoundError if any name has no hits. Partial results
   *   are discarded.
   */
  async resolveMany(names: readonly string[], identity: CallerIdentity = {}): Promise<string[]> {
    const outcome = await runPool(
      names.length,
      this.maxConcurrency,
      (index, signal) => this.client.lookupLibrary(names[index], identity, signal),
      (result) => result.status !== 'found',
    );

    if (!outcome.completed) {
      const { halted, index } = outcome;
      this.logger.info('batch resolve halted', { index, name: names[index], status: halted.status });
      if (halted.status === 'error') throw halted.error;
      throw new LibraryNotFoundError(
        `No matching library ids found for names ${JSON.stringify(names)}`,
      );
    }

    return outcome.results.map((result) =>
      result.status === 'found' ? formatSearchResults(result.value) : '',
    );
  }

  /**
   * Fetch documentation for each `(id, tokens, topic)` triple, in input
   * order. Ids without documentation get {@link missingDocsPlaceholder}.
   *
   * @throws ValidationError before any call if the arrays differ in length.
   */
  async fetchMany(
    ids: readonly string[],
    tokenBudgets: readonly number[],
    topics: readonly string[],
    identity: CallerIdentity = {},
  ): Promise<string[]> {
    if (ids.length !== tokenBudgets.length || ids.length !== topics.length) {
      throw new ValidationError('Lengths of library_ids, tokens, and topics must match.');
    }

    const outcome = await runPool<LookupOutcome<string>>(
      ids.length,
      this.maxConcurrency,
      (index, signal) =>
        this.client.lookupDocs(ids[index], tokenBudgets[index], topics[index], identity, signal),
      (result) => result.status === 'error',
    );

    if (!outcome.completed) {
      const { halted, index } = outcome;
      this.logger.info('batch fetch halted', { index, libraryId: ids[index] });
      throw halted.status === 'error' ? halted.error : new Error('batch fetch halted');
    }

    return outcome.results.map((result, index) => {
      if (result.status === 'found') return result.value;
      this.logger.debug('documentation missing in batch', { libraryId: ids[index] });
      return missingDocsPlaceholder(ids[index], topics[index]);
    });
  }
}
