import type { Logger } from '../logger.js';
import { errorMessage } from '../errors.js';

export type Outcome<O> = { ok: true; value: O } | { ok: false; error: unknown };

export interface FetchPoolOptions {
  concurrency?: number;
  logger?: Logger;
}

/**
 * Bounded-concurrency map over a batch. A fixed set of workers pulls indices
 * from a shared cursor and writes into an indexed result buffer; the batch
 * resolves once every worker has drained the queue.
 */
export class FetchPool {
  readonly concurrency: number;
  private readonly logger?: Logger;

  constructor({ concurrency = 10, logger }: FetchPoolOptions = {}) {
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new TypeError('Expected `concurrency` to be an integer from 1 and up');
    }
    this.concurrency = concurrency;
    this.logger = logger;
  }

  async settle<I, O>(
    inputs: readonly I[],
    task: (input: I, index: number) => Promise<O>,
  ): Promise<Outcome<O>[]> {
    const results = new Array<Outcome<O>>(inputs.length);
    let cursor = 0;

    const worker = async () => {
      while (cursor < inputs.length) {
        const index = cursor++;
        try {
          results[index] = { ok: true, value: await task(inputs[index], index) };
        } catch (error) {
          results[index] = { ok: false, error };
        }
      }
    };

    const workers = Math.min(this.concurrency, inputs.length);
    this.logger?.debug({ msg: 'pool batch start', items: inputs.length, workers });
    await Promise.all(Array.from({ length: workers }, () => worker()));
    return results;
  }

  /** Like `settle`, with each failed item turned into an output by `recover`. */
  async map<I, O>(
    inputs: readonly I[],
    task: (input: I, index: number) => Promise<O>,
    recover: (error: unknown, input: I, index: number) => O,
  ): Promise<O[]> {
    const outcomes = await this.settle(inputs, task);
    return outcomes.map((outcome, index) => {
      if (outcome.ok) return outcome.value;
      this.logger?.warn({ msg: 'pool item failed', index, error: errorMessage(outcome.error) });
      return recover(outcome.error, inputs[index], index);
    });
  }
}
