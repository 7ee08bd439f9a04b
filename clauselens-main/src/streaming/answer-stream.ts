import { Channel } from "./channel.js";
import type { StreamEvent } from "./types.js";

export type StreamProducer = (channel: Channel<StreamEvent>, signal: AbortSignal) => Promise<void>;

/**
 * Lazy, single-use sequence of stream events. The producer starts on the
 * first `next()`; leaving the loop early or aborting the caller's signal
 * aborts the producer's signal synchronously and ends the sequence.
 */
export class AnswerStream implements AsyncIterable<StreamEvent> {
  private iterated = false;

  constructor(
    private readonly producer: StreamProducer,
    private readonly callerSignal?: AbortSignal,
  ) {}

  [Symbol.asyncIterator](): AsyncIterator<StreamEvent, undefined> {
    if (this.iterated) {
      throw new Error("AnswerStream can only be iterated once.");
    }
    this.iterated = true;

    const channel = new Channel<StreamEvent>();
    const controller = new AbortController();
    const callerSignal = this.callerSignal;
    let started = false;
    let finished = false;

    const detach = (): void => callerSignal?.removeEventListener("abort", cancel);
    const cancel = (): void => {
      if (finished) return;
      finished = true;
      detach();
      controller.abort();
      channel.cancel();
    };

    const start = (): void => {
      started = true;
      if (callerSignal?.aborted) {
        cancel();
        return;
      }
      callerSignal?.addEventListener("abort", cancel, { once: true });
      this.producer(channel, controller.signal).then(
        () => channel.close(),
        (err: unknown) => channel.close(err),
      );
    };

    return {
      next: async (): Promise<IteratorResult<StreamEvent, undefined>> => {
        if (!started) start();
        if (finished) return { done: true, value: undefined };
        try {
          const result = await channel.take();
          if (result.done) {
            finished = true;
            detach();
          }
          return result;
        } catch (err) {
          finished = true;
          detach();
          throw err;
        }
      },
      return: async (): Promise<IteratorResult<StreamEvent, undefined>> => {
        cancel();
        return { done: true, value: undefined };
      },
    };
  }
}
