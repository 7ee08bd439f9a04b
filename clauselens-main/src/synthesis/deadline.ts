import { ProviderError, errorMessage } from "../core/errors.js";
import { devDebug } from "../shared/index.js";

/**
 * An abort signal that fires on timeout or when the caller's signal aborts.
 * `arm()` restarts the timer, so the same deadline can bound the idle gap
 * between streamed fragments.
 */
export class Deadline {
  private readonly controller = new AbortController();
  private timer: ReturnType<typeof setTimeout> | null = null;
  private readonly onParentAbort = (): void => {
    this.abort(new ProviderError("Request cancelled by caller.", "ABORTED"));
  };

  constructor(
    private readonly timeoutMs: number,
    private readonly parent?: AbortSignal,
  ) {
    if (parent?.aborted) {
      this.onParentAbort();
    } else {
      parent?.addEventListener("abort", this.onParentAbort, { once: true });
      this.arm();
    }
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  arm(): void {
    if (this.controller.signal.aborted) return;
    if (this.timer) clearTimeout(this.timer);
    this.timer = setTimeout(() => {
      this.abort(new ProviderError(`Completion exceeded ${this.timeoutMs} ms.`, "TIMEOUT"));
    }, this.timeoutMs);
  }

  abort(reason: ProviderError): void {
    if (this.controller.signal.aborted) return;
    this.controller.abort(reason);
  }

  reason(): ProviderError {
    const reason: unknown = this.controller.signal.reason;
    return reason instanceof ProviderError ? reason : new ProviderError("Request aborted.", "ABORTED");
  }

  /** Settles with `work`, or rejects as soon as the signal fires even if `work` ignores it. */
  race<T>(work: Promise<T>): Promise<T> {
    const signal = this.controller.signal;
    return new Promise<T>((resolve, reject) => {
      const onAbort = (): void => reject(this.reason());
      if (signal.aborted) {
        onAbort();
        work.catch((err: unknown) => devDebug(`Late provider failure after abort: ${errorMessage(err)}`));
        return;
      }
      signal.addEventListener("abort", onAbort, { once: true });
      work.then(
        (value) => {
          signal.removeEventListener("abort", onAbort);
          resolve(value);
        },
        (err: unknown) => {
          signal.removeEventListener("abort", onAbort);
          reject(err);
        },
      );
    });
  }

  dispose(): void {
    if (this.timer) clearTimeout(this.timer);
    this.timer = null;
    this.parent?.removeEventListener("abort", this.onParentAbort);
  }
}
