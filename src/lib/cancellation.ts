import { setTimeout as delay } from "node:timers/promises";
import { EntityApiError } from "./errors.js";

/**
 * Cooperative stop flag shared between the caller and a running traversal.
 * Set once, never cleared; long-running code polls it.
 */
export class CancellationToken {
  private cancelled = false;

  get isCancelled(): boolean {
    return this.cancelled;
  }

  cancel(): void {
    this.cancelled = true;
  }

  throwIfCancelled(): void {
    if (this.cancelled) throw EntityApiError.cancelled();
  }
}

export type Sleep = (ms: number, token: CancellationToken) => Promise<void>;

const SLEEP_SLICE_MS = 250;

/**
 * Waits for `ms`, waking every slice to look at the token so a cancelled run
 * does not sit out a long backoff. Resolves early on cancellation; the caller
 * decides what to do next.
 */
export const interruptibleSleep: Sleep = async (ms, token) => {
  let remaining = ms;
  while (remaining > 0 && !token.isCancelled) {
    const slice = Math.min(remaining, SLEEP_SLICE_MS);
    await delay(slice);
    remaining -= slice;
  }
};
