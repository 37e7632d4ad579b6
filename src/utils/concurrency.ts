import { setTimeout as delay } from "timers/promises";

/**
 * Runs `task` over `items` with at most `limit` in flight. Results keep the
 * input order; each worker writes only its own slot.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  task: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
  if (items.length === 0) return [];
  const bounded = Math.max(1, Math.min(limit, items.length));
  const out = new Array<R>(items.length);
  let cursor = 0;

  async function worker(): Promise<void> {
    for (;;) {
      const current = cursor;
      cursor += 1;
      if (current >= items.length) return;
      out[current] = await task(items[current], current);
    }
  }

  await Promise.all(Array.from({ length: bounded }, () => worker()));
  return out;
}

/**
 * Resolves after `ms`, or rejects with an AbortError as soon as `signal`
 * fires.
 */
export async function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (ms <= 0) return;
  await delay(ms, undefined, { signal });
}

export function backoffDelayMs(
  attempt: number,
  baseDelayMs: number,
  maxDelayMs = Number.POSITIVE_INFINITY,
): number {
  const exponential = baseDelayMs * Math.pow(2, Math.max(0, attempt - 1));
  return Math.min(maxDelayMs, exponential);
}

/** Longest delay `setTimeout` honours; larger values fire at once. */
export const MAX_TIMER_MS = 2_147_483_647;

export interface Deadline {
  signal: AbortSignal;
  dispose: () => void;
}

/**
 * A signal that aborts after `ms` or when `parent` aborts, whichever comes
 * first. The signal's `reason` is `reason` when the deadline fires and the
 * parent's reason otherwise.
 */
export function withDeadline(ms: number, parent?: AbortSignal, reason?: string): Deadline {
  const controller = new AbortController();

  const timer = setTimeout(
    () => controller.abort(reason),
    Math.min(MAX_TIMER_MS, Math.max(0, ms)),
  );
  const onParentAbort = () => controller.abort(parent?.reason);

  if (parent?.aborted) {
    controller.abort(parent.reason);
  } else {
    parent?.addEventListener("abort", onParentAbort, { once: true });
  }

  return {
    signal: controller.signal,
    dispose: () => {
      clearTimeout(timer);
      parent?.removeEventListener("abort", onParentAbort);
    },
  };
}

/** Why `signal` was aborted, when it was aborted with a text reason. */
export function abortReason(signal: AbortSignal | undefined, fallback: string): string {
  const reason: unknown = signal?.reason;
  return typeof reason === "string" && reason ? reason : fallback;
}
