import { isRateLimitError, sleep as defaultSleep } from '../../utils/retry.js';

export interface BatchResult {
  successful: number[];
  failed: number[];
  /** "Ticket <id>: <message>" per failed item */
  errors: string[];
}

/**
 * One remote mutation against one item
 */
export type ItemMutation = (itemId: number) => Promise<void>;

export type ProgressCallback = (processed: number, total: number) => void;

export interface BatchOptions {
  /** Pause between consecutive items (ms) */
  delayMs?: number;
  /** Pause before retrying a throttled item (ms) */
  rateLimitCooldownMs?: number;
  onProgress?: ProgressCallback;
  /** Checked before each attempt; an aborted signal rejects with its reason */
  signal?: AbortSignal;
  sleep?: (ms: number) => Promise<void>;
  isRateLimited?: (error: unknown) => boolean;
}

export const DEFAULT_ITEM_DELAY_MS = 1000;
export const DEFAULT_RATE_LIMIT_COOLDOWN_MS = 60_000;

function describeFailure(itemId: number, error: unknown): string {
  const message = error instanceof Error ? error.message : String(error);
  return `Ticket ${itemId}: ${message}`;
}

/**
 * Apply `mutate` to each item in order, one at a time.
 *
 * A throttled item waits out the cooldown and is retried exactly once; any
 * other failure is recorded without a retry. Per-item failures never reject
 * the returned promise. The progress callback receives the 1-based position
 * of each item that succeeded. Once `signal` is aborted no further item is
 * attempted and the promise rejects with the signal's reason.
 */
export async function runBatch(
  itemIds: readonly number[],
  mutate: ItemMutation,
  options: BatchOptions = {}
): Promise<BatchResult> {
  const {
    delayMs = DEFAULT_ITEM_DELAY_MS,
    rateLimitCooldownMs = DEFAULT_RATE_LIMIT_COOLDOWN_MS,
    onProgress,
    signal,
    sleep = defaultSleep,
    isRateLimited = isRateLimitError,
  } = options;

  const result: BatchResult = { successful: [], failed: [], errors: [] };
  const total = itemIds.length;

  for (let index = 0; index < total; index++) {
    const itemId = itemIds[index];
    signal?.throwIfAborted();

    let succeeded = false;
    try {
      await mutate(itemId);
      succeeded = true;
    } catch (error) {
      if (isRateLimited(error)) {
        await sleep(rateLimitCooldownMs);
        signal?.throwIfAborted();
        try {
          await mutate(itemId);
          succeeded = true;
        } catch (retryError) {
          result.failed.push(itemId);
          result.errors.push(describeFailure(itemId, retryError));
        }
      } else {
        result.failed.push(itemId);
        result.errors.push(describeFailure(itemId, error));
      }
    }

    if (succeeded) {
      result.successful.push(itemId);
      onProgress?.(index + 1, total);
    }

    if (index < total - 1 && delayMs > 0) {
      await sleep(delayMs);
    }
  }

  return result;
}
