import { DispatchError } from '../lib/error.js';
import { createLogger } from '../lib/logger.js';

import type { MediaKind } from '../constants/media.js';
import type { PayloadCallback } from './types.js';

const log = createLogger('Dispatcher');

interface ScheduledCall {
  kind: MediaKind;
  callback: PayloadCallback;
  payload: Buffer;
  timestamp: number;
  channel: number;
}

/**
 * Hands decoded payloads from the decode loop to the consumer's event loop.
 *
 * Each call is submitted as its own macrotask (`setImmediate`) and never awaited by the
 * caller, so a slow consumer cannot stall decoding. Calls of one kind start in the order
 * they were dispatched; video and audio calls are not ordered against each other.
 * A callback that throws or rejects is logged and otherwise ignored.
 *
 * @example
 * ```typescript
 * const dispatcher = new CrossContextDispatcher();
 *
 * dispatcher.dispatch('video', onSnapshot, jpeg, record.timestamp, record.channel);
 *
 * // Wait for delivered callbacks, then tear down
 * await dispatcher.drain();
 * dispatcher.close();
 * ```
 */
export class CrossContextDispatcher {
  private closed = false;
  private scheduled = new Map<NodeJS.Immediate, MediaKind>();
  private running = new Set<Promise<void>>();
  private counts: Record<MediaKind, number> = { video: 0, audio: 0 };

  /**
   * Whether the consumer context was torn down.
   */
  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Number of scheduled or running calls of one kind.
   *
   * @param kind - Media kind
   *
   * @returns Pending call count
   */
  pending(kind: MediaKind): number {
    return this.counts[kind];
  }

  /**
   * Schedule `callback(payload, timestamp, channel)` on the consumer's event loop.
   *
   * Returns immediately. When the context is closed the payload is dropped,
   * a {@link DispatchError} is logged and nothing is retried.
   *
   * @param kind - Media kind, for ordering and bookkeeping
   *
   * @param callback - Consumer callback
   *
   * @param payload - JPEG or PCM bytes
   *
   * @param timestamp - Capture time of the source record (ms)
   *
   * @param channel - Camera channel of the source record
   *
   * @returns Whether the call was scheduled
   *
   * @example
   * ```typescript
   * if (!dispatcher.dispatch('audio', onPcm, pcm, ts, 0)) {
   *   // consumer is gone
   * }
   * ```
   */
  dispatch(kind: MediaKind, callback: PayloadCallback, payload: Buffer, timestamp: number, channel: number): boolean {
    if (this.closed) {
      const error = new DispatchError(kind, `Consumer context closed, dropping ${kind} payload (${timestamp})`);
      log.warn(error.message);
      return false;
    }

    const call: ScheduledCall = { kind, callback, payload, timestamp, channel };
    const immediate: NodeJS.Immediate = setImmediate(() => {
      this.scheduled.delete(immediate);
      this.start(call);
    });
    this.scheduled.set(immediate, kind);
    this.counts[kind] += 1;
    return true;
  }

  /**
   * Wait until every scheduled call has settled.
   *
   * @example
   * ```typescript
   * await dispatcher.drain();
   * ```
   */
  async drain(): Promise<void> {
    while (this.scheduled.size > 0 || this.running.size > 0) {
      if (this.running.size > 0) {
        await Promise.all(this.running);
      } else {
        await new Promise<void>((resolve) => setImmediate(resolve));
      }
    }
  }

  /**
   * Tear down the consumer context.
   *
   * Calls that were scheduled but have not started are dropped; running calls finish.
   * Safe to call more than once.
   */
  close(): void {
    if (this.closed) {
      return;
    }

    this.closed = true;
    for (const [immediate, kind] of this.scheduled) {
      clearImmediate(immediate);
      this.counts[kind] -= 1;
    }
    this.scheduled.clear();
  }

  private start(call: ScheduledCall): void {
    const task: Promise<void> = this.invoke(call).finally(() => {
      this.running.delete(task);
      this.counts[call.kind] -= 1;
    });
    this.running.add(task);
  }

  private async invoke(call: ScheduledCall): Promise<void> {
    try {
      await call.callback(call.payload, call.timestamp, call.channel);
    } catch (error) {
      log.error('%s callback failed, %d', call.kind, call.timestamp, error);
    }
  }
}
