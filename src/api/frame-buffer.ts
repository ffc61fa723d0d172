import { DEFAULT_BUFFER_SIZE } from '../constants/media.js';
import { createLogger } from '../lib/logger.js';

import type { MediaKind } from '../constants/media.js';
import type { FrameRecord, TakenFrame } from './types.js';

const log = createLogger('FrameBuffer');

/**
 * FrameBuffer is a bounded two-lane (video/audio) queue with a single shared wait condition.
 *
 * Producers push synchronously and are never blocked: when a lane is full, records are
 * dropped or evicted instead. The video lane keeps keyframes over non-keyframes so the
 * decoder can resume clean decoding after an overload. A single consumer pulls with
 * {@link take}, which waits on a promise until a push signals it, the timeout elapses,
 * or the buffer shuts down.
 *
 * @example
 * ```typescript
 * const buffer = new FrameBuffer(20);
 *
 * // Producer
 * buffer.putVideo(record);
 *
 * // Consumer
 * const taken = await buffer.take(200);  // null on timeout
 *
 * // Cleanup
 * buffer.shutdown();
 * ```
 */
export class FrameBuffer {
  private video: FrameRecord[] = [];
  private audio: FrameRecord[] = [];
  private waiter: (() => void) | null = null;
  private maxSize: number;
  private closed = false;

  /**
   * Creates a new FrameBuffer.
   *
   * @param maxSize Capacity of each lane, floored and clamped to at least 1
   */
  constructor(maxSize: number = DEFAULT_BUFFER_SIZE) {
    // Non-finite sizes fall back to the default
    this.maxSize = Number.isFinite(maxSize) ? Math.max(1, Math.floor(maxSize)) : DEFAULT_BUFFER_SIZE;
  }

  /**
   * Capacity of each lane (from constructor).
   */
  get capacity(): number {
    return this.maxSize;
  }

  /**
   * Number of queued video records.
   */
  get videoSize(): number {
    return this.video.length;
  }

  /**
   * Number of queued audio records.
   */
  get audioSize(): number {
    return this.audio.length;
  }

  /**
   * Whether {@link shutdown} was called.
   */
  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Whether a consumer is waiting in {@link take}.
   */
  get hasWaiter(): boolean {
    return this.waiter !== null;
  }

  /**
   * Copy of a lane's contents, oldest first.
   *
   * @param kind Lane to copy
   *
   * @returns Queued records
   */
  snapshot(kind: MediaKind): FrameRecord[] {
    return kind === 'video' ? [...this.video] : [...this.audio];
  }

  /**
   * Queues a video record.
   *
   * When the lane is full, a keyframe replaces the first non-keyframe (or the oldest entry
   * if the lane holds only keyframes) and a non-keyframe is discarded.
   *
   * @param record Video record
   *
   * @returns Whether the record was stored
   *
   * @example
   * ```typescript
   * if (!buffer.putVideo(record)) {
   *   // dropped under backpressure
   * }
   * ```
   */
  putVideo(record: FrameRecord): boolean {
    if (this.closed) {
      return false;
    }

    if (this.video.length >= this.maxSize) {
      if (!record.isKeyframe) {
        log.debug('drop non-key frame, %s, %d', record.codecId, record.timestamp);
        return false;
      }

      const index = this.video.findIndex((queued) => !queued.isKeyframe);
      const [evicted] = this.video.splice(index === -1 ? 0 : index, 1);
      log.debug('evict %s frame for key frame, %s, %d', evicted?.isKeyframe ? 'key' : 'non-key', record.codecId, evicted?.timestamp);
    }

    this.video.push(record);
    this.notify();
    return true;
  }

  /**
   * Queues an audio record, evicting the oldest one when the lane is full.
   *
   * @param record Audio record
   */
  putAudio(record: FrameRecord): void {
    if (this.closed) {
      return;
    }

    if (this.audio.length >= this.maxSize) {
      const evicted = this.audio.shift();
      log.debug('drop oldest audio frame, %s, %d', record.codecId, evicted?.timestamp);
    }

    this.audio.push(record);
    this.notify();
  }

  /**
   * Takes the next record, video first.
   *
   * If both lanes are empty, waits up to `timeoutMs` for a push and checks once more.
   * Only one consumer may wait at a time.
   *
   * @param timeoutMs Maximum wait
   *
   * @returns Next record, or null on timeout or shutdown
   *
   * @throws {Error} If another take() is already waiting
   *
   * @example
   * ```typescript
   * const taken = await buffer.take(200);
   * if (taken?.kind === 'video') {
   *   await decodeVideo(taken.record);
   * }
   * ```
   */
  async take(timeoutMs: number): Promise<TakenFrame | null> {
    const ready = this.pop();
    if (ready || this.closed) {
      return ready;
    }

    if (this.waiter) {
      throw new Error('FrameBuffer supports a single consumer');
    }

    // Block until signaled or timed out
    await new Promise<void>((resolve) => {
      const wake = (): void => {
        clearTimeout(timer);
        if (this.waiter === wake) {
          this.waiter = null;
        }
        resolve();
      };
      const timer = setTimeout(wake, timeoutMs);
      this.waiter = wake;
    });

    return this.closed ? null : this.pop();
  }

  /**
   * Clears both lanes and wakes a waiting consumer.
   *
   * Subsequent puts are ignored and takes return null. Safe to call more than once.
   *
   * @example
   * ```typescript
   * buffer.shutdown();
   * ```
   */
  shutdown(): void {
    if (this.closed) {
      return;
    }

    this.closed = true;
    this.video.length = 0;
    this.audio.length = 0;
    this.notify();
  }

  private pop(): TakenFrame | null {
    const video = this.video.shift();
    if (video) {
      return { kind: 'video', record: video };
    }

    const audio = this.audio.shift();
    if (audio) {
      return { kind: 'audio', record: audio };
    }

    return null;
  }

  private notify(): void {
    const waiter = this.waiter;
    if (waiter) {
      this.waiter = null;
      waiter();
    }
  }
}
