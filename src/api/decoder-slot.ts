import { CodecMismatchError, DecodeError } from '../lib/error.js';

import type { MediaCodecId } from '../constants/media.js';

type SlotState<TCodec extends MediaCodecId, THandle> = { bound: false } | { bound: true; codecId: TCodec; handle: THandle };

/**
 * Holder for a lazily constructed codec handle.
 *
 * Starts unbound and binds once, to the codec of the first record that reaches it.
 * After that it hands out the same handle for that codec and refuses any other codec;
 * a mid-stream codec change is reported instead of reinitializing the decoder.
 * A failed construction leaves the slot unbound so the next record retries.
 *
 * @example
 * ```typescript
 * const slot = new DecoderSlot<VideoCodecId, DecoderHandle<Frame>>();
 *
 * const decoder = await slot.bind('h264', (codecId) => codecs.createVideoDecoder(codecId));
 * await slot.bind('hevc', create);  // throws CodecMismatchError
 * ```
 */
export class DecoderSlot<TCodec extends MediaCodecId, THandle extends { close(): void }> {
  private state: SlotState<TCodec, THandle> = { bound: false };

  /**
   * Whether a handle has been constructed.
   */
  get isBound(): boolean {
    return this.state.bound;
  }

  /**
   * Codec the slot is bound to, or null while unbound.
   */
  get codecId(): TCodec | null {
    return this.state.bound ? this.state.codecId : null;
  }

  /**
   * Return the handle for `codecId`, constructing it on first use.
   *
   * @param codecId - Codec of the record being decoded
   *
   * @param create - Constructs the handle
   *
   * @returns Bound handle
   *
   * @throws {CodecMismatchError} If the slot is bound to another codec
   *
   * @throws {DecodeError} If construction fails
   */
  async bind(codecId: TCodec, create: (codecId: TCodec) => Promise<THandle>): Promise<THandle> {
    if (this.state.bound) {
      if (this.state.codecId !== codecId) {
        throw new CodecMismatchError(codecId, this.state.codecId);
      }
      return this.state.handle;
    }

    let handle: THandle;
    try {
      handle = await create(codecId);
    } catch (error) {
      throw new DecodeError(codecId, `Failed to create ${codecId} decoder`, { cause: error });
    }

    this.state = { bound: true, codecId, handle };
    return handle;
  }

  /**
   * Close the bound handle and return to the unbound state.
   */
  release(): void {
    if (this.state.bound) {
      const handle = this.state.handle;
      this.state = { bound: false };
      handle.close();
    }
  }
}
