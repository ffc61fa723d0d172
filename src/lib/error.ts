import type { MediaCodecId, MediaKind } from '../constants/media.js';

/**
 * Base class of every error raised by the stream decoder.
 *
 * Carries the underlying failure (an FFmpegError, a sharp error, ...) as `cause`.
 *
 * @example
 * ```typescript
 * import { MediaDecoderError } from 'stream-decoder';
 *
 * try {
 *   new MediaDecoder({ frameInterval: 1000, videoCallback, codecs });
 * } catch (error) {
 *   if (error instanceof MediaDecoderError) {
 *     console.error(error.message, error.cause);
 *   }
 * }
 * ```
 */
export class MediaDecoderError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Invalid construction options or camera configuration.
 *
 * Fatal to construction; never raised once a decoder is running.
 */
export class ConfigurationError extends MediaDecoderError {}

/**
 * A decoder could not be constructed or rejected a packet.
 *
 * Recoverable: the record is dropped and the decode loop continues.
 */
export class DecodeError extends MediaDecoderError {
  readonly codecId: MediaCodecId;

  constructor(codecId: MediaCodecId, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.codecId = codecId;
  }
}

/**
 * A record arrived for a codec other than the one its decoder is bound to.
 */
export class CodecMismatchError extends DecodeError {
  readonly boundCodecId: MediaCodecId;

  constructor(codecId: MediaCodecId, boundCodecId: MediaCodecId) {
    super(codecId, `Decoder is bound to ${boundCodecId}, cannot decode ${codecId}`);
    this.boundCodecId = boundCodecId;
  }
}

/**
 * A decoded frame could not be converted to JPEG or PCM.
 */
export class ConversionError extends MediaDecoderError {
  readonly kind: MediaKind;

  constructor(kind: MediaKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.kind = kind;
  }
}

/**
 * The consumer's context was closed when a payload was handed over.
 */
export class DispatchError extends MediaDecoderError {
  readonly kind: MediaKind;

  constructor(kind: MediaKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.kind = kind;
  }
}
