import type { AudioCodecId, MediaCodecId, MediaKind, VideoCodecId } from '../constants/media.js';
import type { CrossContextDispatcher } from './dispatcher.js';

/**
 * One encoded media unit received from the network layer.
 *
 * The media kind is given by the lane it is pushed into
 * (`pushVideoFrame` or `pushAudioFrame`).
 */
export interface FrameRecord {
  /** Codec of the payload */
  codecId: MediaCodecId;

  /** Encoded bytes (Annex B for video) */
  payload: Buffer;

  /** Capture time in milliseconds */
  timestamp: number;

  /** Camera multiplex channel */
  channel: number;

  /**
   * Whether the frame decodes without prior reference frames.
   * Only meaningful for video.
   */
  isKeyframe: boolean;
}

/**
 * A record taken out of the FrameBuffer, tagged with its lane.
 */
export interface TakenFrame {
  kind: MediaKind;
  record: FrameRecord;
}

/**
 * Consumer callback receiving a JPEG snapshot or a PCM batch.
 */
export type PayloadCallback = (payload: Buffer, timestampMs: number, channel: number) => Promise<void>;

/**
 * A decoded frame owned by the caller until freed.
 */
export interface DecodedFrame {
  free(): void;
}

/**
 * Decoder bound to a single codec.
 */
export interface DecoderHandle<TFrame extends DecodedFrame> {
  readonly codecId: MediaCodecId;

  /**
   * Decode one packet.
   *
   * @returns Zero or more frames, each to be freed by the caller
   *
   * @throws {Error} If the codec rejects the packet
   */
  decode(payload: Buffer): Promise<TFrame[]>;

  close(): void;
}

/**
 * Converts decoded audio frames to packed mono s16 PCM at 16 kHz.
 */
export interface ResamplerHandle<TFrame extends DecodedFrame> {
  resample(frame: TFrame): Promise<Buffer>;

  close(): void;
}

/**
 * Codec collaborator used by the decode loop.
 *
 * {@link FFmpegCodecs} implements it on top of node-av.
 */
export interface MediaCodecs<TVideoFrame extends DecodedFrame, TAudioFrame extends DecodedFrame> {
  createVideoDecoder(codecId: VideoCodecId): Promise<DecoderHandle<TVideoFrame>>;

  createAudioDecoder(codecId: AudioCodecId): Promise<DecoderHandle<TAudioFrame>>;

  createResampler(): Promise<ResamplerHandle<TAudioFrame>>;

  /**
   * Convert a decoded video frame to JPEG bytes.
   */
  encodeImage(frame: TVideoFrame): Promise<Buffer>;
}

/**
 * Options for {@link MediaDecoder}.
 */
export interface MediaDecoderOptions<TVideoFrame extends DecodedFrame, TAudioFrame extends DecodedFrame> {
  /**
   * Minimum spacing between two forwarded video snapshots (ms).
   */
  frameInterval: number;

  /**
   * Receives JPEG snapshots.
   */
  videoCallback: PayloadCallback;

  /**
   * Receives PCM batches. Required when audio is enabled.
   */
  audioCallback?: PayloadCallback;

  /**
   * Decode and forward audio.
   *
   * @default true
   */
  enableAudio?: boolean;

  /**
   * Codec implementation.
   */
  codecs: MediaCodecs<TVideoFrame, TAudioFrame>;

  /**
   * Capacity of each buffer lane.
   *
   * @default 20
   */
  bufferSize?: number;

  /**
   * How long one loop iteration waits for data (ms).
   *
   * @default 200
   */
  pollTimeout?: number;

  /**
   * Wall clock used for rate gating (ms).
   *
   * @default Date.now
   */
  clock?: () => number;

  /**
   * Context receiving the callbacks. A new one is created when omitted.
   */
  dispatcher?: CrossContextDispatcher;
}
