import { DEFAULT_POLL_TIMEOUT, isAudioCodec, isVideoCodec } from '../constants/media.js';
import { CodecMismatchError, ConfigurationError, ConversionError, DecodeError } from '../lib/error.js';
import { createLogger } from '../lib/logger.js';
import { DecoderSlot } from './decoder-slot.js';
import { CrossContextDispatcher } from './dispatcher.js';
import { FrameBuffer } from './frame-buffer.js';
import { RateGate } from './rate-gate.js';

import type { AudioCodecId, MediaKind, VideoCodecId } from '../constants/media.js';
import type { DecodedFrame, DecoderHandle, FrameRecord, MediaCodecs, MediaDecoderOptions, PayloadCallback, ResamplerHandle } from './types.js';

const log = createLogger('MediaDecoder');

/**
 * Lifecycle of a {@link MediaDecoder}.
 */
export type MediaDecoderState = 'created' | 'running' | 'stopping' | 'stopped';

/**
 * Read-only view of the decoder's frame buffer.
 */
export interface FrameBufferStats {
  capacity: number;
  videoSize: number;
  audioSize: number;
  waiting: boolean;
  closed: boolean;
}

/**
 * Audio decoder and resampler, bound together to one audio codec.
 */
interface AudioChain<TFrame extends DecodedFrame> {
  decoder: DecoderHandle<TFrame>;
  resampler: ResamplerHandle<TFrame>;
  close(): void;
}

/**
 * Background decoder bridging a live camera stream to an async consumer.
 *
 * Producers push encoded frames from the network layer with {@link pushVideoFrame} and
 * {@link pushAudioFrame}; both return at once and drop data under pressure. A single decode
 * loop drains the {@link FrameBuffer}, decodes each packet, and forwards JPEG snapshots at
 * most once per `frameInterval` and every PCM batch. Payloads reach the consumer callbacks
 * through a {@link CrossContextDispatcher}, never awaited by the loop.
 *
 * Decoders are created on the first record of each kind and stay bound to that codec.
 * Decode and conversion failures are logged and the loop moves on.
 *
 * @example
 * ```typescript
 * import { FFmpegCodecs, MediaDecoder } from 'stream-decoder';
 *
 * const codecs = FFmpegCodecs.create({ hardware: 'auto' });
 * const decoder = new MediaDecoder({
 *   frameInterval: 1000,
 *   codecs,
 *   videoCallback: async (jpeg, timestamp, channel) => {
 *     await publishSnapshot(jpeg, timestamp, channel);
 *   },
 *   audioCallback: async (pcm, timestamp, channel) => {
 *     await publishAudio(pcm, timestamp, channel);
 *   },
 * });
 *
 * decoder.start();
 * session.on('video', (record) => decoder.pushVideoFrame(record));
 * session.on('audio', (record) => decoder.pushAudioFrame(record));
 *
 * // Later
 * await decoder.stop();
 * codecs.close();
 * ```
 *
 * @see {@link FrameBuffer} For the buffering and eviction policy
 * @see {@link RateGate} For snapshot cadence
 */
export class MediaDecoder<TVideoFrame extends DecodedFrame, TAudioFrame extends DecodedFrame> {
  private readonly codecs: MediaCodecs<TVideoFrame, TAudioFrame>;
  private readonly buffer: FrameBuffer;
  private readonly rateGate: RateGate;
  private readonly dispatcher: CrossContextDispatcher;
  private readonly videoCallback: PayloadCallback;
  private readonly audioCallback: PayloadCallback | null;
  private readonly pollTimeout: number;
  private readonly clock: () => number;

  private readonly videoSlot = new DecoderSlot<VideoCodecId, DecoderHandle<TVideoFrame>>();
  private readonly audioSlot = new DecoderSlot<AudioCodecId, AudioChain<TAudioFrame>>();

  private currentState: MediaDecoderState = 'created';
  private workerPromise: Promise<void> | null = null;
  private manualStep: Promise<boolean> | null = null;

  /**
   * @param options - Decoder configuration
   *
   * @throws {ConfigurationError} If audio is enabled without an audio callback
   */
  constructor(options: MediaDecoderOptions<TVideoFrame, TAudioFrame>) {
    const enableAudio = options.enableAudio ?? true;
    if (enableAudio && !options.audioCallback) {
      throw new ConfigurationError('audioCallback is required when audio is enabled');
    }

    this.codecs = options.codecs;
    this.videoCallback = options.videoCallback;
    this.audioCallback = enableAudio && options.audioCallback ? options.audioCallback : null;
    this.buffer = new FrameBuffer(options.bufferSize);
    this.rateGate = new RateGate(options.frameInterval);
    this.dispatcher = options.dispatcher ?? new CrossContextDispatcher();
    this.pollTimeout = options.pollTimeout ?? DEFAULT_POLL_TIMEOUT;
    this.clock = options.clock ?? Date.now;
  }

  /**
   * Current lifecycle state.
   */
  get state(): MediaDecoderState {
    return this.currentState;
  }

  /**
   * Whether audio records are decoded.
   */
  get audioEnabled(): boolean {
    return this.audioCallback !== null;
  }

  /**
   * Current fill of the buffer between producers and the decode loop.
   */
  get bufferStats(): FrameBufferStats {
    return {
      capacity: this.buffer.capacity,
      videoSize: this.buffer.videoSize,
      audioSize: this.buffer.audioSize,
      waiting: this.buffer.hasWaiter,
      closed: this.buffer.isClosed,
    };
  }

  /**
   * Cadence limiter for video snapshots.
   */
  get gate(): RateGate {
    return this.rateGate;
  }

  /**
   * Codec the video decoder is bound to, or null before the first video record.
   */
  get videoCodec(): VideoCodecId | null {
    return this.videoSlot.codecId;
  }

  /**
   * Codec the audio decoder is bound to, or null before the first audio record.
   */
  get audioCodec(): AudioCodecId | null {
    return this.audioSlot.codecId;
  }

  /**
   * Start the decode loop.
   *
   * @throws {Error} If the decoder was already started or stopped, or a {@link step} is pending
   *
   * @example
   * ```typescript
   * decoder.start();
   * ```
   */
  start(): void {
    if (this.currentState !== 'created') {
      throw new Error(`Cannot start decoder in state ${this.currentState}`);
    }
    if (this.manualStep) {
      throw new Error('Cannot start decoder while step() is pending');
    }

    this.currentState = 'running';
    this.workerPromise = this.runWorker();
    log.info('decoder started');
  }

  /**
   * Stop the decode loop.
   *
   * Discards buffered records, wakes the loop if it is waiting for data, waits for the
   * iteration in progress and releases the decoders. Nothing is forwarded afterwards.
   * Safe to call more than once.
   *
   * @example
   * ```typescript
   * await decoder.stop();
   * ```
   */
  async stop(): Promise<void> {
    if (this.currentState === 'created') {
      this.currentState = 'stopped';
      this.buffer.shutdown();
      return;
    }

    if (this.currentState === 'running') {
      this.currentState = 'stopping';
      this.buffer.shutdown();
    }

    await this.workerPromise;
  }

  /**
   * Queue an encoded video frame. Never blocks or throws.
   *
   * @param record - Video record from the network layer
   */
  pushVideoFrame(record: FrameRecord): void {
    this.buffer.putVideo(record);
  }

  /**
   * Queue an encoded audio frame. Ignored when audio is disabled.
   *
   * @param record - Audio record from the network layer
   */
  pushAudioFrame(record: FrameRecord): void {
    if (this.audioCallback) {
      this.buffer.putAudio(record);
    }
  }

  /**
   * Run one loop iteration: wait for a record and decode it.
   *
   * Only for decoders that were not started; the background loop owns the buffer otherwise.
   *
   * @returns Whether a record was handled
   *
   * @throws {Error} If the decode loop is running or another step is pending
   *
   * @example
   * ```typescript
   * // Drive the decoder manually instead of start()
   * while (await decoder.step()) {}
   * ```
   */
  async step(): Promise<boolean> {
    if (this.currentState === 'running' || this.currentState === 'stopping') {
      throw new Error(`Cannot step decoder in state ${this.currentState}`);
    }
    if (this.manualStep) {
      throw new Error('Cannot step decoder while another step is pending');
    }

    const pending = this.runStep();
    this.manualStep = pending;
    try {
      return await pending;
    } finally {
      this.manualStep = null;
    }
  }

  private async runStep(): Promise<boolean> {
    const taken = await this.buffer.take(this.pollTimeout);
    if (!taken) {
      return false;
    }

    if (taken.kind === 'video') {
      await this.handleVideo(taken.record);
    } else {
      await this.handleAudio(taken.record);
    }
    return true;
  }

  private async runWorker(): Promise<void> {
    while (this.currentState === 'running') {
      try {
        await this.runStep();
      } catch (error) {
        log.error('frame data handle error', error);
        // Yield so a failing iteration cannot starve timers and I/O
        await new Promise<void>((resolve) => setImmediate(resolve));
      }

      if (this.buffer.isClosed) {
        break;
      }

      if (this.dispatcher.isClosed) {
        log.warn('consumer context closed, stopping decoder');
        this.buffer.shutdown();
        break;
      }
    }

    this.videoSlot.release();
    this.audioSlot.release();
    this.currentState = 'stopped';
    log.info('decoder stopped');
  }

  private async handleVideo(record: FrameRecord): Promise<void> {
    const decoder = await this.bindVideoDecoder(record);
    if (!decoder) {
      return;
    }

    let frames: TVideoFrame[];
    try {
      frames = await decoder.decode(record.payload);
    } catch (error) {
      const decodeError = new DecodeError(decoder.codecId, `Failed to decode video frame (${record.timestamp})`, { cause: error });
      log.error(decodeError.message, decodeError.cause);
      return;
    }

    try {
      const now = this.clock();
      if (!this.rateGate.isOpen(now)) {
        return;
      }

      const frame = frames[0];
      if (!frame) {
        log.debug('video frame is empty, %s, %d', record.codecId, record.timestamp);
        this.rateGate.advance(now);
        return;
      }

      let image: Buffer;
      try {
        image = await this.codecs.encodeImage(frame);
      } catch (error) {
        const conversionError = new ConversionError('video', `Failed to process video frame (${record.timestamp})`, { cause: error });
        log.error(conversionError.message, conversionError.cause);
        return;
      }

      if (this.forward('video', image, record)) {
        this.rateGate.advance(now);
      }
    } finally {
      for (const frame of frames) {
        frame.free();
      }
    }
  }

  private async handleAudio(record: FrameRecord): Promise<void> {
    const chain = await this.bindAudioChain(record);
    if (!chain) {
      return;
    }

    let frames: TAudioFrame[];
    try {
      frames = await chain.decoder.decode(record.payload);
    } catch (error) {
      const decodeError = new DecodeError(chain.decoder.codecId, `Failed to decode audio frame (${record.timestamp})`, { cause: error });
      log.error(decodeError.message, decodeError.cause);
      return;
    }

    const chunks: Buffer[] = [];
    try {
      for (const frame of frames) {
        try {
          chunks.push(await chain.resampler.resample(frame));
        } catch (error) {
          const conversionError = new ConversionError('audio', `Failed to resample audio frame (${record.timestamp})`, { cause: error });
          log.error(conversionError.message, conversionError.cause);
        }
      }
    } finally {
      for (const frame of frames) {
        frame.free();
      }
    }

    this.forward('audio', Buffer.concat(chunks), record);
  }

  private async bindVideoDecoder(record: FrameRecord): Promise<DecoderHandle<TVideoFrame> | null> {
    const codecId = record.codecId;
    if (!isVideoCodec(codecId)) {
      log.error('unsupported video codec %s, %d', codecId, record.timestamp);
      return null;
    }

    const wasBound = this.videoSlot.isBound;
    try {
      const decoder = await this.videoSlot.bind(codecId, (id) => this.codecs.createVideoDecoder(id));
      if (!wasBound) {
        log.info('video decoder created, codec=%s', codecId);
      }
      return decoder;
    } catch (error) {
      if (error instanceof CodecMismatchError) {
        log.error('%s, dropping video frame %d', error.message, record.timestamp);
      } else {
        log.error('video decoder unavailable, %d', record.timestamp, error);
      }
      return null;
    }
  }

  private async bindAudioChain(record: FrameRecord): Promise<AudioChain<TAudioFrame> | null> {
    const codecId = record.codecId;
    if (!isAudioCodec(codecId)) {
      log.error('unsupported audio codec %s, %d', codecId, record.timestamp);
      return null;
    }

    const wasBound = this.audioSlot.isBound;
    try {
      const chain = await this.audioSlot.bind(codecId, (id) => this.createAudioChain(id));
      if (!wasBound) {
        log.info('audio decoder created, codec=%s', codecId);
      }
      return chain;
    } catch (error) {
      if (error instanceof CodecMismatchError) {
        log.error('%s, dropping audio frame %d', error.message, record.timestamp);
      } else {
        log.error('audio decoder unavailable, %d', record.timestamp, error);
      }
      return null;
    }
  }

  private async createAudioChain(codecId: AudioCodecId): Promise<AudioChain<TAudioFrame>> {
    const decoder = await this.codecs.createAudioDecoder(codecId);
    let resampler: ResamplerHandle<TAudioFrame>;
    try {
      resampler = await this.codecs.createResampler();
    } catch (error) {
      decoder.close();
      throw error;
    }

    return {
      decoder,
      resampler,
      close: () => {
        decoder.close();
        resampler.close();
      },
    };
  }

  private forward(kind: MediaKind, payload: Buffer, record: FrameRecord): boolean {
    // stop() may land while a decode is in flight
    if (this.currentState === 'stopping' || this.currentState === 'stopped') {
      return false;
    }

    const callback = kind === 'video' ? this.videoCallback : this.audioCallback;
    if (!callback) {
      return false;
    }

    return this.dispatcher.dispatch(kind, callback, payload, record.timestamp, record.channel);
  }
}
