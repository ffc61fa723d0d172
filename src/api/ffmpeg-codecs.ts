import { AVERROR_EAGAIN, AVERROR_EOF, Codec, CodecContext, FFmpegError, Frame, Packet, Rational } from 'node-av';
import { FilterAPI, FilterPreset, HardwareContext } from 'node-av/api';
import {
  AV_CHANNEL_LAYOUT_MONO,
  AV_CODEC_ID_H264,
  AV_CODEC_ID_HEVC,
  AV_CODEC_ID_OPUS,
  AV_CODEC_ID_PCM_ALAW,
  AV_CODEC_ID_PCM_MULAW,
  AV_PIX_FMT_RGB24,
  AV_SAMPLE_FMT_S16,
} from 'node-av/constants';
import sharp from 'sharp';

import { DEFAULT_JPEG_QUALITY, isAudioCodec, isVideoCodec, PCM_BYTES_PER_SAMPLE, PCM_CHANNELS, PCM_SAMPLE_RATE } from '../constants/media.js';
import { ConversionError } from '../lib/error.js';
import { createLogger } from '../lib/logger.js';

import type { AVCodecID } from 'node-av/constants';
import type { AudioCodecId, MediaCodecId, VideoCodecId } from '../constants/media.js';
import type { DecoderHandle, MediaCodecs, ResamplerHandle } from './types.js';

const log = createLogger('FFmpegCodecs');

const CODEC_IDS: Record<MediaCodecId, AVCodecID> = {
  h264: AV_CODEC_ID_H264,
  hevc: AV_CODEC_ID_HEVC,
  opus: AV_CODEC_ID_OPUS,
  pcm_alaw: AV_CODEC_ID_PCM_ALAW,
  pcm_mulaw: AV_CODEC_ID_PCM_MULAW,
};

// Cameras send mono audio at the codec's native rate
const AUDIO_SAMPLE_RATES: Record<AudioCodecId, number> = {
  opus: 48000,
  pcm_alaw: 8000,
  pcm_mulaw: 8000,
};

const VIDEO_TIME_BASE = 90000;

/**
 * Options for {@link FFmpegCodecs.create}.
 */
export interface FFmpegCodecsOptions {
  /**
   * Hardware context for video decoding.
   * `'auto'` probes the platform's preferred device; null decodes in software.
   *
   * @default null
   */
  hardware?: HardwareContext | 'auto' | null;

  /**
   * JPEG quality of snapshots (1-100).
   *
   * @default 90
   */
  jpegQuality?: number;

  /**
   * Decoder threads, 0 to auto-detect.
   *
   * @default 0
   */
  threads?: number;
}

/**
 * Map a demuxed stream's codec id to a FrameRecord codec id.
 *
 * @param codecId - FFmpeg codec id
 *
 * @returns Matching codec id, or null if the decoder does not support it
 *
 * @example
 * ```typescript
 * const video = input.video();
 * const codecId = video ? codecIdFromAV(video.codecpar.codecId) : null;
 * ```
 */
export function codecIdFromAV(codecId: AVCodecID): MediaCodecId | null {
  for (const [name, id] of Object.entries(CODEC_IDS)) {
    if (id === codecId && (isVideoCodec(name) || isAudioCodec(name))) {
      return name;
    }
  }
  return null;
}

/**
 * Copy the first plane of a packed frame without line padding.
 */
function packPlane(frame: Frame, rowBytes: number, rows: number): Buffer {
  const plane = frame.data?.[0];
  if (!plane) {
    throw new ConversionError(frame.width > 0 ? 'video' : 'audio', 'Frame has no data');
  }

  const stride = frame.linesize[0] ?? rowBytes;
  if (stride === rowBytes || rows === 1) {
    return Buffer.from(plane.subarray(0, rowBytes * rows));
  }

  const packed = Buffer.alloc(rowBytes * rows);
  for (let y = 0; y < rows; y++) {
    plane.copy(packed, y * rowBytes, y * stride, y * stride + rowBytes);
  }
  return packed;
}

function freeAll(frames: Frame[]): void {
  for (const frame of frames) {
    frame.free();
  }
}

/**
 * Packet decoder bound to one codec, fed raw payloads without a demuxer.
 *
 * Sends each payload with avcodec_send_packet() and drains avcodec_receive_frame()
 * until the decoder asks for more data.
 */
export class FFmpegDecoder implements DecoderHandle<Frame> {
  readonly codecId: MediaCodecId;
  private codecContext: CodecContext;
  private hardwareAccelerated: boolean;
  private isClosed = false;

  private constructor(codecId: MediaCodecId, codecContext: CodecContext, hardwareAccelerated: boolean) {
    this.codecId = codecId;
    this.codecContext = codecContext;
    this.hardwareAccelerated = hardwareAccelerated;
  }

  /**
   * Open a decoder for a codec.
   *
   * With a hardware context, the hardware decoder for the codec is tried first and the
   * software decoder is used if it is missing or fails to open.
   *
   * @param codecId - Codec to decode
   *
   * @param hardware - Hardware context, or null for software decoding
   *
   * @param threads - Decoder threads, 0 to auto-detect
   *
   * @returns Opened decoder
   *
   * @throws {FFmpegError} If the codec cannot be opened
   */
  static async open(codecId: MediaCodecId, hardware: HardwareContext | null = null, threads = 0): Promise<FFmpegDecoder> {
    if (hardware && isVideoCodec(codecId)) {
      const hwCodec = hardware.getDecoderCodec(CODEC_IDS[codecId]);
      if (hwCodec?.isHardwareAcceleratedDecoder()) {
        try {
          const decoder = await FFmpegDecoder.openCodec(codecId, hwCodec, hardware, threads);
          log.info('Created %s decoder with %s acceleration', codecId, hardware.deviceTypeName);
          return decoder;
        } catch (error) {
          log.warn('Failed to init hardware decoder for %s, fallback to software', codecId, error);
        }
      }
    }

    const codec = Codec.findDecoder(CODEC_IDS[codecId]);
    if (!codec) {
      throw new Error(`No decoder available for ${codecId}`);
    }

    return await FFmpegDecoder.openCodec(codecId, codec, null, threads);
  }

  private static async openCodec(codecId: MediaCodecId, codec: Codec, hardware: HardwareContext | null, threads: number): Promise<FFmpegDecoder> {
    const codecContext = new CodecContext();
    codecContext.allocContext3(codec);

    if (isAudioCodec(codecId)) {
      codecContext.sampleRate = AUDIO_SAMPLE_RATES[codecId];
      codecContext.channelLayout = AV_CHANNEL_LAYOUT_MONO;
      codecContext.pktTimebase = new Rational(1, AUDIO_SAMPLE_RATES[codecId]);
    } else {
      codecContext.pktTimebase = new Rational(1, VIDEO_TIME_BASE);
    }

    if (hardware) {
      codecContext.hwDeviceCtx = hardware.deviceContext;
      codecContext.setHardwarePixelFormat(hardware.devicePixelFormat);
    }

    codecContext.threadCount = threads;

    const ret = await codecContext.open2(codec, null);
    if (ret < 0) {
      codecContext.freeContext();
      FFmpegError.throwIfError(ret, `Failed to open ${codecId} decoder`);
    }

    return new FFmpegDecoder(codecId, codecContext, hardware !== null);
  }

  /**
   * Whether frames come from a hardware decoder.
   */
  get isHardware(): boolean {
    return this.hardwareAccelerated;
  }

  /**
   * Decode one packet.
   *
   * @param payload - Encoded packet
   *
   * @returns Decoded frames, each to be freed by the caller
   *
   * @throws {FFmpegError} If the decoder rejects the packet
   */
  async decode(payload: Buffer): Promise<Frame[]> {
    if (this.isClosed || payload.length === 0) {
      return [];
    }

    const packet = new Packet();
    packet.alloc();
    packet.data = payload;

    const frames: Frame[] = [];
    try {
      const sendRet = await this.codecContext.sendPacket(packet);
      FFmpegError.throwIfError(sendRet, 'Failed to send packet to decoder');

      while (true) {
        const frame = new Frame();
        frame.alloc();
        const ret = await this.codecContext.receiveFrame(frame);
        if (ret === AVERROR_EAGAIN || ret === AVERROR_EOF) {
          frame.free();
          break;
        }
        if (ret < 0) {
          frame.free();
          FFmpegError.throwIfError(ret, 'Failed to receive frame');
        }

        frame.timeBase = this.codecContext.pktTimebase;
        frames.push(frame);
      }

      return frames;
    } catch (error) {
      freeAll(frames);
      throw error;
    } finally {
      packet.free();
    }
  }

  close(): void {
    if (this.isClosed) {
      return;
    }

    this.isClosed = true;
    this.codecContext.freeContext();
  }
}

/**
 * Converts decoded audio to packed mono s16 PCM at 16 kHz through an aresample/aformat graph.
 */
export class FFmpegResampler implements ResamplerHandle<Frame> {
  private filter: FilterAPI;

  constructor() {
    const chain = FilterPreset.chain().aresample(PCM_SAMPLE_RATE).aformat(AV_SAMPLE_FMT_S16, PCM_SAMPLE_RATE, 'mono').build();
    this.filter = FilterAPI.create(chain);
  }

  async resample(frame: Frame): Promise<Buffer> {
    const outputs = await this.filter.processAll(frame);
    try {
      return Buffer.concat(outputs.map((output) => packPlane(output, output.nbSamples * PCM_CHANNELS * PCM_BYTES_PER_SAMPLE, 1)));
    } finally {
      freeAll(outputs);
    }
  }

  close(): void {
    this.filter.close();
  }
}

/**
 * node-av backed codecs for {@link MediaDecoder}.
 *
 * Decodes h264/hevc video (optionally on hardware) and opus/G.711 audio, converts
 * snapshots to RGB with an FFmpeg filter and encodes them to JPEG with sharp,
 * and resamples audio to mono s16 PCM at 16 kHz.
 *
 * @example
 * ```typescript
 * import { FFmpegCodecs } from 'stream-decoder';
 *
 * const codecs = FFmpegCodecs.create({ hardware: 'auto', jpegQuality: 85 });
 * const decoder = await codecs.createVideoDecoder('h264');
 *
 * for (const frame of await decoder.decode(packet)) {
 *   const jpeg = await codecs.encodeImage(frame);
 *   frame.free();
 * }
 *
 * decoder.close();
 * codecs.close();
 * ```
 */
export class FFmpegCodecs implements MediaCodecs<Frame, Frame> {
  private hardwareContext: HardwareContext | null;
  private ownsHardware: boolean;
  private jpegQuality: number;
  private threads: number;
  private softwareFilter: FilterAPI | null = null;
  private hardwareFilter: FilterAPI | null = null;

  private constructor(hardware: HardwareContext | null, ownsHardware: boolean, jpegQuality: number, threads: number) {
    this.hardwareContext = hardware;
    this.ownsHardware = ownsHardware;
    this.jpegQuality = jpegQuality;
    this.threads = threads;
  }

  /**
   * Create the codecs, probing hardware when requested.
   *
   * @param options - Codec options
   *
   * @returns Codecs instance
   */
  static create(options: FFmpegCodecsOptions = {}): FFmpegCodecs {
    let hardware: HardwareContext | null = null;
    let ownsHardware = false;

    if (options.hardware === 'auto') {
      hardware = HardwareContext.auto();
      ownsHardware = hardware !== null;
      if (hardware) {
        log.info('Hardware acceleration available: %s', hardware.deviceTypeName);
      } else {
        log.info('No hardware acceleration available, will use software decoding');
      }
    } else {
      hardware = options.hardware ?? null;
    }

    return new FFmpegCodecs(hardware, ownsHardware, options.jpegQuality ?? DEFAULT_JPEG_QUALITY, options.threads ?? 0);
  }

  /**
   * Hardware context used for video decoding, if any.
   */
  get hardware(): HardwareContext | null {
    return this.hardwareContext;
  }

  async createVideoDecoder(codecId: VideoCodecId): Promise<FFmpegDecoder> {
    return await FFmpegDecoder.open(codecId, this.hardwareContext, this.threads);
  }

  async createAudioDecoder(codecId: AudioCodecId): Promise<FFmpegDecoder> {
    return await FFmpegDecoder.open(codecId, null, this.threads);
  }

  async createResampler(): Promise<FFmpegResampler> {
    return new FFmpegResampler();
  }

  /**
   * Convert a decoded video frame to JPEG.
   *
   * Hardware frames are downloaded first.
   *
   * @param frame - Decoded video frame
   *
   * @returns JPEG bytes
   *
   * @throws {ConversionError} If conversion yields no image
   */
  async encodeImage(frame: Frame): Promise<Buffer> {
    const filter = this.rgbFilter(frame.hwFramesCtx !== null);
    const outputs = await filter.processAll(frame);
    try {
      const rgb = outputs[0];
      if (!rgb) {
        throw new ConversionError('video', 'RGB conversion produced no frame');
      }

      const pixels = packPlane(rgb, rgb.width * 3, rgb.height);
      return await sharp(pixels, { raw: { width: rgb.width, height: rgb.height, channels: 3 } })
        .jpeg({ quality: this.jpegQuality })
        .toBuffer();
    } finally {
      freeAll(outputs);
    }
  }

  /**
   * Release conversion filters and the hardware context created by `'auto'`.
   */
  close(): void {
    this.softwareFilter?.close();
    this.hardwareFilter?.close();
    this.softwareFilter = null;
    this.hardwareFilter = null;

    if (this.ownsHardware) {
      this.hardwareContext?.dispose();
      this.hardwareContext = null;
      this.ownsHardware = false;
    }
  }

  private rgbFilter(hardwareFrame: boolean): FilterAPI {
    const toRgb = FilterPreset.chain().format(AV_PIX_FMT_RGB24).build();

    if (hardwareFrame) {
      this.hardwareFilter ??= FilterAPI.create(`hwdownload,format=nv12,${toRgb}`);
      return this.hardwareFilter;
    }

    this.softwareFilter ??= FilterAPI.create(toRgb);
    return this.softwareFilter;
  }
}
