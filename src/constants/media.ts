/**
 * Video codecs a camera stream can carry.
 */
export const VIDEO_CODECS = ['h264', 'hevc'] as const;

/**
 * Audio codecs a camera stream can carry.
 */
export const AUDIO_CODECS = ['opus', 'pcm_alaw', 'pcm_mulaw'] as const;

export type VideoCodecId = (typeof VIDEO_CODECS)[number];
export type AudioCodecId = (typeof AUDIO_CODECS)[number];
export type MediaCodecId = VideoCodecId | AudioCodecId;

export type MediaKind = 'video' | 'audio';

/** Default capacity of each FrameBuffer lane. */
export const DEFAULT_BUFFER_SIZE = 20;

/** How long one decode loop iteration waits for data (ms). */
export const DEFAULT_POLL_TIMEOUT = 200;

/** Default spacing between two video snapshots (ms). */
export const DEFAULT_FRAME_INTERVAL = 1000;

/** Default JPEG quality of video snapshots. */
export const DEFAULT_JPEG_QUALITY = 90;

/** Output format of decoded audio: mono, signed 16-bit, 16 kHz. */
export const PCM_SAMPLE_RATE = 16000;
export const PCM_CHANNELS = 1;
export const PCM_BYTES_PER_SAMPLE = 2;

/**
 * Check whether a codec identifier names a video codec.
 *
 * @param codecId - Codec identifier
 *
 * @returns True for h264 and hevc
 */
export function isVideoCodec(codecId: string): codecId is VideoCodecId {
  return (VIDEO_CODECS as readonly string[]).includes(codecId);
}

/**
 * Check whether a codec identifier names an audio codec.
 *
 * @param codecId - Codec identifier
 *
 * @returns True for opus and G.711
 */
export function isAudioCodec(codecId: string): codecId is AudioCodecId {
  return (AUDIO_CODECS as readonly string[]).includes(codecId);
}
