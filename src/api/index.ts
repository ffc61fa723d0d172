// MediaDecoder
export { MediaDecoder, type FrameBufferStats, type MediaDecoderState } from './media-decoder.js';

// FrameBuffer
export { FrameBuffer } from './frame-buffer.js';

// RateGate
export { RateGate } from './rate-gate.js';

// Dispatcher
export { CrossContextDispatcher } from './dispatcher.js';

// DecoderSlot
export { DecoderSlot } from './decoder-slot.js';

// FFmpeg codecs
export { codecIdFromAV, FFmpegCodecs, FFmpegDecoder, FFmpegResampler, type FFmpegCodecsOptions } from './ffmpeg-codecs.js';

// Configuration
export { DEFAULT_CAMERA_CONFIG, loadCameraConfig, parseCameraConfig, resolveCameraQuality, VideoQuality, type CameraConfig } from './config.js';

// Types
export type * from './types.js';
