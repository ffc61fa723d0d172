/**
 * Camera Snapshot Example
 *
 * Pulls a live camera stream and feeds its packets to a MediaDecoder.
 * Writes one JPEG snapshot per frame interval and appends the decoded audio
 * as raw mono s16 PCM at 16 kHz.
 *
 * Usage: tsx examples/camera-snapshots.ts <rtsp-url> <output-dir> [options]
 *
 * Options:
 *   --duration <n>   Capture duration in seconds (default: 10)
 *   --config <path>  Camera configuration JSON (frame_interval, ...)
 *
 * Examples:
 *   tsx examples/camera-snapshots.ts rtsp://camera.local/stream examples/.tmp/snapshots
 *   tsx examples/camera-snapshots.ts rtsp://camera.local/stream out --duration 30 --config camera.json
 */

import { appendFile, mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';

import { Demuxer } from 'node-av/api';

import { codecIdFromAV, DEFAULT_CAMERA_CONFIG, FFmpegCodecs, isAudioCodec, isVideoCodec, loadCameraConfig, MediaDecoder } from '../src/index.js';

import type { FrameRecord } from '../src/index.js';

const args = process.argv.slice(2);
const inputUrl = args[0];
const outputDir = args[1];

if (!inputUrl || !outputDir || inputUrl.startsWith('--') || outputDir.startsWith('--')) {
  console.error('Usage: tsx examples/camera-snapshots.ts <rtsp-url> <output-dir> [options]');
  console.error('Options:');
  console.error('  --duration <n>   Capture duration in seconds (default: 10)');
  console.error('  --config <path>  Camera configuration JSON');
  process.exit(1);
}

function option(name: string): string | undefined {
  const index = args.indexOf(name);
  return index === -1 ? undefined : args[index + 1];
}

const duration = Number(option('--duration') ?? 10);
const configPath = option('--config');
const config = configPath ? await loadCameraConfig(configPath) : DEFAULT_CAMERA_CONFIG;

await mkdir(outputDir, { recursive: true });
const pcmFile = join(outputDir, 'audio.pcm');

console.log(`Input: ${inputUrl}`);
console.log(`Output: ${outputDir}`);
console.log(`Frame interval: ${config.frameInterval}ms`);

const input = await Demuxer.open(inputUrl, {
  options: {
    rtsp_transport: 'tcp',
  },
});

const videoStream = input.video();
if (!videoStream) {
  throw new Error('No video stream found in camera source');
}

const videoCodec = codecIdFromAV(videoStream.codecpar.codecId);
if (!videoCodec || !isVideoCodec(videoCodec)) {
  throw new Error(`Unsupported video codec: ${videoStream.codecpar.codecId}`);
}

const audioStream = input.audio();
const audioId = audioStream ? codecIdFromAV(audioStream.codecpar.codecId) : null;
const audioCodec = audioId && isAudioCodec(audioId) ? audioId : null;
if (!audioCodec) {
  console.warn('No supported audio stream found, processing video only');
}

const codecs = FFmpegCodecs.create({ hardware: 'auto' });

let snapshots = 0;
let audioBytes = 0;

const decoder = new MediaDecoder({
  frameInterval: config.frameInterval,
  codecs,
  enableAudio: audioCodec !== null,
  videoCallback: async (jpeg, timestamp, channel) => {
    await writeFile(join(outputDir, `snapshot-${channel}-${timestamp}.jpg`), jpeg);
    snapshots++;
  },
  audioCallback: async (pcm) => {
    await appendFile(pcmFile, pcm);
    audioBytes += pcm.length;
  },
});

let stop = false;
const timeout = setTimeout(() => {
  console.log(`Capture duration reached (${duration}s), stopping...`);
  stop = true;
}, duration * 1000);

decoder.start();
console.log('Capture started...');

try {
  for await (const packet of input.packets()) {
    if (!packet) {
      break;
    }

    try {
      if (stop) {
        break;
      }

      const data = packet.data;
      if (!data) {
        continue;
      }

      const record: Omit<FrameRecord, 'codecId'> = {
        payload: Buffer.from(data),
        timestamp: Date.now(),
        channel: 0,
        isKeyframe: packet.isKeyframe,
      };

      if (packet.streamIndex === videoStream.index) {
        decoder.pushVideoFrame({ ...record, codecId: videoCodec });
      } else if (audioCodec && packet.streamIndex === audioStream?.index) {
        decoder.pushAudioFrame({ ...record, codecId: audioCodec });
      }
    } finally {
      packet.free();
    }
  }
} finally {
  clearTimeout(timeout);
  await decoder.stop();
  codecs.close();
  await input.close();
}

console.log(`Snapshots written: ${snapshots}`);
console.log(`PCM bytes written: ${audioBytes} (${pcmFile})`);
