import assert from 'node:assert';
import { describe, it } from 'node:test';

import { FrameBuffer } from '../src/api/frame-buffer.js';
import { makeRecord, prepareTestEnvironment } from './index.js';

prepareTestEnvironment();

describe('FrameBuffer', () => {
  describe('Construction', () => {
    it('should default to 20 entries per lane', () => {
      const buffer = new FrameBuffer();
      assert.strictEqual(buffer.capacity, 20);
      assert.strictEqual(buffer.videoSize, 0);
      assert.strictEqual(buffer.audioSize, 0);
    });

    it('should clamp capacity to at least 1', () => {
      assert.strictEqual(new FrameBuffer(0).capacity, 1);
      assert.strictEqual(new FrameBuffer(-5).capacity, 1);
    });

    it('should floor fractional capacity and ignore non-finite values', () => {
      const buffer = new FrameBuffer(2.5);
      for (let i = 0; i < 5; i++) {
        buffer.putAudio(makeRecord('opus', `a${i}`, i));
      }

      assert.strictEqual(buffer.capacity, 2);
      assert.strictEqual(buffer.audioSize, 2);
      assert.strictEqual(new FrameBuffer(0.5).capacity, 1);
      assert.strictEqual(new FrameBuffer(Number.NaN).capacity, 20);
      assert.strictEqual(new FrameBuffer(Number.POSITIVE_INFINITY).capacity, 20);
    });
  });

  describe('Video lane', () => {
    it('should never exceed capacity', () => {
      const buffer = new FrameBuffer(5);
      for (let i = 0; i < 50; i++) {
        buffer.putVideo(makeRecord('h264', `f${i}`, i, i % 7 === 0));
        assert.ok(buffer.videoSize <= 5);
      }
      assert.strictEqual(buffer.videoSize, 5);
    });

    it('should discard non-keyframes over capacity (scenario A)', () => {
      const buffer = new FrameBuffer(20);
      const results: boolean[] = [];
      for (let i = 0; i < 25; i++) {
        results.push(buffer.putVideo(makeRecord('h264', `f${i}`, i)));
      }

      assert.strictEqual(buffer.videoSize, 20);
      assert.deepStrictEqual(
        results.map((stored, i) => (stored ? -1 : i)).filter((i) => i >= 0),
        [20, 21, 22, 23, 24],
      );
      assert.deepStrictEqual(
        buffer.snapshot('video').map((record) => record.timestamp),
        Array.from({ length: 20 }, (_, i) => i),
      );
    });

    it('should evict exactly one non-keyframe for a keyframe (scenario B)', () => {
      const buffer = new FrameBuffer(20);
      for (let i = 0; i < 20; i++) {
        buffer.putVideo(makeRecord('h264', `f${i}`, i));
      }

      const stored = buffer.putVideo(makeRecord('h264', 'key', 100, true));
      const lane = buffer.snapshot('video');

      assert.strictEqual(stored, true);
      assert.strictEqual(lane.length, 20);
      assert.strictEqual(lane.filter((record) => record.isKeyframe).length, 1);
      assert.strictEqual(lane[19]?.timestamp, 100);
      // First non-keyframe is the one removed
      assert.deepStrictEqual(
        lane.slice(0, 19).map((record) => record.timestamp),
        Array.from({ length: 19 }, (_, i) => i + 1),
      );
    });

    it('should keep keyframes while a non-keyframe can be evicted', () => {
      const buffer = new FrameBuffer(3);
      buffer.putVideo(makeRecord('h264', 'k0', 0, true));
      buffer.putVideo(makeRecord('h264', 'k1', 1, true));
      buffer.putVideo(makeRecord('h264', 'p2', 2));

      buffer.putVideo(makeRecord('h264', 'k3', 3, true));

      assert.deepStrictEqual(
        buffer.snapshot('video').map((record) => record.timestamp),
        [0, 1, 3],
      );
    });

    it('should evict the oldest keyframe when the lane holds only keyframes', () => {
      const buffer = new FrameBuffer(2);
      buffer.putVideo(makeRecord('h264', 'k0', 0, true));
      buffer.putVideo(makeRecord('h264', 'k1', 1, true));

      buffer.putVideo(makeRecord('h264', 'k2', 2, true));

      assert.deepStrictEqual(
        buffer.snapshot('video').map((record) => record.timestamp),
        [1, 2],
      );
    });

    it('should leave a full lane unchanged for a non-keyframe', () => {
      const buffer = new FrameBuffer(2);
      buffer.putVideo(makeRecord('h264', 'k0', 0, true));
      buffer.putVideo(makeRecord('h264', 'p1', 1));
      const before = buffer.snapshot('video');

      assert.strictEqual(buffer.putVideo(makeRecord('h264', 'p2', 2)), false);
      assert.deepStrictEqual(buffer.snapshot('video'), before);
    });
  });

  describe('Audio lane', () => {
    it('should drop the oldest record when full', () => {
      const buffer = new FrameBuffer(3);
      for (let i = 0; i < 5; i++) {
        buffer.putAudio(makeRecord('opus', `a${i}`, i));
      }

      assert.strictEqual(buffer.audioSize, 3);
      assert.deepStrictEqual(
        buffer.snapshot('audio').map((record) => record.timestamp),
        [2, 3, 4],
      );
    });
  });

  describe('take', () => {
    it('should return video before audio', async () => {
      const buffer = new FrameBuffer();
      buffer.putAudio(makeRecord('opus', 'a0', 0));
      buffer.putVideo(makeRecord('h264', 'v1', 1));
      buffer.putAudio(makeRecord('opus', 'a2', 2));

      const first = await buffer.take(10);
      const second = await buffer.take(10);
      const third = await buffer.take(10);

      assert.strictEqual(first?.kind, 'video');
      assert.strictEqual(first?.record.timestamp, 1);
      assert.strictEqual(second?.kind, 'audio');
      assert.strictEqual(second?.record.timestamp, 0);
      assert.strictEqual(third?.kind, 'audio');
      assert.strictEqual(third?.record.timestamp, 2);
    });

    it('should return null after the timeout when empty', async () => {
      const buffer = new FrameBuffer();
      const started = Date.now();

      const taken = await buffer.take(30);

      assert.strictEqual(taken, null);
      assert.ok(Date.now() - started >= 25);
      assert.strictEqual(buffer.hasWaiter, false);
    });

    it('should wake on a push', async () => {
      const buffer = new FrameBuffer();
      const pending = buffer.take(5_000);
      assert.strictEqual(buffer.hasWaiter, true);

      buffer.putAudio(makeRecord('pcm_alaw', 'a0', 7, false, 2));
      const taken = await pending;

      assert.strictEqual(taken?.kind, 'audio');
      assert.strictEqual(taken?.record.timestamp, 7);
      assert.strictEqual(taken?.record.channel, 2);
    });

    it('should reject a second concurrent consumer', async () => {
      const buffer = new FrameBuffer();
      const pending = buffer.take(5_000);

      await assert.rejects(buffer.take(10), { message: 'FrameBuffer supports a single consumer' });

      buffer.shutdown();
      assert.strictEqual(await pending, null);
    });
  });

  describe('shutdown', () => {
    it('should wake a waiting consumer with no data', async () => {
      const buffer = new FrameBuffer();
      const started = Date.now();
      const pending = buffer.take(5_000);

      buffer.shutdown();

      assert.strictEqual(await pending, null);
      assert.ok(Date.now() - started < 1_000);
    });

    it('should clear both lanes and ignore later puts', async () => {
      const buffer = new FrameBuffer();
      buffer.putVideo(makeRecord('h264', 'v0', 0, true));
      buffer.putAudio(makeRecord('opus', 'a0', 0));

      buffer.shutdown();
      buffer.shutdown();

      assert.strictEqual(buffer.isClosed, true);
      assert.strictEqual(buffer.videoSize, 0);
      assert.strictEqual(buffer.audioSize, 0);
      assert.strictEqual(buffer.putVideo(makeRecord('h264', 'v1', 1, true)), false);
      buffer.putAudio(makeRecord('opus', 'a1', 1));
      assert.strictEqual(buffer.audioSize, 0);
      assert.strictEqual(await buffer.take(10), null);
    });
  });
});
