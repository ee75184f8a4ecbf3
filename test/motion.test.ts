/**
 * Tests for motion differencing and the motion tracker
 */

import { describe, it, expect, beforeEach } from 'vitest';
import {
    toLuma,
    gaussianBlur5,
    countChangedPixels,
    detectMotion,
    MotionTracker,
    type LumaFrame
} from '../server/motion.js';
import { createMockLogger, makePng, solidPng, makeFrame } from './helpers/fakes.js';

function luma(width: number, height: number, fill: number, changed: number = 0, changedValue: number = 0): LumaFrame {
    const data = new Uint8Array(width * height).fill(fill);
    for (let i = 0; i < changed; i++) data[i] = changedValue;
    return { width, height, data };
}

describe('toLuma', () => {
    it('should weight channels with BT.601 coefficients', () => {
        const png = makePng(3, 1, (x) => (x === 0 ? [255, 0, 0] : x === 1 ? [0, 255, 0] : [0, 0, 255]));
        const frame = toLuma(png);

        expect(frame.width).toBe(3);
        expect(frame.height).toBe(1);
        expect(Array.from(frame.data)).toEqual([76, 150, 29]);
    });

    it('should keep a uniform image uniform when blurred', () => {
        const frame = toLuma(solidPng(8, 6, 128), { blur: true });
        expect(frame.data.every((v) => v === 128)).toBe(true);
    });
});

describe('gaussianBlur5', () => {
    it('should spread a single bright pixel with the 5x5 binomial kernel', () => {
        const frame = luma(5, 5, 0);
        frame.data[12] = 255;

        const blurred = gaussianBlur5(frame);

        // 36 * 255 / 256 at the centre, edge pixels mirror without repeating the border
        expect(blurred.data[12]).toBe(36);
        expect(blurred.data[0]).toBe(4);
    });
});

describe('detectMotion', () => {
    it('should never report motion for identical frames', () => {
        const frame = luma(16, 16, 90);
        for (const intensity of [0, 30, 255]) {
            for (const pixels of [0, 10, 500]) {
                expect(detectMotion(frame, frame, intensity, pixels)).toBe(false);
            }
        }
    });

    it('should report motion only when changed pixels exceed the pixel threshold', () => {
        const prev = luma(10, 10, 0);

        expect(detectMotion(prev, luma(10, 10, 0, 6, 100), 30, 5)).toBe(true);
        expect(detectMotion(prev, luma(10, 10, 0, 5, 100), 30, 5)).toBe(false);
    });

    it('should not count a difference equal to the intensity threshold', () => {
        const prev = luma(4, 4, 0);
        expect(countChangedPixels(prev, luma(4, 4, 30), 30)).toBe(0);
        expect(countChangedPixels(prev, luma(4, 4, 31), 30)).toBe(16);
    });

    it('should treat frames of different dimensions as motion-free', () => {
        const prev = luma(10, 10, 0);
        const curr = luma(5, 20, 255);

        expect(countChangedPixels(prev, curr, 30)).toBeUndefined();
        expect(detectMotion(prev, curr, 0, 0)).toBe(false);
    });
});

describe('MotionTracker', () => {
    let logger: ReturnType<typeof createMockLogger>;
    const black = solidPng(20, 20, 0);
    const white = solidPng(20, 20, 255);

    beforeEach(() => {
        logger = createMockLogger();
    });

    it('should track last motion and idle duration across cycles', () => {
        const tracker = new MotionTracker({ intensityThreshold: 30, pixelThreshold: 100, blur: false }, logger, 1000);

        const first = tracker.observe(makeFrame(black, 1), 2000);
        expect(first).toEqual({ hasMotion: false, lastMotionAt: 1000, idleDurationMs: 1000, motionSeen: false });

        const moved = tracker.observe(makeFrame(white, 2), 3000);
        expect(moved).toEqual({ hasMotion: true, lastMotionAt: 3000, idleDurationMs: 0, motionSeen: true });

        // Same sequence number carries no new information
        const repeated = tracker.observe(makeFrame(black, 2), 4000);
        expect(repeated.hasMotion).toBe(false);
        expect(repeated.idleDurationMs).toBe(1000);

        const still = tracker.observe(makeFrame(white, 3), 5000);
        expect(still.hasMotion).toBe(false);
        expect(still.idleDurationMs).toBe(2000);

        const missing = tracker.observe(undefined, 6000);
        expect(missing.hasMotion).toBe(false);
        expect(missing.idleDurationMs).toBe(3000);

        const again = tracker.observe(makeFrame(black, 4), 7000);
        expect(again.hasMotion).toBe(true);
        expect(again.idleDurationMs).toBe(0);
    });

    it('should replace the reference when the frame size changes', () => {
        const tracker = new MotionTracker({ intensityThreshold: 30, pixelThreshold: 50, blur: false }, logger, 0);

        tracker.observe(makeFrame(black, 1), 1);
        const resized = tracker.observe(makeFrame(solidPng(10, 10, 255), 2), 2);
        expect(resized.hasMotion).toBe(false);
        expect(logger.info).toHaveBeenCalledWith('Frame size changed - motion reference replaced', { from: '20x20', to: '10x10' });

        // Compared against the resized reference from now on
        expect(tracker.observe(makeFrame(solidPng(10, 10, 0), 3), 3).hasMotion).toBe(true);
    });

    it('should report no motion for an undecodable frame', () => {
        const tracker = new MotionTracker({ intensityThreshold: 30, pixelThreshold: 0, blur: false }, logger, 0);

        tracker.observe(makeFrame(black, 1), 1);
        const result = tracker.observe(makeFrame(Buffer.from('not a png'), 2), 2);

        expect(result.hasMotion).toBe(false);
        expect(logger.warn).toHaveBeenCalledWith('Cannot decode frame for motion detection', expect.objectContaining({ seq: 2 }));
    });
});
