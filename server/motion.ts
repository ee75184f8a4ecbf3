/**
 * Motion Detector - frame differencing on a single luminance channel.
 */

import { PNG } from 'pngjs';
import type { Frame } from './frame-source.js';
import type { SimpleLogger } from './logger.js';
import { errorMessage } from './errors.js';

export interface LumaFrame {
    width: number;
    height: number;
    /** One byte per pixel, row major */
    data: Uint8Array;
}

export interface MotionState {
    hasMotion: boolean;
    /** Epoch ms of the last observed motion; process start until motion is first seen */
    lastMotionAt: number;
    idleDurationMs: number;
    motionSeen: boolean;
}

export interface MotionOptions {
    intensityThreshold: number;
    pixelThreshold: number;
    blur: boolean;
}

// 5 tap binomial kernel, [1 4 6 4 1] / 16 in each direction
const KERNEL = [1, 4, 6, 4, 1];

/**
 * Decode a PNG and reduce it to luminance (ITU-R BT.601 weights)
 */
export function toLuma(png: Buffer, options: { blur: boolean } = { blur: false }): LumaFrame {
    const image = PNG.sync.read(png);
    const { width, height, data } = image;
    const luma = new Uint8Array(width * height);

    for (let i = 0, p = 0; i < luma.length; i++, p += 4) {
        luma[i] = Math.round(0.299 * data[p] + 0.587 * data[p + 1] + 0.114 * data[p + 2]);
    }

    const frame = { width, height, data: luma };
    return options.blur ? gaussianBlur5(frame) : frame;
}

// Mirror without repeating the edge pixel: -1 -> 1, n -> n-2
function reflect(i: number, n: number): number {
    if (n === 1) return 0;
    if (i < 0) return -i;
    if (i >= n) return 2 * n - i - 2;
    return i;
}

export function gaussianBlur5(frame: LumaFrame): LumaFrame {
    const { width, height, data } = frame;
    const horizontal = new Uint16Array(width * height);
    const out = new Uint8Array(width * height);

    for (let y = 0; y < height; y++) {
        const row = y * width;
        for (let x = 0; x < width; x++) {
            let sum = 0;
            for (let k = -2; k <= 2; k++) {
                sum += KERNEL[k + 2] * data[row + reflect(x + k, width)];
            }
            horizontal[row + x] = sum;
        }
    }

    for (let y = 0; y < height; y++) {
        for (let x = 0; x < width; x++) {
            let sum = 0;
            for (let k = -2; k <= 2; k++) {
                sum += KERNEL[k + 2] * horizontal[reflect(y + k, height) * width + x];
            }
            out[y * width + x] = (sum + 128) >> 8;
        }
    }

    return { width, height, data: out };
}

/**
 * Number of pixels whose absolute difference exceeds `intensityThreshold`,
 * or undefined when the frames cannot be compared
 */
export function countChangedPixels(prev: LumaFrame, curr: LumaFrame, intensityThreshold: number): number | undefined {
    if (prev.width !== curr.width || prev.height !== curr.height) return undefined;
    let changed = 0;
    for (let i = 0; i < curr.data.length; i++) {
        if (Math.abs(curr.data[i] - prev.data[i]) > intensityThreshold) changed++;
    }
    return changed;
}

export function detectMotion(prev: LumaFrame, curr: LumaFrame, intensityThreshold: number, pixelThreshold: number): boolean {
    const changed = countChangedPixels(prev, curr, intensityThreshold);
    return changed !== undefined && changed > pixelThreshold;
}

/**
 * Keeps the previous frame and the time of the last motion.
 */
export class MotionTracker {
    private reference: LumaFrame | undefined;
    private referenceSeq: number | undefined;
    private lastMotionAt: number;
    private motionSeen = false;
    private lastHasMotion = false;

    constructor(
        private readonly options: MotionOptions,
        private readonly logger: SimpleLogger,
        startedAt: number = Date.now()
    ) {
        this.lastMotionAt = startedAt;
    }

    /**
     * Compare `frame` with the previous one and update the motion state.
     * A missing frame, a repeated frame or an undecodable frame is no motion.
     */
    observe(frame: Frame | undefined, now: number): MotionState {
        this.lastHasMotion = this.compare(frame);
        if (this.lastHasMotion) {
            this.lastMotionAt = now;
            this.motionSeen = true;
        }
        return this.state(now);
    }

    state(now: number): MotionState {
        return {
            hasMotion: this.lastHasMotion,
            lastMotionAt: this.lastMotionAt,
            idleDurationMs: Math.max(0, now - this.lastMotionAt),
            motionSeen: this.motionSeen
        };
    }

    private compare(frame: Frame | undefined): boolean {
        if (!frame || frame.seq === this.referenceSeq) return false;

        let luma: LumaFrame;
        try {
            luma = toLuma(frame.data, { blur: this.options.blur });
        } catch (e) {
            this.logger.warn('Cannot decode frame for motion detection', { seq: frame.seq, error: errorMessage(e) });
            return false;
        }

        const prev = this.reference;
        this.reference = luma;
        this.referenceSeq = frame.seq;
        if (!prev) return false;

        const changed = countChangedPixels(prev, luma, this.options.intensityThreshold);
        if (changed === undefined) {
            this.logger.info('Frame size changed - motion reference replaced', {
                from: `${prev.width}x${prev.height}`,
                to: `${luma.width}x${luma.height}`
            });
            return false;
        }

        const motion = changed > this.options.pixelThreshold;
        this.logger.debug('Motion check', { changed, threshold: this.options.pixelThreshold, motion });
        return motion;
    }
}
