/**
 * Frame Source - keeps the freshest camera frame available.
 *
 * A dedicated ffmpeg reader owns the RTSP connection and decodes it to a PNG
 * image pipe, which is drained continuously. Every complete image overwrites a
 * single-slot cell; nothing is queued, so callers always see the newest frame
 * and never block on the network. When the reader dies it is restarted with
 * bounded exponential backoff, and `getFrame()` reports Unavailable meanwhile.
 */

import { PngStreamSplitter } from './png-stream.js';
import { spawnProcess, type ProcessHandle, type ProcessSpawnOptions } from './process-utils.js';
import { TransportError, type ErrorContext, toErrorContext } from './errors.js';
import type { SimpleLogger } from './logger.js';

export interface Frame {
    /** PNG encoded image */
    readonly data: Buffer;
    readonly capturedAt: number;
    /** Increases by one per captured frame */
    readonly seq: number;
}

/**
 * Single writer, single reader, last value wins
 */
export class LatestFrameCell {
    private value: Frame | undefined;

    put(frame: Frame): void {
        this.value = frame;
    }

    get(): Frame | undefined {
        return this.value;
    }

    clear(): void {
        this.value = undefined;
    }
}

export interface FrameSourceOptions {
    url: string;
    ffmpegPath: string;
    frameRate: number;
    frameWidth: number;
    /** Socket timeout handed to ffmpeg, also the stall watchdog period */
    timeoutMs: number;
    retryInitialMs: number;
    retryMaxMs: number;
    /** How long frames may be unavailable before the stream counts as failed */
    graceMs: number;
    logger: SimpleLogger;
    launch?: (options: ProcessSpawnOptions) => ProcessHandle;
    now?: () => number;
}

export interface FrameSourceStatus {
    connected: boolean;
    lastFrameAt: number | null;
    framesReceived: number;
    reconnectAttempts: number;
    lastError: ErrorContext | null;
}

export function buildFfmpegArgs(options: Pick<FrameSourceOptions, 'url' | 'frameRate' | 'frameWidth' | 'timeoutMs'>): string[] {
    const args = ['-hide_banner', '-loglevel', 'error'];
    if (options.url.startsWith('rtsp://') || options.url.startsWith('rtsps://')) {
        // ffmpeg socket timeout is in microseconds
        args.push('-rtsp_transport', 'tcp', '-timeout', String(options.timeoutMs * 1000));
    }
    args.push(
        '-i', options.url,
        '-an',
        '-vf', `fps=${options.frameRate},scale=${options.frameWidth}:-2`,
        '-f', 'image2pipe',
        '-c:v', 'png',
        '-'
    );
    return args;
}

/**
 * Delay before reconnect attempt `attempt` (1-based): initial * 2^(attempt-1), capped
 */
export function backoffDelay(attempt: number, initialMs: number, maxMs: number): number {
    const exponent = Math.max(0, attempt - 1);
    return Math.min(maxMs, initialMs * Math.pow(2, Math.min(exponent, 30)));
}

export class FrameSource {
    private readonly cell = new LatestFrameCell();
    private readonly launch: (options: ProcessSpawnOptions) => ProcessHandle;
    private readonly now: () => number;
    private readonly splitter: PngStreamSplitter;

    private reader: ProcessHandle | null = null;
    private retryTimer: NodeJS.Timeout | null = null;
    private stallTimer: NodeJS.Timeout | null = null;
    private running = false;
    private isConnected = false;
    private seq = 0;
    private attempts = 0;
    private startedAt = 0;
    private lastFrameAt: number | null = null;
    private lastError: ErrorContext | null = null;
    private loggedError = false;

    constructor(private readonly options: FrameSourceOptions) {
        this.launch = options.launch ?? spawnProcess;
        this.now = options.now ?? Date.now;
        this.splitter = new PngStreamSplitter((png) => this.publish(png));
    }

    get connected(): boolean {
        return this.isConnected;
    }

    start(): void {
        if (this.running) return;
        this.running = true;
        this.startedAt = this.now();
        this.connect();
    }

    stop(): void {
        this.running = false;
        if (this.retryTimer) clearTimeout(this.retryTimer);
        this.retryTimer = null;
        this.clearStallTimer();

        const reader = this.reader;
        this.reader = null;
        if (reader && reader.exitCode === null) {
            try {
                reader.kill();
            } catch (e) {
                this.options.logger.error('Failed to stop stream reader', { error: String(e) });
            }
        }
        this.isConnected = false;
        this.cell.clear();
        this.options.logger.info('Stream reader stopped');
    }

    /**
     * Most recently captured frame, or undefined while the reader is disconnected
     */
    getFrame(): Frame | undefined {
        if (!this.isConnected) return undefined;
        return this.cell.get();
    }

    /**
     * True once no frame has arrived for longer than the grace period
     * (measured from start-up until the first frame)
     */
    unavailableBeyondGrace(now: number = this.now()): boolean {
        if (!this.running) return false;
        const since = this.lastFrameAt ?? this.startedAt;
        return this.getFrame() === undefined
            ? now - since > this.options.graceMs
            : now - since > Math.max(this.options.graceMs, this.options.timeoutMs);
    }

    status(): FrameSourceStatus {
        return {
            connected: this.isConnected,
            lastFrameAt: this.lastFrameAt,
            framesReceived: this.seq,
            reconnectAttempts: this.attempts,
            lastError: this.lastError
        };
    }

    private connect(): void {
        if (!this.running) return;
        this.retryTimer = null;
        this.splitter.reset();

        if (!this.loggedError) {
            this.options.logger.info('Connecting to stream', { url: this.options.url });
        }

        const stderrLines: string[] = [];
        let reader: ProcessHandle;
        try {
            reader = this.launch({
                name: 'StreamReader',
                cmd: this.options.ffmpegPath,
                args: buildFfmpegArgs(this.options),
                onStdout: (data: Buffer) => {
                    if (this.reader === reader) this.splitter.push(data);
                },
                onStderr: (data: string) => {
                    stderrLines.push(data.trim());
                    if (stderrLines.length > 5) stderrLines.shift();
                },
                onError: (error: Error) => {
                    // 'close' still follows a spawn failure
                    this.options.logger.debug('Stream reader process error', { error: error.message });
                    stderrLines.push(error.message);
                },
                onClose: (code: number | null, signal: NodeJS.Signals | null) => {
                    if (this.reader !== reader) return;
                    this.reader = null;
                    if (this.splitter.discardedBytes > 0) {
                        this.options.logger.warn('Stream reader output contained non-image bytes', { bytes: this.splitter.discardedBytes });
                    }
                    this.handleDisconnect(new TransportError(
                        `Stream reader exited (code=${code}, signal=${signal})${stderrLines.length ? `: ${stderrLines.join(' | ')}` : ''}`
                    ));
                }
            });
        } catch (e) {
            this.handleDisconnect(new TransportError(`Cannot start stream reader: ${String(e)}`, { cause: e }));
            return;
        }
        this.reader = reader;
        this.armStallTimer();
    }

    private publish(png: Buffer): void {
        const capturedAt = this.now();
        this.cell.put({ data: png, capturedAt, seq: ++this.seq });
        this.lastFrameAt = capturedAt;
        this.armStallTimer();

        if (!this.isConnected) {
            this.isConnected = true;
            this.attempts = 0;
            this.lastError = null;
            this.loggedError = false;
            this.options.logger.info('Stream connected - receiving frames', { url: this.options.url });
        }
    }

    private handleDisconnect(error: TransportError): void {
        this.clearStallTimer();
        this.isConnected = false;
        this.cell.clear();
        this.lastError = toErrorContext(error, 'transport', this.now());
        if (!this.running) return;

        this.attempts++;
        const delayMs = backoffDelay(this.attempts, this.options.retryInitialMs, this.options.retryMaxMs);

        if (!this.loggedError) {
            this.options.logger.error('Stream connection lost', {
                url: this.options.url,
                error: error.message,
                retryInMs: delayMs
            });
            this.loggedError = true;
        } else {
            this.options.logger.debug('Stream still unavailable', { attempt: this.attempts, retryInMs: delayMs });
        }

        this.retryTimer = setTimeout(() => this.connect(), delayMs);
    }

    private armStallTimer(): void {
        if (this.stallTimer) {
            this.stallTimer.refresh();
            return;
        }
        // Process alive but no frames: kill it so the close handler reconnects
        this.stallTimer = setTimeout(() => {
            this.stallTimer = null;
            const reader = this.reader;
            if (!reader || reader.exitCode !== null) return;
            this.options.logger.warn('Stream reader stalled - restarting', { timeoutMs: this.options.timeoutMs * 2 });
            try {
                reader.kill('SIGKILL');
            } catch (e) {
                this.options.logger.error('Failed to kill stalled stream reader', { error: String(e) });
            }
        }, this.options.timeoutMs * 2);
    }

    private clearStallTimer(): void {
        if (this.stallTimer) clearTimeout(this.stallTimer);
        this.stallTimer = null;
    }
}
