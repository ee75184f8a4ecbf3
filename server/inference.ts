/**
 * Inference service client and the gate that decides when to call it.
 *
 * The service pulls the frame itself: it is given the public URL of the frame
 * this process serves, and answers with a list of detections.
 */

import { z } from 'zod';
import serverFetch, { type FetchBody, type FetchOptions } from './server_fetch.js';
import { withTimeout } from './process-utils.js';
import { InferenceError, errorMessage, toErrorContext, type ErrorContext } from './errors.js';
import type { SimpleLogger } from './logger.js';
import type { StandbyMode } from './standby.js';

export interface BoundingBox {
    x: number;
    y: number;
    width: number;
    height: number;
}

export interface Detection {
    /** Failure confidence in [0, 1] */
    confidence: number;
    label?: string;
    boundingBox?: BoundingBox;
}

export type SkipReason = 'standby' | 'no-motion' | 'error';

export type InferenceOutcome =
    | { kind: 'detection'; detection: Detection; detections: Detection[] }
    | { kind: 'skipped'; reason: SkipReason };

const confidence = z.number().min(0).max(1);
const coord = z.number().finite();
const box = z.tuple([coord, coord, coord, coord]);

const tupleEntry = z.tuple([z.string(), confidence, box]);
const legacyEntry = z.tuple([z.string(), confidence, coord, coord, coord, coord]);
const bareEntry = z.tuple([z.string(), confidence]);
const objectEntry = z.object({
    label: z.string().optional(),
    name: z.string().optional(),
    confidence,
    box: box.optional()
});

const responseSchema = z.object({ detections: z.array(z.unknown()) });

function toBox([x, y, width, height]: [number, number, number, number]): BoundingBox {
    return { x, y, width, height };
}

function parseEntry(entry: unknown): Detection | undefined {
    const tuple = tupleEntry.safeParse(entry);
    if (tuple.success) {
        const [label, conf, b] = tuple.data;
        return { label, confidence: conf, boundingBox: toBox(b) };
    }
    const legacy = legacyEntry.safeParse(entry);
    if (legacy.success) {
        const [label, conf, x, y, w, h] = legacy.data;
        return { label, confidence: conf, boundingBox: toBox([x, y, w, h]) };
    }
    const bare = bareEntry.safeParse(entry);
    if (bare.success) {
        return { label: bare.data[0], confidence: bare.data[1] };
    }
    const obj = objectEntry.safeParse(entry);
    if (obj.success) {
        const label = obj.data.label ?? obj.data.name;
        return {
            confidence: obj.data.confidence,
            ...(label !== undefined && { label }),
            ...(obj.data.box && { boundingBox: toBox(obj.data.box) })
        };
    }
    return undefined;
}

/**
 * Normalise an inference response body. Invalid entries are dropped;
 * a body without a `detections` list is an InferenceError.
 */
export function parseDetections(body: unknown, logger?: SimpleLogger): Detection[] {
    const parsed = responseSchema.safeParse(body);
    if (!parsed.success) {
        throw new InferenceError('Inference response has no detections list');
    }

    const detections: Detection[] = [];
    parsed.data.detections.forEach((entry, index) => {
        const detection = parseEntry(entry);
        if (detection) {
            detections.push(detection);
        } else {
            logger?.warn('Dropping invalid detection entry', { index, entry: JSON.stringify(entry) });
        }
    });
    return detections;
}

/**
 * Highest confidence detection; no detections is confidence 0
 */
export function strongestDetection(detections: Detection[]): Detection {
    return detections.reduce<Detection>(
        (best, d) => (d.confidence > best.confidence ? d : best),
        { confidence: 0 }
    );
}

export interface InferenceService {
    analyze(frameUrl: string): Promise<Detection[]>;
    checkHealth(force?: boolean): Promise<boolean>;
    readonly healthy: boolean;
}

export interface InferenceClientOptions {
    baseUrl: string;
    timeoutMs: number;
    logger: SimpleLogger;
    /** How long a health result is reused */
    healthCacheMs?: number;
    fetch?: (url: string, opts?: FetchOptions) => Promise<FetchBody>;
    now?: () => number;
}

export class InferenceClient implements InferenceService {
    private readonly fetch: (url: string, opts?: FetchOptions) => Promise<FetchBody>;
    private readonly now: () => number;
    private readonly healthCacheMs: number;
    private lastHealthCheckAt: number | undefined;
    private isHealthy = false;

    constructor(private readonly options: InferenceClientOptions) {
        this.fetch = options.fetch ?? serverFetch;
        this.now = options.now ?? Date.now;
        this.healthCacheMs = options.healthCacheMs ?? 30000;
    }

    get healthy(): boolean {
        return this.isHealthy;
    }

    async analyze(frameUrl: string): Promise<Detection[]> {
        const url = `${this.options.baseUrl}/p/`;
        let body: FetchBody;
        try {
            body = await withTimeout(
                this.fetch(url, { query: { img: frameUrl }, timeout: this.options.timeoutMs }),
                this.options.timeoutMs,
                () => new InferenceError(`Inference request timed out after ${this.options.timeoutMs}ms`)
            );
        } catch (e) {
            this.isHealthy = false;
            if (e instanceof InferenceError) throw e;
            throw new InferenceError(`Inference request failed: ${errorMessage(e)}`, { cause: e });
        }

        if (body.kind !== 'json') {
            this.isHealthy = false;
            throw new InferenceError(`Inference response is not JSON (${body.kind})`);
        }
        try {
            return parseDetections(body.value, this.options.logger);
        } catch (e) {
            this.isHealthy = false;
            throw e;
        }
    }

    /**
     * GET /hc/ must answer 200 "ok". Reuses the last result within the cache window unless forced.
     */
    async checkHealth(force = false): Promise<boolean> {
        const now = this.now();
        if (!force && this.lastHealthCheckAt !== undefined && now - this.lastHealthCheckAt < this.healthCacheMs) {
            return this.isHealthy;
        }
        this.lastHealthCheckAt = now;

        let healthy: boolean;
        try {
            const body = await withTimeout(
                this.fetch(`${this.options.baseUrl}/hc/`, { timeout: this.options.timeoutMs }),
                this.options.timeoutMs,
                () => new InferenceError('Health check timed out')
            );
            healthy = body.kind === 'text' ? body.value.trim() === 'ok' : body.kind === 'json' && body.value === 'ok';
            if (!healthy) {
                this.options.logger.warn('Inference health check failed', { response: body.kind === 'empty' ? '' : JSON.stringify(body.value) });
            }
        } catch (e) {
            healthy = false;
            this.options.logger.debug('Inference health check error', { error: errorMessage(e) });
        }

        if (healthy !== this.isHealthy) {
            this.options.logger.info(healthy ? 'Inference service healthy' : 'Inference service unhealthy', { url: this.options.baseUrl });
        }
        this.isHealthy = healthy;
        return healthy;
    }
}

/**
 * Decides per cycle whether inference runs. Never calls the service unless the
 * controller is active and the cycle saw motion.
 */
export class InferenceGate {
    private failure: ErrorContext | null = null;

    constructor(
        private readonly service: InferenceService,
        private readonly frameUrl: string,
        private readonly logger: SimpleLogger,
        private readonly now: () => number = Date.now
    ) {}

    /** Most recent failed inference request */
    get lastError(): ErrorContext | null {
        return this.failure;
    }

    async maybeInfer(motion: { hasMotion: boolean }, standby: { mode: StandbyMode }): Promise<InferenceOutcome> {
        if (standby.mode !== 'active') return { kind: 'skipped', reason: 'standby' };
        if (!motion.hasMotion) return { kind: 'skipped', reason: 'no-motion' };

        try {
            const detections = await this.service.analyze(this.frameUrl);
            const detection = strongestDetection(detections);
            this.logger.debug('Inference complete', { detections: detections.length, confidence: detection.confidence });
            return { kind: 'detection', detection, detections };
        } catch (e) {
            this.failure = toErrorContext(e, 'inference', this.now());
            this.logger.error('Inference failed - cycle skipped', { error: errorMessage(e) });
            return { kind: 'skipped', reason: 'error' };
        }
    }
}
