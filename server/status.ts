/**
 * Status State Machine
 *
 * The status is re-derived from a snapshot of inputs each time, never patched
 * incrementally. Precedence: standby, collaborator error, idle, failure threshold.
 */

import type { StandbyMode } from './standby.js';
import type { Detection, InferenceOutcome } from './inference.js';
import type { SimpleLogger } from './logger.js';

export type SystemStatus = 'starting' | 'idle' | 'ok' | 'failure' | 'error' | 'standby';

export interface StatusInputs {
    mode: StandbyMode;
    /** Stream unavailable or broker disconnected beyond grace, or an unresolved container fault */
    collaboratorError: boolean;
    motion: { motionSeen: boolean; idleDurationMs: number };
    idleTimeoutMs: number;
    inference: InferenceOutcome;
    threshold: number;
    previous: SystemStatus;
}

export function deriveStatus(inputs: StatusInputs): SystemStatus {
    if (inputs.mode === 'standby') return 'standby';
    if (inputs.collaboratorError) return 'error';
    if (!inputs.motion.motionSeen || inputs.motion.idleDurationMs >= inputs.idleTimeoutMs) return 'idle';

    if (inputs.inference.kind === 'detection') {
        return inputs.inference.detection.confidence >= inputs.threshold ? 'failure' : 'ok';
    }
    // No fresh verdict: hold a failure, otherwise the printer is active
    return inputs.previous === 'failure' ? 'failure' : 'ok';
}

export interface StatusChange {
    from: SystemStatus;
    to: SystemStatus;
    at: number;
    /** Present when the change was caused by an inference verdict */
    detection?: Detection;
    detections?: Detection[];
}

export interface Statistics {
    totalChecks: number;
    failedChecks: number;
}

export type StatusListener = (change: StatusChange) => void;

export class StatusTracker {
    private current: SystemStatus = 'starting';
    private stats: Statistics = { totalChecks: 0, failedChecks: 0 };
    private confidence: number | null = null;
    private readonly listeners = new Set<StatusListener>();

    constructor(private readonly logger: SimpleLogger) {}

    get status(): SystemStatus {
        return this.current;
    }

    get statistics(): Statistics {
        return { ...this.stats };
    }

    /** Confidence of the most recent inference verdict */
    get lastConfidence(): number | null {
        return this.confidence;
    }

    onChange(listener: StatusListener): () => void {
        this.listeners.add(listener);
        return () => this.listeners.delete(listener);
    }

    /**
     * One evaluated monitoring cycle: counts a check, then applies the derived status
     */
    evaluate(inputs: Omit<StatusInputs, 'previous'>, now: number): SystemStatus {
        this.stats.totalChecks++;
        if (inputs.inference.kind === 'detection') {
            this.confidence = inputs.inference.detection.confidence;
        }
        return this.apply(inputs, now);
    }

    /**
     * Re-derive outside a cycle (controller mode changed); not counted as a check
     */
    refresh(inputs: Omit<StatusInputs, 'previous' | 'inference'>, now: number): SystemStatus {
        return this.apply({ ...inputs, inference: { kind: 'skipped', reason: 'standby' } }, now);
    }

    private apply(inputs: Omit<StatusInputs, 'previous'>, now: number): SystemStatus {
        const from = this.current;
        const to = deriveStatus({ ...inputs, previous: from });
        if (to === from) return to;

        this.current = to;
        if (to === 'failure') this.stats.failedChecks++;

        const change: StatusChange = { from, to, at: now };
        if (inputs.inference.kind === 'detection') {
            change.detection = inputs.inference.detection;
            change.detections = inputs.inference.detections;
        }

        const level = to === 'failure' || to === 'error' ? 'warn' : 'info';
        this.logger[level]('Status changed', { from, to, ...(change.detection && { confidence: change.detection.confidence }) });

        for (const listener of this.listeners) {
            try {
                listener(change);
            } catch (e) {
                this.logger.error('Status listener failed', { error: String(e) });
            }
        }
        return to;
    }
}
