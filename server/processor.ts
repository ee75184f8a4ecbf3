/**
 * Monitoring cycle
 *
 * One cycle: take the freshest frame, run motion detection, let the inference
 * gate decide whether to analyse it, derive the status, then give the standby
 * controller its idle/motion signals. A cycle first lets the controller clear a
 * container fault the runtime no longer shows. Cycles never overlap; a cycle that is
 * still running when the next tick fires causes that tick to be skipped.
 */

import type { SimpleLogger } from './logger.js';
import type { Frame, FrameSource } from './frame-source.js';
import type { MotionTracker, MotionState } from './motion.js';
import type { Detection, InferenceGate, InferenceService } from './inference.js';
import type { StatusTracker, StatusChange, SystemStatus } from './status.js';
import type { StandbyController } from './standby.js';
import type { MqttHandler } from './mqtt-handler.js';
import type { ErrorContext } from './errors.js';
import { buildSnapshot, type MonitorSnapshot } from './heartbeat.js';

// ============================================================================
// In-Memory State
// ============================================================================

let _inmem_isShuttingDown = false;

// Cycle in progress, used to prevent overlapping cycles
let _inmem_cycleInProgress = false;

// Frame of the most recent cycle, served to the inference service
let _inmem_currentFrame: Frame | undefined;

let _inmem_lastCheckAt: number | null = null;

// ============================================================================
// Dependencies
// ============================================================================

export interface ProcessorSettings {
    idleTimeoutMs: number;
    threshold: number;
    mqttGraceMs: number;
    topics: { failure: string; status: string };
}

export interface ProcessorDependencies {
    logger: SimpleLogger;
    settings: ProcessorSettings;
    frameSource: Pick<FrameSource, 'getFrame' | 'connected' | 'unavailableBeyondGrace' | 'status'>;
    motion: Pick<MotionTracker, 'observe' | 'state'>;
    gate: Pick<InferenceGate, 'maybeInfer' | 'lastError'>;
    inference: Pick<InferenceService, 'checkHealth' | 'healthy'>;
    status: StatusTracker;
    standby: StandbyController;
    mqtt: Pick<MqttHandler, 'connected' | 'disconnectedBeyondGrace' | 'publish' | 'lastError'>;
    /** Dashboard stream */
    broadcast: (snapshot: MonitorSnapshot) => void;
    now?: () => number;
}

let deps: ProcessorDependencies;
let unsubscribe: Array<() => void> = [];

const now = (): number => (deps.now ?? Date.now)();

export function initProcessor(dependencies: ProcessorDependencies): void {
    for (const u of unsubscribe) u();
    deps = dependencies;

    unsubscribe = [
        deps.status.onChange((change) => onStatusChange(change)),
        // Keep status == standby whenever the controller holds standby, not just at the next cycle
        deps.standby.onModeChange(() => refreshStatus())
    ];
}

export function setShuttingDown(value: boolean): void {
    _inmem_isShuttingDown = value;
}

export function isShuttingDown(): boolean {
    return _inmem_isShuttingDown;
}

export function getCurrentFrame(): Frame | undefined {
    return _inmem_currentFrame;
}

/**
 * Reset all in-memory state. Used by tests to ensure isolation.
 */
export function resetProcessorState(): void {
    for (const u of unsubscribe) u();
    unsubscribe = [];
    _inmem_isShuttingDown = false;
    _inmem_cycleInProgress = false;
    _inmem_currentFrame = undefined;
    _inmem_lastCheckAt = null;
}

// ============================================================================
// Status inputs
// ============================================================================

function collaboratorError(at: number): boolean {
    return deps.frameSource.unavailableBeyondGrace(at)
        || deps.mqtt.disconnectedBeyondGrace(deps.settings.mqttGraceMs, at)
        || deps.standby.hasUnresolvedFault;
}

/**
 * Most recent failure context across collaborators
 */
export function lastError(): ErrorContext | null {
    const candidates = [
        deps.frameSource.status().lastError,
        deps.mqtt.lastError,
        deps.gate.lastError,
        deps.standby.getState().lastError
    ].filter((e): e is ErrorContext => e !== null);

    // ISO timestamps sort lexically
    return candidates.reduce<ErrorContext | null>((latest, e) => (!latest || e.at > latest.at ? e : latest), null);
}

export function getSnapshot(): MonitorSnapshot {
    const at = now();
    const motion = deps.motion.state(at);
    return buildSnapshot({
        status: deps.status.status,
        statistics: deps.status.statistics,
        confidence: deps.status.lastConfidence,
        standby: deps.standby.getState(),
        mqttConnected: deps.mqtt.connected,
        mlApiHealthy: deps.inference.healthy,
        streamConnected: deps.frameSource.connected,
        lastCheckAt: _inmem_lastCheckAt,
        lastMotionAt: motion.motionSeen ? motion.lastMotionAt : undefined,
        lastError: lastError(),
        now: at
    });
}

/**
 * Re-derive the status outside a cycle, without counting a check
 */
export function refreshStatus(): SystemStatus {
    const at = now();
    return deps.status.refresh({
        mode: deps.standby.currentMode,
        collaboratorError: collaboratorError(at),
        motion: deps.motion.state(at),
        idleTimeoutMs: deps.settings.idleTimeoutMs,
        threshold: deps.settings.threshold
    }, at);
}

// ============================================================================
// Publishing
// ============================================================================

/** Wire shape of the inference service: [label, confidence, [x, y, w, h]] */
function toWireDetection(d: Detection): [string, number, [number, number, number, number]] | [string, number] {
    const label = d.label ?? '';
    return d.boundingBox
        ? [label, d.confidence, [d.boundingBox.x, d.boundingBox.y, d.boundingBox.width, d.boundingBox.height]]
        : [label, d.confidence];
}

function onStatusChange(change: StatusChange): void {
    const snapshot = getSnapshot();
    deps.broadcast(snapshot);

    void deps.mqtt.publish(deps.settings.topics.status, {
        status: change.to,
        previous: change.from,
        timestamp: new Date(change.at).toISOString(),
        mode: snapshot.mode,
        detection_confidence: snapshot.detection_confidence,
        last_error: snapshot.last_error
    }, 1);

    if (change.to === 'failure') {
        const confidence = change.detection?.confidence ?? deps.status.lastConfidence ?? 0;
        deps.logger.warn('FAILURE DETECTED', { confidence });
        void deps.mqtt.publish(deps.settings.topics.failure, {
            status: 'failure',
            confidence,
            timestamp: new Date(change.at).toISOString(),
            detections: (change.detections ?? []).map(toWireDetection)
        }, 2);
    }
}

// ============================================================================
// Control Loop
// ============================================================================

export interface CycleResult {
    status: SystemStatus;
    motion: MotionState;
    inferred: boolean;
}

/**
 * Run one monitoring cycle; undefined when skipped because one is already running
 */
export async function runMonitorCycle(): Promise<CycleResult | undefined> {
    if (_inmem_isShuttingDown) return undefined;
    if (_inmem_cycleInProgress) {
        deps.logger.debug('Monitoring cycle still running - tick skipped');
        return undefined;
    }
    _inmem_cycleInProgress = true;

    try {
        // A container fault lasts until the runtime is seen in the state the mode implies
        await deps.standby.reconcileFault();

        const at = now();
        const frame = deps.frameSource.getFrame();
        if (frame) {
            _inmem_currentFrame = frame;
        } else {
            deps.logger.debug('No frame available, will retry');
        }

        const motion = deps.motion.observe(frame, at);
        if (motion.hasMotion) {
            deps.standby.onMotion();
        }

        if (motion.hasMotion && deps.standby.currentMode === 'active') {
            // Cached; keeps the health flag current alongside analysis
            await deps.inference.checkHealth();
        }

        const outcome = await deps.gate.maybeInfer(motion, { mode: deps.standby.currentMode });

        const evaluatedAt = now();
        _inmem_lastCheckAt = evaluatedAt;
        const status = deps.status.evaluate({
            mode: deps.standby.currentMode,
            collaboratorError: collaboratorError(evaluatedAt),
            motion: deps.motion.state(evaluatedAt),
            idleTimeoutMs: deps.settings.idleTimeoutMs,
            inference: outcome,
            threshold: deps.settings.threshold
        }, evaluatedAt);

        deps.standby.checkAutoStandby(motion, evaluatedAt);

        return { status, motion, inferred: outcome.kind === 'detection' };
    } finally {
        _inmem_cycleInProgress = false;
    }
}
