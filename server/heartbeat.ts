/**
 * Heartbeat/telemetry - periodic read-only snapshot of the monitor
 */

import type { SimpleLogger } from './logger.js';
import type { SystemStatus, Statistics } from './status.js';
import type { StandbyState, StandbyMode } from './standby.js';
import type { ErrorContext } from './errors.js';

export interface MonitorSnapshot {
    status: SystemStatus;
    timestamp: string;
    mqtt_connected: boolean;
    ml_api_healthy: boolean;
    stream_connected: boolean;
    total_checks: number;
    failed_checks: number;
    detection_confidence: number | null;
    failure_detected: boolean;
    standby_mode: boolean;
    standby_enabled: boolean;
    ml_container_running: boolean;
    mode: StandbyMode;
    /** seconds */
    auto_timeout: number;
    last_check_time: string | null;
    last_motion_time: string | null;
    last_error: ErrorContext | null;
}

export interface SnapshotSources {
    status: SystemStatus;
    statistics: Statistics;
    confidence: number | null;
    standby: StandbyState;
    mqttConnected: boolean;
    mlApiHealthy: boolean;
    streamConnected: boolean;
    lastCheckAt: number | null;
    /** Undefined until motion has been seen */
    lastMotionAt: number | undefined;
    lastError: ErrorContext | null;
    now: number;
}

const iso = (ms: number | null | undefined): string | null => (ms == null ? null : new Date(ms).toISOString());

export function buildSnapshot(src: SnapshotSources): MonitorSnapshot {
    return {
        status: src.status,
        timestamp: new Date(src.now).toISOString(),
        mqtt_connected: src.mqttConnected,
        ml_api_healthy: src.mlApiHealthy,
        stream_connected: src.streamConnected,
        total_checks: src.statistics.totalChecks,
        failed_checks: src.statistics.failedChecks,
        detection_confidence: src.confidence,
        failure_detected: src.status === 'failure',
        standby_mode: src.standby.mode === 'standby',
        standby_enabled: src.standby.enabled,
        ml_container_running: src.standby.containerRunning,
        mode: src.standby.mode,
        auto_timeout: src.standby.autoTimeoutMs / 1000,
        last_check_time: iso(src.lastCheckAt),
        last_motion_time: iso(src.lastMotionAt),
        last_error: src.lastError
    };
}

export interface HeartbeatOptions {
    intervalMs: number;
    snapshot: () => MonitorSnapshot;
    /** Resolves false when the message was dropped */
    publish: (snapshot: MonitorSnapshot) => Promise<boolean>;
    /** Local consumers (dashboard stream) */
    broadcast?: (snapshot: MonitorSnapshot) => void;
    logger: SimpleLogger;
}

export class HeartbeatEmitter {
    private timer: NodeJS.Timeout | null = null;

    constructor(private readonly options: HeartbeatOptions) {}

    start(): void {
        if (this.timer) return;
        this.options.logger.info('Starting heartbeat', { intervalMs: this.options.intervalMs });
        this.timer = setInterval(async () => {
            try {
                await this.beat();
            } catch (e) {
                this.options.logger.error('Heartbeat error', { error: String(e) });
            }
        }, this.options.intervalMs);
    }

    stop(): void {
        if (this.timer) clearInterval(this.timer);
        this.timer = null;
    }

    async beat(): Promise<boolean> {
        const snapshot = this.options.snapshot();
        this.options.broadcast?.(snapshot);
        const sent = await this.options.publish(snapshot);
        if (sent) {
            this.options.logger.debug('Heartbeat sent', { status: snapshot.status, mode: snapshot.mode });
        }
        return sent;
    }
}
