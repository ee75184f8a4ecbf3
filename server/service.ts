/**
 * Service bootstrap - builds every component from configuration and owns the
 * schedules: frame reader (continuous), monitoring cycle, heartbeat and the
 * dashboard keep-alive.
 */

import type { Server } from 'node:http';
import type { MonitorConfig } from './config.js';
import type { SimpleLogger } from './logger.js';
import { FrameSource, type FrameSourceOptions } from './frame-source.js';
import { MotionTracker } from './motion.js';
import { InferenceClient, InferenceGate, type InferenceService } from './inference.js';
import { StatusTracker } from './status.js';
import { StandbyController, type StandbyControllerOptions } from './standby.js';
import { DockerCli, type ContainerRuntime } from './container.js';
import { MqttHandler, type MqttHandlerOptions } from './mqtt-handler.js';
import { HeartbeatEmitter } from './heartbeat.js';
import { SSEManager } from './sse-manager.js';
import { initWeb } from './www.js';
import { errorMessage } from './errors.js';
import {
    initProcessor,
    runMonitorCycle,
    getSnapshot,
    getCurrentFrame,
    refreshStatus,
    setShuttingDown,
    isShuttingDown
} from './processor.js';

const SSE_KEEPALIVE_MS = 30000;

function listeningPort(server: Server): number {
    const address = server.address();
    return address !== null && typeof address === 'object' ? address.port : 0;
}

export interface ServiceOverrides {
    launch?: FrameSourceOptions['launch'];
    runtime?: ContainerRuntime;
    inference?: InferenceService;
    connectBroker?: MqttHandlerOptions['connect'];
    now?: () => number;
    sleep?: StandbyControllerOptions['sleep'];
    webRoot?: string;
}

export interface MonitorService {
    readonly frameSource: FrameSource;
    readonly motion: MotionTracker;
    readonly gate: InferenceGate;
    readonly inference: InferenceService;
    readonly status: StatusTracker;
    readonly standby: StandbyController;
    readonly mqtt: MqttHandler;
    readonly heartbeat: HeartbeatEmitter;
    readonly sse: SSEManager;
    /** Available once started */
    readonly baseUrl: string;
    start(): Promise<void>;
    shutdown(): Promise<void>;
}

export function createService(config: MonitorConfig, logger: SimpleLogger, overrides: ServiceOverrides = {}): MonitorService {
    const now = overrides.now ?? Date.now;

    const frameSource = new FrameSource({
        ...config.stream,
        logger,
        ...(overrides.launch && { launch: overrides.launch }),
        now
    });

    const motion = new MotionTracker(config.motion, logger, now());

    const inference = overrides.inference ?? new InferenceClient({
        baseUrl: config.detection.mlApiUrl,
        timeoutMs: config.detection.mlApiTimeoutMs,
        logger,
        now
    });
    const gate = new InferenceGate(inference, config.detection.framePublicUrl, logger, now);

    const status = new StatusTracker(logger);

    const runtime = overrides.runtime ?? new DockerCli({
        bin: config.standby.dockerPath,
        container: config.standby.containerName,
        timeoutMs: config.standby.opTimeoutMs
    });

    const standby = new StandbyController({
        runtime,
        readiness: inference,
        logger,
        enabled: config.standby.enabled,
        autoTimeoutMs: config.standby.autoTimeoutMs,
        opTimeoutMs: config.standby.opTimeoutMs,
        retryCooldownMs: config.standby.retryCooldownMs,
        resumeMaxWaitMs: config.standby.resumeMaxWaitMs,
        resumePollIntervalMs: config.standby.resumePollIntervalMs,
        now,
        ...(overrides.sleep && { sleep: overrides.sleep })
    });

    const mqtt = new MqttHandler({
        host: config.mqtt.host,
        port: config.mqtt.port,
        username: config.mqtt.username,
        password: config.mqtt.password,
        clientId: config.mqtt.clientId,
        controlTopic: config.mqtt.topics.control,
        subscribeControl: config.standby.enabled,
        logger,
        onControl: (command) => {
            const result = standby.dispatch(command, 'remote');
            logger.info('Remote standby command dispatched', { command, outcome: result.outcome });
        },
        ...(overrides.connectBroker && { connect: overrides.connectBroker }),
        now
    });

    const sse = new SSEManager();

    initProcessor({
        logger,
        settings: {
            idleTimeoutMs: config.motion.idleTimeoutMs,
            threshold: config.detection.threshold,
            mqttGraceMs: config.mqtt.graceMs,
            topics: { failure: config.mqtt.topics.failure, status: config.mqtt.topics.status }
        },
        frameSource,
        motion,
        gate,
        inference,
        status,
        standby,
        mqtt,
        broadcast: (snapshot) => sse.broadcastStatus(snapshot),
        now
    });

    const heartbeat = new HeartbeatEmitter({
        intervalMs: config.mqtt.heartbeatIntervalMs,
        snapshot: getSnapshot,
        publish: (snapshot) => mqtt.publish(config.mqtt.topics.heartbeat, snapshot, 0),
        broadcast: (snapshot) => sse.broadcastStatus(snapshot),
        logger
    });

    let server: Server | null = null;
    let timers: NodeJS.Timeout[] = [];

    async function start(): Promise<void> {
        await standby.initialize();
        refreshStatus();

        mqtt.start();
        frameSource.start();

        server = await initWeb({
            logger,
            standby,
            getSnapshot,
            getCurrentFrame,
            sse,
            ...(overrides.webRoot && { webRoot: overrides.webRoot })
        }, config.web.port);

        timers = [
            setInterval(async () => {
                try {
                    await runMonitorCycle();
                } catch (e) {
                    logger.error('Monitoring cycle error', { error: errorMessage(e) });
                }
            }, config.detection.checkIntervalMs),
            setInterval(() => sse.sendKeepAlive(), SSE_KEEPALIVE_MS)
        ];
        heartbeat.start();

        logger.info('Print monitor started', {
            port: listeningPort(server),
            mode: standby.currentMode,
            checkIntervalMs: config.detection.checkIntervalMs
        });
    }

    async function shutdown(): Promise<void> {
        if (isShuttingDown()) return;
        setShuttingDown(true);

        for (const t of timers) clearInterval(t);
        timers = [];
        heartbeat.stop();
        frameSource.stop();
        await mqtt.stop();
        sse.closeAll();

        const s = server;
        server = null;
        if (s) {
            await new Promise<void>((resolve) => {
                s.close((err) => {
                    if (err) logger.error('Error closing web server', { error: err.message });
                    resolve();
                });
                s.closeAllConnections();
            });
            logger.info('Web server closed');
        }
    }

    return {
        frameSource,
        motion,
        gate,
        inference,
        status,
        standby,
        mqtt,
        heartbeat,
        sse,
        get baseUrl(): string {
            if (!server) throw new Error('Service not started');
            return `http://127.0.0.1:${listeningPort(server)}`;
        },
        start,
        shutdown
    };
}
