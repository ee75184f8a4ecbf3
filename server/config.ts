/**
 * Configuration - flat set of named options read from the environment.
 * Validated once at startup; an invalid value aborts with the variable name.
 */

import { z } from 'zod';
import { ConfigError } from './errors.js';
import type { SimpleLogger } from './logger.js';

const DEFAULT_RTSP_URL = 'rtsp://localhost:8554/stream';
const DEFAULT_BROKER_HOST = 'localhost';

const seconds = (fallback: number) => z.coerce.number().nonnegative().default(fallback);
const positiveSeconds = (fallback: number) => z.coerce.number().positive().default(fallback);
const int = (fallback: number) => z.coerce.number().int().nonnegative().default(fallback);
const flag = (fallback: boolean) => z
    .enum(['true', 'false', '1', '0', 'yes', 'no'])
    .default(fallback ? 'true' : 'false')
    .transform((v) => v === 'true' || v === '1' || v === 'yes');

export const envSchema = z.object({
    // Stream
    RTSP_STREAM_URL: z.string().min(1).default(DEFAULT_RTSP_URL),
    RTSP_TIMEOUT: positiveSeconds(10),
    FRAME_RATE: z.coerce.number().positive().max(30).default(2),
    FRAME_WIDTH: z.coerce.number().int().min(16).default(640),
    FFMPEG_PATH: z.string().min(1).default('ffmpeg'),
    STREAM_RETRY_INITIAL_SECONDS: positiveSeconds(1),
    STREAM_RETRY_MAX_SECONDS: positiveSeconds(60),
    STREAM_GRACE_SECONDS: seconds(30),

    // MQTT
    MQTT_BROKER_HOST: z.string().min(1).default(DEFAULT_BROKER_HOST),
    MQTT_BROKER_PORT: z.coerce.number().int().min(1).max(65535).default(1883),
    MQTT_USERNAME: z.string().default(''),
    MQTT_PASSWORD: z.string().default(''),
    MQTT_CLIENT_ID: z.string().min(1).default('print-monitor'),
    MQTT_TOPIC_FAILURE: z.string().min(1).default('printer/monitor/failure'),
    MQTT_TOPIC_HEARTBEAT: z.string().min(1).default('printer/monitor/heartbeat'),
    MQTT_TOPIC_CONTROL: z.string().min(1).default('printer/monitor/control'),
    MQTT_TOPIC_STATUS: z.string().min(1).default('printer/monitor/status'),
    MQTT_HEARTBEAT_INTERVAL: positiveSeconds(30),
    MQTT_GRACE_SECONDS: seconds(60),

    // Detection
    CHECK_INTERVAL_SECONDS: positiveSeconds(10),
    ML_API_URL: z.string().url().default('http://ml_api:3333'),
    ML_API_TIMEOUT: positiveSeconds(15),
    FRAME_PUBLIC_URL: z.string().url().default('http://print-monitor:8080/latest_frame.png'),
    DETECTION_THRESHOLD: z.coerce.number().min(0).max(1).default(0.6),

    // Motion
    MOTION_INTENSITY_THRESHOLD: z.coerce.number().int().min(0).max(255).default(30),
    MOTION_PIXEL_THRESHOLD: int(500),
    MOTION_BLUR: flag(true),
    IDLE_TIMEOUT: seconds(60),

    // Standby
    STANDBY_MODE_ENABLED: flag(true),
    STANDBY_AUTO_TIMEOUT: seconds(300),
    ML_API_CONTAINER_NAME: z.string().min(1).default('ml_api'),
    DOCKER_PATH: z.string().min(1).default('docker'),
    CONTAINER_OP_TIMEOUT: positiveSeconds(30),
    CONTAINER_RETRY_SECONDS: seconds(60),
    RESUME_MAX_WAIT: positiveSeconds(60),
    RESUME_POLL_INTERVAL: positiveSeconds(2),

    // Web / logging
    WEB_PORT: z.coerce.number().int().min(0).max(65535).default(8080),
    LOG_LEVEL: z.enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']).default('info'),
    LOG_FILE: z.string().default('')
});

export type EnvConfig = z.infer<typeof envSchema>;

export interface MonitorConfig {
    stream: {
        url: string;
        timeoutMs: number;
        frameRate: number;
        frameWidth: number;
        ffmpegPath: string;
        retryInitialMs: number;
        retryMaxMs: number;
        graceMs: number;
    };
    mqtt: {
        host: string;
        port: number;
        username: string;
        password: string;
        clientId: string;
        topics: { failure: string; heartbeat: string; control: string; status: string };
        heartbeatIntervalMs: number;
        graceMs: number;
    };
    detection: {
        checkIntervalMs: number;
        mlApiUrl: string;
        mlApiTimeoutMs: number;
        framePublicUrl: string;
        threshold: number;
    };
    motion: {
        intensityThreshold: number;
        pixelThreshold: number;
        blur: boolean;
        idleTimeoutMs: number;
    };
    standby: {
        enabled: boolean;
        autoTimeoutMs: number;
        containerName: string;
        dockerPath: string;
        opTimeoutMs: number;
        retryCooldownMs: number;
        resumeMaxWaitMs: number;
        resumePollIntervalMs: number;
    };
    web: { port: number };
    log: { level: string; file: string };
}

const ms = (s: number) => Math.round(s * 1000);

/**
 * Parse and validate configuration from an environment map.
 * Empty strings count as unset so docker-compose style `VAR=` falls back to the default.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): MonitorConfig {
    const raw: Record<string, string> = {};
    for (const key of Object.keys(envSchema.shape)) {
        const value = env[key];
        if (value !== undefined && value !== '') {
            raw[key] = key === 'STANDBY_MODE_ENABLED' || key === 'MOTION_BLUR' ? value.toLowerCase() : value;
        }
    }

    const parsed = envSchema.safeParse(raw);
    if (!parsed.success) {
        const details = parsed.error.issues
            .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
            .join('; ');
        throw new ConfigError(`Invalid configuration - ${details}`);
    }
    const e = parsed.data;

    if (e.STREAM_RETRY_MAX_SECONDS < e.STREAM_RETRY_INITIAL_SECONDS) {
        throw new ConfigError('Invalid configuration - STREAM_RETRY_MAX_SECONDS must be >= STREAM_RETRY_INITIAL_SECONDS');
    }

    return {
        stream: {
            url: e.RTSP_STREAM_URL,
            timeoutMs: ms(e.RTSP_TIMEOUT),
            frameRate: e.FRAME_RATE,
            frameWidth: e.FRAME_WIDTH,
            ffmpegPath: e.FFMPEG_PATH,
            retryInitialMs: ms(e.STREAM_RETRY_INITIAL_SECONDS),
            retryMaxMs: ms(e.STREAM_RETRY_MAX_SECONDS),
            graceMs: ms(e.STREAM_GRACE_SECONDS)
        },
        mqtt: {
            host: e.MQTT_BROKER_HOST,
            port: e.MQTT_BROKER_PORT,
            username: e.MQTT_USERNAME,
            password: e.MQTT_PASSWORD,
            clientId: e.MQTT_CLIENT_ID,
            topics: {
                failure: e.MQTT_TOPIC_FAILURE,
                heartbeat: e.MQTT_TOPIC_HEARTBEAT,
                control: e.MQTT_TOPIC_CONTROL,
                status: e.MQTT_TOPIC_STATUS
            },
            heartbeatIntervalMs: ms(e.MQTT_HEARTBEAT_INTERVAL),
            graceMs: ms(e.MQTT_GRACE_SECONDS)
        },
        detection: {
            checkIntervalMs: ms(e.CHECK_INTERVAL_SECONDS),
            mlApiUrl: e.ML_API_URL.replace(/\/+$/, ''),
            mlApiTimeoutMs: ms(e.ML_API_TIMEOUT),
            framePublicUrl: e.FRAME_PUBLIC_URL,
            threshold: e.DETECTION_THRESHOLD
        },
        motion: {
            intensityThreshold: e.MOTION_INTENSITY_THRESHOLD,
            pixelThreshold: e.MOTION_PIXEL_THRESHOLD,
            blur: e.MOTION_BLUR,
            idleTimeoutMs: ms(e.IDLE_TIMEOUT)
        },
        standby: {
            enabled: e.STANDBY_MODE_ENABLED,
            autoTimeoutMs: ms(e.STANDBY_AUTO_TIMEOUT),
            containerName: e.ML_API_CONTAINER_NAME,
            dockerPath: e.DOCKER_PATH,
            opTimeoutMs: ms(e.CONTAINER_OP_TIMEOUT),
            retryCooldownMs: ms(e.CONTAINER_RETRY_SECONDS),
            resumeMaxWaitMs: ms(e.RESUME_MAX_WAIT),
            resumePollIntervalMs: ms(e.RESUME_POLL_INTERVAL)
        },
        web: { port: e.WEB_PORT },
        log: { level: e.LOG_LEVEL, file: e.LOG_FILE }
    };
}

/**
 * Warnings for settings that are almost certainly unconfigured
 */
export function configWarnings(config: MonitorConfig): string[] {
    const warnings: string[] = [];
    if (config.stream.url === DEFAULT_RTSP_URL) {
        warnings.push('RTSP_STREAM_URL is set to default - you need to configure your camera stream');
    }
    if (config.mqtt.host === DEFAULT_BROKER_HOST) {
        warnings.push('MQTT_BROKER_HOST is set to localhost - ensure your MQTT broker is accessible');
    }
    return warnings;
}

export function logConfig(config: MonitorConfig, logger: SimpleLogger): void {
    for (const warning of configWarnings(config)) {
        logger.warn('Configuration warning', { warning });
    }

    logger.info('Print monitor configuration', {
        stream: config.stream.url,
        mlApi: config.detection.mlApiUrl,
        broker: `${config.mqtt.host}:${config.mqtt.port}`,
        checkIntervalMs: config.detection.checkIntervalMs,
        heartbeatIntervalMs: config.mqtt.heartbeatIntervalMs,
        detectionThreshold: config.detection.threshold,
        webPort: config.web.port,
        motion: {
            intensity: config.motion.intensityThreshold,
            pixels: config.motion.pixelThreshold,
            idleTimeoutMs: config.motion.idleTimeoutMs
        },
        standby: config.standby.enabled
            ? { enabled: true, autoTimeoutMs: config.standby.autoTimeoutMs, container: config.standby.containerName }
            : { enabled: false }
    });
}
