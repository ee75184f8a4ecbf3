/**
 * MQTT handler - publishes status, failure and heartbeat messages and
 * receives standby commands on the control topic.
 */

import * as mqtt from 'mqtt';
import { z } from 'zod';
import { MessagingError, errorMessage, toErrorContext, type ErrorContext } from './errors.js';
import type { SimpleLogger } from './logger.js';
import type { StandbyTarget } from './standby.js';

export type QoS = 0 | 1 | 2;

/** The subset of an MQTT client the handler uses */
export interface BrokerClient {
    onConnect(listener: () => void): void;
    onClose(listener: () => void): void;
    onError(listener: (error: Error) => void): void;
    onReconnect(listener: () => void): void;
    onMessage(listener: (topic: string, payload: Buffer) => void): void;
    subscribe(topic: string, qos: QoS): Promise<void>;
    publish(topic: string, payload: string, qos: QoS): Promise<void>;
    end(): Promise<void>;
}

export function connectBroker(options: mqtt.IClientOptions): BrokerClient {
    const client = mqtt.connect(options);
    return {
        onConnect: (listener) => { client.on('connect', () => listener()); },
        onClose: (listener) => { client.on('close', () => listener()); },
        onError: (listener) => { client.on('error', (error: Error) => listener(error)); },
        onReconnect: (listener) => { client.on('reconnect', () => listener()); },
        onMessage: (listener) => { client.on('message', (topic: string, payload: Buffer) => listener(topic, payload)); },
        subscribe: async (topic, qos) => { await client.subscribeAsync(topic, { qos }); },
        publish: async (topic, payload, qos) => { await client.publishAsync(topic, payload, { qos }); },
        end: () => client.endAsync()
    };
}

export const controlMessageSchema = z.object({
    command: z.string().transform((c) => c.trim().toLowerCase()).pipe(z.enum(['standby', 'active']))
});

export type ControlParseResult =
    | { ok: true; command: StandbyTarget }
    | { ok: false; error: string };

/**
 * `{"command": "standby" | "active"}`, case-insensitive
 */
export function parseControlMessage(payload: Buffer | string): ControlParseResult {
    let json: unknown;
    try {
        json = JSON.parse(payload.toString());
    } catch {
        return { ok: false, error: 'Invalid JSON in control message' };
    }
    const parsed = controlMessageSchema.safeParse(json);
    if (!parsed.success) {
        const issue = parsed.error.issues[0];
        return { ok: false, error: `Unknown control command: ${issue ? issue.message : 'invalid message'}` };
    }
    return { ok: true, command: parsed.data.command };
}

export interface MqttHandlerOptions {
    host: string;
    port: number;
    username: string;
    password: string;
    clientId: string;
    controlTopic: string;
    /** Only subscribe to the control topic when standby is enabled */
    subscribeControl: boolean;
    logger: SimpleLogger;
    onControl: (command: StandbyTarget) => void;
    connect?: (options: mqtt.IClientOptions) => BrokerClient;
    now?: () => number;
}

export class MqttHandler {
    private client: BrokerClient | null = null;
    private isConnected = false;
    private disconnectedAt: number | null = null;
    private loggedError = false;
    private failure: ErrorContext | null = null;
    private readonly now: () => number;

    constructor(private readonly options: MqttHandlerOptions) {
        this.now = options.now ?? Date.now;
    }

    get connected(): boolean {
        return this.isConnected;
    }

    get lastError(): ErrorContext | null {
        return this.failure;
    }

    /**
     * Disconnected, or never connected, for longer than `graceMs`
     */
    disconnectedBeyondGrace(graceMs: number, now: number = this.now()): boolean {
        if (this.isConnected || this.disconnectedAt === null) return false;
        return now - this.disconnectedAt > graceMs;
    }

    start(): void {
        if (this.client) return;
        const { host, port, username, password, clientId, logger } = this.options;

        logger.info('Connecting to MQTT broker', { broker: `${host}:${port}`, clientId });
        this.disconnectedAt = this.now();

        const client = (this.options.connect ?? connectBroker)({
            host,
            port,
            protocol: 'mqtt',
            clientId,
            protocolVersion: 5,
            ...(username && password ? { username, password } : {}),
            reconnectPeriod: 5000,
            connectTimeout: 10000
        });
        this.client = client;

        client.onConnect(() => {
            this.isConnected = true;
            this.disconnectedAt = null;
            this.loggedError = false;
            logger.info('Connected to MQTT broker', { broker: `${host}:${port}` });

            if (this.options.subscribeControl) {
                void client.subscribe(this.options.controlTopic, 1).then(
                    () => logger.info('Subscribed to control topic', { topic: this.options.controlTopic }),
                    (e: unknown) => logger.error('Control topic subscription failed', {
                        topic: this.options.controlTopic,
                        error: errorMessage(e)
                    })
                );
            }
        });

        client.onClose(() => {
            if (this.isConnected) {
                logger.warn('Disconnected from MQTT broker');
                this.disconnectedAt = this.now();
            }
            this.isConnected = false;
        });

        client.onError((error) => {
            this.failure = toErrorContext(new MessagingError(error.message, { cause: error }), 'messaging', this.now());
            if (!this.loggedError) {
                logger.error('MQTT connection error - check MQTT_BROKER_HOST and MQTT_BROKER_PORT', {
                    broker: `${host}:${port}`,
                    error: error.message
                });
                this.loggedError = true;
            } else {
                logger.debug('MQTT connection error', { error: error.message });
            }
        });

        client.onReconnect(() => logger.debug('MQTT reconnecting'));

        client.onMessage((topic, payload) => this.handleMessage(topic, payload));
    }

    /**
     * Publish `message` as JSON. Resolves false when disconnected or on failure.
     */
    async publish(topic: string, message: object, qos: QoS): Promise<boolean> {
        if (!this.client || !this.isConnected) {
            this.options.logger.debug('Cannot publish: MQTT not connected', { topic });
            return false;
        }
        try {
            await this.client.publish(topic, JSON.stringify(message), qos);
            return true;
        } catch (e) {
            const error = new MessagingError(`Publish to ${topic} failed: ${errorMessage(e)}`, { cause: e });
            this.failure = toErrorContext(error, 'messaging', this.now());
            this.options.logger.error('MQTT publish failed', { topic, error: error.message });
            return false;
        }
    }

    async stop(): Promise<void> {
        const client = this.client;
        this.client = null;
        this.isConnected = false;
        if (!client) return;
        try {
            await client.end();
            this.options.logger.info('Disconnected from MQTT broker');
        } catch (e) {
            this.options.logger.error('Error closing MQTT connection', { error: errorMessage(e) });
        }
    }

    private handleMessage(topic: string, payload: Buffer): void {
        if (topic !== this.options.controlTopic) return;

        const result = parseControlMessage(payload);
        if (!result.ok) {
            this.options.logger.warn(result.error, { payload: payload.toString().slice(0, 200) });
            return;
        }
        this.options.logger.info('Received control command', { command: result.command });
        try {
            this.options.onControl(result.command);
        } catch (e) {
            this.options.logger.error('Error processing control message', { error: errorMessage(e) });
        }
    }
}
