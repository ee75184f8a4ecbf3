/**
 * Error taxonomy for the monitor.
 * Each collaborator failure is surfaced as its own kind so the status machine,
 * the API and the logs can report the most recent failure context.
 */

export type ErrorKind = 'transport' | 'inference' | 'container' | 'messaging' | 'config';

export class MonitorError extends Error {
    readonly kind: ErrorKind;

    constructor(kind: ErrorKind, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'MonitorError';
        this.kind = kind;
    }
}

/** Stream unreachable or dropped */
export class TransportError extends MonitorError {
    constructor(message: string, options?: { cause?: unknown }) {
        super('transport', message, options);
        this.name = 'TransportError';
    }
}

/** Inference service unreachable, malformed response or timeout */
export class InferenceError extends MonitorError {
    constructor(message: string, options?: { cause?: unknown }) {
        super('inference', message, options);
        this.name = 'InferenceError';
    }
}

/** Container start/stop/inspect failed or timed out */
export class ContainerOpError extends MonitorError {
    readonly operation: 'start' | 'stop' | 'inspect' | 'resume';

    constructor(operation: ContainerOpError['operation'], message: string, options?: { cause?: unknown }) {
        super('container', message, options);
        this.name = 'ContainerOpError';
        this.operation = operation;
    }
}

/** Publish/subscribe failure */
export class MessagingError extends MonitorError {
    constructor(message: string, options?: { cause?: unknown }) {
        super('messaging', message, options);
        this.name = 'MessagingError';
    }
}

export class ConfigError extends MonitorError {
    constructor(message: string) {
        super('config', message);
        this.name = 'ConfigError';
    }
}

/** Most recent failure context, shown by the dashboard and the API */
export interface ErrorContext {
    kind: ErrorKind;
    message: string;
    at: string;
}

export function toErrorContext(error: unknown, fallbackKind: ErrorKind, at: number): ErrorContext {
    if (error instanceof MonitorError) {
        return { kind: error.kind, message: error.message, at: new Date(at).toISOString() };
    }
    return { kind: fallbackKind, message: errorMessage(error), at: new Date(at).toISOString() };
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
