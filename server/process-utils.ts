/**
 * Utility functions for process management and timeouts
 * Provides a clean pipeline approach for spawning processes and handling their output
 */

import { spawn } from 'child_process';
import defaultLogger, { type SimpleLogger } from './logger.js';

// Replaced by the service (or tests) at startup
let logger: SimpleLogger = defaultLogger;

export function setLogger(loggerInstance: SimpleLogger): void {
    logger = loggerInstance;
}

/** Minimal view of a spawned process, enough to stop it and see if it is still alive */
export interface ProcessHandle {
    readonly pid?: number | undefined;
    readonly exitCode: number | null;
    kill(signal?: NodeJS.Signals): boolean;
}

export interface ProcessSpawnOptions {
    name: string;
    cmd: string;
    args: string[];
    cwd?: string;
    /** Raw stdout chunks; binary pipes (image2pipe) must not be decoded as text */
    onStdout?: (data: Buffer) => void;
    onStderr?: (data: string) => void;
    onError?: (error: Error) => void;
    onClose?: (code: number | null, signal: NodeJS.Signals | null) => void;
}

/**
 * Spawn a process with consistent logging and stream handling
 */
export function spawnProcess(options: ProcessSpawnOptions): ProcessHandle {
    const { name, cmd, args, cwd, onStdout, onStderr, onError, onClose } = options;

    logger.info('Spawning process', { name, cmd, args: args.slice(0, 3).join(' ') + '...', cwd: cwd || process.cwd() });

    const childProcess = spawn(cmd, args, { cwd: cwd || process.cwd() });

    childProcess.stdout.on('data', (data: Buffer) => {
        if (onStdout) {
            onStdout(data);
        } else {
            logger.debug('Process stdout', { name, data: data.toString().trim() });
        }
    });

    childProcess.stderr.on('data', (data: Buffer) => {
        const str = data.toString();
        if (onStderr) {
            onStderr(str);
        } else {
            logger.warn('Process stderr', { name, data: str.trim() });
        }
    });

    childProcess.on('error', (error: Error) => {
        if (onError) {
            onError(error);
        } else {
            logger.error('Process error', { name, error: error.message });
        }
    });

    childProcess.on('close', (code: number | null, signal: NodeJS.Signals | null) => {
        if (onClose) {
            onClose(code, signal);
        } else {
            const isGraceful = code === 0 || code === 255 || code === null;
            const level = isGraceful ? 'info' : 'error';
            logger[level]('Process closed', { name, code, signal, graceful: isGraceful });
        }
    });

    logger.info('Process spawned', { name, pid: childProcess.pid });
    return childProcess;
}

export interface RunProcessResult {
    code: number | null;
    signal: NodeJS.Signals | null;
    stdout: string;
    stderr: string;
}

export class ProcessTimeoutError extends Error {
    constructor(name: string, timeoutMs: number) {
        super(`${name} did not complete within ${timeoutMs}ms`);
        this.name = 'ProcessTimeoutError';
    }
}

/**
 * Run a process to completion and return its output.
 * With `timeoutMs` the process is killed and the promise rejects as soon as the
 * deadline passes, without waiting for the process to actually exit.
 */
export function runProcess(
    options: Omit<ProcessSpawnOptions, 'onClose' | 'onStdout' | 'onStderr' | 'onError'> & { timeoutMs?: number }
): Promise<RunProcessResult> {
    return new Promise((resolve, reject) => {
        let stdout = '';
        let stderr = '';
        let settled = false;
        let timer: NodeJS.Timeout | undefined;

        const settle = (fn: () => void) => {
            if (settled) return;
            settled = true;
            if (timer) clearTimeout(timer);
            fn();
        };

        const child = spawnProcess({
            name: options.name,
            cmd: options.cmd,
            args: options.args,
            cwd: options.cwd,
            onStdout: (data: Buffer) => { stdout += data.toString(); },
            onStderr: (data: string) => { stderr += data; },
            onError: (error: Error) => settle(() => reject(error)),
            onClose: (code, signal) => settle(() => resolve({ code, signal, stdout, stderr }))
        });

        if (options.timeoutMs !== undefined) {
            const timeoutMs = options.timeoutMs;
            timer = setTimeout(() => {
                logger.warn('Process timed out - killing', { name: options.name, pid: child.pid, timeoutMs });
                try {
                    child.kill('SIGKILL');
                } catch (e) {
                    logger.error('Failed to kill timed out process', { name: options.name, error: String(e) });
                }
                settle(() => reject(new ProcessTimeoutError(options.name, timeoutMs)));
            }, timeoutMs);
        }
    });
}

/**
 * Race a promise against a deadline. The underlying work is abandoned, not cancelled.
 */
export function withTimeout<T>(work: Promise<T>, timeoutMs: number, onTimeout: () => Error): Promise<T> {
    return new Promise<T>((resolve, reject) => {
        const timer = setTimeout(() => reject(onTimeout()), timeoutMs);
        work.then(
            (value) => {
                clearTimeout(timer);
                resolve(value);
            },
            (error: unknown) => {
                clearTimeout(timer);
                reject(error);
            }
        );
    });
}

export function sleep(ms: number): Promise<void> {
    return new Promise((res) => setTimeout(res, ms));
}
