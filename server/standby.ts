/**
 * Standby Controller
 *
 * Owns the inference container lifecycle. Manual (HTTP), remote (MQTT),
 * automatic (idle timeout) and motion triggers all enter through `dispatch`,
 * which decides synchronously: a trigger arriving while a transition is in
 * flight is coalesced into it, a trigger for the mode already held is a no-op.
 * Container calls are serialised by a mutex and each one has a deadline.
 *
 *   active -> entering -> standby -> resuming -> active
 */

import { Atomic } from './atomic.js';
import { withTimeout, sleep as defaultSleep } from './process-utils.js';
import { ContainerOpError, errorMessage, toErrorContext, type ErrorContext } from './errors.js';
import type { ContainerRuntime } from './container.js';
import type { SimpleLogger } from './logger.js';
import type { MotionState } from './motion.js';

export type StandbyMode = 'active' | 'entering' | 'standby' | 'resuming';
export type StandbyTarget = 'standby' | 'active';
export type TriggerSource = 'manual' | 'remote' | 'auto' | 'motion';

export interface StandbyState {
    mode: StandbyMode;
    enabled: boolean;
    autoTimeoutMs: number;
    containerRunning: boolean;
    lastActivityAt: number;
    /** A container operation failed and the runtime has not since been confirmed in the current mode */
    containerFault: boolean;
    lastError: ErrorContext | null;
    /** Automatic triggers are ignored until this time after a failed operation */
    retryAfter: number | null;
}

export interface TransitionResult {
    success: boolean;
    mode: StandbyMode;
    error?: ErrorContext;
}

export type DispatchResult =
    | { outcome: 'started'; done: Promise<TransitionResult> }
    | { outcome: 'coalesced'; done: Promise<TransitionResult> }
    | { outcome: 'noop'; mode: StandbyMode }
    | { outcome: 'rejected'; reason: 'disabled' | 'cooldown'; mode: StandbyMode };

export type StandbyRequestResult =
    | { outcome: 'completed' | 'coalesced'; success: boolean; mode: StandbyMode; error?: ErrorContext }
    | { outcome: 'noop'; success: true; mode: StandbyMode }
    | { outcome: 'rejected'; success: false; mode: StandbyMode; reason: 'disabled' | 'cooldown' };

/** Readiness probe used while resuming */
export interface ReadinessProbe {
    checkHealth(force?: boolean): Promise<boolean>;
}

export interface StandbyControllerOptions {
    runtime: ContainerRuntime;
    readiness: ReadinessProbe;
    logger: SimpleLogger;
    enabled: boolean;
    /** 0 disables automatic standby */
    autoTimeoutMs: number;
    opTimeoutMs: number;
    retryCooldownMs: number;
    resumeMaxWaitMs: number;
    resumePollIntervalMs: number;
    now?: () => number;
    sleep?: (ms: number) => Promise<void>;
}

export type ModeListener = (mode: StandbyMode, previous: StandbyMode) => void;

export class StandbyController {
    private readonly mutex = new Atomic(1);
    private readonly listeners = new Set<ModeListener>();
    private readonly now: () => number;
    private readonly sleep: (ms: number) => Promise<void>;

    private mode: StandbyMode = 'active';
    private containerRunning = true;
    private lastActivityAt: number;
    private containerFault = false;
    private lastError: ErrorContext | null = null;
    private retryAfter: number | null = null;
    private inFlight: { target: StandbyTarget; done: Promise<TransitionResult> } | null = null;

    constructor(private readonly options: StandbyControllerOptions) {
        this.now = options.now ?? Date.now;
        this.sleep = options.sleep ?? defaultSleep;
        this.lastActivityAt = this.now();
    }

    get enabled(): boolean {
        return this.options.enabled;
    }

    get currentMode(): StandbyMode {
        return this.mode;
    }

    get hasUnresolvedFault(): boolean {
        return this.containerFault;
    }

    getState(): StandbyState {
        return {
            mode: this.mode,
            enabled: this.options.enabled,
            autoTimeoutMs: this.options.autoTimeoutMs,
            containerRunning: this.containerRunning,
            lastActivityAt: this.lastActivityAt,
            containerFault: this.containerFault,
            lastError: this.lastError,
            retryAfter: this.retryAfter
        };
    }

    onModeChange(listener: ModeListener): () => void {
        this.listeners.add(listener);
        return () => this.listeners.delete(listener);
    }

    /**
     * Mirror the container's state at startup. A stopped container starts the controller in standby.
     */
    async initialize(): Promise<StandbyMode> {
        if (!this.options.enabled) {
            this.options.logger.info('Standby mode disabled - inference container is not managed');
            return this.mode;
        }

        return this.mutex.runExclusive(async () => {
            const running = await this.reconcile();
            if (running === false && this.mode === 'active') {
                this.options.logger.info('Inference container not running at startup - starting in standby');
                this.setMode('standby');
            } else if (running === true) {
                this.options.logger.info('Inference container running at startup');
            }
            return this.mode;
        });
    }

    /**
     * Single entry point for every trigger. Decides synchronously; the container
     * work continues in the background and is observable through `done`.
     */
    dispatch(target: StandbyTarget, source: TriggerSource): DispatchResult {
        if (!this.options.enabled) {
            return { outcome: 'rejected', reason: 'disabled', mode: this.mode };
        }

        if (this.inFlight) {
            this.options.logger.debug('Standby trigger coalesced into transition in flight', {
                target,
                source,
                inFlight: this.inFlight.target
            });
            return { outcome: 'coalesced', done: this.inFlight.done };
        }

        if ((target === 'standby' && this.mode === 'standby') || (target === 'active' && this.mode === 'active')) {
            return { outcome: 'noop', mode: this.mode };
        }

        const now = this.now();
        if ((source === 'auto' || source === 'motion') && this.retryAfter !== null && now < this.retryAfter) {
            this.options.logger.debug('Automatic standby trigger suppressed after failed container operation', {
                target,
                source,
                retryInMs: this.retryAfter - now
            });
            return { outcome: 'rejected', reason: 'cooldown', mode: this.mode };
        }

        this.options.logger.info(target === 'standby' ? 'Entering standby' : 'Resuming from standby', { source });
        this.setMode(target === 'standby' ? 'entering' : 'resuming');

        const revertTo: StandbyMode = target === 'standby' ? 'active' : 'standby';
        const done = this.mutex
            .runExclusive(() => (target === 'standby' ? this.enter() : this.resume()))
            .catch((e: unknown): TransitionResult => {
                const error = this.recordFailure(e, target === 'standby' ? 'stop' : 'start', false);
                this.setMode(revertTo);
                return { success: false, mode: this.mode, error };
            })
            .finally(() => {
                this.inFlight = null;
            });
        this.inFlight = { target, done };
        return { outcome: 'started', done };
    }

    /**
     * Dispatch and wait for the outcome
     */
    async request(target: StandbyTarget, source: TriggerSource): Promise<StandbyRequestResult> {
        const result = this.dispatch(target, source);
        switch (result.outcome) {
            case 'rejected':
                return { outcome: 'rejected', success: false, mode: result.mode, reason: result.reason };
            case 'noop':
                return { outcome: 'noop', success: true, mode: result.mode };
            case 'started': {
                const t = await result.done;
                return { outcome: 'completed', ...t };
            }
            case 'coalesced': {
                const t = await result.done;
                // Only a success when the transition it joined ended where this caller wanted
                const success = t.success && t.mode === target;
                return { outcome: 'coalesced', success, mode: t.mode, ...(t.error && { error: t.error }) };
            }
        }
    }

    enableStandby(source: TriggerSource = 'manual'): Promise<StandbyRequestResult> {
        return this.request('standby', source);
    }

    disableStandby(source: TriggerSource = 'manual'): Promise<StandbyRequestResult> {
        return this.request('active', source);
    }

    /**
     * Automatic standby once idle for at least the auto timeout. Idle time counts
     * from the later of the last motion and the last completed resume.
     */
    checkAutoStandby(motion: Pick<MotionState, 'lastMotionAt'>, now: number = this.now()): DispatchResult | undefined {
        if (!this.options.enabled || this.options.autoTimeoutMs <= 0 || this.mode !== 'active') return undefined;

        const idleMs = now - Math.max(motion.lastMotionAt, this.lastActivityAt);
        if (idleMs < this.options.autoTimeoutMs) return undefined;

        this.options.logger.info('No motion for auto standby timeout', { idleMs, autoTimeoutMs: this.options.autoTimeoutMs });
        return this.dispatch('standby', 'auto');
    }

    /**
     * Motion seen while in standby resumes the inference container
     */
    onMotion(): DispatchResult | undefined {
        if (this.mode !== 'standby') return undefined;
        this.options.logger.info('Motion detected in standby');
        return this.dispatch('active', 'motion');
    }

    /**
     * Re-check the runtime after a failed operation. The fault clears once the
     * container is confirmed in the state the current mode implies; the failure
     * stays in `lastError` and the retry cooldown still applies.
     */
    async reconcileFault(): Promise<boolean> {
        if (!this.containerFault || this.inFlight) return false;

        return this.mutex.runExclusive(async () => {
            if (!this.containerFault || (this.mode !== 'active' && this.mode !== 'standby')) return false;

            const running = await this.reconcile();
            if (running === undefined || running !== (this.mode === 'active')) return false;

            this.containerFault = false;
            this.options.logger.info('Container fault resolved - runtime matches mode', { mode: this.mode, containerRunning: running });
            return true;
        });
    }

    private async enter(): Promise<TransitionResult> {
        let failure: unknown;
        try {
            await this.withDeadline(this.options.runtime.stop(), 'stop');
        } catch (e) {
            failure = e;
        }

        const running = await this.reconcile();
        if (failure === undefined && running === true) {
            failure = new ContainerOpError('stop', 'Container still running after stop');
        }

        if (failure === undefined) {
            this.resolveFault();
            this.setMode('standby');
            this.options.logger.info('Standby mode active - inference container stopped');
            return { success: true, mode: this.mode };
        }

        // Reconciliation decides where we really are
        const target: StandbyMode = running === false ? 'standby' : 'active';
        const error = this.recordFailure(failure, 'stop', running === false);
        this.setMode(target);
        return { success: false, mode: this.mode, error };
    }

    private async resume(): Promise<TransitionResult> {
        let failure: unknown;
        try {
            await this.withDeadline(this.options.runtime.start(), 'start');
        } catch (e) {
            failure = e;
        }

        if (failure === undefined) {
            const ready = await this.waitForReady();
            if (!ready) {
                failure = new ContainerOpError(
                    'resume',
                    `Inference service not ready within ${this.options.resumeMaxWaitMs}ms`
                );
            }
        }

        const running = await this.reconcile();

        if (failure === undefined) {
            this.resolveFault();
            this.lastActivityAt = this.now();
            this.setMode('active');
            this.options.logger.info('Resumed from standby - inference service ready');
            return { success: true, mode: this.mode };
        }

        // A start that errored yet left the container running counts as resumed
        const startedAnyway = failure instanceof ContainerOpError && failure.operation === 'start' && running === true;
        const error = this.recordFailure(failure, 'start', startedAnyway);
        if (startedAnyway) this.lastActivityAt = this.now();
        this.setMode(startedAnyway ? 'active' : 'standby');
        return { success: false, mode: this.mode, error };
    }

    private async waitForReady(): Promise<boolean> {
        const deadline = this.now() + this.options.resumeMaxWaitMs;
        for (;;) {
            let ready = false;
            try {
                // A probe never runs past the overall deadline
                ready = await withTimeout(
                    this.options.readiness.checkHealth(true),
                    Math.max(0, deadline - this.now()),
                    () => new ContainerOpError('resume', 'Readiness probe did not answer before the resume deadline')
                );
            } catch (e) {
                this.options.logger.debug('Readiness probe failed', { error: errorMessage(e) });
            }
            if (ready) return true;
            if (this.now() + this.options.resumePollIntervalMs > deadline) return false;
            this.options.logger.debug('Waiting for inference service', { remainingMs: deadline - this.now() });
            await this.sleep(this.options.resumePollIntervalMs);
        }
    }

    /**
     * Refresh `containerRunning` from the runtime; undefined when that fails
     */
    private async reconcile(): Promise<boolean | undefined> {
        try {
            const running = await this.withDeadline(this.options.runtime.isRunning(), 'inspect');
            this.containerRunning = running;
            return running;
        } catch (e) {
            this.options.logger.warn('Cannot determine container state', { error: errorMessage(e) });
            return undefined;
        }
    }

    private withDeadline<T>(work: Promise<T>, operation: ContainerOpError['operation']): Promise<T> {
        return withTimeout(
            work,
            this.options.opTimeoutMs,
            () => new ContainerOpError(operation, `Container ${operation} timed out after ${this.options.opTimeoutMs}ms`)
        ).catch((e: unknown) => {
            if (e instanceof ContainerOpError) throw e;
            throw new ContainerOpError(operation, errorMessage(e), { cause: e });
        });
    }

    /**
     * @param settled the runtime ended up in the requested state regardless
     */
    private recordFailure(failure: unknown, fallback: 'start' | 'stop', settled: boolean): ErrorContext {
        const now = this.now();
        const error = failure instanceof ContainerOpError ? failure : new ContainerOpError(fallback, errorMessage(failure), { cause: failure });
        this.lastError = toErrorContext(error, 'container', now);
        this.containerFault = !settled;
        this.retryAfter = now + this.options.retryCooldownMs;
        this.options.logger.error('Container operation failed', {
            operation: error.operation,
            error: error.message,
            containerRunning: this.containerRunning,
            retryInMs: this.options.retryCooldownMs
        });
        return this.lastError;
    }

    private resolveFault(): void {
        if (this.containerFault) {
            this.options.logger.info('Container fault resolved');
        }
        this.containerFault = false;
        this.retryAfter = null;
    }

    private setMode(mode: StandbyMode): void {
        const previous = this.mode;
        if (previous === mode) return;
        this.mode = mode;
        this.options.logger.debug('Standby mode changed', { from: previous, to: mode });
        for (const listener of this.listeners) {
            try {
                listener(mode, previous);
            } catch (e) {
                this.options.logger.error('Standby mode listener failed', { error: errorMessage(e) });
            }
        }
    }
}
