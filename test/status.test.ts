import { describe, it, expect, beforeEach, vi } from 'vitest';
import { deriveStatus, StatusTracker, type StatusInputs, type StatusChange } from '../server/status.js';
import type { InferenceOutcome } from '../server/inference.js';
import { createMockLogger } from './helpers/fakes.js';

const detected = (confidence: number): InferenceOutcome => ({
    kind: 'detection',
    detection: { label: 'failure', confidence },
    detections: [{ label: 'failure', confidence }]
});

const skipped: InferenceOutcome = { kind: 'skipped', reason: 'no-motion' };

function inputs(overrides: Partial<StatusInputs> = {}): StatusInputs {
    return {
        mode: 'active',
        collaboratorError: false,
        motion: { motionSeen: true, idleDurationMs: 0 },
        idleTimeoutMs: 60000,
        inference: skipped,
        threshold: 0.7,
        previous: 'ok',
        ...overrides
    };
}

describe('deriveStatus', () => {
    it('should report standby ahead of every other input', () => {
        expect(deriveStatus(inputs({ mode: 'standby', collaboratorError: true, inference: detected(0.99) }))).toBe('standby');
    });

    it('should report error ahead of idle and verdicts', () => {
        expect(deriveStatus(inputs({ collaboratorError: true, inference: detected(0.99) }))).toBe('error');
        expect(deriveStatus(inputs({ collaboratorError: true, motion: { motionSeen: false, idleDurationMs: 0 } }))).toBe('error');
    });

    it('should stay idle until motion has been seen', () => {
        expect(deriveStatus(inputs({ motion: { motionSeen: false, idleDurationMs: 0 }, inference: detected(0.9) }))).toBe('idle');
    });

    it('should go idle once the idle timeout is reached', () => {
        expect(deriveStatus(inputs({ motion: { motionSeen: true, idleDurationMs: 59999 } }))).toBe('ok');
        expect(deriveStatus(inputs({ motion: { motionSeen: true, idleDurationMs: 60000 } }))).toBe('idle');
    });

    it('should compare the strongest confidence with the threshold inclusively', () => {
        expect(deriveStatus(inputs({ inference: detected(0.7) }))).toBe('failure');
        expect(deriveStatus(inputs({ inference: detected(0.69) }))).toBe('ok');
        expect(deriveStatus(inputs({ inference: detected(0.2), previous: 'failure' }))).toBe('ok');
    });

    it('should hold a failure while no fresh verdict is available', () => {
        expect(deriveStatus(inputs({ previous: 'failure' }))).toBe('failure');
        expect(deriveStatus(inputs({ previous: 'failure', inference: { kind: 'skipped', reason: 'error' } }))).toBe('failure');
        expect(deriveStatus(inputs({ previous: 'idle' }))).toBe('ok');
    });

    it('should derive normally while a transition is in progress', () => {
        expect(deriveStatus(inputs({ mode: 'entering' }))).toBe('ok');
        expect(deriveStatus(inputs({ mode: 'resuming', motion: { motionSeen: false, idleDurationMs: 0 } }))).toBe('idle');
    });
});

describe('StatusTracker', () => {
    let logger: ReturnType<typeof createMockLogger>;
    let tracker: StatusTracker;
    let changes: StatusChange[];

    const cycle = (overrides: Partial<StatusInputs>, now: number) => {
        const { previous: _previous, ...rest } = inputs(overrides);
        return tracker.evaluate(rest, now);
    };

    beforeEach(() => {
        logger = createMockLogger();
        tracker = new StatusTracker(logger);
        changes = [];
        tracker.onChange((c) => changes.push(c));
    });

    it('should start in starting', () => {
        expect(tracker.status).toBe('starting');
        expect(tracker.statistics).toEqual({ totalChecks: 0, failedChecks: 0 });
        expect(tracker.lastConfidence).toBeNull();
    });

    it('should count every cycle and each entry into failure', () => {
        cycle({ inference: detected(0.1) }, 1000);
        cycle({ inference: detected(0.9) }, 2000);
        cycle({ inference: detected(0.95) }, 3000);
        cycle({}, 4000);
        cycle({ inference: detected(0.1) }, 5000);
        cycle({ inference: detected(0.8) }, 6000);

        expect(tracker.statistics).toEqual({ totalChecks: 6, failedChecks: 2 });
        expect(changes.map((c) => c.to)).toEqual(['ok', 'failure', 'ok', 'failure']);
        expect(tracker.lastConfidence).toBe(0.8);
    });

    it('should attach the verdict to changes it caused', () => {
        cycle({ inference: detected(0.85) }, 1000);

        expect(changes).toEqual([{
            from: 'starting',
            to: 'failure',
            at: 1000,
            detection: { label: 'failure', confidence: 0.85 },
            detections: [{ label: 'failure', confidence: 0.85 }]
        }]);
        expect(logger.warn).toHaveBeenCalledWith('Status changed', { from: 'starting', to: 'failure', confidence: 0.85 });
    });

    it('should keep the last confidence across skipped cycles', () => {
        cycle({ inference: detected(0.4) }, 1000);
        cycle({}, 2000);
        expect(tracker.lastConfidence).toBe(0.4);
    });

    it('should re-derive on refresh without counting a check', () => {
        cycle({ inference: detected(0.1) }, 1000);

        const { previous: _p, inference: _i, ...rest } = inputs({ mode: 'standby' });
        expect(tracker.refresh(rest, 2000)).toBe('standby');

        expect(tracker.statistics.totalChecks).toBe(1);
        expect(changes[1]).toEqual({ from: 'ok', to: 'standby', at: 2000 });
        expect(logger.info).toHaveBeenCalledWith('Status changed', { from: 'ok', to: 'standby' });
    });

    it('should not notify when the status is unchanged', () => {
        cycle({ inference: detected(0.1) }, 1000);
        cycle({ inference: detected(0.2) }, 2000);
        expect(changes).toHaveLength(1);
    });

    it('should isolate listener failures and honour unsubscribe', () => {
        const other = vi.fn();
        const unsubscribe = tracker.onChange(() => {
            throw new Error('listener broke');
        });
        tracker.onChange(other);

        cycle({ inference: detected(0.1) }, 1000);
        expect(logger.error).toHaveBeenCalledWith('Status listener failed', { error: 'Error: listener broke' });
        expect(other).toHaveBeenCalledTimes(1);

        unsubscribe();
        cycle({ collaboratorError: true }, 2000);
        expect(logger.error).toHaveBeenCalledTimes(1);
        expect(other).toHaveBeenCalledTimes(2);
    });
});
