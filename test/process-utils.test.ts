/**
 * Tests for child process helpers and deadlines.
 * Child processes are the current Node.js binary running a one-line script.
 */

import { describe, it, expect, beforeAll } from 'vitest';
import { runProcess, spawnProcess, withTimeout, ProcessTimeoutError, setLogger } from '../server/process-utils.js';
import { Atomic } from '../server/atomic.js';
import { createMockLogger } from './helpers/fakes.js';

const script = (code: string) => ['-e', code];

describe('runProcess', () => {
    beforeAll(() => {
        setLogger(createMockLogger());
    });

    it('should collect output and the exit code', async () => {
        const result = await runProcess({
            name: 'echo',
            cmd: process.execPath,
            args: script('process.stdout.write("true\\n"); process.stderr.write("warn"); process.exit(3)')
        });

        expect(result).toEqual({ code: 3, signal: null, stdout: 'true\n', stderr: 'warn' });
    });

    it('should kill a process that outlives its deadline', async () => {
        const started = Date.now();

        await expect(runProcess({
            name: 'sleeper',
            cmd: process.execPath,
            args: script('setTimeout(() => {}, 10000)'),
            timeoutMs: 200
        })).rejects.toThrow(ProcessTimeoutError);

        expect(Date.now() - started).toBeLessThan(5000);
    });

    it('should reject when the command cannot be spawned', async () => {
        await expect(runProcess({ name: 'missing', cmd: '/nonexistent/print-monitor-cli', args: [] }))
            .rejects.toThrow(/ENOENT/);
    });

    it('should deliver stdout as raw bytes', async () => {
        const chunks: Buffer[] = [];
        await new Promise<void>((resolve) => {
            spawnProcess({
                name: 'bytes',
                cmd: process.execPath,
                args: script('process.stdout.write(Buffer.from([0x89, 0x50, 0x4e, 0x47]))'),
                onStdout: (data) => chunks.push(data),
                onClose: () => resolve()
            });
        });

        expect(Array.from(Buffer.concat(chunks))).toEqual([0x89, 0x50, 0x4e, 0x47]);
    });
});

describe('withTimeout', () => {
    it('should pass through a result that arrives in time', async () => {
        expect(await withTimeout(Promise.resolve(5), 100, () => new Error('late'))).toBe(5);
    });

    it('should reject with the timeout error once the deadline passes', async () => {
        const never = new Promise<number>(() => undefined);
        await expect(withTimeout(never, 20, () => new Error('too slow'))).rejects.toThrow('too slow');
    });

    it('should pass through the underlying rejection', async () => {
        await expect(withTimeout(Promise.reject(new Error('failed')), 100, () => new Error('late'))).rejects.toThrow('failed');
    });
});

describe('Atomic', () => {
    it('should run exclusive sections one at a time in arrival order', async () => {
        const mutex = new Atomic(1);
        const order: string[] = [];
        let releaseFirst: () => void = () => undefined;

        const first = mutex.runExclusive(async () => {
            order.push('first:start');
            await new Promise<void>((resolve) => { releaseFirst = resolve; });
            order.push('first:end');
        });
        const second = mutex.runExclusive(async () => {
            order.push('second');
        });

        await new Promise<void>((resolve) => setImmediate(resolve));
        expect(mutex.isLocked()).toBe(true);

        releaseFirst();
        await Promise.all([first, second]);

        expect(order).toEqual(['first:start', 'first:end', 'second']);
        expect(mutex.isLocked()).toBe(false);
    });

    it('should release the lock when a section throws', async () => {
        const mutex = new Atomic(1);

        await expect(mutex.runExclusive(async () => {
            throw new Error('section failed');
        })).rejects.toThrow('section failed');

        expect(await mutex.runExclusive(async () => 'next')).toBe('next');
    });
});
