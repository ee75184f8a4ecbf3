/**
 * Container runtime adapter for the inference container, driven through the docker CLI
 */

import { runProcess, type RunProcessResult } from './process-utils.js';
import { ContainerOpError, errorMessage } from './errors.js';

export interface ContainerRuntime {
    start(): Promise<void>;
    stop(): Promise<void>;
    isRunning(): Promise<boolean>;
}

export interface DockerCliOptions {
    /** docker binary */
    bin: string;
    /** Arguments placed before the docker sub-command */
    baseArgs?: string[];
    container: string;
    /** Deadline for each CLI call */
    timeoutMs: number;
    /** Grace docker gives the container before SIGKILL on stop */
    stopTimeoutSeconds?: number;
    run?: typeof runProcess;
}

export class DockerCli implements ContainerRuntime {
    private readonly run: typeof runProcess;

    constructor(private readonly options: DockerCliOptions) {
        this.run = options.run ?? runProcess;
    }

    async start(): Promise<void> {
        await this.exec('start', ['start', this.options.container]);
    }

    async stop(): Promise<void> {
        const grace = this.options.stopTimeoutSeconds ?? 10;
        await this.exec('stop', ['stop', '-t', String(grace), this.options.container]);
    }

    async isRunning(): Promise<boolean> {
        const result = await this.exec('inspect', ['inspect', '-f', '{{.State.Running}}', this.options.container]);
        return result.stdout.trim() === 'true';
    }

    private async exec(operation: 'start' | 'stop' | 'inspect', args: string[]): Promise<RunProcessResult> {
        let result: RunProcessResult;
        try {
            result = await this.run({
                name: `docker-${operation}`,
                cmd: this.options.bin,
                args: [...(this.options.baseArgs ?? []), ...args],
                timeoutMs: this.options.timeoutMs
            });
        } catch (e) {
            throw new ContainerOpError(operation, `docker ${operation} ${this.options.container}: ${errorMessage(e)}`, { cause: e });
        }

        if (result.code !== 0) {
            const detail = result.stderr.trim() || `exit code ${result.code}`;
            throw new ContainerOpError(operation, `docker ${operation} ${this.options.container} failed: ${detail}`);
        }
        return result;
    }
}
