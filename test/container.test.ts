import { describe, it, expect, beforeEach, vi, type Mock } from 'vitest';
import { DockerCli } from '../server/container.js';
import { ContainerOpError } from '../server/errors.js';
import { ProcessTimeoutError, type runProcess } from '../server/process-utils.js';

describe('DockerCli', () => {
    let run: Mock<typeof runProcess>;
    let docker: DockerCli;

    beforeEach(() => {
        run = vi.fn<typeof runProcess>().mockResolvedValue({ code: 0, signal: null, stdout: '', stderr: '' });
        docker = new DockerCli({ bin: 'docker', container: 'ml_api', timeoutMs: 30000, run });
    });

    it('should start and stop the named container', async () => {
        await docker.start();
        await docker.stop();

        expect(run).toHaveBeenNthCalledWith(1, { name: 'docker-start', cmd: 'docker', args: ['start', 'ml_api'], timeoutMs: 30000 });
        expect(run).toHaveBeenNthCalledWith(2, { name: 'docker-stop', cmd: 'docker', args: ['stop', '-t', '10', 'ml_api'], timeoutMs: 30000 });
    });

    it('should place base arguments before the sub-command', async () => {
        docker = new DockerCli({ bin: 'docker', baseArgs: ['-H', 'unix:///run/docker.sock'], container: 'ml_api', timeoutMs: 1000, stopTimeoutSeconds: 3, run });
        await docker.stop();

        expect(run.mock.calls[0][0].args).toEqual(['-H', 'unix:///run/docker.sock', 'stop', '-t', '3', 'ml_api']);
    });

    it('should read the running flag from inspect', async () => {
        run.mockResolvedValueOnce({ code: 0, signal: null, stdout: 'true\n', stderr: '' });
        expect(await docker.isRunning()).toBe(true);

        run.mockResolvedValueOnce({ code: 0, signal: null, stdout: 'false\n', stderr: '' });
        expect(await docker.isRunning()).toBe(false);

        expect(run.mock.calls[0][0].args).toEqual(['inspect', '-f', '{{.State.Running}}', 'ml_api']);
    });

    it('should report a non-zero exit with the CLI error output', async () => {
        run.mockResolvedValueOnce({ code: 1, signal: null, stdout: '', stderr: 'Error response from daemon: No such container: ml_api\n' });

        const error = await docker.start().catch((e: unknown) => e);

        expect(error).toBeInstanceOf(ContainerOpError);
        expect(error).toHaveProperty('operation', 'start');
        expect(error).toHaveProperty('message', 'docker start ml_api failed: Error response from daemon: No such container: ml_api');
    });

    it('should report the exit code when the CLI prints nothing', async () => {
        run.mockResolvedValueOnce({ code: 125, signal: null, stdout: '', stderr: '' });
        await expect(docker.stop()).rejects.toThrow('docker stop ml_api failed: exit code 125');
    });

    it('should wrap a timed out or unspawnable CLI call', async () => {
        run.mockRejectedValueOnce(new ProcessTimeoutError('docker-inspect', 30000));

        const error = await docker.isRunning().catch((e: unknown) => e);

        expect(error).toBeInstanceOf(ContainerOpError);
        expect(error).toHaveProperty('operation', 'inspect');
        expect(error).toHaveProperty('message', 'docker inspect ml_api: docker-inspect did not complete within 30000ms');
    });
});
