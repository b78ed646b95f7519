import { createId } from '@paralleldrive/cuid2';
import { ProcessResult, ProcessRunner, executeCommandSecureArgs, runProcess } from '../executor/executor';
import { ContainerRuntime, Environment, ExecutionResult } from './types';
import { ExecutionError, ProvisioningError, TransferError } from '../builder/errors';
import { EnvironmentLimits, DEFAULT_LIMITS, toDockerRunArgs, toLabelArgs } from '../utils/dockerLimits';
import { WORK_DIR } from '../builder/profiles';
import { describeError, maskSensitiveData } from '../utils/sanitizer';
import { logger, Logger } from '../utils/logger';

export interface DockerRuntimeOptions {
  bin?: string;
  limits?: EnvironmentLimits;
  run?: ProcessRunner;
  log?: Logger;
}

const NO_SUCH_CONTAINER = /no such container/i;

// stderr the docker CLI itself writes when the daemon refuses or cannot run the exec
const DAEMON_ERROR = /^(Error response from daemon:|Cannot connect to the Docker daemon)/;

export const isDaemonError = (result: ProcessResult): boolean =>
  result.exitCode !== 0 && result.stdout === '' && DAEMON_ERROR.test(result.stderr.trimStart());

class DockerEnvironment implements Environment {
  readonly id: string;
  private started = false;

  constructor(
    readonly image: string,
    private readonly labels: Record<string, string>,
    private readonly bin: string,
    private readonly limits: EnvironmentLimits,
    private readonly run: ProcessRunner,
    private readonly log: Logger
  ) {
    this.id = `build-env-${createId()}`;
  }

  async start(): Promise<void> {
    // --workdir makes docker create /app, so the later `docker cp` has a parent directory
    const args = [
      'run',
      '-d',
      '--rm',
      '--name', this.id,
      '--workdir', WORK_DIR,
      ...toLabelArgs(this.labels),
      ...toDockerRunArgs(this.limits),
      this.image,
      'sleep', 'infinity',
    ];
    try {
      await executeCommandSecureArgs(this.bin, args, this.run);
    } catch (error) {
      throw new ProvisioningError(`Failed to start environment from ${this.image}: ${describeError(error)}`, { cause: error });
    }
    this.started = true;
    this.log.debug({ container: this.id }, 'Environment started');
  }

  async copyFileIn(hostPath: string, containerPath: string): Promise<void> {
    try {
      await executeCommandSecureArgs(this.bin, ['cp', hostPath, `${this.id}:${containerPath}`], this.run);
    } catch (error) {
      throw new TransferError(`Failed to copy archive into environment: ${describeError(error)}`, { cause: error });
    }
  }

  async exec(argv: readonly string[]): Promise<ExecutionResult> {
    let result: ProcessResult;
    try {
      result = await this.run(this.bin, ['exec', this.id, ...argv]);
    } catch (error) {
      throw new ExecutionError(`Failed to run build commands: ${describeError(error)}`, { cause: error });
    }
    if (isDaemonError(result)) {
      throw new ExecutionError(`Failed to run build commands: ${result.stderr.trim()}`);
    }
    return { exitCode: result.exitCode, stdout: result.stdout, stderr: result.stderr };
  }

  async destroy(): Promise<void> {
    const result = await this.run(this.bin, ['rm', '-f', '-v', this.id]).catch((error: unknown) => ({
      exitCode: -1,
      stdout: '',
      stderr: describeError(error),
    }));

    if (result.exitCode === 0 || NO_SUCH_CONTAINER.test(result.stderr)) {
      this.log.debug({ container: this.id, started: this.started }, 'Environment removed');
      return;
    }
    // Teardown never changes the build outcome; a leaked container is labelled for manual cleanup
    this.log.warn(
      { container: this.id, exitCode: result.exitCode, error: maskSensitiveData(result.stderr.trim()) },
      'Failed to remove environment'
    );
  }
}

export class DockerCliRuntime implements ContainerRuntime {
  private readonly bin: string;
  private readonly limits: EnvironmentLimits;
  private readonly run: ProcessRunner;
  private readonly log: Logger;

  constructor(options: DockerRuntimeOptions = {}) {
    this.bin = options.bin ?? 'docker';
    this.limits = options.limits ?? DEFAULT_LIMITS;
    this.run = options.run ?? runProcess;
    this.log = options.log ?? logger.child({ component: 'docker-runtime' });
  }

  createEnvironment(image: string, labels: Record<string, string>): Environment {
    return new DockerEnvironment(image, labels, this.bin, this.limits, this.run, this.log);
  }

  async ping(): Promise<void> {
    await executeCommandSecureArgs(this.bin, ['info', '--format', '{{.ServerVersion}}'], this.run);
  }

  async pullImage(image: string): Promise<void> {
    await executeCommandSecureArgs(this.bin, ['pull', image], this.run);
  }
}
