export interface ExecutionResult {
  readonly exitCode: number;
  readonly stdout: string;
  readonly stderr: string;
}

/**
 * One isolated, short-lived build environment.
 *
 * Obtaining a handle has no side effects; `start` is what provisions it.
 * `destroy` must be safe whether or not `start` ran or succeeded.
 */
export interface Environment {
  readonly id: string;
  readonly image: string;
  start(): Promise<void>;
  copyFileIn(hostPath: string, containerPath: string): Promise<void>;
  exec(argv: readonly string[]): Promise<ExecutionResult>;
  destroy(): Promise<void>;
}

export interface ContainerRuntime {
  createEnvironment(image: string, labels: Record<string, string>): Environment;
  ping(): Promise<void>;
  pullImage(image: string): Promise<void>;
}
