import { spawn, SpawnOptions } from 'child_process';

export interface ProcessResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

export type ProcessRunner = (
  command: string,
  args: string[],
  options?: SpawnOptions
) => Promise<ProcessResult>;

/**
 * Run a command with an argument array (no shell) and wait for it to exit.
 *
 * Both streams are collected in full. A non-zero exit code resolves normally;
 * the promise rejects only when the process cannot be spawned at all.
 * A process killed by a signal reports exit code 128 + signal number, as a shell would.
 */
export const runProcess: ProcessRunner = (command, args, options = {}) => {
  return new Promise((resolve, reject) => {
    const child = spawn(command, args, { ...options, shell: false, stdio: ['ignore', 'pipe', 'pipe'] });

    const stdoutChunks: Buffer[] = [];
    const stderrChunks: Buffer[] = [];

    child.stdout?.on('data', (chunk: Buffer) => stdoutChunks.push(chunk));
    child.stderr?.on('data', (chunk: Buffer) => stderrChunks.push(chunk));

    child.on('error', (error) => {
      reject(error);
    });

    child.on('close', (code, signal) => {
      resolve({
        exitCode: code ?? signalExitCode(signal),
        stdout: Buffer.concat(stdoutChunks).toString('utf8'),
        stderr: Buffer.concat(stderrChunks).toString('utf8'),
      });
    });
  });
};

const SIGNAL_NUMBERS: Record<string, number> = {
  SIGHUP: 1,
  SIGINT: 2,
  SIGQUIT: 3,
  SIGKILL: 9,
  SIGSEGV: 11,
  SIGPIPE: 13,
  SIGTERM: 15,
};

const signalExitCode = (signal: NodeJS.Signals | null): number =>
  128 + (signal ? SIGNAL_NUMBERS[signal] ?? 0 : 0);

/**
 * Like runProcess, but treats a non-zero exit as a failure and resolves with stdout only.
 */
export const executeCommandSecureArgs = async (
  command: string,
  args: string[],
  run: ProcessRunner = runProcess
): Promise<string> => {
  const result = await run(command, args);
  if (result.exitCode !== 0) {
    const detail = result.stderr.trim() || result.stdout.trim() || `exit code ${result.exitCode}`;
    const label = [command, args[0]].filter(Boolean).join(' ');
    throw new Error(`${label} failed: ${detail}`);
  }
  return result.stdout;
};
