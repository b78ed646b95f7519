import { ExecutionResult } from '../runtime/types';

export type BuildStatus = 'SUCCESS' | 'FAILED';

export const statusOf = (result: ExecutionResult): BuildStatus =>
  result.exitCode === 0 ? 'SUCCESS' : 'FAILED';

export const formatConfigurationError = (message: string): string => `Error: ${message}`;

export const formatHeader = (imageReference: string, invocation: readonly string[]): string =>
  `Using build image: ${imageReference}\n` +
  'Attempting to run commands:\n' +
  `${invocation.join(' ')}\n\n`;

export const formatExecutionResult = (result: ExecutionResult): string =>
  '--- BUILD LOGS ---\n' +
  `Exit Code: ${result.exitCode}\n\n` +
  `--- STDOUT ---\n${result.stdout}\n\n` +
  `--- STDERR ---\n${result.stderr}\n` +
  `\n--- BUILD STATUS: ${statusOf(result)} ---`;

export const formatExecutionError = (message: string): string => `\nExecution Error: ${message}`;
