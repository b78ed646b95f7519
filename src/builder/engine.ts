import { createId } from '@paralleldrive/cuid2';
import { BuildProfile, CONTAINER_ARCHIVE_PATH, selectProfile, toInvocation } from './profiles';
import { BuildEngineError, ConfigurationError } from './errors';
import {
  formatConfigurationError,
  formatExecutionError,
  formatExecutionResult,
  formatHeader,
  statusOf,
} from './outcome';
import { ContainerRuntime, ExecutionResult } from '../runtime/types';
import { describeError, maskSensitiveData } from '../utils/sanitizer';
import { logger as rootLogger, Logger } from '../utils/logger';
import { BuildMetricStatus, buildDuration, buildsInProgress, buildsTotal } from '../utils/metrics';

export interface BuildEngineOptions {
  log?: Logger;
  generateBuildId?: () => string;
}

/**
 * Builds an uploaded archive inside a fresh container and reports the result as text.
 *
 * Every call gets its own environment, torn down before the call returns.
 * Nothing thrown inside the lifecycle escapes `executeBuild`.
 */
export class BuildEngine {
  private readonly log: Logger;
  private readonly generateBuildId: () => string;

  constructor(private readonly runtime: ContainerRuntime, options: BuildEngineOptions = {}) {
    this.log = options.log ?? rootLogger.child({ component: 'build-engine' });
    this.generateBuildId = options.generateBuildId ?? createId;
  }

  async executeBuild(localArchivePath: string, projectType: string): Promise<string> {
    let profile: BuildProfile;
    try {
      profile = selectProfile(projectType);
    } catch (error) {
      if (error instanceof ConfigurationError) {
        this.log.error({ projectType }, 'Unsupported project type received');
        buildsTotal.inc({ project_type: 'unknown', status: 'rejected' });
        return formatConfigurationError(error.message);
      }
      return this.unexpected(error, localArchivePath);
    }

    return this.runBuild(profile, localArchivePath);
  }

  async runBuild(profile: BuildProfile, localArchivePath: string): Promise<string> {
    const buildId = this.generateBuildId();
    const log = this.log.child({ buildId, projectType: profile.projectType });
    const invocation = toInvocation(profile);
    const startedAt = Date.now();
    let output = formatHeader(profile.imageReference, invocation);
    let status: BuildMetricStatus = 'error';

    log.info({ archive: localArchivePath, image: profile.imageReference }, 'Starting synchronous build');
    buildsInProgress.inc({ project_type: profile.projectType });

    try {
      const result = await this.runInEnvironment(profile, localArchivePath, invocation, buildId, log);
      output += formatExecutionResult(result);
      status = statusOf(result) === 'SUCCESS' ? 'success' : 'failed';
      if (status === 'success') {
        log.info({ exitCode: result.exitCode }, 'Build succeeded');
      } else {
        log.error({ exitCode: result.exitCode }, 'Build failed');
      }
    } catch (error) {
      const message = maskSensitiveData(describeError(error));
      const stage = error instanceof BuildEngineError ? error.stage : 'unexpected';
      log.error({ stage, error: message }, 'Error during build execution');
      output += formatExecutionError(message);
    } finally {
      buildsInProgress.dec({ project_type: profile.projectType });
      buildsTotal.inc({ project_type: profile.projectType, status });
      buildDuration.observe({ project_type: profile.projectType, status }, (Date.now() - startedAt) / 1000);
    }

    log.info({ status, durationMs: Date.now() - startedAt }, 'Synchronous build finished');
    return output;
  }

  private async runInEnvironment(
    profile: BuildProfile,
    localArchivePath: string,
    invocation: readonly string[],
    buildId: string,
    log: Logger
  ): Promise<ExecutionResult> {
    const environment = this.runtime.createEnvironment(profile.imageReference, {
      'build-id': buildId,
      'project-type': profile.projectType,
    });

    try {
      await environment.start();
      log.info({ container: environment.id }, 'Environment started');

      await environment.copyFileIn(localArchivePath, CONTAINER_ARCHIVE_PATH);
      log.info({ destination: CONTAINER_ARCHIVE_PATH }, 'Copied archive into environment');

      log.info('Executing build commands');
      const result = await environment.exec(invocation);
      log.info({ exitCode: result.exitCode }, 'Build commands finished');
      return result;
    } finally {
      await environment.destroy().then(
        () => log.debug({ container: environment.id }, 'Environment torn down'),
        (error: unknown) =>
          log.warn({ container: environment.id, error: describeError(error) }, 'Environment teardown failed')
      );
    }
  }

  private unexpected(error: unknown, localArchivePath: string): string {
    const message = maskSensitiveData(describeError(error));
    this.log.error({ archive: localArchivePath, error: message }, 'Unexpected error before build start');
    return formatExecutionError(message);
  }
}
