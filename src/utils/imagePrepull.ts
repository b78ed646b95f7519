import { ContainerRuntime } from '../runtime/types';
import { allProfiles } from '../builder/profiles';
import { describeError } from './sanitizer';
import { logger } from './logger';

/**
 * Pull every build profile's image so the first build of each type skips the download.
 * Failures are logged and skipped.
 */
export const prePullImages = async (runtime: Pick<ContainerRuntime, 'pullImage'>): Promise<string[]> => {
  logger.info('Starting build image pre-pull...');
  const pulled: string[] = [];

  for (const { imageReference } of allProfiles()) {
    try {
      await runtime.pullImage(imageReference);
      pulled.push(imageReference);
      logger.info({ image: imageReference }, 'Pre-pulled build image');
    } catch (error) {
      logger.warn({ image: imageReference, error: describeError(error) }, 'Failed to pre-pull image');
    }
  }

  logger.info({ pulled: pulled.length }, 'Build image pre-pull complete');
  return pulled;
};
