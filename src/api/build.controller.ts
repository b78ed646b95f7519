import { Request, Response } from 'express';
import { BuildEngine } from '../builder/engine';
import { ArchiveStore, ArchiveStagingError } from '../intake/archiveStore';
import { validateUpload } from '../intake/validation';
import { describeError, maskSensitiveData } from '../utils/sanitizer';
import { logger } from '../utils/logger';

export interface BuildControllerDeps {
  engine: Pick<BuildEngine, 'executeBuild'>;
  store: Pick<ArchiveStore, 'stage' | 'discard'>;
}

const sendText = (res: Response, status: number, body: string) => {
  res.status(status).type('text/plain').send(body);
};

/**
 * Blocks until the build finishes. The response body is the engine's outcome text,
 * also when the build itself failed.
 */
export const createBuildController = ({ engine, store }: BuildControllerDeps) => {
  const buildSynchronously = async (req: Request, res: Response): Promise<void> => {
    const log = req.log ?? logger;
    const fields: Record<string, unknown> = req.body ?? {};
    const rawType = fields.projectType;
    log.info({ projectType: rawType }, 'Received synchronous build request');

    const validation = validateUpload(req.file, rawType);
    if (!validation.ok) {
      sendText(res, 400, validation.message);
      return;
    }

    let stagedPath: string | null = null;
    try {
      stagedPath = await store.stage(validation.archive.buffer);
      const outcome = await engine.executeBuild(stagedPath, validation.projectType);
      log.info('Synchronous build completed');
      sendText(res, 200, outcome);
    } catch (error) {
      const message = maskSensitiveData(describeError(error));
      if (error instanceof ArchiveStagingError) {
        log.error({ error: message }, 'Failed to store or process uploaded file');
        sendText(res, 500, `Error saving/processing file: ${message}`);
      } else {
        log.error({ error: message }, 'Unexpected error during synchronous build');
        sendText(res, 500, `Unexpected build error: ${message}`);
      }
    } finally {
      if (stagedPath) {
        await store.discard(stagedPath);
      }
    }
  };

  return { buildSynchronously };
};
