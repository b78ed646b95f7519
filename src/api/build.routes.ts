import { Router } from 'express';
import multer from 'multer';
import { createBuildController, BuildControllerDeps } from './build.controller';
import { createBuildRateLimit } from '../middleware/rateLimit';

export interface BuildRouterOptions {
  maxUploadBytes: number;
  buildsPerHour: number;
}

export const createBuildRouter = (deps: BuildControllerDeps, { maxUploadBytes, buildsPerHour }: BuildRouterOptions): Router => {
  const router = Router();
  const { buildSynchronously } = createBuildController(deps);
  const buildRateLimit = createBuildRateLimit({ buildsPerHour });

  const archiveUpload = multer({
    storage: multer.memoryStorage(),
    limits: {
      fileSize: maxUploadBytes,
      files: 1,
    },
  });

  /**
   * @openapi
   * /simple/build-sync:
   *   post:
   *     summary: Upload a zip archive and build it synchronously
   *     description: Blocks until the build finishes. The response is the build log as plain text.
   *     tags: [Build]
   *     requestBody:
   *       required: true
   *       content:
   *         multipart/form-data:
   *           schema:
   *             type: object
   *             properties:
   *               file:
   *                 type: string
   *                 format: binary
   *               projectType:
   *                 type: string
   *                 enum: [MAVEN, NPM, PIP]
   *     responses:
   *       200:
   *         description: Build log and status
   *       400:
   *         description: Invalid upload or project type
   *       413:
   *         description: Archive exceeds the upload limit
   *       429:
   *         description: Too many builds from this address in the last hour
   */
  router.post('/simple/build-sync', buildRateLimit, archiveUpload.single('file'), buildSynchronously);

  return router;
};
