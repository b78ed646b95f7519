import 'dotenv/config';
import http from 'http';
import { createApp } from './app';
import { BuildEngine } from './builder/engine';
import { ArchiveStore } from './intake/archiveStore';
import { DockerCliRuntime } from './runtime/dockerRuntime';
import { limitsFromConfig } from './utils/dockerLimits';
import { loadConfig } from './utils/env';
import { prePullImages } from './utils/imagePrepull';
import { logger } from './utils/logger';

const main = async () => {
  const config = loadConfig();
  logger.level = config.logLevel;

  const runtime = new DockerCliRuntime({
    bin: config.docker.bin,
    limits: limitsFromConfig(config.docker),
  });
  const engine = new BuildEngine(runtime);
  const store = new ArchiveStore(config.tempBuildDir);
  await store.init();

  const app = createApp({ config, runtime, engine, store });
  const server = http.createServer(app);

  server.listen(config.port, config.host, () => {
    logger.info(`Server is running on http://${config.host}:${config.port}`);
    if (config.prepullImages) {
      prePullImages(runtime).catch((error: unknown) => logger.error({ error }, 'Image pre-pull aborted'));
    }
  });
};

main().catch((error: unknown) => {
  logger.fatal({ err: error }, 'Failed to start server');
  process.exit(1);
});
