// @module: server-bootstrap
// @tags: entrypoint, lifecycle, readiness

import 'dotenv/config';
import { loadConfig } from './config.js';
import { createReadinessController } from './readiness.js';
import { createServer } from './server.js';

const bootstrap = async (): Promise<void> => {
  const config = loadConfig();
  const readiness = createReadinessController();
  const app = await createServer({ config, readiness });

  const shutdownServer = async (): Promise<void> => {
    readiness.markNotReady('stopping');
    try {
      await app.close();
    } catch (error) {
      app.log.error({ err: error }, 'Error while shutting down server');
    }
  };

  const registerSignalHandler = (signal: NodeJS.Signals): void => {
    process.on(signal, () => {
      void (async () => {
        app.log.info({ signal }, 'Received shutdown signal');
        await shutdownServer();
        process.exit(0);
      })();
    });
  };

  registerSignalHandler('SIGINT');
  registerSignalHandler('SIGTERM');

  try {
    await app.listen({ host: config.HOST, port: config.PORT });
    readiness.markReady();
    app.log.info(
      { host: config.HOST, port: config.PORT, wsPath: config.WS_PATH },
      'Relay server is listening',
    );
  } catch (error) {
    app.log.error({ err: error }, 'Failed to start server');
    readiness.markNotReady('listen failed');
    process.exit(1);
  }
};

bootstrap().catch((error: unknown) => {
  console.error('Relay server failed to boot', error);
  process.exit(1);
});
