import { buildApp } from './app.js';
import { loadAppConfig } from './infrastructure/index.js';

/**
 * Bootstrap the host with the dev console attached.
 *
 * Configuration failures and dev console start-up failures (missing
 * static files) are fatal.
 */
async function main(): Promise<void> {
  const config = loadAppConfig();
  const app = await buildApp(config);

  let closing = false;
  const shutdown = (signal: string): void => {
    if (closing) return;
    closing = true;
    app.log.info({ signal }, 'Shutting down');

    app.close().then(
      () => process.exit(0),
      (err: unknown) => {
        app.log.error({ err }, 'Shutdown failed');
        process.exit(1);
      },
    );
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));

  await app.fastify.listen({
    host: config.server.host,
    port: config.server.port,
  });

  app.log.info(
    { url: config.dev_console.root_path + config.dev_console.ui_path },
    'Dev console available',
  );
}

main().catch((err: unknown) => {

  console.error(
    'Fatal: failed to start server',
    err,
  );

  process.exit(1);

});
