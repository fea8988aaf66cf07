import Fastify from 'fastify';
import type { FastifyBaseLogger, FastifyInstance } from 'fastify';
import type { DestinationStream, Logger } from 'pino';

import { DevConsoleService } from './application/index.js';
import {
  BusLogStream,
  ComponentRegistry,
  LocalEventBus,
  NodeRuntimeMetrics,
  createLogger,
  formatLogRecord,
  startConfigRelay,
  startHeartbeat,
  staticFileLoader,
} from './infrastructure/index.js';
import type { AppConfig } from './infrastructure/index.js';
import { busBridge } from './interfaces/http/index.js';

export interface HostApp {
  fastify: FastifyInstance;
  bus: LocalEventBus;
  registry: ComponentRegistry;
  devConsole: DevConsoleService;
  log: Logger;
  /** Stops every registered component, the HTTP server included. */
  close(): Promise<void>;
}

export interface BuildAppOptions {
  /** Where JSON log lines go besides the bus; stdout by default. */
  logDestination?: DestinationStream;
}

/**
 * Assembles the host and the dev console.
 *
 * Order:
 * 1) Logger and bus (the bus log stream connects once the bus exists)
 * 2) Component registry, listening for deregistration requests
 * 3) Fastify with the bus bridge
 * 4) Heartbeat
 * 5) Dev console start (static files load here; failure is fatal)
 * 6) Optional Redis config relay (a failure stops everything started so far)
 *
 * Does not listen; the caller decides between `listen()` and `inject()`.
 */
export async function buildApp(config: AppConfig, options: BuildAppOptions = {}): Promise<HostApp> {
  const busLog = new BusLogStream();
  const log = createLogger(config.server.log_level, [busLog], options.logDestination);

  const bus = new LocalEventBus(log.child({ component: 'EventBus' }));
  busLog.connect(bus);

  const registry = new ComponentRegistry(bus, log.child({ component: 'ComponentRegistry' }));
  registry.attach();
  registry.register({ name: 'LogService', stop: () => busLog.disconnect() });

  const httpLog: FastifyBaseLogger = log.child({ component: 'HttpServer' });
  const fastify = Fastify({ loggerInstance: httpLog });
  await fastify.register(busBridge, { bus });
  registry.register({ name: 'HttpServer', stop: () => fastify.close() });

  const stopHeartbeat = startHeartbeat(bus, config.dev_console.heartbeat_ms);
  registry.register({ name: 'Heartbeat', stop: stopHeartbeat });

  const devConsole = new DevConsoleService({
    bus,
    components: registry,
    runtime: new NodeRuntimeMetrics(),
    loadStaticFiles: staticFileLoader(config.dev_console.static_dir),
    formatLog: formatLogRecord,
    log,
    config: {
      rootPath: config.dev_console.root_path,
      uiPath: config.dev_console.ui_path,
      maxEvents: config.dev_console.max_events,
      maxLogs: config.dev_console.max_logs,
    },
    excludedComponents: config.dev_console.excluded_components,
  });

  try {
    await devConsole.start();
  } catch (err: unknown) {
    stopHeartbeat();
    await fastify.close();
    throw err;
  }
  registry.register(devConsole);

  if (config.redis.url !== '') {
    let stopRelay: () => Promise<void>;
    try {
      stopRelay = await startConfigRelay(
        config.redis.url,
        bus,
        log.child({ component: 'ConfigRelay' }),
        config.redis.channel,
      );
    } catch (err: unknown) {
      await registry.stopAll();
      throw err;
    }
    registry.register({ name: 'ConfigRelay', stop: stopRelay });
  }

  return {
    fastify,
    bus,
    registry,
    devConsole,
    log,
    close: () => registry.stopAll(),
  };
}
