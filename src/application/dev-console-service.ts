import type { Logger } from 'pino';
import {
  CHANNEL_CONFIG_CHANGE,
  CHANNEL_HEARTBEAT,
  DEFAULT_CONSOLE_CONFIG,
} from '../domain/index.js';
import type {
  BusListener,
  Component,
  ComponentDirectory,
  ConsoleConfig,
  HostBus,
  LogFormatter,
  RuntimeMetrics,
  StaticFileLoader,
} from '../domain/index.js';
import { LiveConfigController } from './config-controller.js';
import { StaticAssetsError } from './errors.js';
import { toEventView } from './event-view.js';
import { HistoryRecorder } from './history-recorder.js';
import type { RecorderStats } from './history-recorder.js';
import { INDEX_FILE, RequestDispatcher } from './request-dispatcher.js';
import { matchRoute } from './route-matcher.js';
import type { RouteContext } from './route-matcher.js';
import { ChannelSubscriptionManager } from './subscription-manager.js';
import { buildSystemInfo } from './system-info.js';

export const DEV_CONSOLE_NAME = 'DevConsoleService';

/** Placeholder in the dashboard document replaced with the root path. */
export const ROOT_PATH_PLACEHOLDER = '{{ROOT_PATH}}';

/** Host components the console never lists or deregisters. */
export const DEFAULT_EXCLUDED_COMPONENTS: readonly string[] = ['LogService'];

export interface DevConsoleOptions {
  bus: HostBus;
  components: ComponentDirectory;
  runtime: RuntimeMetrics;
  loadStaticFiles: StaticFileLoader;
  formatLog: LogFormatter;
  log: Logger;
  config?: Partial<ConsoleConfig>;
  excludedComponents?: readonly string[];
  now?: () => Date;
}

/**
 * The dev console as one host component.
 *
 * All console state (histories, counters, subscriptions, live config)
 * lives on this instance: `start()` wires it to the bus and `stop()`
 * detaches and clears it. The total-event counter survives `stop()`.
 */
export class DevConsoleService implements Component {
  readonly name = DEV_CONSOLE_NAME;

  private readonly bus: HostBus;
  private readonly components: ComponentDirectory;
  private readonly runtime: RuntimeMetrics;
  private readonly loadStaticFiles: StaticFileLoader;
  private readonly log: Logger;
  private readonly excluded: ReadonlySet<string>;
  private readonly now: () => Date;

  private readonly controller: LiveConfigController;
  private readonly recorder: HistoryRecorder;
  private readonly dispatcher: RequestDispatcher;
  private readonly subscriptions: ChannelSubscriptionManager;

  private assets: ReadonlyMap<string, string> = new Map();
  private heartbeatListener: BusListener | null = null;
  private configListener: BusListener | null = null;

  constructor(options: DevConsoleOptions) {
    this.bus = options.bus;
    this.components = options.components;
    this.runtime = options.runtime;
    this.loadStaticFiles = options.loadStaticFiles;
    this.log = options.log.child({ component: DEV_CONSOLE_NAME });
    this.excluded = new Set(options.excludedComponents ?? DEFAULT_EXCLUDED_COMPONENTS);
    this.now = options.now ?? (() => new Date());

    this.controller = new LiveConfigController(
      { ...DEFAULT_CONSOLE_CONFIG, ...options.config },
      this.bus,
      (config) => this.onConfigApplied(config),
      this.log,
    );

    this.dispatcher = new RequestDispatcher(
      {
        systemInfo: () => this.systemInfo(),
        eventList: () => this.recorder.eventSnapshot().map(toEventView),
        logList: () => this.recorder.logSnapshot(),
        configView: () => this.controller.view(),
        applyConfig: (document) => this.controller.applyUpdate(document),
        asset: (fileName) => this.asset(fileName),
        hasComponent: (name) => this.hasComponent(name),
      },
      this.bus,
      this.log,
    );

    this.recorder = new HistoryRecorder(
      () => this.controller.current(),
      options.formatLog,
      {
        match: (request) => matchRoute(request, this.routeContext()),
        dispatch: (event, request, route) => this.dispatcher.dispatch(event, request, route),
      },
      this.now,
    );

    this.subscriptions = new ChannelSubscriptionManager(
      this.bus,
      (event) => this.recorder.record(event),
      this.log,
    );
  }

  get config(): ConsoleConfig {
    return this.controller.current();
  }

  get running(): boolean {
    return this.heartbeatListener !== null;
  }

  get subscribedChannels(): number {
    return this.subscriptions.size;
  }

  stats(): RecorderStats {
    return this.recorder.stats();
  }

  /**
   * Loads the dashboard files, then attaches to the bus. A failure to
   * read the files rejects with `StaticAssetsError` and leaves the
   * console detached.
   */
  async start(): Promise<void> {
    if (this.running) return;

    try {
      this.assets = await this.loadStaticFiles();
    } catch (err: unknown) {
      throw new StaticAssetsError('Failed to load dev console static files', { cause: err });
    }

    this.heartbeatListener = this.bus.subscribe(CHANNEL_HEARTBEAT, () => {
      this.subscriptions.scan();
    });
    this.configListener = this.bus.subscribe(CHANNEL_CONFIG_CHANGE, (event) => {
      this.controller.configure(event.payload);
    });
    this.subscriptions.scan();

    const { rootPath, uiPath } = this.controller.current();
    this.log.info(
      { url: rootPath + uiPath, assets: [...this.assets.keys()] },
      'Dev console started',
    );
  }

  stop(): void {
    if (this.heartbeatListener !== null) {
      this.bus.unsubscribe(CHANNEL_HEARTBEAT, this.heartbeatListener);
      this.heartbeatListener = null;
    }
    if (this.configListener !== null) {
      this.bus.unsubscribe(CHANNEL_CONFIG_CHANGE, this.configListener);
      this.configListener = null;
    }
    this.subscriptions.detachAll();
    this.recorder.clear();
    this.log.info('Dev console stopped');
  }

  private onConfigApplied(config: ConsoleConfig): void {
    const trimmed = this.recorder.trimToLimits(config);
    this.log.info(
      { uiPath: config.uiPath, maxEvents: config.maxEvents, maxLogs: config.maxLogs, trimmed },
      'Dev console config applied',
    );
  }

  private asset(fileName: string): string | undefined {
    const content = this.assets.get(fileName);
    if (content === undefined || fileName !== INDEX_FILE) return content;
    return content.replaceAll(ROOT_PATH_PLACEHOLDER, this.controller.current().rootPath);
  }

  private visibleComponents(): Component[] {
    return this.components.list().filter((c) => !this.excluded.has(c.name));
  }

  private hasComponent(name: string): boolean {
    return this.visibleComponents().some((c) => c.name === name);
  }

  private routeContext(): RouteContext {
    const { rootPath, uiPath } = this.controller.current();
    return {
      rootPath,
      uiPath,
      hasComponent: (name) => this.hasComponent(name),
      hasAsset: (fileName) => this.assets.has(fileName),
    };
  }

  private systemInfo() {
    return buildSystemInfo(
      this.runtime.snapshot(),
      this.visibleComponents().map((c) => c.name),
      this.bus.listenerCount(),
      this.recorder.stats(),
      this.now(),
    );
  }
}
