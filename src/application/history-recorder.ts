import {
  CHANNEL_HEARTBEAT,
  CHANNEL_HTTP_REQUEST,
  CHANNEL_LOGGING,
  NO_MATCH,
  isHttpExchange,
} from '../domain/index.js';
import type {
  BusEvent,
  CapturedEvent,
  HttpExchange,
  LogFormatter,
  RouteMatch,
} from '../domain/index.js';
import { BoundedHistory } from './history.js';
import { renderValue } from './render.js';

/** Console routing as the recorder needs it: match first, then handle. */
export interface RequestRouter {
  match(request: HttpExchange): RouteMatch;
  dispatch(event: BusEvent, request: HttpExchange, route: RouteMatch): void;
}

export interface HistoryLimits {
  readonly maxEvents: number;
  readonly maxLogs: number;
}

export interface RecorderStats {
  totalEvents: number;
  lastEventsRetained: number;
  lastLogsRetained: number;
}

/**
 * Classifies every delivered bus event and keeps the two histories.
 *
 * - heartbeats are counted, never stored
 * - console HTTP requests go to the router instead of the history
 * - `logging` records become formatted lines in the log history
 * - everything else is stamped and stored in the event history
 *
 * `limits` is read on every insert so a config change takes effect on
 * the next capture.
 */
export class HistoryRecorder {
  private readonly events = new BoundedHistory<CapturedEvent>();
  private readonly logs = new BoundedHistory<string>();
  private total = 0;

  constructor(
    private readonly limits: () => HistoryLimits,
    private readonly formatLog: LogFormatter,
    private readonly router: RequestRouter,
    private readonly now: () => Date = () => new Date(),
  ) {}

  get totalEvents(): number {
    return this.total;
  }

  record(event: BusEvent): void {
    this.total += 1;

    if (event.channel === CHANNEL_HEARTBEAT) return;

    if (event.channel === CHANNEL_HTTP_REQUEST && isHttpExchange(event.payload)) {
      const route = this.router.match(event.payload);
      if (route.kind !== NO_MATCH.kind) {
        this.router.dispatch(event, event.payload, route);
        return;
      }
    }

    const { maxEvents, maxLogs } = this.limits();

    if (event.channel === CHANNEL_LOGGING) {
      this.logs.insert(this.toLogLine(event.payload), maxLogs);
      return;
    }

    this.events.insert({ event, recordedAt: this.now() }, maxEvents);
  }

  /** Shrinks both histories after the limits were lowered. */
  trimToLimits(limits: HistoryLimits): { events: number; logs: number } {
    return {
      events: this.events.trimTo(limits.maxEvents),
      logs: this.logs.trimTo(limits.maxLogs),
    };
  }

  eventSnapshot(): CapturedEvent[] {
    return this.events.snapshot();
  }

  logSnapshot(): string[] {
    return this.logs.snapshot();
  }

  stats(): RecorderStats {
    return {
      totalEvents: this.total,
      lastEventsRetained: this.events.size,
      lastLogsRetained: this.logs.size,
    };
  }

  /** Empties both histories; the event counter keeps its value. */
  clear(): void {
    this.events.clear();
    this.logs.clear();
  }

  private toLogLine(record: unknown): string {
    try {
      return this.formatLog(record);
    } catch {
      // Unformattable records are kept verbatim rather than dropped.
      return renderValue(record);
    }
  }
}
