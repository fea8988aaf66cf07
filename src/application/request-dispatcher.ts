import type { Logger } from 'pino';
import {
  CHANNEL_SERVICE_UNREGISTER,
  CONTENT_TYPE_HTML,
  CONTENT_TYPE_JSON,
  CONTENT_TYPE_TEXT,
} from '../domain/index.js';
import type {
  BusEvent,
  HostBus,
  HttpExchange,
  RouteMatch,
} from '../domain/index.js';
import { contentTypeFor, responseOk } from './response.js';

export const INDEX_FILE = 'index.html';

/** Read and write access the handlers need; each handler reads once. */
export interface DispatchContext {
  systemInfo(): unknown;
  eventList(): unknown;
  logList(): readonly string[];
  configView(): unknown;
  applyConfig(document: unknown): unknown;
  asset(fileName: string): string | undefined;
  hasComponent(name: string): boolean;
}

/**
 * Turns a matched console route into a response, by method.
 *
 * GET reads, PATCH updates the config, DELETE deregisters a component.
 * Any other method/route pair writes nothing and is logged, which
 * leaves the request to the host's not-found handling.
 */
export class RequestDispatcher {
  constructor(
    private readonly ctx: DispatchContext,
    private readonly bus: HostBus,
    private readonly log: Logger,
  ) {}

  dispatch(event: BusEvent, request: HttpExchange, route: RouteMatch): void {
    const method = request.method.toUpperCase();
    let handled = false;

    switch (method) {
      case 'GET':
        handled = this.handleGet(event, route);
        break;
      case 'PATCH':
        handled = this.handlePatch(event, request, route);
        break;
      case 'DELETE':
        handled = this.handleDelete(event, route);
        break;
      default:
        break;
    }

    if (!handled) {
      this.log.debug({ method, route: route.kind }, 'Unsupported method for console endpoint');
    }
  }

  private handleGet(event: BusEvent, route: RouteMatch): boolean {
    switch (route.kind) {
      case 'system-info':
        event.respond(responseOk(CONTENT_TYPE_JSON, JSON.stringify(this.ctx.systemInfo())));
        return true;
      case 'events':
        event.respond(responseOk(CONTENT_TYPE_JSON, JSON.stringify(this.ctx.eventList())));
        return true;
      case 'logs':
        event.respond(responseOk(CONTENT_TYPE_JSON, JSON.stringify(this.ctx.logList())));
        return true;
      case 'config':
        event.respond(responseOk(CONTENT_TYPE_JSON, JSON.stringify(this.ctx.configView())));
        return true;
      case 'dashboard': {
        const html = this.ctx.asset(INDEX_FILE);
        if (html === undefined) return false;
        event.respond(responseOk(CONTENT_TYPE_HTML, html));
        return true;
      }
      case 'asset': {
        const content = this.ctx.asset(route.fileName);
        if (content === undefined) return false;
        event.respond(responseOk(contentTypeFor(route.fileName), content));
        return true;
      }
      case 'service':
      case 'none':
        return false;
    }
  }

  private handlePatch(event: BusEvent, request: HttpExchange, route: RouteMatch): boolean {
    if (route.kind !== 'config') return false;

    const applied = this.ctx.applyConfig(request.body);
    event.respond(responseOk(CONTENT_TYPE_JSON, JSON.stringify(applied)));
    return true;
  }

  private handleDelete(event: BusEvent, route: RouteMatch): boolean {
    if (route.kind !== 'service') return false;
    // The component may have gone between match and handle.
    if (!this.ctx.hasComponent(route.name)) return false;

    // Fire and forget: the host removes the component on its own schedule.
    this.bus.send(CHANNEL_SERVICE_UNREGISTER, { name: route.name }, { async: true });
    this.log.info({ service: route.name }, 'Deregistration requested');
    event.respond(responseOk(CONTENT_TYPE_TEXT, ''));
    return true;
  }
}
