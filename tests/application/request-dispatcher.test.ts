import { describe, it, expect, vi, beforeEach } from 'vitest';
import { RequestDispatcher } from '../../src/application/request-dispatcher.js';
import type { DispatchContext } from '../../src/application/request-dispatcher.js';
import { CORS_HEADERS, contentTypeFor, responseOk } from '../../src/application/response.js';
import { BusEvent, CHANNEL_HTTP_REQUEST, CHANNEL_SERVICE_UNREGISTER } from '../../src/domain/index.js';
import type { HttpExchange, HttpResponse, RouteMatch } from '../../src/domain/index.js';
import { LocalEventBus } from '../../src/infrastructure/bus/index.js';
import { fakeLogger } from '../helpers.js';

function exchange(method: string, body?: unknown): HttpExchange {
  return { method, path: '/dev-console/x', headers: {}, body };
}

describe('responseOk', () => {
  it('builds a 200 response with the CORS headers', () => {
    expect(responseOk('application/json', '[]')).toEqual({
      status: 200,
      contentType: 'application/json',
      headers: {
        'access-control-allow-origin': '*',
        'access-control-allow-methods': 'GET, PATCH, DELETE, OPTIONS',
        'access-control-allow-headers': 'Content-Type',
      },
      body: '[]',
    });
  });

  it('copies the header map per response', () => {
    expect(responseOk('text/plain', '').headers).not.toBe(CORS_HEADERS);
  });
});

describe('contentTypeFor', () => {
  it('maps known extensions', () => {
    expect(contentTypeFor('index.html')).toBe('text/html');
    expect(contentTypeFor('style.css')).toBe('text/css');
    expect(contentTypeFor('script.js')).toBe('application/javascript');
  });

  it('falls back to text/plain', () => {
    expect(contentTypeFor('favicon.svg')).toBe('text/plain');
    expect(contentTypeFor('README')).toBe('text/plain');
  });
});

describe('RequestDispatcher', () => {
  let log: ReturnType<typeof fakeLogger>;
  let bus: LocalEventBus;
  let ctx: DispatchContext;
  let dispatcher: RequestDispatcher;

  beforeEach(() => {
    log = fakeLogger();
    bus = new LocalEventBus(log);
    ctx = {
      systemInfo: () => ({ pid: 1 }),
      eventList: () => [{ channel: 'orders' }],
      logList: () => ['line'],
      configView: () => ({ baseUrl: '/ui', maxEvents: 10, maxLogs: 10 }),
      applyConfig: vi.fn(() => ({ dev_console_max_logs: 5 })),
      asset: (fileName) => (fileName === 'index.html' ? '<html></html>' : fileName === 'app.js' ? 'run()' : undefined),
      hasComponent: (name) => name === 'OrderService',
    };
    dispatcher = new RequestDispatcher(ctx, bus, log);
  });

  function run(request: HttpExchange, route: RouteMatch): HttpResponse | undefined {
    const event = new BusEvent<HttpExchange, HttpResponse>(CHANNEL_HTTP_REQUEST, request);
    dispatcher.dispatch(event, request, route);
    return event.response;
  }

  it('serves JSON endpoints on GET', () => {
    expect(run(exchange('GET'), { kind: 'system-info' })?.body).toBe('{"pid":1}');
    expect(run(exchange('GET'), { kind: 'events' })?.body).toBe('[{"channel":"orders"}]');
    expect(run(exchange('GET'), { kind: 'logs' })?.body).toBe('["line"]');
    expect(run(exchange('GET'), { kind: 'config' })?.body).toBe('{"baseUrl":"/ui","maxEvents":10,"maxLogs":10}');
    expect(run(exchange('get'), { kind: 'logs' })?.contentType).toBe('application/json');
  });

  it('serves the dashboard document as HTML', () => {
    const response = run(exchange('GET'), { kind: 'dashboard' });
    expect(response?.contentType).toBe('text/html');
    expect(response?.body).toBe('<html></html>');
  });

  it('serves assets with the type of their extension', () => {
    const response = run(exchange('GET'), { kind: 'asset', fileName: 'app.js' });
    expect(response?.contentType).toBe('application/javascript');
    expect(response?.body).toBe('run()');
  });

  it('applies a PATCH to config and returns the staged changes', () => {
    const response = run(exchange('PATCH', { maxLogs: 5 }), { kind: 'config' });

    expect(ctx.applyConfig).toHaveBeenCalledWith({ maxLogs: 5 });
    expect(response?.body).toBe('{"dev_console_max_logs":5}');
  });

  it('requests deregistration on DELETE and answers with an empty body', async () => {
    const requests: unknown[] = [];
    bus.subscribe(CHANNEL_SERVICE_UNREGISTER, (event) => requests.push(event.payload));

    const response = run(exchange('DELETE'), { kind: 'service', name: 'OrderService' });

    expect(response).toEqual(responseOk('text/plain', ''));
    expect(requests).toEqual([]);
    await bus.drain();
    expect(requests).toEqual([{ name: 'OrderService' }]);
  });

  it('does not answer a DELETE for a component that went away', () => {
    expect(run(exchange('DELETE'), { kind: 'service', name: 'GoneService' })).toBeUndefined();
  });

  it.each([
    ['POST', { kind: 'events' }],
    ['PUT', { kind: 'config' }],
    ['PATCH', { kind: 'events' }],
    ['DELETE', { kind: 'config' }],
    ['GET', { kind: 'service', name: 'OrderService' }],
  ] satisfies Array<[string, RouteMatch]>)('leaves %s on %o unanswered', (method, route) => {
    expect(run(exchange(method), route)).toBeUndefined();
    expect(log.debug).toHaveBeenCalledWith(
      { method, route: route.kind },
      'Unsupported method for console endpoint',
    );
  });
});
