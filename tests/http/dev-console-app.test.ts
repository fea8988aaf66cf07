import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { buildApp } from '../../src/app.js';
import type { HostApp } from '../../src/app.js';
import { StaticAssetsError } from '../../src/application/index.js';
import { CHANNEL_HEARTBEAT } from '../../src/domain/index.js';
import { loadAppConfig } from '../../src/infrastructure/config/index.js';
import type { AppConfig } from '../../src/infrastructure/config/index.js';
import { memoryDestination } from '../helpers.js';

function testConfig(): AppConfig {
  return loadAppConfig('/nonexistent/dev-console.yaml', {});
}

describe('dev console over HTTP', () => {
  let app: HostApp;

  beforeEach(async () => {
    app = await buildApp(testConfig(), { logDestination: memoryDestination() });
    await app.fastify.ready();
  });

  afterEach(async () => {
    await app.close();
  });

  it('serves the dashboard with the root path filled in', async () => {
    const res = await app.fastify.inject({ method: 'GET', url: '/dev-console/ui' });

    expect(res.statusCode).toBe(200);
    expect(res.headers['content-type']).toMatch(/^text\/html/);
    expect(res.body).toContain('<!DOCTYPE html>');
    expect(res.body).toContain('src="/dev-console/script.js"');
  });

  it('serves static files by extension', async () => {
    const script = await app.fastify.inject({ method: 'GET', url: '/dev-console/script.js' });
    const icon = await app.fastify.inject({ method: 'GET', url: '/dev-console/favicon.svg' });

    expect(script.headers['content-type']).toMatch(/^application\/javascript/);
    expect(icon.headers['content-type']).toMatch(/^text\/plain/);
  });

  it('adds the CORS headers to console responses', async () => {
    const res = await app.fastify.inject({ method: 'GET', url: '/dev-console/logs' });

    expect(res.headers['access-control-allow-origin']).toBe('*');
    expect(res.headers['access-control-allow-methods']).toBe('GET, PATCH, DELETE, OPTIONS');
    expect(res.headers['access-control-allow-headers']).toBe('Content-Type');
  });

  it('reports live components without the excluded ones', async () => {
    const res = await app.fastify.inject({ method: 'GET', url: '/dev-console/system-info' });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toMatchObject({
      serviceNames: ['HttpServer', 'Heartbeat', 'DevConsoleService'],
      services: 3,
      pid: process.pid,
    });
  });

  it('answers 404 for paths it does not own and records the request', async () => {
    const res = await app.fastify.inject({ method: 'GET', url: '/api/orders' });
    const events = await app.fastify.inject({ method: 'GET', url: '/dev-console/events' });

    expect(res.statusCode).toBe(404);
    expect(events.json()).toEqual([
      expect.objectContaining({ channel: 'http_request', isAck: false }),
    ]);
  });

  it('truncates long payloads in the events view', async () => {
    app.bus.registerChannel('orders');
    app.bus.send(CHANNEL_HEARTBEAT, {});
    app.bus.send('orders', 'x'.repeat(300));

    const res = await app.fastify.inject({ method: 'GET', url: '/dev-console/events' });
    const [latest] = res.json<Array<{ channel: string; payload: string }>>();

    expect(latest?.channel).toBe('orders');
    expect(latest?.payload).toBe('x'.repeat(256) + '…');
  });

  it('applies a PATCHed config once the broadcast is delivered', async () => {
    const patch = await app.fastify.inject({
      method: 'PATCH',
      url: '/dev-console/config',
      payload: { baseUrl: '/tests', maxLogs: 1 },
    });
    expect(patch.body).toBe('{"dev_console_max_logs":1,"dev_console_url":"/tests"}');

    await app.bus.drain();

    const config = await app.fastify.inject({ method: 'GET', url: '/dev-console/config' });
    expect(config.json()).toEqual({ baseUrl: '/tests', maxEvents: 1000, maxLogs: 1 });

    const logs = await app.fastify.inject({ method: 'GET', url: '/dev-console/logs' });
    expect(logs.json()).toHaveLength(1);

    const dashboard = await app.fastify.inject({ method: 'GET', url: '/dev-console/tests' });
    expect(dashboard.statusCode).toBe(200);
  });

  it('deregisters a component once and then no longer knows it', async () => {
    const first = await app.fastify.inject({ method: 'DELETE', url: '/dev-console/service/Heartbeat' });
    expect(first.statusCode).toBe(200);
    expect(first.body).toBe('');

    await app.bus.drain();

    const second = await app.fastify.inject({ method: 'DELETE', url: '/dev-console/service/Heartbeat' });
    expect(second.statusCode).toBe(404);
    expect(app.registry.find('Heartbeat')).toBeUndefined();
  });

  it('deregisters a component when the DELETE carries a JSON content type and no body', async () => {
    const res = await app.fastify.inject({
      method: 'DELETE',
      url: '/dev-console/service/Heartbeat',
      headers: { 'content-type': 'application/json' },
    });
    expect(res.statusCode).toBe(200);

    await app.bus.drain();

    const info = await app.fastify.inject({ method: 'GET', url: '/dev-console/system-info' });
    expect(info.json()).toMatchObject({ serviceNames: ['HttpServer', 'DevConsoleService'], services: 2 });
  });

  it('stops answering after the console deregisters itself', async () => {
    const res = await app.fastify.inject({ method: 'DELETE', url: '/dev-console/service/DevConsoleService' });
    expect(res.statusCode).toBe(200);

    await app.bus.drain();

    const info = await app.fastify.inject({ method: 'GET', url: '/dev-console/system-info' });
    expect(info.statusCode).toBe(404);
    expect(app.devConsole.running).toBe(false);
  });

  it('does not answer unsupported methods', async () => {
    const res = await app.fastify.inject({ method: 'POST', url: '/dev-console/events', payload: {} });
    expect(res.statusCode).toBe(404);
  });
});

describe('buildApp', () => {
  it('fails when the dashboard files are missing', async () => {
    const config = testConfig();
    const broken: AppConfig = {
      ...config,
      dev_console: { ...config.dev_console, static_dir: '/nonexistent/dev-console' },
    };

    await expect(buildApp(broken, { logDestination: memoryDestination() }))
      .rejects.toBeInstanceOf(StaticAssetsError);
  });
});
