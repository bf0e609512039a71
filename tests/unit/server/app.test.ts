import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { Server } from 'node:http';
import { EventLogger } from '../../../src/event-logger.js';
import { clientErrorStatus, closeServer, createApp, startServer } from '../../../src/server/app.js';
import { ManualClock, MemoryLogStore } from '../../helpers/memory-log-store.js';

describe('createApp', () => {
  let store: MemoryLogStore;
  let eventLogger: EventLogger;
  let server: Server;
  let baseUrl: string;

  beforeEach(async () => {
    store = new MemoryLogStore();
    const clock = new ManualClock(new Date(2025, 3, 7, 12, 0, 0));
    eventLogger = new EventLogger({ store, eventTypes: ['Meal', 'Break'], clock: clock.now });
    server = await startServer(createApp(eventLogger, { projectId: 'TRBD001' }), '127.0.0.1', 0);
    const address = server.address();
    if (address === null || typeof address === 'string') {
      throw new Error('server is not listening on a TCP port');
    }
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterEach(async () => {
    if (server.listening) await closeServer(server);
  });

  const postJson = (path: string, body: string) =>
    fetch(`${baseUrl}${path}`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body,
    });

  it('toggles an event through the JSON endpoint', async () => {
    const response = await postJson('/toggle_event', JSON.stringify({ event: 'Meal', notes: '' }));
    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({ status: 'Meal has started', active_event: 'Meal' });
    expect(eventLogger.activeEvent).toBe('Meal');
  });

  it('answers malformed JSON with 400 and leaves the state alone', async () => {
    await postJson('/toggle_event', JSON.stringify({ event: 'Meal' }));

    const response = await postJson('/toggle_event', '{"event":');
    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({ status: 'Invalid request (malformed JSON)', active_event: 'Meal' });
    expect(eventLogger.activeEvent).toBe('Meal');
    expect(store.records).toHaveLength(0);
  });

  it('answers an oversized body with 413 and leaves the state alone', async () => {
    const response = await postJson('/toggle_event', JSON.stringify({ event: 'Meal', notes: 'x'.repeat(70000) }));
    expect(response.status).toBe(413);
    expect(await response.json()).toEqual({
      status: 'Invalid request (request entity too large)',
      active_event: null,
    });
    expect(eventLogger.activeEvent).toBeNull();
    expect(store.records).toHaveLength(0);
  });

  it('serves the button page', async () => {
    const response = await fetch(`${baseUrl}/`);
    expect(response.status).toBe(200);
    expect(response.headers.get('content-type')).toMatch(/^text\/html/);
    expect(await response.text()).toContain('<title>Event Logger</title>');
  });

  it('stops listening once closed', async () => {
    await closeServer(server);
    expect(server.listening).toBe(false);
  });
});

describe('clientErrorStatus', () => {
  const httpError = (fields: Record<string, unknown>) => Object.assign(new Error('rejected'), fields);

  it('returns exposed 4xx codes', () => {
    expect(clientErrorStatus(httpError({ status: 415, expose: true }))).toBe(415);
    expect(clientErrorStatus(httpError({ statusCode: 413, expose: true }))).toBe(413);
  });

  it('ignores server errors and unexposed errors', () => {
    expect(clientErrorStatus(httpError({ status: 500, expose: false }))).toBeNull();
    expect(clientErrorStatus(httpError({ status: 400 }))).toBeNull();
    expect(clientErrorStatus(new Error('plain'))).toBeNull();
    expect(clientErrorStatus('text')).toBeNull();
  });
});
