import { describe, it, expect } from 'vitest';
import {
  formatTimestamp,
  renderValue,
  truncate,
  TRUNCATE_AT,
} from '../../src/application/render.js';
import { toEventView } from '../../src/application/event-view.js';
import { BusEvent } from '../../src/domain/index.js';

describe('renderValue', () => {
  it('renders absent values as an empty string', () => {
    expect(renderValue(undefined)).toBe('');
    expect(renderValue(null)).toBe('');
  });

  it('passes strings through unchanged', () => {
    expect(renderValue('plain text')).toBe('plain text');
  });

  it('renders objects and numbers as JSON', () => {
    expect(renderValue({ a: 1, b: [true] })).toBe('{"a":1,"b":[true]}');
    expect(renderValue(42)).toBe('42');
  });

  it('falls back to String() for values JSON cannot encode', () => {
    const cyclic: Record<string, unknown> = {};
    cyclic['self'] = cyclic;
    expect(renderValue(cyclic)).toBe('[object Object]');
    expect(renderValue(10n)).toBe('10');
  });
});

describe('truncate', () => {
  it('keeps text of exactly the limit', () => {
    const text = 'x'.repeat(TRUNCATE_AT);
    expect(truncate(text)).toBe(text);
  });

  it('cuts longer text and appends the marker', () => {
    const text = 'y'.repeat(TRUNCATE_AT + 10);
    expect(truncate(text)).toBe('y'.repeat(TRUNCATE_AT) + '…');
  });
});

describe('formatTimestamp', () => {
  it('formats local time as yyyy-MM-dd HH:mm:ss', () => {
    expect(formatTimestamp(new Date(2026, 0, 2, 3, 4, 5))).toBe('2026-01-02 03:04:05');
  });
});

describe('toEventView', () => {
  const recordedAt = new Date('2026-03-01T10:00:00.000Z');

  it('maps the event and its capture time', () => {
    const event = new BusEvent('orders', { id: 7 }, true);
    event.respond('done');

    expect(toEventView({ event, recordedAt })).toEqual({
      channel: 'orders',
      isAck: true,
      isBroadcast: true,
      eventTimestamp: '2026-03-01T10:00:00.000Z',
      payload: '{"id":7}',
      response: 'done',
    });
  });

  it('renders a missing response as an empty string', () => {
    const view = toEventView({ event: new BusEvent('orders', 'x'), recordedAt });
    expect(view.isAck).toBe(false);
    expect(view.response).toBe('');
  });

  it('reads a response attached after capture', () => {
    const event = new BusEvent('orders', 'x');
    const captured = { event, recordedAt };
    event.respond({ ok: true });
    expect(toEventView(captured).response).toBe('{"ok":true}');
  });

  it('truncates long payloads to 256 characters plus the marker', () => {
    const event = new BusEvent('bulk', 'z'.repeat(300));
    const view = toEventView({ event, recordedAt });
    expect(view.payload).toHaveLength(257);
    expect(view.payload.endsWith('…')).toBe(true);
  });
});
