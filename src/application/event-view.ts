import type { CapturedEvent } from '../domain/index.js';
import { renderValue, truncate } from './render.js';

export interface EventView {
  channel: string;
  isAck: boolean;
  isBroadcast: boolean;
  eventTimestamp: string;
  payload: string;
  response: string;
}

export function toEventView(captured: CapturedEvent): EventView {
  const { event, recordedAt } = captured;
  return {
    channel: event.channel,
    isAck: event.acknowledged,
    isBroadcast: event.broadcast,
    eventTimestamp: recordedAt.toISOString(),
    payload: truncate(renderValue(event.payload)),
    response: truncate(renderValue(event.response)),
  };
}
