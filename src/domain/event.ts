import type { Channel } from './channel.js';

/**
 * A single message travelling on the host bus.
 *
 * Listeners may attach a response with `respond()`, which also marks
 * the event acknowledged. The payload never changes after `send()`.
 */
export class BusEvent<P = unknown, R = unknown> {
  readonly channel: Channel;
  readonly payload: P;
  readonly broadcast: boolean;
  private _response: R | undefined;
  private _acknowledged = false;

  constructor(channel: Channel, payload: P, broadcast = false) {
    this.channel = channel;
    this.payload = payload;
    this.broadcast = broadcast;
  }

  get response(): R | undefined {
    return this._response;
  }

  get acknowledged(): boolean {
    return this._acknowledged;
  }

  respond(response: R): void {
    this._response = response;
    this._acknowledged = true;
  }
}

/**
 * A bus event as retained in the console's event history.
 *
 * The event is held by reference: a response attached after capture
 * shows up in later reads.
 */
export interface CapturedEvent {
  readonly event: BusEvent;
  readonly recordedAt: Date;
}
