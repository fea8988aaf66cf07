import type { Logger } from 'pino';
import { z } from 'zod';
import { CHANNEL_SERVICE_UNREGISTER } from '../../domain/index.js';
import type {
  BusListener,
  Component,
  ComponentDirectory,
  HostBus,
} from '../../domain/index.js';

const unregisterRequestSchema = z.object({
  name: z.string().min(1),
});

/**
 * Live components of the host application, in registration order.
 *
 * Listens for `app_service_unregister` requests: the named component is
 * removed at once and then stopped. Stop failures are logged, never
 * thrown back at the requester.
 */
export class ComponentRegistry implements ComponentDirectory {
  private readonly components = new Map<string, Component>();
  private listener: BusListener | null = null;

  constructor(
    private readonly bus: HostBus,
    private readonly log: Logger,
  ) {}

  register(component: Component): void {
    if (this.components.has(component.name)) {
      throw new Error(`Component already registered: ${component.name}`);
    }
    this.components.set(component.name, component);
    this.log.debug({ service: component.name }, 'Component registered');
  }

  list(): readonly Component[] {
    return [...this.components.values()];
  }

  find(name: string): Component | undefined {
    return this.components.get(name);
  }

  /** Starts handling deregistration requests from the bus. */
  attach(): void {
    if (this.listener !== null) return;

    this.listener = (event) => {
      const parsed = unregisterRequestSchema.safeParse(event.payload);
      if (!parsed.success) {
        this.log.warn({ payload: event.payload }, 'Malformed deregistration request, skipping');
        return;
      }
      // Errors are handled inside deregister()
      void this.deregister(parsed.data.name);
    };
    this.bus.subscribe(CHANNEL_SERVICE_UNREGISTER, this.listener);
  }

  detach(): void {
    if (this.listener === null) return;
    this.bus.unsubscribe(CHANNEL_SERVICE_UNREGISTER, this.listener);
    this.listener = null;
  }

  /** Removes and stops `name`. Resolves false when it was not registered. */
  async deregister(name: string): Promise<boolean> {
    const component = this.components.get(name);
    if (component === undefined) {
      this.log.debug({ service: name }, 'Deregistration of unknown component ignored');
      return false;
    }

    this.components.delete(name);
    try {
      await component.stop();
      this.log.info({ service: name }, 'Component deregistered');
    } catch (err: unknown) {
      this.log.error({ err, service: name }, 'Component failed to stop');
    }
    return true;
  }

  /** Stops every component, newest first. */
  async stopAll(): Promise<void> {
    for (const name of [...this.components.keys()].reverse()) {
      await this.deregister(name);
    }
    this.detach();
  }
}
