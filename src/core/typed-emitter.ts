import { EventEmitter } from "node:events";

/**
 * Type-safe event emitter built on node:events.
 *
 * Listeners run synchronously in registration order; a listener that throws
 * aborts delivery and the error surfaces at the `emit` call site.
 *
 * ```ts
 * interface MyEvents {
 *   "call:failed": { name: string; error: unknown };
 * }
 * class MyClass extends TypedEventEmitter<MyEvents> {}
 * ```
 */
export class TypedEventEmitter<TEvents extends object> {
  private emitter = new EventEmitter();

  constructor() {
    // Dashboards, loggers and metrics often subscribe to the same breaker
    this.emitter.setMaxListeners(100);
  }

  on<K extends keyof TEvents & string>(event: K, listener: (payload: TEvents[K]) => void): this {
    this.emitter.on(event, listener);
    return this;
  }

  once<K extends keyof TEvents & string>(event: K, listener: (payload: TEvents[K]) => void): this {
    this.emitter.once(event, listener);
    return this;
  }

  off<K extends keyof TEvents & string>(event: K, listener: (payload: TEvents[K]) => void): this {
    this.emitter.off(event, listener);
    return this;
  }

  removeAllListeners<K extends keyof TEvents & string>(event?: K): this {
    if (event) {
      this.emitter.removeAllListeners(event);
    } else {
      this.emitter.removeAllListeners();
    }
    return this;
  }

  protected emit<K extends keyof TEvents & string>(event: K, payload: TEvents[K]): boolean {
    return this.emitter.emit(event, payload);
  }

  listenerCount<K extends keyof TEvents & string>(event: K): number {
    return this.emitter.listenerCount(event);
  }
}
