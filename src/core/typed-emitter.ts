import { EventEmitter } from "node:events";

/**
 * Type-safe event emitter built on node:events.
 * Each event carries exactly one payload object, keyed by the event map.
 *
 * ```ts
 * class Breaker extends TypedEventEmitter<BreakerEventMap> {}
 * breaker.on("state:changed", ({ from, to }) => render(from, to));
 * ```
 */
export class TypedEventEmitter<TEvents extends object> {
  private emitter = new EventEmitter();

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

  listenerCount<K extends keyof TEvents & string>(event: K): number {
    return this.emitter.listenerCount(event);
  }

  protected emit<K extends keyof TEvents & string>(event: K, payload: TEvents[K]): boolean {
    return this.emitter.emit(event, payload);
  }
}
