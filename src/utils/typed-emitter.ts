import { EventEmitter } from "node:events";

// eslint-disable-next-line @typescript-eslint/no-explicit-any
type Fn = (...args: any[]) => void;

export type ListenerErrorHandler = (event: string, err: unknown) => void;

/**
 * EventEmitter with typed events. A listener that throws never reaches the
 * emitting call site: the error goes to `onListenerError` instead.
 */
export class TypedEventEmitter<
  T extends { [K in keyof T]: Fn },
> {
  private readonly emitter = new EventEmitter();

  constructor(private readonly onListenerError?: ListenerErrorHandler) {}

  on<K extends string & keyof T>(event: K, listener: T[K]): this {
    this.emitter.on(event, listener as Fn);
    return this;
  }

  off<K extends string & keyof T>(event: K, listener: T[K]): this {
    this.emitter.off(event, listener as Fn);
    return this;
  }

  emit<K extends string & keyof T>(
    event: K,
    ...args: Parameters<T[K]>
  ): boolean {
    const listeners = this.emitter.listeners(event) as Fn[];
    for (const listener of listeners) {
      try {
        listener(...args);
      } catch (err) {
        this.onListenerError?.(event, err);
      }
    }
    return listeners.length > 0;
  }
}
