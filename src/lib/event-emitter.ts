/**
 * A small typed event emitter.
 *
 * Extend `EventEmitterProtected` when only the owning class should be able to
 * emit, or use `EventEmitter` when any holder of the emitter may emit.
 *
 * Listener errors never reach the emitter: synchronous throws and rejected
 * promises are handed to the `onListenerError` callback given to the
 * constructor, or written to `console.error` when there is none.
 */

import { isPromise } from './is-promise';

type EventCallback<T> = (data: T) => void | Promise<void>;

export type ListenerErrorHandler = (event: string, error: unknown) => void;

export class EventEmitterProtected<TEventMap extends object> {
  private events: Map<keyof TEventMap, Set<EventCallback<never>>>;
  private readonly onListenerError?: ListenerErrorHandler;

  constructor(onListenerError?: ListenerErrorHandler) {
    this.events = new Map();
    this.onListenerError = onListenerError;
  }

  /**
   * Subscribe to an event
   * @returns A function to unsubscribe from the event
   */
  public on<K extends keyof TEventMap>(
    event: K,
    callback: EventCallback<TEventMap[K]>,
  ): () => void {
    let callbacks = this.events.get(event);

    if (!callbacks) {
      callbacks = new Set();
      this.events.set(event, callbacks);
    }

    callbacks.add(callback);

    return () => {
      const current = this.events.get(event);
      if (current) {
        current.delete(callback);

        if (current.size === 0) {
          this.events.delete(event);
        }
      }
    };
  }

  /**
   * Subscribe to an event once - automatically unsubscribes after first emission
   */
  public once<K extends keyof TEventMap>(
    event: K,
    callback: EventCallback<TEventMap[K]>,
  ): () => void {
    const unsubscribe = this.on(event, (data: TEventMap[K]) => {
      unsubscribe();
      return callback(data);
    });

    return unsubscribe;
  }

  public hasListeners(event: keyof TEventMap): boolean {
    const callbacks = this.events.get(event);
    return callbacks !== undefined && callbacks.size > 0;
  }

  public listenerCount(event: keyof TEventMap): number {
    return this.events.get(event)?.size ?? 0;
  }

  /**
   * Remove all event listeners, or only the ones for `event`
   */
  public clear(event?: keyof TEventMap): void {
    if (event !== undefined) {
      this.events.delete(event);
    } else {
      this.events.clear();
    }
  }

  protected emit<K extends keyof TEventMap>(
    event: K,
    data: TEventMap[K],
  ): void {
    const callbacks = this.events.get(event);
    if (!callbacks) {
      return;
    }

    // Copy so once() handlers can unsubscribe while we iterate
    for (const callback of [...callbacks]) {
      this.invoke(event, callback as EventCallback<TEventMap[K]>, data);
    }
  }

  private invoke<K extends keyof TEventMap>(
    event: K,
    callback: EventCallback<TEventMap[K]>,
    data: TEventMap[K],
  ): void {
    const report = (error: unknown): void => {
      this.reportListenerError(String(event), error);
    };

    try {
      const result = callback(data);

      if (isPromise(result)) {
        result.catch(report);
      }
    } catch (error) {
      report(error);
    }
  }

  private reportListenerError(event: string, error: unknown): void {
    const description = error instanceof Error ? error.message : String(error);

    if (this.onListenerError) {
      try {
        this.onListenerError(event, error);
      } catch {
        // eslint-disable-next-line no-console
        console.error(`Error in onListenerError handler: ${description}`);
      }
    } else {
      // eslint-disable-next-line no-console
      console.error(`Error in listener for ${event}: ${description}`);
    }
  }
}

/**
 * Event emitter with a public emit method.
 */
export class EventEmitter<
  TEventMap extends object,
> extends EventEmitterProtected<TEventMap> {
  public emit<K extends keyof TEventMap>(event: K, data: TEventMap[K]): void {
    super.emit(event, data);
  }
}
