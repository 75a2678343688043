import { toDisposable, type Disposable } from '../utils/disposable';

export type Listener<T> = (payload: T) => void;

type ListenerTable<TEvents> = {
  [K in keyof TEvents]?: Set<Listener<TEvents[K]>>;
};

/**
 * Synchronous, typed listener registry. Listeners run in registration order; a
 * listener that throws is reported through `onListenerError` and does not stop
 * delivery to the others.
 */
export class EventChannel<TEvents extends object> implements Disposable {
  private readonly listeners: ListenerTable<TEvents> = {};
  private readonly registries = new Set<{ clear(): void }>();
  private disposed = false;

  constructor(
    private readonly onListenerError?: (event: keyof TEvents, error: unknown) => void,
  ) {}

  on<K extends keyof TEvents>(event: K, listener: Listener<TEvents[K]>): Disposable {
    if (this.disposed) {
      return toDisposable(() => undefined);
    }

    const registered = this.listeners[event] ?? new Set<Listener<TEvents[K]>>();
    registered.add(listener);
    this.listeners[event] = registered;
    this.registries.add(registered);

    return toDisposable(() => {
      registered.delete(listener);
    });
  }

  once<K extends keyof TEvents>(event: K, listener: Listener<TEvents[K]>): Disposable {
    const subscription = this.on(event, (payload) => {
      subscription.dispose();
      listener(payload);
    });

    return subscription;
  }

  fire<K extends keyof TEvents>(event: K, payload: TEvents[K]): void {
    const registered = this.listeners[event];

    if (!registered || registered.size === 0) {
      return;
    }

    for (const listener of Array.from(registered)) {
      try {
        listener(payload);
      } catch (error) {
        this.onListenerError?.(event, error);
      }
    }
  }

  listenerCount(event: keyof TEvents): number {
    return this.listeners[event]?.size ?? 0;
  }

  dispose(): void {
    this.disposed = true;

    for (const registered of this.registries) {
      registered.clear();
    }

    this.registries.clear();
  }
}
