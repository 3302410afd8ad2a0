type Listener<T> = (data: T) => void;

type Registration<T> = {
  callback: Listener<T>;
  once: boolean;
};

/**
 * Ordered listener lists, one per event.
 *
 * A dispatch runs over the list as it was when the dispatch began: listeners
 * added from inside a listener wait for the next dispatch, and listeners
 * removed from inside a listener still run in the current one. One-shot
 * listeners are the exception, they are dropped before anything is invoked.
 */
export class CustomEventTarget<EventMap extends object> {
  private _listeners: {
    [key in keyof EventMap]?: Array<Registration<EventMap[key]>>;
  };

  constructor() {
    this._listeners = {};
  }

  addEventListener<K extends keyof EventMap>(
    type: K,
    callback: Listener<EventMap[K]>,
    options: { once?: boolean } = {}
  ): void {
    this._register(type, callback, options.once ?? false);
  }

  //the returned function removes this registration only
  on<K extends keyof EventMap>(type: K, callback: Listener<EventMap[K]>) {
    const registration = this._register(type, callback, false);
    return () => this._unregister(type, registration);
  }

  once<K extends keyof EventMap>(type: K, callback: Listener<EventMap[K]>) {
    const registration = this._register(type, callback, true);
    return () => this._unregister(type, registration);
  }

  private _register<K extends keyof EventMap>(
    type: K,
    callback: Listener<EventMap[K]>,
    once: boolean
  ): Registration<EventMap[K]> {
    const registration = { callback, once };
    this._listeners[type] = [...(this._listeners[type] ?? []), registration];
    return registration;
  }

  private _unregister<K extends keyof EventMap>(
    type: K,
    registration: Registration<EventMap[K]>
  ) {
    const registrations = this._listeners[type];
    if (registrations) {
      this._listeners[type] = registrations.filter(
        (entry) => entry !== registration
      );
    }
  }

  //drops every registration of callback

  removeEventListener<K extends keyof EventMap>(
    type: K,
    callback: Listener<EventMap[K]>
  ): void {
    const registrations = this._listeners[type];
    if (registrations) {
      this._listeners[type] = registrations.filter(
        (registration) => registration.callback !== callback
      );
    }
  }

  listenerCount<K extends keyof EventMap>(type: K): number {
    return this._listeners[type]?.length ?? 0;
  }

  dispatchEvent<K extends keyof EventMap>(type: K, detail: EventMap[K]): void {
    const registrations = this._listeners[type];
    if (!registrations || registrations.length === 0) return;

    //one-shot listeners are dropped before they run, so a re-entrant dispatch can't call them twice
    this._listeners[type] = registrations.filter(
      (registration) => !registration.once
    );

    for (const registration of registrations) {
      registration.callback(detail);
    }
  }
}
