/**
 * Listener scope: owns every event listener and timer a widget registers,
 * so one dispose() call undoes all of them.
 */

type Timer = ReturnType<typeof setTimeout>;

export interface ListenerScope {
  listen<K extends keyof HTMLElementEventMap>(
    target: HTMLElement,
    type: K,
    handler: (event: HTMLElementEventMap[K]) => void,
    options?: AddEventListenerOptions,
  ): void;
  listenWindow<K extends keyof WindowEventMap>(
    type: K,
    handler: (event: WindowEventMap[K]) => void,
  ): void;
  /** setTimeout that is cleared on dispose; the id is forgotten once it fires */
  timeout: (fn: () => void, ms: number) => Timer;
  interval: (fn: () => void, ms: number) => Timer;
  clear: (id: Timer) => void;
  readonly disposed: boolean;
  dispose: () => void;
}

export function createScope(): ListenerScope {
  const removers: Array<() => void> = [];
  const timeouts = new Set<Timer>();
  const intervals = new Set<Timer>();
  let disposed = false;

  return {
    listen(target, type, handler, options) {
      if (disposed) return;
      target.addEventListener(type, handler, options);
      removers.push(() => target.removeEventListener(type, handler, options));
    },

    listenWindow(type, handler) {
      if (disposed) return;
      window.addEventListener(type, handler);
      removers.push(() => window.removeEventListener(type, handler));
    },

    timeout(fn, ms) {
      const id = setTimeout(() => {
        timeouts.delete(id);
        fn();
      }, ms);
      timeouts.add(id);
      return id;
    },

    interval(fn, ms) {
      const id = setInterval(fn, ms);
      intervals.add(id);
      return id;
    },

    clear(id) {
      if (timeouts.delete(id)) clearTimeout(id);
      if (intervals.delete(id)) clearInterval(id);
    },

    get disposed() {
      return disposed;
    },

    dispose() {
      if (disposed) return;
      disposed = true;
      for (const remove of removers.splice(0)) remove();
      for (const id of timeouts) clearTimeout(id);
      for (const id of intervals) clearInterval(id);
      timeouts.clear();
      intervals.clear();
    },
  };
}
