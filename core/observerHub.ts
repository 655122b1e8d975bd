/**
 * Observer Hub
 *
 * Small observer implementation used for engine notifications.
 */

export type Observer<T> = (value: T) => void;

export interface ObserverHub<T> {
  subscribe: (observer: Observer<T>) => () => void;
  notify: (value: T) => void;
}

export function createObserverHub<T>(): ObserverHub<T> {
  const observers = new Set<Observer<T>>();

  return {
    subscribe: (observer) => {
      observers.add(observer);
      return () => {
        observers.delete(observer);
      };
    },
    notify: (value) => {
      // copy so an observer may unsubscribe while being notified
      Array.from(observers).forEach((observer) => observer(value));
    },
  };
}
