/**
 * Listener capability and the registry categories keep listeners in.
 *
 * @module core/category-listener
 */

import type { ILogObj, Logger } from "tslog";
import type {
  CategoryEvent,
  ChildAddedEvent,
  ChildRemovedEvent,
  ElementsAddedEvent,
  ElementsRemovedEvent,
} from "./category-events.js";
import { formatCategoryEvent } from "./category-events.js";
import type { ListenerErrorPolicy } from "./options.js";

/**
 * Receives changes from a category and from all of its descendants.
 */
export interface CategoryListener<T> {
  elementsAdded(event: ElementsAddedEvent<T>): void;
  elementsRemoved(event: ElementsRemovedEvent<T>): void;
  childAdded(event: ChildAddedEvent<T>): void;
  childRemoved(event: ChildRemovedEvent<T>): void;
}

/** Removes the subscription it was returned for. Calling it twice is harmless. */
export type Unsubscribe = () => void;

/**
 * Invokes the callback matching the event's type.
 */
export function notifyListener<T>(listener: CategoryListener<T>, event: CategoryEvent<T>): void {
  switch (event.type) {
    case "elements_added":
      listener.elementsAdded(event);
      break;
    case "elements_removed":
      listener.elementsRemoved(event);
      break;
    case "child_added":
      listener.childAdded(event);
      break;
    case "child_removed":
      listener.childRemoved(event);
      break;
  }
}

/**
 * Adapts a closure to the four-callback listener shape.
 */
export function listenerFromHandler<T>(handler: (event: CategoryEvent<T>) => void): CategoryListener<T> {
  return {
    elementsAdded: handler,
    elementsRemoved: handler,
    childAdded: handler,
    childRemoved: handler,
  };
}

/**
 * Ordered set of listeners.
 *
 * Dispatch walks a snapshot taken when the event is delivered, so a listener
 * may add or remove listeners (itself included) while being notified: removed
 * ones still see the current event, added ones start with the next.
 */
export class ListenerRegistry<T> {
  private listeners: CategoryListener<T>[] = [];

  constructor(
    private readonly policy: ListenerErrorPolicy,
    private readonly logger: Logger<ILogObj>,
  ) {}

  /** @returns false if the listener was already registered */
  add(listener: CategoryListener<T>): boolean {
    if (this.listeners.includes(listener)) {
      return false;
    }
    this.listeners = [...this.listeners, listener];
    return true;
  }

  /** @returns false if the listener was not registered */
  remove(listener: CategoryListener<T>): boolean {
    const index = this.listeners.indexOf(listener);
    if (index === -1) {
      return false;
    }
    this.listeners = [...this.listeners.slice(0, index), ...this.listeners.slice(index + 1)];
    return true;
  }

  has(listener: CategoryListener<T>): boolean {
    return this.listeners.includes(listener);
  }

  get size(): number {
    return this.listeners.length;
  }

  dispatch(event: CategoryEvent<T>): void {
    // Copy-on-write: the array captured here never changes under us
    const snapshot = this.listeners;
    if (snapshot.length === 0) {
      return;
    }

    this.logger.silly("Dispatching category event", {
      event: formatCategoryEvent(event),
      listeners: snapshot.length,
    });

    for (const listener of snapshot) {
      if (this.policy === "propagate") {
        notifyListener(listener, event);
        continue;
      }
      try {
        notifyListener(listener, event);
      } catch (error) {
        this.logger.error("Category listener failed", {
          event: formatCategoryEvent(event),
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }
  }
}
