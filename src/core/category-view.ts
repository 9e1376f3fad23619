import {
  type CategoryEvent,
  type CategoryEventOfType,
  type CategoryEventType,
  createChildEvent,
  createElementsEvent,
  isChildEvent,
  isEventOfType,
} from "./category-events.js";
import {
  type CategoryListener,
  listenerFromHandler,
  notifyListener,
  type Unsubscribe,
} from "./category-listener.js";
import type { ReadonlyCategory } from "./category.js";
import type { ElementEquality } from "./options.js";

function toViewEvent<T>(event: CategoryEvent<T>): CategoryEvent<T> {
  const source = event.source.asReadonly();
  if (isChildEvent(event)) {
    return createChildEvent(event.type, source, event.child.asReadonly());
  }
  return createElementsEvent(event.type, source, [...event.elements]);
}

/**
 * Wraps a category so that consumers can read and observe it but not mutate it.
 * Children, and the categories named by events, are wrapped on the way out.
 *
 * A category hands out one view for its lifetime (see `Category.asReadonly`),
 * so a listener added through one reference to the view can be removed
 * through another.
 */
export class ReadonlyCategoryView<T> implements ReadonlyCategory<T> {
  /** Listener passed in by the caller → wrapper registered on the target */
  private readonly listenerWrappers = new Map<CategoryListener<T>, CategoryListener<T>>();

  constructor(private readonly target: ReadonlyCategory<T>) {}

  get elementEquality(): ElementEquality<T> {
    return this.target.elementEquality;
  }

  getName(): string {
    return this.target.getName();
  }

  getChildren(): ReadonlyCategory<T>[] {
    return this.target.getChildren().map((child) => child.asReadonly());
  }

  getChild(name: string): ReadonlyCategory<T> | undefined {
    return this.target.getChild(name)?.asReadonly();
  }

  getElements(): T[] {
    return this.target.getElements();
  }

  containsElement(element: T): boolean {
    return this.target.containsElement(element);
  }

  addCategoryListener(listener: CategoryListener<T>): void {
    let wrapper = this.listenerWrappers.get(listener);
    if (!wrapper) {
      wrapper = listenerFromHandler<T>((event) => notifyListener(listener, toViewEvent(event)));
      this.listenerWrappers.set(listener, wrapper);
    }
    this.target.addCategoryListener(wrapper);
  }

  removeCategoryListener(listener: CategoryListener<T>): void {
    const wrapper = this.listenerWrappers.get(listener);
    if (wrapper) {
      this.listenerWrappers.delete(listener);
      this.target.removeCategoryListener(wrapper);
    }
  }

  on<K extends CategoryEventType>(type: K, handler: (event: CategoryEventOfType<T, K>) => void): Unsubscribe {
    return this.target.onAll((event) => {
      const viewed = toViewEvent(event);
      if (isEventOfType(viewed, type)) {
        handler(viewed);
      }
    });
  }

  onAll(handler: (event: CategoryEvent<T>) => void): Unsubscribe {
    return this.target.onAll((event) => handler(toViewEvent(event)));
  }

  asReadonly(): ReadonlyCategory<T> {
    return this;
  }

  equals(other: ReadonlyCategory<T>): boolean {
    return this.target.equals(other);
  }

  toString(): string {
    return this.target.getName();
  }
}

/**
 * The read-only view of a category. Views are returned as they are.
 */
export function readonlyView<T>(category: ReadonlyCategory<T>): ReadonlyCategory<T> {
  return category.asReadonly();
}
