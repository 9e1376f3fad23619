/**
 * The observable category node.
 *
 * A category holds a name, an ordered set of elements and named child
 * categories. Listeners registered on a category receive every change in
 * the subtree below it: each category registers one forwarding listener on
 * each of its children, and that listener re-dispatches child events to
 * the parent's own listeners. Chained up the tree, an event reaches every
 * ancestor unchanged.
 *
 * @module core/category
 */

import type { ILogObj, Logger } from "tslog";
import {
  type CategoryEvent,
  type CategoryEventOfType,
  type CategoryEventType,
  createChildEvent,
  createElementsEvent,
  isEventOfType,
} from "./category-events.js";
import {
  type CategoryListener,
  ListenerRegistry,
  listenerFromHandler,
  type Unsubscribe,
} from "./category-listener.js";
import { ReadonlyCategoryView } from "./category-view.js";
import {
  type CategoryOptions,
  type ElementEquality,
  type ResolvedCategoryOptions,
  resolveCategoryOptions,
  sameValueZero,
} from "./options.js";
import { assertCategoryName } from "./validation.js";

/**
 * Read access to a category, plus observation.
 *
 * {@link Category} implements this with mutable children; its
 * {@link Category.asReadonly} view exposes nothing else.
 */
export interface ReadonlyCategory<T> {
  getName(): string;
  /** Snapshot of the direct children, in insertion order */
  getChildren(): ReadonlyCategory<T>[];
  getChild(name: string): ReadonlyCategory<T> | undefined;
  /** Snapshot of the elements, in insertion order */
  getElements(): T[];
  containsElement(element: T): boolean;
  /** Equality used for this category's elements */
  readonly elementEquality: ElementEquality<T>;

  addCategoryListener(listener: CategoryListener<T>): void;
  removeCategoryListener(listener: CategoryListener<T>): void;
  on<K extends CategoryEventType>(type: K, handler: (event: CategoryEventOfType<T, K>) => void): Unsubscribe;
  onAll(handler: (event: CategoryEvent<T>) => void): Unsubscribe;

  /** The read-only view of this category; a view returns itself */
  asReadonly(): ReadonlyCategory<T>;

  /** Same name, equal elements in the same order, equal children in the same order */
  equals(other: ReadonlyCategory<T>): boolean;
}

/**
 * A mutable, observable category.
 *
 * @example
 * ```typescript
 * const root = new Category<number>("Root");
 * root.onAll((event) => console.log(event.type, event.source.getName()));
 *
 * const child = root.addChild("Child");   // child_added from Root
 * child.addElements([1, 2]);              // elements_added from Child
 * root.removeChild("Child");              // child_removed from Root
 * child.addElements([3]);                 // no longer reaches Root's listeners
 * ```
 */
export class Category<T> implements ReadonlyCategory<T> {
  private readonly name: string;
  private readonly elements: T[] = [];
  private readonly children: Category<T>[] = [];
  private readonly options: ResolvedCategoryOptions<T>;
  private readonly listeners: ListenerRegistry<T>;
  private view: ReadonlyCategoryView<T> | undefined;

  /** Registered on every child while it is a child of this category. */
  private readonly forwardingListener: CategoryListener<T> = listenerFromHandler((event) =>
    this.listeners.dispatch(event),
  );

  /**
   * @param name - Non-empty name, fixed for the lifetime of the category
   * @param options - Element equality, logger and listener error policy; children inherit them
   * @throws InvalidArgumentError if the name or an option is invalid
   */
  constructor(name: string, options?: CategoryOptions<T>) {
    assertCategoryName(name);
    this.name = name;
    this.options = resolveCategoryOptions(options);
    this.listeners = new ListenerRegistry<T>(this.options.listenerErrors, this.options.logger);
  }

  get elementEquality(): ElementEquality<T> {
    return this.options.equals;
  }

  get logger(): Logger<ILogObj> {
    return this.options.logger;
  }

  getName(): string {
    return this.name;
  }

  // ===========================================================================
  // Children
  // ===========================================================================

  getChildren(): Category<T>[] {
    return [...this.children];
  }

  /**
   * @throws InvalidArgumentError if the name is not a non-empty string
   */
  getChild(name: string): Category<T> | undefined {
    assertCategoryName(name);
    return this.children.find((child) => child.name === name);
  }

  /**
   * Returns the child with the given name, creating it when missing.
   * Only creation emits `child_added`.
   *
   * @throws InvalidArgumentError if the name is not a non-empty string
   */
  addChild(name: string): Category<T> {
    const present = this.getChild(name);
    if (present) {
      return present;
    }

    const child = new Category<T>(name, this.options);
    this.attach(child);
    this.listeners.dispatch(createChildEvent("child_added", this, child));
    return child;
  }

  /**
   * Detaches the named child. The returned category keeps its own contents
   * and listeners, but its changes no longer reach this category.
   *
   * @returns the detached child, or undefined when there is no such child,
   *   which includes a name that is not a valid category name
   */
  removeChild(name: string): Category<T> | undefined {
    const child = this.children.find((candidate) => candidate.name === name);
    if (!child) {
      return undefined;
    }

    this.detach(child);
    this.listeners.dispatch(createChildEvent("child_removed", this, child));
    return child;
  }

  /**
   * Removes every child, in order, with one `child_removed` each.
   * Elements are left alone.
   */
  removeAllChildren(): void {
    for (const child of this.getChildren()) {
      this.removeChild(child.name);
    }
  }

  private attach(child: Category<T>): void {
    this.children.push(child);
    child.addCategoryListener(this.forwardingListener);
    this.options.logger.debug("Attached child category", { parent: this.name, child: child.name });
  }

  private detach(child: Category<T>): void {
    const index = this.children.indexOf(child);
    if (index !== -1) {
      this.children.splice(index, 1);
    }
    child.removeCategoryListener(this.forwardingListener);
    this.options.logger.debug("Detached child category", { parent: this.name, child: child.name });
  }

  // ===========================================================================
  // Elements
  // ===========================================================================

  getElements(): T[] {
    return [...this.elements];
  }

  containsElement(element: T): boolean {
    if (this.options.equals === sameValueZero) {
      return this.elements.includes(element);
    }
    return this.indexOfElement(element) !== -1;
  }

  /**
   * Appends each item that is not yet present.
   *
   * When anything was appended, emits one `elements_added` whose `elements`
   * is the whole de-duplicated input batch.
   *
   * @returns whether at least one item was appended; false for null/undefined input
   */
  addElements(items?: Iterable<T> | null): boolean {
    if (items == null) {
      return false;
    }

    const batch = this.distinct(items);
    // The batch is distinct, so membership only needs the elements present before it
    const isPresent = this.membership(this.elements);
    let changed = false;
    for (const item of batch) {
      if (!isPresent(item)) {
        this.elements.push(item);
        changed = true;
      }
    }

    if (changed) {
      this.listeners.dispatch(createElementsEvent("elements_added", this, batch));
    }
    return changed;
  }

  /**
   * Removes each item that is present.
   *
   * When anything was removed, emits one `elements_removed` whose `elements`
   * is the whole de-duplicated input batch.
   *
   * @returns whether at least one item was removed; false for null/undefined input
   */
  removeElements(items?: Iterable<T> | null): boolean {
    if (items == null) {
      return false;
    }

    const batch = this.distinct(items);
    const isRemoved = this.membership(batch);
    let kept = 0;
    for (const element of this.elements) {
      if (!isRemoved(element)) {
        this.elements[kept++] = element;
      }
    }
    const changed = kept !== this.elements.length;
    this.elements.length = kept;

    if (changed) {
      this.listeners.dispatch(createElementsEvent("elements_removed", this, batch));
    }
    return changed;
  }

  removeAllElements(): void {
    this.removeElements(this.getElements());
  }

  private indexOfElement(element: T): number {
    const equals = this.options.equals;
    return this.elements.findIndex((candidate) => equals(candidate, element));
  }

  /**
   * Membership test against a fixed list. Under SameValueZero it is a Set
   * lookup; otherwise a scan with the configured equality.
   */
  private membership(values: readonly T[]): (element: T) => boolean {
    const equals = this.options.equals;
    if (equals === sameValueZero) {
      const set = new Set(values);
      return (element) => set.has(element);
    }
    const snapshot = [...values];
    return (element) => snapshot.some((value) => equals(value, element));
  }

  private distinct(items: Iterable<T>): T[] {
    const equals = this.options.equals;
    if (equals === sameValueZero) {
      return [...new Set(items)];
    }
    const result: T[] = [];
    for (const item of items) {
      if (!result.some((seen) => equals(seen, item))) {
        result.push(item);
      }
    }
    return result;
  }

  // ===========================================================================
  // Observation
  // ===========================================================================

  /**
   * Registers a listener for changes to this category and its descendants.
   * Registering the same listener twice has no further effect.
   */
  addCategoryListener(listener: CategoryListener<T>): void {
    this.listeners.add(listener);
  }

  removeCategoryListener(listener: CategoryListener<T>): void {
    this.listeners.remove(listener);
  }

  /**
   * Subscribes a closure to one event type.
   *
   * @example
   * ```typescript
   * const off = root.on("child_added", (event) => console.log(event.child.getName()));
   * off();
   * ```
   */
  on<K extends CategoryEventType>(type: K, handler: (event: CategoryEventOfType<T, K>) => void): Unsubscribe {
    return this.subscribe(
      listenerFromHandler<T>((event) => {
        if (isEventOfType(event, type)) {
          handler(event);
        }
      }),
    );
  }

  /**
   * Subscribes a closure to every event type.
   */
  onAll(handler: (event: CategoryEvent<T>) => void): Unsubscribe {
    return this.subscribe(listenerFromHandler(handler));
  }

  /**
   * Number of registered listeners. While this category is a child, its
   * parent's forwarding listener is one of them.
   */
  getListenerCount(): number {
    return this.listeners.size;
  }

  private subscribe(listener: CategoryListener<T>): Unsubscribe {
    this.addCategoryListener(listener);
    return () => this.removeCategoryListener(listener);
  }

  // ===========================================================================
  // Views, equality
  // ===========================================================================

  /**
   * A wrapper exposing only {@link ReadonlyCategory}. Changes made through
   * this category stay visible through the view.
   */
  asReadonly(): ReadonlyCategory<T> {
    this.view ??= new ReadonlyCategoryView(this);
    return this.view;
  }

  equals(other: ReadonlyCategory<T>): boolean {
    if (other === this) {
      return true;
    }
    if (this.name !== other.getName()) {
      return false;
    }

    const otherElements = other.getElements();
    if (otherElements.length !== this.elements.length) {
      return false;
    }
    const equals = this.options.equals;
    if (!this.elements.every((element, index) => equals(element, otherElements[index]))) {
      return false;
    }

    const otherChildren = other.getChildren();
    if (otherChildren.length !== this.children.length) {
      return false;
    }
    return this.children.every((child, index) => {
      const counterpart = otherChildren[index];
      return counterpart !== undefined && child.equals(counterpart);
    });
  }

  toString(): string {
    return this.name;
  }
}
