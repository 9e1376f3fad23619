/**
 * Event types for category trees.
 *
 * Every event names the category where the change physically happened
 * (`source`), which is not necessarily the category a listener was
 * registered on: events from descendants are forwarded unchanged. Listeners
 * subscribed through a read-only view receive a copy whose categories are
 * read-only views too.
 *
 * @module core/category-events
 */

import type { ReadonlyCategory } from "./category.js";

// =============================================================================
// Element Events
// =============================================================================

interface BaseElementsEvent<T> {
  /** Category whose elements changed */
  source: ReadonlyCategory<T>;
  /**
   * The input batch of the add/remove call, de-duplicated, in first-occurrence
   * order. May include items whose presence did not actually change.
   */
  elements: ReadonlySet<T>;
  /** Always absent for element events */
  child: undefined;
}

/**
 * Emitted once per `addElements` call that added at least one element.
 */
export interface ElementsAddedEvent<T> extends BaseElementsEvent<T> {
  type: "elements_added";
}

/**
 * Emitted once per `removeElements` call that removed at least one element.
 */
export interface ElementsRemovedEvent<T> extends BaseElementsEvent<T> {
  type: "elements_removed";
}

// =============================================================================
// Child Events
// =============================================================================

interface BaseChildEvent<T> {
  /** Category whose children changed */
  source: ReadonlyCategory<T>;
  /** Always empty for child events */
  elements: ReadonlySet<T>;
  /** The child that was attached or detached */
  child: ReadonlyCategory<T>;
}

export interface ChildAddedEvent<T> extends BaseChildEvent<T> {
  type: "child_added";
}

/**
 * Emitted after the child was detached; `child` is a standalone root by then.
 */
export interface ChildRemovedEvent<T> extends BaseChildEvent<T> {
  type: "child_removed";
}

// =============================================================================
// Union
// =============================================================================

export type CategoryEvent<T> =
  | ElementsAddedEvent<T>
  | ElementsRemovedEvent<T>
  | ChildAddedEvent<T>
  | ChildRemovedEvent<T>;

export type CategoryEventType = CategoryEvent<unknown>["type"];

export type ElementsEventType = "elements_added" | "elements_removed";
export type ChildEventType = "child_added" | "child_removed";

/**
 * Narrows an event to the variant carrying the given type tag.
 */
export type CategoryEventOfType<T, K extends CategoryEventType> = Extract<CategoryEvent<T>, { type: K }>;

export function isEventOfType<T, K extends CategoryEventType>(
  event: CategoryEvent<T>,
  type: K,
): event is CategoryEventOfType<T, K> {
  return event.type === type;
}

export function isElementsEvent<T>(
  event: CategoryEvent<T>,
): event is ElementsAddedEvent<T> | ElementsRemovedEvent<T> {
  return event.type === "elements_added" || event.type === "elements_removed";
}

export function isChildEvent<T>(event: CategoryEvent<T>): event is ChildAddedEvent<T> | ChildRemovedEvent<T> {
  return event.type === "child_added" || event.type === "child_removed";
}

// =============================================================================
// Construction
// =============================================================================

const EMPTY: ReadonlySet<never> = new Set<never>();

export function createElementsEvent<T>(
  type: ElementsEventType,
  source: ReadonlyCategory<T>,
  elements: readonly T[],
): ElementsAddedEvent<T> | ElementsRemovedEvent<T> {
  const base = { source, elements: new Set(elements), child: undefined };
  return Object.freeze(type === "elements_added" ? { type, ...base } : { type, ...base });
}

export function createChildEvent<T>(
  type: ChildEventType,
  source: ReadonlyCategory<T>,
  child: ReadonlyCategory<T>,
): ChildAddedEvent<T> | ChildRemovedEvent<T> {
  const base = { source, elements: EMPTY, child };
  return Object.freeze(type === "child_added" ? { type, ...base } : { type, ...base });
}

/**
 * One-line description, e.g. `CategoryEvent[child_added source=Root child=A]`.
 */
export function formatCategoryEvent<T>(event: CategoryEvent<T>): string {
  if (isChildEvent(event)) {
    return `CategoryEvent[${event.type} source=${event.source.getName()} child=${event.child.getName()}]`;
  }
  return `CategoryEvent[${event.type} source=${event.source.getName()} elements=${event.elements.size}]`;
}
