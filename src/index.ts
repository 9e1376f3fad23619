// Categories
export type { ReadonlyCategory } from "./core/category.js";
export { Category } from "./core/category.js";
export { readonlyView } from "./core/category-view.js";
export {
  createCategory,
  findCategory,
  getAllElements,
  getDescendants,
  mergeRecursively,
  removeEmptyCategories,
  toFormattedString,
} from "./core/categories.js";
export { CategoryBuilder, createBuilder } from "./core/category-builder.js";
// Events and listeners
export type {
  CategoryEvent,
  CategoryEventOfType,
  CategoryEventType,
  ChildAddedEvent,
  ChildEventType,
  ChildRemovedEvent,
  ElementsAddedEvent,
  ElementsEventType,
  ElementsRemovedEvent,
} from "./core/category-events.js";
export { formatCategoryEvent, isChildEvent, isElementsEvent, isEventOfType } from "./core/category-events.js";
export type { CategoryListener, Unsubscribe } from "./core/category-listener.js";
export { listenerFromHandler, notifyListener } from "./core/category-listener.js";
// Configuration
export type {
  CategoryOptions,
  ElementEquality,
  ListenerErrorPolicy,
  ResolvedCategoryOptions,
} from "./core/options.js";
export { resolveCategoryOptions, sameValueZero } from "./core/options.js";
export { LISTENER_ERROR_POLICIES, LISTENER_ERRORS_ENV_VAR } from "./core/constants.js";
// Errors
export { InvalidArgumentError, isInvalidArgumentError } from "./core/errors.js";
// Logging
export type { LoggerOptions, LogLevelName } from "./logging/logger.js";
export { createLogger, defaultLogger } from "./logging/logger.js";
