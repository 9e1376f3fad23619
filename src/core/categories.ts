/**
 * Functions that work on any category tree through its public methods.
 *
 * @module core/categories
 */

import { Category, type ReadonlyCategory } from "./category.js";
import { type CategoryOptions, sameValueZero } from "./options.js";

/**
 * Creates a standalone root category.
 *
 * @throws InvalidArgumentError if the name or an option is invalid
 */
export function createCategory<T>(name: string, options?: CategoryOptions<T>): Category<T> {
  return new Category<T>(name, options);
}

/**
 * Every element of the category and its descendants, depth-first, with
 * duplicates (under the category's element equality) dropped.
 *
 * @example
 * ```typescript
 * // Root [0, 1, 2] with one child [10, 11]
 * getAllElements(root); // Set {0, 1, 2, 10, 11}
 * ```
 */
export function getAllElements<T>(category: ReadonlyCategory<T>): ReadonlySet<T> {
  const equals = category.elementEquality;

  // Set membership is SameValueZero already
  if (equals === sameValueZero) {
    const result = new Set<T>();
    for (const node of [category, ...getDescendants(category)]) {
      for (const element of node.getElements()) {
        result.add(element);
      }
    }
    return result;
  }

  const result: T[] = [];
  for (const node of [category, ...getDescendants(category)]) {
    for (const element of node.getElements()) {
      if (!result.some((seen) => equals(seen, element))) {
        result.push(element);
      }
    }
  }
  return new Set(result);
}

/**
 * All categories below the given one, depth-first pre-order.
 */
export function getDescendants<T>(category: Category<T>): Category<T>[];
export function getDescendants<T>(category: ReadonlyCategory<T>): ReadonlyCategory<T>[];
export function getDescendants<T>(category: ReadonlyCategory<T>): ReadonlyCategory<T>[] {
  const result: ReadonlyCategory<T>[] = [];
  for (const child of category.getChildren()) {
    result.push(child, ...getDescendants(child));
  }
  return result;
}

/**
 * Follows child names from `root`. An empty path yields `root` itself.
 *
 * @example
 * ```typescript
 * findCategory(root, ["Fruit", "Citrus"]); // root.getChild("Fruit")?.getChild("Citrus")
 * ```
 */
export function findCategory<T>(root: Category<T>, path: readonly string[]): Category<T> | undefined;
export function findCategory<T>(root: ReadonlyCategory<T>, path: readonly string[]): ReadonlyCategory<T> | undefined;
export function findCategory<T>(root: ReadonlyCategory<T>, path: readonly string[]): ReadonlyCategory<T> | undefined {
  let current: ReadonlyCategory<T> | undefined = root;
  for (const segment of path) {
    current = current.getChild(segment);
    if (!current) {
      return undefined;
    }
  }
  return current;
}

/**
 * Removes, bottom-up, every descendant that ends up with neither children
 * nor elements. The category passed in is kept even if it ends up empty.
 */
export function removeEmptyCategories<T>(category: Category<T>): void {
  const children = category.getChildren();
  for (const child of children) {
    removeEmptyCategories(child);
  }
  for (const child of children) {
    if (child.getChildren().length === 0 && child.getElements().length === 0) {
      category.removeChild(child.getName());
    }
  }
}

/**
 * Copies the elements and the child structure of `source` into `target`,
 * matching children by name and creating the missing ones.
 *
 * `source` is read in full before `target` changes, so it may be an ancestor
 * of `target` (or a view of one): its structure as of the call is copied once.
 */
export function mergeRecursively<T>(target: Category<T>, source: ReadonlyCategory<T>): void {
  mergeInto(target, takeSnapshot(source));
}

interface CategorySnapshot<T> {
  name: string;
  elements: T[];
  children: CategorySnapshot<T>[];
}

function takeSnapshot<T>(category: ReadonlyCategory<T>): CategorySnapshot<T> {
  return {
    name: category.getName(),
    elements: category.getElements(),
    children: category.getChildren().map((child) => takeSnapshot(child)),
  };
}

function mergeInto<T>(target: Category<T>, source: CategorySnapshot<T>): void {
  target.addElements(source.elements);
  for (const child of source.children) {
    mergeInto(target.addChild(child.name), child);
  }
}

/**
 * Multi-line drawing of the tree, for debugging. The exact format is not
 * guaranteed to stay the same.
 *
 * ```text
 * Root
 * |-0
 * +-A
 * | |-1
 * +-B
 * ```
 *
 * @param formatElement - Renders one element; defaults to `String`
 */
export function toFormattedString<T>(
  category: ReadonlyCategory<T>,
  formatElement: (element: T) => string = String,
): string {
  return formatLines(category, "", formatElement).join("");
}

function formatLines<T>(
  category: ReadonlyCategory<T>,
  indent: string,
  formatElement: (element: T) => string,
): string[] {
  const head = indent.length >= 2 ? `${indent.slice(0, -2)}+-` : indent;
  const lines = [`${head}${category.getName()}\n`];

  for (const element of category.getElements()) {
    lines.push(`${indent}|-${formatElement(element)}\n`);
  }

  const children = category.getChildren();
  children.forEach((child, index) => {
    const childIndent = index === children.length - 1 ? `${indent}  ` : `${indent}| `;
    lines.push(...formatLines(child, childIndent, formatElement));
  });

  return lines;
}
