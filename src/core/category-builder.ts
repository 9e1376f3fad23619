import { getAllElements, mergeRecursively } from "./categories.js";
import { Category, type ReadonlyCategory } from "./category.js";
import type { CategoryOptions } from "./options.js";
import { assertCategoryName } from "./validation.js";

/**
 * Fluent construction of category trees. Child categories are created on
 * demand the first time they are addressed with {@link get}.
 *
 * Every call goes through the regular {@link Category} methods, so listeners
 * already registered on the tree see the usual events.
 *
 * @example
 * ```typescript
 * const builder = createBuilder<string>("Root");
 * builder.add("orphan");
 * builder.get("Fruit").add("apple").add("pear");
 * builder.get("Fruit").get("Citrus").add("lemon");
 * builder.addIfUncategorized("Other", ["apple", "kale"]); // only "kale" lands in Other
 *
 * const root = builder.build();
 * ```
 */
export class CategoryBuilder<T> {
  private constructor(private readonly category: Category<T>) {}

  /**
   * Starts a builder with a fresh root category.
   *
   * @throws InvalidArgumentError if the name or an option is invalid
   */
  static create<T>(name: string, options?: CategoryOptions<T>): CategoryBuilder<T> {
    return new CategoryBuilder(new Category<T>(name, options));
  }

  /**
   * Continues building an existing category.
   */
  static forCategory<T>(category: Category<T>): CategoryBuilder<T> {
    return new CategoryBuilder(category);
  }

  add(element: T): this {
    this.category.addElements([element]);
    return this;
  }

  /**
   * Adds the elements; null or undefined is ignored.
   */
  addAll(elements?: Iterable<T> | null): this {
    this.category.addElements(elements);
    return this;
  }

  /**
   * Builder for the named child, created if it does not exist yet.
   *
   * @throws InvalidArgumentError if the name is not a non-empty string
   */
  get(name: string): CategoryBuilder<T> {
    return new CategoryBuilder(this.category.addChild(name));
  }

  /**
   * Adds to the named child each candidate that appears nowhere below this
   * builder's category (its own elements included). The child is only created
   * when at least one candidate is left.
   *
   * @throws InvalidArgumentError if the name is not a non-empty string
   */
  addIfUncategorized(name: string, candidates?: Iterable<T> | null): this {
    assertCategoryName(name);
    if (candidates == null) {
      return this;
    }

    const equals = this.category.elementEquality;
    const categorized = [...getAllElements(this.category)];
    const uncategorized: T[] = [];
    const isKnown = (candidate: T) =>
      categorized.some((element) => equals(element, candidate)) ||
      uncategorized.some((element) => equals(element, candidate));

    for (const candidate of candidates) {
      if (!isKnown(candidate)) {
        uncategorized.push(candidate);
      }
    }

    if (uncategorized.length > 0) {
      this.get(name).addAll(uncategorized);
    }
    return this;
  }

  /**
   * Merges another tree into this one, matching children by name.
   * `other` may contain this builder's category.
   */
  mergeRecursively(other: ReadonlyCategory<T>): this {
    mergeRecursively(this.category, other);
    return this;
  }

  /**
   * The category this builder works on. Further builder calls keep modifying it.
   */
  build(): Category<T> {
    return this.category;
  }
}

/**
 * Starts a builder with a fresh root category.
 *
 * @throws InvalidArgumentError if the name or an option is invalid
 */
export function createBuilder<T>(name: string, options?: CategoryOptions<T>): CategoryBuilder<T> {
  return CategoryBuilder.create<T>(name, options);
}
