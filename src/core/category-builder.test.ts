import { describe, expect, it } from "vitest";
import { CollectingCategoryListener } from "../testing/collecting-listener.js";
import { createCategory, findCategory, toFormattedString } from "./categories.js";
import { CategoryBuilder, createBuilder } from "./category-builder.js";
import { InvalidArgumentError } from "./errors.js";

describe("CategoryBuilder", () => {
  it("builds a tree through chained path-style calls", () => {
    const builder = createBuilder<string>("Root");
    builder.add("orphan");
    builder.get("FirstChild").add("a");
    builder.get("FirstChild").add("b");
    builder.get("SecondChild").add("c");
    builder.get("SecondChild").get("GrandChild").add("d");

    const root = builder.build();

    expect(toFormattedString(root)).toBe(
      "Root\n|-orphan\n+-FirstChild\n| |-a\n| |-b\n+-SecondChild\n  |-c\n  +-GrandChild\n    |-d\n",
    );
  });

  it("returns the same category from build()", () => {
    const builder = createBuilder<number>("Root");

    expect(builder.build()).toBe(builder.build());
  });

  it("addresses the same child on repeated get()", () => {
    const builder = createBuilder<number>("Root");

    const first = builder.get("A").build();
    const second = builder.get("A").build();

    expect(second).toBe(first);
    expect(builder.build().getChildren()).toHaveLength(1);
  });

  it("adds several elements at once and ignores null", () => {
    const root = createBuilder<number>("Root").addAll([1, 2, 2]).addAll(null).addAll(undefined).build();

    expect(root.getElements()).toEqual([1, 2]);
  });

  it("rejects invalid child names", () => {
    const builder = createBuilder<number>("Root");

    expect(() => builder.get("")).toThrow(InvalidArgumentError);
    expect(() => builder.get(null as unknown as string)).toThrow(InvalidArgumentError);
    expect(() => createBuilder<number>(undefined as unknown as string)).toThrow(InvalidArgumentError);
  });

  it("emits events to listeners already on the tree", () => {
    const builder = createBuilder<number>("Root");
    const listener = new CollectingCategoryListener<number>();
    builder.build().addCategoryListener(listener);

    builder.get("A").add(1);

    expect(listener.events.map((event) => `${event.type}@${event.source.getName()}`)).toEqual([
      "child_added@Root",
      "elements_added@A",
    ]);
  });

  it("continues building an existing category", () => {
    const existing = createCategory<number>("Root");
    existing.addElements([1]);

    CategoryBuilder.forCategory(existing).add(2).get("A").add(3);

    expect(existing.getElements()).toEqual([1, 2]);
    expect(existing.getChild("A")?.getElements()).toEqual([3]);
  });

  describe("addIfUncategorized", () => {
    it("adds only candidates not present anywhere in the tree", () => {
      const builder = createBuilder<string>("Root");
      builder.add("top");
      builder.get("Fruit").add("apple");

      builder.addIfUncategorized("Other", ["apple", "kale", "top", "kale", "pear"]);

      expect(builder.build().getChild("Other")?.getElements()).toEqual(["kale", "pear"]);
    });

    it("does not create the child when nothing is left", () => {
      const builder = createBuilder<string>("Root");
      builder.get("Fruit").add("apple");

      builder.addIfUncategorized("Other", ["apple"]);

      expect(builder.build().getChild("Other")).toBeUndefined();
    });

    it("adds the remaining candidates in one event", () => {
      const builder = createBuilder<string>("Root");
      const listener = new CollectingCategoryListener<string>();
      builder.build().addCategoryListener(listener);

      builder.addIfUncategorized("Other", ["x", "y"]);

      expect(listener.childAddedEvents).toHaveLength(1);
      expect(listener.elementsAddedEvents).toHaveLength(1);
      expect([...listener.elementsAddedEvents[0].elements]).toEqual(["x", "y"]);
    });

    it("extends an existing child", () => {
      const builder = createBuilder<string>("Root");
      builder.get("Other").add("x");

      builder.addIfUncategorized("Other", ["x", "y"]);

      expect(builder.build().getChild("Other")?.getElements()).toEqual(["x", "y"]);
    });

    it("only looks below the builder's own category", () => {
      const builder = createBuilder<string>("Root");
      builder.get("Fruit").add("apple");

      builder.get("Veg").add("kale").addIfUncategorized("Other", ["apple", "kale"]);

      expect(findCategory(builder.build(), ["Veg", "Other"])?.getElements()).toEqual(["apple"]);
    });

    it("uses the tree's element equality", () => {
      const builder = createBuilder<{ id: number }>("Root", { equals: (a, b) => a.id === b.id });
      builder.get("Known").add({ id: 1 });

      builder.addIfUncategorized("Other", [{ id: 1 }, { id: 2 }]);

      expect(builder.build().getChild("Other")?.getElements()).toEqual([{ id: 2 }]);
    });

    it("validates the name even without candidates", () => {
      const builder = createBuilder<string>("Root");

      expect(() => builder.addIfUncategorized("", null)).toThrow(InvalidArgumentError);
      expect(builder.addIfUncategorized("Other", null).build().getChildren()).toEqual([]);
    });
  });

  describe("mergeRecursively", () => {
    it("merges another tree by child name", () => {
      const other = createCategory<number>("Other");
      other.addElements([9]);
      other.addChild("A").addChild("A1").addElements([1]);

      const merged = createBuilder<number>("Root");
      merged.get("A").add(2);
      merged.mergeRecursively(other);

      expect(toFormattedString(merged.build())).toBe("Root\n|-9\n+-A\n  |-2\n  +-A1\n    |-1\n");
    });
  });
});
