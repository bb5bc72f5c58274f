import fs from "node:fs/promises";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { ContentDecks, contentCategoryOf, drawIndex } from "../src/content.js";
import { quietConsole, tempDir } from "./helpers.js";

describe("contentCategoryOf", () => {
  it("recognises singular and plural category names", () => {
    expect(contentCategoryOf("joke")).toBe("joke");
    expect(contentCategoryOf(" Stories ")).toBe("story");
    expect(contentCategoryOf("QUOTES")).toBe("quote");
    expect(contentCategoryOf("shower")).toBeUndefined();
  });
});

describe("drawIndex", () => {
  it("hands out every index once before repeating", () => {
    let consumed: number[] = [];
    const seen: number[] = [];
    for (let i = 0; i < 6; i++) {
      const draw = drawIndex(6, consumed);
      if (!draw) throw new Error("expected a draw");
      seen.push(draw.index);
      consumed = draw.consumed;
    }
    expect([...seen].sort((a, b) => a - b)).toEqual([0, 1, 2, 3, 4, 5]);
  });

  it("resets once the deck is exhausted", () => {
    const high = () => 0.99;
    let consumed: number[] = [];
    const seen: number[] = [];
    for (let i = 0; i < 4; i++) {
      const draw = drawIndex(4, consumed, high);
      if (!draw) throw new Error("expected a draw");
      seen.push(draw.index);
      consumed = draw.consumed;
    }
    expect(seen).toEqual([3, 2, 1, 0]);
    expect(drawIndex(4, consumed, high)).toEqual({ index: 3, consumed: [3] });
  });

  it("ignores consumed indices that no longer exist", () => {
    expect(drawIndex(2, [0, 7, -1], () => 0)).toEqual({ index: 1, consumed: [0, 1] });
  });

  it("has nothing to draw from an empty deck", () => {
    expect(drawIndex(0, [])).toBeUndefined();
  });
});

describe("ContentDecks", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await tempDir();
    await fs.writeFile(
      path.join(dir, "jokes.txt"),
      ["# house jokes", "first joke", "", "second joke", "third joke"].join("\n"),
    );
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("reads one item per line, skipping blanks and comments", async () => {
    expect(await new ContentDecks(dir).items("joke")).toEqual(["first joke", "second joke", "third joke"]);
  });

  it("persists what has been drawn across instances", async () => {
    const lowest = () => 0;
    const first = new ContentDecks(dir, lowest);
    expect(await first.draw("joke")).toEqual({ category: "joke", index: 0, text: "first joke" });
    expect(await first.draw("joke")).toEqual({ category: "joke", index: 1, text: "second joke" });
    expect(await fs.readFile(path.join(dir, "jokes.used"), "utf8")).toBe("0\n1\n");

    const restarted = new ContentDecks(dir, lowest);
    expect(await restarted.draw("joke")).toEqual({ category: "joke", index: 2, text: "third joke" });
    expect(await restarted.draw("joke")).toEqual({ category: "joke", index: 0, text: "first joke" });
    expect(await fs.readFile(path.join(dir, "jokes.used"), "utf8")).toBe("0\n");
  });

  it("ignores garbage in the tracker file", async () => {
    const { warn } = quietConsole();
    await fs.writeFile(path.join(dir, "jokes.used"), "0\nbanana\n2\n");
    expect(await new ContentDecks(dir).consumed("joke")).toEqual([0, 2]);
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it("returns nothing for a category without an items file", async () => {
    quietConsole();
    expect(await new ContentDecks(dir).draw("story")).toBeUndefined();
  });
});
