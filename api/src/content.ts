// content.ts
import fs from "node:fs/promises";
import path from "node:path";
import { CONTENT_CATEGORIES, type ContentCategory } from "./config.js";
import { isNotFound, writeFileAtomic } from "./csv.js";
import { errorMessage } from "./errors.js";

const PLURAL: Record<ContentCategory, string> = { story: "stories", quote: "quotes", joke: "jokes" };

/** "Joke", "jokes", " quote " all name a category; anything else is a regular chore. */
export function contentCategoryOf(action: string): ContentCategory | undefined {
  const a = action.trim().toLowerCase();
  return CONTENT_CATEGORIES.find((c) => c === a || PLURAL[c] === a);
}

export type Draw = { index: number; consumed: number[] };

/**
 * Picks an index in [0, count) not in `consumed`. Once every index has been used the deck
 * resets and the drawn index starts the new round.
 */
export function drawIndex(count: number, consumed: readonly number[], random: () => number = Math.random): Draw | undefined {
  if (count <= 0) return undefined;
  const used = new Set(consumed.filter((i) => Number.isInteger(i) && i >= 0 && i < count));
  const unused: number[] = [];
  for (let i = 0; i < count; i++) if (!used.has(i)) unused.push(i);
  if (unused.length === 0) {
    const index = Math.min(count - 1, Math.floor(random() * count));
    return { index, consumed: [index] };
  }
  const index = unused[Math.min(unused.length - 1, Math.floor(random() * unused.length))];
  return { index, consumed: [...used, index] };
}

export type DrawnItem = { category: ContentCategory; index: number; text: string };

// One items file (`stories.txt`) and one tracker file (`stories.used`) per category
export class ContentDecks {
  constructor(
    readonly dir: string,
    private readonly random: () => number = Math.random,
  ) {}

  itemsFile(category: ContentCategory): string {
    return path.join(this.dir, `${PLURAL[category]}.txt`);
  }

  trackerFile(category: ContentCategory): string {
    return path.join(this.dir, `${PLURAL[category]}.used`);
  }

  // one item per line; blank lines and # comments are ignored
  async items(category: ContentCategory): Promise<string[]> {
    const text = await readOptional(this.itemsFile(category));
    return text
      .split(/\r?\n/)
      .map((l) => l.trim())
      .filter((l) => l.length > 0 && !l.startsWith("#"));
  }

  async consumed(category: ContentCategory): Promise<number[]> {
    const text = await readOptional(this.trackerFile(category));
    const indices: number[] = [];
    for (const line of text.split(/\r?\n/)) {
      const l = line.trim();
      if (!l) continue;
      const n = Number(l);
      if (Number.isInteger(n) && n >= 0) indices.push(n);
      else console.warn(`[content] ignoring bad index "${l}" in ${this.trackerFile(category)}`);
    }
    return indices;
  }

  /** `undefined` when the category has no items. A failed tracker write is logged, not thrown. */
  async draw(category: ContentCategory): Promise<DrawnItem | undefined> {
    const items = await this.items(category);
    const draw = drawIndex(items.length, await this.consumed(category), this.random);
    if (!draw) {
      console.warn(`[content] no ${PLURAL[category]} in ${this.itemsFile(category)}`);
      return undefined;
    }
    try {
      await writeFileAtomic(this.trackerFile(category), draw.consumed.join("\n") + "\n");
    } catch (err) {
      console.error(`[content] ${errorMessage(err)}`);
    }
    return { category, index: draw.index, text: items[draw.index] };
  }
}

async function readOptional(file: string): Promise<string> {
  try {
    return await fs.readFile(file, "utf8");
  } catch (err) {
    if (isNotFound(err)) return "";
    throw err;
  }
}
