// csv.ts
// Typed CSV access: every row passes through a zod schema, bad rows are reported and skipped.
import fs from "node:fs/promises";
import path from "node:path";
import Papa from "papaparse";
import type { z } from "zod";
import { RotaError, errorMessage } from "./errors.js";

export type RejectedRow = { row: number; raw: Record<string, string>; reason: string };

export type CsvReadResult<T> = { rows: T[]; rejected: RejectedRow[] };

export function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

export function parseCsv<S extends z.ZodTypeAny>(text: string, schema: S): CsvReadResult<z.output<S>> {
  const parsed = Papa.parse<Record<string, string>>(text, {
    header: true,
    skipEmptyLines: "greedy",
    transformHeader: (h) => h.trim().toLowerCase(),
  });
  const rows: z.output<S>[] = [];
  const rejected: RejectedRow[] = [];
  const broken = new Map<number, string>();
  for (const e of parsed.errors) {
    // short rows are left to the schema, which knows which columns are optional
    if (e.row !== undefined && e.code !== "TooFewFields") broken.set(e.row, e.message);
  }
  parsed.data.forEach((raw, i) => {
    const parseError = broken.get(i);
    if (parseError) {
      rejected.push({ row: i + 1, raw, reason: parseError });
      return;
    }
    const result = schema.safeParse(raw);
    if (result.success) {
      rows.push(result.data);
    } else {
      const reason = result.error.issues.map((iss) => `${iss.path.join(".") || "row"}: ${iss.message}`).join("; ");
      rejected.push({ row: i + 1, raw, reason });
    }
  });
  return { rows, rejected };
}

/** Missing file reads as `undefined`; any other read failure is thrown. */
export async function readCsvFile<S extends z.ZodTypeAny>(
  file: string,
  schema: S,
): Promise<CsvReadResult<z.output<S>> | undefined> {
  let text: string;
  try {
    text = await fs.readFile(file, "utf8");
  } catch (err) {
    if (isNotFound(err)) return undefined;
    throw err;
  }
  return parseCsv(text, schema);
}

export function toCsv<C extends string>(columns: readonly C[], rows: ReadonlyArray<Record<C, string | number>>): string {
  return Papa.unparse(
    { fields: [...columns], data: rows.map((r) => columns.map((c) => String(r[c]))) },
    { newline: "\n" },
  ) + "\n";
}

/**
 * Writes to a sibling temp file and renames it over `file`.
 * On failure the destination is left as it was.
 */
export async function writeFileAtomic(file: string, content: string): Promise<void> {
  const tmp = `${file}.${process.pid}.tmp`;
  try {
    await fs.mkdir(path.dirname(file), { recursive: true });
    await fs.writeFile(tmp, content, "utf8");
    await fs.rename(tmp, file);
  } catch (err) {
    await fs.rm(tmp, { force: true }).catch((rmErr: unknown) => {
      console.error(`[csv] could not remove temp file ${tmp}: ${errorMessage(rmErr)}`);
    });
    throw new RotaError("persistence_failed", `Failed to write ${file}: ${errorMessage(err)}`, { cause: err });
  }
}

export async function writeCsvAtomic<C extends string>(
  file: string,
  columns: readonly C[],
  rows: ReadonlyArray<Record<C, string | number>>,
): Promise<void> {
  await writeFileAtomic(file, toCsv(columns, rows));
}

/** Appends one row, writing the header first when the file is new. */
export async function appendCsvRow<C extends string>(
  file: string,
  columns: readonly C[],
  row: Record<C, string | number>,
): Promise<void> {
  let exists = true;
  try {
    await fs.stat(file);
  } catch (err) {
    if (!isNotFound(err)) throw err;
    exists = false;
  }
  const body = Papa.unparse({ fields: [...columns], data: [columns.map((c) => String(row[c]))] }, {
    header: !exists,
    newline: "\n",
  });
  try {
    if (!exists) await fs.mkdir(path.dirname(file), { recursive: true });
    await fs.appendFile(file, body + "\n", "utf8");
  } catch (err) {
    throw new RotaError("persistence_failed", `Failed to append to ${file}: ${errorMessage(err)}`, { cause: err });
  }
}
