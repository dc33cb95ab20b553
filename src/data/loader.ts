import { readFile } from "node:fs/promises";
import { parse } from "csv-parse/sync";
import { createTransactionSet, type TransactionSet } from "../analysis/records.js";

/**
 * Parse a sales CSV (header row required) into raw rows keyed by column name.
 */
export function parseSalesCsv(text: string): Record<string, unknown>[] {
  const rows: unknown = parse(text, {
    columns: true,
    bom: true,
    trim: true,
    skip_empty_lines: true,
  });

  if (!Array.isArray(rows)) {
    throw new Error("CSV parser did not return a list of rows");
  }
  return rows.filter(isRow);
}

/** Read and validate the dataset at `path`. */
export async function loadTransactionSet(path: string): Promise<TransactionSet> {
  let text: string;
  try {
    text = await readFile(path, "utf8");
  } catch (error) {
    if (isMissingFile(error)) {
      throw new Error(`Sales data file not found: ${path}`);
    }
    throw error;
  }
  return createTransactionSet(parseSalesCsv(text));
}

function isRow(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}
