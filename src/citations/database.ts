import { existsSync, readFileSync } from "node:fs";
import { join } from "node:path";
import { z } from "zod";
import { CitationDatabaseError } from "../errors";
import type { CitationDatabase, CitationEntry } from "./types";

export const CitationEntrySchema = z.object({
  coAuthors: z.array(z.string().min(1)).optional(),
  etAl: z.boolean().optional(),
  title: z.string().min(1),
  year: z.string().regex(/^\d{4}$/, "year must be four digits"),
  venue: z.string().optional(),
  publisher: z.string().optional(),
  category: z.string().optional(),
});

export const CitationDatabaseFileSchema = z.object({
  categories: z.array(z.string()).default([]),
  entries: z.record(z.string(), CitationEntrySchema),
});

/** Bundled database, shipped beside src/ and dist/ */
export const DEFAULT_DATABASE_PATH = join(__dirname, "..", "..", "data", "citations.json");

export function createCitationDatabase(
  entries: Record<string, CitationEntry>,
  categories: string[] = []
): CitationDatabase {
  return { categories, entries: new Map(Object.entries(entries)) };
}

export function loadCitationDatabase(path: string = DEFAULT_DATABASE_PATH): CitationDatabase {
  if (!existsSync(path)) {
    throw new CitationDatabaseError({ message: `Citation database not found: ${path}`, path });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf-8"));
  } catch (error) {
    throw new CitationDatabaseError({
      message: `Invalid JSON in citation database ${path}: ${error instanceof Error ? error.message : String(error)}`,
      path,
    });
  }

  const result = CitationDatabaseFileSchema.safeParse(raw);
  if (!result.success) {
    throw new CitationDatabaseError({
      message: `Invalid citation database ${path}`,
      path,
      issues: result.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`),
    });
  }

  return createCitationDatabase(result.data.entries, result.data.categories);
}

/**
 * Find the entry for a primary author surname.
 * Tries the exact key, then a case-insensitive key, then the last word of
 * multi-word keys ("Vliet" finds "Van Vliet").
 */
export function lookupCitation(
  db: CitationDatabase,
  author: string
): { key: string; entry: CitationEntry } | null {
  const exact = db.entries.get(author);
  if (exact) return { key: author, entry: exact };

  const lowered = author.toLowerCase();
  for (const [key, entry] of db.entries) {
    if (key.toLowerCase() === lowered) return { key, entry };
  }
  for (const [key, entry] of db.entries) {
    const words = key.split(/\s+/);
    if (words.length > 1 && (words[words.length - 1] ?? "").toLowerCase() === lowered) {
      return { key, entry };
    }
  }
  return null;
}
