// ---------------------------------------------------------------------------
// Title/author extraction strategies.
//
// Each strategy looks at a stripped file-name title and either produces an
// ExtractionResult or declines with `null`. The extractor tries them in
// order and keeps the first answer.
// ---------------------------------------------------------------------------

import type { CatalogRecord, ExtractionResult } from "../../core/types.js";
import { ExtractionStatus } from "../../core/types.js";
import type { Catalog } from "../catalog/catalog.js";
import { fuzzyMatchStrict, hasTokens } from "./fuzzy-set.js";

export interface ExtractionContext {
  catalog: Catalog;
  /** Author the series stripper pulled out of a bracketed tag. */
  recoveredAuthor: string;
  /** Depth limit for retrying the hyphen split on a narrower span. */
  hyphenRecursionLimit: number;
}

export interface ExtractionStrategy {
  readonly name: string;
  apply(working: string, context: ExtractionContext): ExtractionResult | null;
}

const BY_SEPARATOR = " by ";
const HYPHEN_SEPARATOR = " - ";

function resolved(title: string, author: string): ExtractionResult {
  return { title, author, status: ExtractionStatus.RESOLVED, hit: null };
}

function fromRecord(record: CatalogRecord): ExtractionResult {
  return {
    title: record.title,
    author: record.author,
    status: ExtractionStatus.RESOLVED,
    hit: record,
  };
}

// ── " by " ──────────────────────────────────────────────────────────────────

/** "Neuromancer by William Gibson": split at the last " by ". */
export const byStrategy: ExtractionStrategy = {
  name: "by",
  apply(working) {
    const index = working.lastIndexOf(BY_SEPARATOR);
    if (index < 0) return null;
    return resolved(
      working.slice(0, index).trim(),
      working.slice(index + BY_SEPARATOR.length).trim(),
    );
  },
};

// ── " - " ───────────────────────────────────────────────────────────────────

/**
 * Look for the catalog record a (title, author) pair names, trying the pair
 * as given and then with title and author swapped.
 */
export function findCatalogHit(
  title: string,
  author: string,
  catalog: Catalog,
): CatalogRecord | undefined {
  if (!hasTokens(author)) return undefined;

  for (const record of catalog.findByTitle(title)) {
    if (fuzzyMatchStrict(author, record.author)) return record;
  }
  for (const record of catalog.findByAuthor(title)) {
    if (fuzzyMatchStrict(author, record.title)) return record;
  }
  return undefined;
}

function splitOnHyphen(
  working: string,
  context: ExtractionContext,
  depth: number,
): ExtractionResult | null {
  const index = working.indexOf(HYPHEN_SEPARATOR);
  if (index < 0) return null;

  const { catalog } = context;
  const before = working.slice(0, index).trim();
  const after = working
    .slice(index + HYPHEN_SEPARATOR.length)
    .replace(/^[-\s]+|[-\s]+$/g, "");

  // The right-hand side is the title unless the catalog knows it only as an
  // author.
  const titleAfter = catalog.isKnownTitle(after) || !catalog.isKnownAuthor(after);
  const title = titleAfter ? after : before;
  const author = titleAfter ? before : after;

  const hit = findCatalogHit(title, author, catalog);
  if (hit) return fromRecord(hit);

  // "Series - Author - Title" or "Author - Title - Edition": retry with the
  // last segment dropped, then with the first one dropped. A retry only
  // wins when it lands on a catalog record.
  if (depth < context.hyphenRecursionLimit) {
    const leftOfLast = working.slice(0, working.lastIndexOf(HYPHEN_SEPARATOR)).trim();
    for (const part of [leftOfLast, after]) {
      if (!part.includes(HYPHEN_SEPARATOR)) continue;
      const retry = splitOnHyphen(part, context, depth + 1);
      if (retry && retry.hit) return retry;
    }
  }

  return resolved(title || working, author || context.recoveredAuthor);
}

/** "Isaac Asimov - Foundation" or "Foundation - Isaac Asimov". */
export const hyphenStrategy: ExtractionStrategy = {
  name: "hyphen",
  apply(working, context) {
    return splitOnHyphen(working, context, 0);
  },
};

// ── Fallback ────────────────────────────────────────────────────────────────

/** The whole string is the title. */
export const wholeTitleStrategy: ExtractionStrategy = {
  name: "whole-title",
  apply(working, context) {
    return resolved(working, context.recoveredAuthor);
  },
};

export const DEFAULT_STRATEGIES: readonly ExtractionStrategy[] = [
  byStrategy,
  hyphenStrategy,
  wholeTitleStrategy,
];
