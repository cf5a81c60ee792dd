// ---------------------------------------------------------------------------
// Resolves an extracted (title, author) guess against the catalog.
// ---------------------------------------------------------------------------

import type { CatalogRecord, ExtractionResult, MatchOutcome } from "../../core/types.js";
import { ExtractionStatus, MatchKind } from "../../core/types.js";
import type { Catalog } from "../catalog/catalog.js";
import {
  AUTHOR_SEPARATORS,
  eitherContains,
  isSubsetOf,
  stripTitlePunctuation,
  titleTokens,
  tokenize,
} from "./fuzzy-set.js";

/**
 * Does `record` describe the book named by `title` and `author`?
 *
 * Titles agree when the extracted title occurs literally in the record's
 * title, or when either word-set contains the other; colons, underscores and
 * hyphens are ignored on both sides. A non-empty author must also appear in
 * the record's author or title, or the record's author must appear in the
 * extracted title.
 */
export function recordMatches(title: string, author: string, record: CatalogRecord): boolean {
  const plainTitle = stripTitlePunctuation(title).trim();
  const wanted = titleTokens(title);
  const recordTitle = titleTokens(record.title);
  if (wanted.size === 0) return false;

  const titleAgrees =
    stripTitlePunctuation(record.title).includes(plainTitle) ||
    (recordTitle.size > 0 && eitherContains(wanted, recordTitle));
  if (!titleAgrees) return false;

  const authorTokens = tokenize(author, AUTHOR_SEPARATORS);
  if (authorTokens.size === 0) return true;

  const recordAuthor = tokenize(record.author, AUTHOR_SEPARATORS);
  return (
    isSubsetOf(authorTokens, recordAuthor) ||
    isSubsetOf(authorTokens, recordTitle) ||
    (recordAuthor.size > 0 && isSubsetOf(recordAuthor, wanted))
  );
}

/** Id 0 is the tool's "no such book"; such rows never count as entries. */
function isListedEntry(record: CatalogRecord): boolean {
  return record.id > 0;
}

/**
 * Decide whether an extraction names an existing catalog entry, a new title,
 * or nothing usable.
 *
 * A record the extractor already hit wins outright; otherwise the first
 * listed record that {@link recordMatches} is returned. Rows with id 0 are
 * never returned.
 */
export function resolveMatch(extraction: ExtractionResult, catalog: Catalog): MatchOutcome {
  if (extraction.status === ExtractionStatus.TITLE_EMPTY) {
    return { kind: MatchKind.UNRESOLVABLE, reason: "title is empty" };
  }
  if (extraction.status === ExtractionStatus.UNRESOLVED || !extraction.title) {
    return { kind: MatchKind.UNRESOLVABLE, reason: "title could not be extracted" };
  }

  const { hit } = extraction;
  if (hit && isListedEntry(hit) && catalog.has(hit)) {
    return { kind: MatchKind.EXISTING, record: hit };
  }

  const record = catalog
    .all()
    .find((r) => isListedEntry(r) && recordMatches(extraction.title, extraction.author, r));
  if (record) return { kind: MatchKind.EXISTING, record };

  return { kind: MatchKind.NEW, title: extraction.title, author: extraction.author };
}
