// ---------------------------------------------------------------------------
// Parser for the catalog tool's tabular `list` output.
//
// Each record is `<id>  <title>  <author>` with columns separated by runs of
// two or more spaces. Long titles wrap onto continuation lines that carry no
// id; those are folded back into the record above them.
// ---------------------------------------------------------------------------

import type { CatalogRecord } from "../../core/types.js";

/** Column headers and "Failed to ..." lines the tool mixes into its output. */
const SKIPPED_LINE = /^(Fail|id\s+title)/;

const RECORD_START = /^(\d+)(?:\s+|$)/;
const COLUMN_GAP = / {2,}/;

/** A line ending in word-like text still has an author to fill in. */
const WORD_LIKE_END = /[\w;,&]+$/;

interface DraftRecord {
  id: number;
  title: string;
  author: string;
}

/**
 * Split the text after an id into its title and author columns.
 *
 * With only one column present, that column is the author when it ends in
 * word-like text: the tool leaves the title cell blank rather than the
 * author cell.
 */
export function splitRecordColumns(rest: string): { title: string; author: string } {
  const columns = rest.split(COLUMN_GAP);
  if (columns.length < 2 && WORD_LIKE_END.test(rest)) {
    return { title: "", author: columns[0] ?? "" };
  }
  return { title: columns[0] ?? "", author: columns[1] ?? "" };
}

function appendContinuation(record: DraftRecord, line: string): void {
  const [titlePart = "", authorPart = ""] = line.trim().split(COLUMN_GAP);

  if (titlePart) {
    if (!record.title) {
      record.title = titlePart;
    } else {
      // Words broken at a hyphen or slash rejoin without a space.
      const joiner = /[-/]$/.test(record.title) ? "" : " ";
      record.title += joiner + titlePart;
    }
  }

  if (authorPart) {
    record.author = record.author ? `${record.author} ${authorPart}` : authorPart;
  }
}

/**
 * Parse the listing into records, in the order the tool printed them.
 *
 * Accepts the raw text or its lines. Header lines are skipped, a
 * continuation line seen before any record is dropped, and repeated ids are
 * kept as separate records. A row whose id is too large to hold exactly is
 * dropped together with its continuation lines.
 */
export function parseCatalogListing(input: string | readonly string[]): readonly CatalogRecord[] {
  const lines = typeof input === "string" ? input.split(/\r?\n/) : input;
  const drafts: DraftRecord[] = [];
  let current: DraftRecord | null = null;

  for (const rawLine of lines) {
    if (!rawLine.trim() || SKIPPED_LINE.test(rawLine)) continue;

    const start = RECORD_START.exec(rawLine);
    if (start) {
      const id = Number(start[1]);
      if (!Number.isSafeInteger(id)) {
        current = null;
        continue;
      }
      current = { id, ...splitRecordColumns(rawLine.slice(start[0].length).trimEnd()) };
      drafts.push(current);
      continue;
    }

    if (current) appendContinuation(current, rawLine);
  }

  return Object.freeze(
    drafts.map((draft): CatalogRecord =>
      Object.freeze({
        id: draft.id,
        title: draft.title.trim(),
        author: draft.author.trim(),
      }),
    ),
  );
}
