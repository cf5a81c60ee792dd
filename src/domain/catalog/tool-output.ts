// ---------------------------------------------------------------------------
// Parsers for the remaining catalog-tool and converter output the intake
// processor reads: added ids, a record's formats, the converted file path.
// ---------------------------------------------------------------------------

const ADDED_IDS_MARKER = "Added book ids: ";
const OUTPUT_SAVED_MARKER = "Output saved to ";

const SKIPPED_LINE = /^(Fail|id\s+title|id\s+formats)/;
const RECORD_START = /^(\d+)\s+/;
const EXTENSION = /\.([a-zA-Z0-9]+)$/;

/**
 * Ids reported by the tool's `add` command, e.g. "Added book ids: 12, 13".
 * Empty when the marker is missing.
 */
export function parseAddedBookIds(stdout: string): number[] {
  const index = stdout.lastIndexOf(ADDED_IDS_MARKER);
  if (index < 0) return [];

  const [idList = ""] = stdout.slice(index + ADDED_IDS_MARKER.length).split(/\r?\n/);
  return idList
    .split(",")
    .map((part) => part.trim())
    .filter((part) => /^\d+$/.test(part))
    .map((part) => Number.parseInt(part, 10));
}

/**
 * Formats stored for `bookId`, from a `list --fields formats` dump such as
 * `12  [/lib/Dune.epub, /lib/Dune.mobi]`. Lines wrapped inside the bracket
 * are joined back before the paths are read. Extensions are lower-cased.
 */
export function parseBookFormats(stdout: string, bookId: number): string[] {
  let collected = "";
  let collecting = false;

  for (const rawLine of stdout.split(/\r?\n/)) {
    const line = rawLine.trimEnd();
    if (!line.trim() || SKIPPED_LINE.test(line)) continue;

    const start = RECORD_START.exec(line);
    if (start) {
      if (collecting) break;
      if (Number.parseInt(start[1] ?? "", 10) !== bookId) continue;
      collecting = true;
      collected = line.slice(start[0].length).trim();
    } else if (collecting) {
      collected += line.trim();
    } else {
      continue;
    }

    if (collected.includes("]")) break;
  }

  const open = collected.indexOf("[");
  const close = collected.lastIndexOf("]");
  const list = collected.slice(open + 1, close < 0 ? undefined : close);

  const formats: string[] = [];
  for (const entry of list.split(",")) {
    const ext = EXTENSION.exec(entry.trim())?.[1]?.toLowerCase();
    if (ext && !formats.includes(ext)) formats.push(ext);
  }
  return formats;
}

/** Path the converter reported after "Output saved to ", or `null`. */
export function parseConversionOutput(stdout: string): string | null {
  for (const line of stdout.split(/\r?\n/)) {
    const index = line.indexOf(OUTPUT_SAVED_MARKER);
    if (index >= 0) {
      const saved = line.slice(index + OUTPUT_SAVED_MARKER.length).trim();
      if (saved) return saved;
    }
  }
  return null;
}
