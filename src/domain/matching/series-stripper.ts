// ---------------------------------------------------------------------------
// Removes series tags and site branding from a file-name title.
// ---------------------------------------------------------------------------

import type { StrippedTitle } from "../../core/types.js";
import type { Catalog } from "../catalog/catalog.js";

/** "(Book 3)", "[Foundation 2]", "(Frank Herbert)" */
const BRACKET_GROUP = /[[(][a-zA-Z0-9 -]+[\])]/g;

const TRAILING_NOISE = /[\s(.]+$/;

export interface StripOptions {
  brandingMarkers: readonly string[];
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Build the pattern for branding markers: the marker, an optional domain
 * suffix and optional surrounding parentheses ("(z-lib.org)").
 */
export function brandingPattern(markers: readonly string[]): RegExp | null {
  if (markers.length === 0) return null;
  const alternatives = markers.map(escapeRegExp).join("|");
  return new RegExp(`\\(?(?:${alternatives})(?:\\.[a-z]{2,6})?\\)?`, "gi");
}

function stripOnce(
  text: string,
  catalog: Catalog,
  branding: RegExp | null,
): StrippedTitle {
  let recoveredAuthor = "";

  for (const match of text.matchAll(BRACKET_GROUP)) {
    if (recoveredAuthor) break;
    const content = match[0].slice(1, -1).trim();
    const [author] = catalog.findByAuthor(content);
    if (author) recoveredAuthor = author.author;
  }

  let title = text.replace(BRACKET_GROUP, " ");
  if (branding) title = title.replace(branding, " ");
  title = title.replace(/\s+/g, " ").replace(TRAILING_NOISE, "").trim();

  return { title, recoveredAuthor };
}

/**
 * Strip bracketed series tags, branding markers and trailing stray
 * punctuation from `text`.
 *
 * A bracketed tag whose content names a catalog author is still removed,
 * but that author is returned as `recoveredAuthor`. Stripping repeats until
 * nothing changes, so the result is stable under a second call.
 */
export function stripSeriesAndNoise(
  text: string,
  catalog: Catalog,
  options: StripOptions,
): StrippedTitle {
  const branding = brandingPattern(options.brandingMarkers);
  let current = text.trim();
  let recoveredAuthor = "";

  for (;;) {
    const pass = stripOnce(current, catalog, branding);
    if (!recoveredAuthor) recoveredAuthor = pass.recoveredAuthor;
    if (pass.title === current) break;
    current = pass.title;
  }

  return { title: current, recoveredAuthor };
}
