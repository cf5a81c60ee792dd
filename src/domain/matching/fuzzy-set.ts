// ---------------------------------------------------------------------------
// Word-set comparison for free text.
//
// Two strings "match" when the token set of one is contained in the token
// set of the other. Tokens are lower-cased and split on a separator class,
// so punctuation, casing and word order do not matter.
// ---------------------------------------------------------------------------

/** Default separators: whitespace, colon, underscore, period, comma. */
export const DEFAULT_SEPARATORS = /[\s:_.,]+/;

/** Separators for author names ("Le Guin, Ursula K."). */
export const AUTHOR_SEPARATORS = /[\s.,]+/;

/** Punctuation removed from titles before they are split on whitespace. */
const TITLE_PUNCTUATION = /[:_-]+/g;

/** Split `text` into its set of non-empty, lower-cased tokens. */
export function tokenize(text: string, separators: RegExp = DEFAULT_SEPARATORS): Set<string> {
  const tokens = new Set<string>();
  for (const part of text.split(separators)) {
    if (part) tokens.add(part.toLowerCase());
  }
  return tokens;
}

/** Title tokens: colons, underscores and hyphens dropped, then split on spaces. */
export function titleTokens(title: string): Set<string> {
  return tokenize(stripTitlePunctuation(title), /\s+/);
}

export function stripTitlePunctuation(title: string): string {
  return title.replace(TITLE_PUNCTUATION, "");
}

/** True when every member of `a` is also in `b`. */
export function isSubsetOf(a: ReadonlySet<string>, b: ReadonlySet<string>): boolean {
  for (const token of a) {
    if (!b.has(token)) return false;
  }
  return true;
}

/** True when either set contains the other. Vacuously true for an empty set. */
export function eitherContains(a: ReadonlySet<string>, b: ReadonlySet<string>): boolean {
  return isSubsetOf(a, b) || isSubsetOf(b, a);
}

/**
 * Compare two strings by word-set containment in either direction.
 *
 * An empty string has an empty token set and therefore matches anything;
 * use {@link fuzzyMatchStrict} where that is not wanted.
 */
export function fuzzyMatch(
  a: string,
  b: string,
  separators: RegExp = DEFAULT_SEPARATORS,
): boolean {
  return eitherContains(tokenize(a, separators), tokenize(b, separators));
}

/** Does `text` yield at least one token? */
export function hasTokens(text: string, separators: RegExp = DEFAULT_SEPARATORS): boolean {
  return tokenize(text, separators).size > 0;
}

/** {@link fuzzyMatch}, but false whenever either side has no tokens. */
export function fuzzyMatchStrict(
  a: string,
  b: string,
  separators: RegExp = DEFAULT_SEPARATORS,
): boolean {
  const setA = tokenize(a, separators);
  const setB = tokenize(b, separators);
  if (setA.size === 0 || setB.size === 0) return false;
  return eitherContains(setA, setB);
}
