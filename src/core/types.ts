// ---------------------------------------------------------------------------
// Core types for the shelf-intake engine.
// All other modules import from this file.
// ---------------------------------------------------------------------------

// ── Enums ───────────────────────────────────────────────────────────────────

export const ExtractionStatus = {
  RESOLVED: "resolved",
  TITLE_EMPTY: "title_empty",
  UNRESOLVED: "unresolved",
} as const;
export type ExtractionStatus =
  (typeof ExtractionStatus)[keyof typeof ExtractionStatus];

export const MatchKind = {
  EXISTING: "existing",
  NEW: "new",
  UNRESOLVABLE: "unresolvable",
} as const;
export type MatchKind = (typeof MatchKind)[keyof typeof MatchKind];

export const IntakeStatus = {
  NO_EXTENSION: "no_extension",
  CANNOT_EXTRACT_TITLE: "cannot_extract_title",
  UNABLE_TO_ADD_BOOK: "unable_to_add_book",
  CONVERSION_ABANDONED: "conversion_abandoned",
  FORMAT_PRESENT: "format_present",
  CONVERSION_FAILED: "conversion_failed",
  UNABLE_TO_ADD_FORMAT: "unable_to_add_format",
  PROCESSED: "processed",
  FAILED: "failed",
} as const;
export type IntakeStatus = (typeof IntakeStatus)[keyof typeof IntakeStatus];

// ── Catalog ─────────────────────────────────────────────────────────────────

/** One row of the catalog tool's listing. Never mutated once parsed. */
export interface CatalogRecord {
  readonly id: number;
  readonly title: string;
  readonly author: string;
}

// ── Extraction & resolution ─────────────────────────────────────────────────

export interface ExtractionResult {
  title: string;
  author: string;
  status: ExtractionStatus;
  /** Catalog record hit directly while extracting, `null` when none was. */
  hit: CatalogRecord | null;
}

export type MatchOutcome =
  | { kind: typeof MatchKind.EXISTING; record: CatalogRecord }
  | { kind: typeof MatchKind.NEW; title: string; author: string }
  | { kind: typeof MatchKind.UNRESOLVABLE; reason: string };

export interface StrippedTitle {
  title: string;
  /** Author recovered from a bracketed tag, empty when none was. */
  recoveredAuthor: string;
}

export interface FileNameParts {
  baseName: string;
  /** Extension without the leading dot, `null` when the name has none. */
  extension: string | null;
}

export type ConversionPlan =
  | { action: "abandoned"; reason: string }
  | { action: "format_present"; format: string }
  | { action: "convert"; source: string; destination: string; format: string };

export interface IntakeReport {
  file: string;
  status: IntakeStatus;
  /** Catalog id the file ended up attached to, `null` when none. */
  bookId: number | null;
  outcome: MatchOutcome | null;
  message?: string;
}

// ── Configuration ───────────────────────────────────────────────────────────

export interface LoggingConfig {
  level: string;
  prettyPrint: boolean;
}

export interface MatchingConfig {
  /** Site watermarks removed from file names, e.g. "z-lib". */
  brandingMarkers: string[];
  /** How many times the hyphen split may be retried on a narrower span. */
  hyphenRecursionLimit: number;
}

export interface ConversionConfig {
  targetFormat: string;
  /** Source extensions that are never converted automatically. */
  skipExtensions: string[];
  outputDir: string;
}

export interface AppConfig {
  logging: LoggingConfig;
  matching: MatchingConfig;
  conversion: ConversionConfig;
}
