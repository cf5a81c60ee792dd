// ---------------------------------------------------------------------------
// shelf-intake public API.
// ---------------------------------------------------------------------------

export * from "./core/types.js";
export * from "./core/errors.js";
export { loadConfig } from "./config/config.js";
export type { LoadConfigOptions } from "./config/config.js";
export { createLogger, createSilentLogger } from "./logging/logger.js";
export type { Logger } from "./logging/logger.js";

export { Catalog } from "./domain/catalog/catalog.js";
export { parseCatalogListing } from "./domain/catalog/listing-parser.js";
export {
  parseAddedBookIds,
  parseBookFormats,
  parseConversionOutput,
} from "./domain/catalog/tool-output.js";
export { splitFileName } from "./domain/files/file-name.js";
export { planConversion } from "./domain/conversion/plan.js";
export { fuzzyMatch, fuzzyMatchStrict, tokenize } from "./domain/matching/fuzzy-set.js";
export { stripSeriesAndNoise } from "./domain/matching/series-stripper.js";
export {
  DEFAULT_STRATEGIES,
  byStrategy,
  hyphenStrategy,
  wholeTitleStrategy,
} from "./domain/matching/strategies.js";
export type { ExtractionContext, ExtractionStrategy } from "./domain/matching/strategies.js";
export { TitleAuthorExtractor } from "./domain/matching/extractor.js";
export { resolveMatch } from "./domain/matching/resolver.js";

export { IntakeProcessor } from "./intake/intake-processor.js";
export type { CatalogTool, FormatConverter } from "./intake/ports.js";
export { describeReport } from "./intake/report.js";
