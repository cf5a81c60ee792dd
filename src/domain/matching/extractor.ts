// ---------------------------------------------------------------------------
// Title/author extraction from noisy file names.
// ---------------------------------------------------------------------------

import type { ExtractionResult, MatchingConfig } from "../../core/types.js";
import { ExtractionStatus } from "../../core/types.js";
import type { Catalog } from "../catalog/catalog.js";
import type { Logger } from "../../logging/logger.js";
import { createSilentLogger } from "../../logging/logger.js";
import { stripSeriesAndNoise } from "./series-stripper.js";
import type { ExtractionStrategy } from "./strategies.js";
import { DEFAULT_STRATEGIES } from "./strategies.js";

const TRAILING_PARENTHETICAL = /\(.*\)\s*$/;
const HAS_WORD = /[\p{L}\p{N}]/u;

function empty(status: ExtractionStatus): ExtractionResult {
  return { title: "", author: "", status, hit: null };
}

/**
 * Recovers a (title, author) guess from a file's base name.
 *
 * The base name is first stripped of series tags and branding, then handed
 * to each strategy in turn ("by" split, hyphen split, whole string). Titles
 * taken from the catalog are returned verbatim; extracted ones lose a
 * trailing parenthetical such as "(unabridged)".
 */
export class TitleAuthorExtractor {
  private readonly logger: Logger;

  constructor(
    private readonly catalog: Catalog,
    private readonly config: MatchingConfig,
    logger?: Logger,
    private readonly strategies: readonly ExtractionStrategy[] = DEFAULT_STRATEGIES,
  ) {
    this.logger = (logger ?? createSilentLogger()).child({ component: "extractor" });
  }

  extract(baseName: string): ExtractionResult {
    const stripped = stripSeriesAndNoise(baseName, this.catalog, {
      brandingMarkers: this.config.brandingMarkers,
    });

    if (!stripped.title) {
      this.logger.debug({ baseName }, "nothing left after stripping");
      return empty(ExtractionStatus.TITLE_EMPTY);
    }

    const context = {
      catalog: this.catalog,
      recoveredAuthor: stripped.recoveredAuthor,
      hyphenRecursionLimit: this.config.hyphenRecursionLimit,
    };

    for (const strategy of this.strategies) {
      const result = strategy.apply(stripped.title, context);
      if (!result) continue;

      const finished = this.finish(result);
      this.logger.debug(
        { baseName, strategy: strategy.name, ...finished },
        "extracted title and author",
      );
      return finished;
    }

    this.logger.debug({ baseName }, "no strategy produced a title");
    return empty(ExtractionStatus.UNRESOLVED);
  }

  private finish(result: ExtractionResult): ExtractionResult {
    if (result.hit) return result;

    const title = result.title.replace(TRAILING_PARENTHETICAL, "").trim();
    if (!title) return empty(ExtractionStatus.TITLE_EMPTY);
    if (!HAS_WORD.test(title)) {
      return { ...result, title, status: ExtractionStatus.UNRESOLVED };
    }
    return { ...result, title, author: result.author.trim() };
  }
}
