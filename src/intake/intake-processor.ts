// ---------------------------------------------------------------------------
// Intake processor: takes dropped book files into the catalog.
//
// For each file: extract a title/author guess from the name, resolve it
// against the catalog snapshot, add the book when it is new, then convert it
// to the target format and attach that format to the record.
// ---------------------------------------------------------------------------

import type { AppConfig, IntakeReport, MatchOutcome } from "../core/types.js";
import { ExtractionStatus, IntakeStatus, MatchKind } from "../core/types.js";
import { CatalogToolError, ConversionError } from "../core/errors.js";
import type { Logger } from "../logging/logger.js";
import { Catalog } from "../domain/catalog/catalog.js";
import {
  parseAddedBookIds,
  parseBookFormats,
  parseConversionOutput,
} from "../domain/catalog/tool-output.js";
import { splitFileName } from "../domain/files/file-name.js";
import { planConversion } from "../domain/conversion/plan.js";
import { TitleAuthorExtractor } from "../domain/matching/extractor.js";
import { resolveMatch } from "../domain/matching/resolver.js";
import type { CatalogTool, FormatConverter } from "./ports.js";
import { describeReport } from "./report.js";

export class IntakeProcessor {
  private readonly extractor: TitleAuthorExtractor;
  private readonly logger: Logger;

  constructor(
    private readonly catalog: Catalog,
    private readonly tool: CatalogTool,
    private readonly converter: FormatConverter,
    private readonly config: AppConfig,
    logger: Logger,
  ) {
    this.logger = logger.child({ component: "intake" });
    this.extractor = new TitleAuthorExtractor(catalog, config.matching, logger);
  }

  /**
   * Build a processor over a fresh catalog snapshot. The listing is read
   * once; books added during the run are not visible to later lookups.
   */
  static async create(
    tool: CatalogTool,
    converter: FormatConverter,
    config: AppConfig,
    logger: Logger,
  ): Promise<IntakeProcessor> {
    const catalog = Catalog.fromListing(await tool.list());
    logger.info({ books: catalog.size }, "catalog snapshot loaded");
    return new IntakeProcessor(catalog, tool, converter, config, logger);
  }

  /** Resolve a file name against the catalog without touching anything. */
  resolve(fileName: string): MatchOutcome | null {
    const { baseName, extension } = splitFileName(fileName);
    if (!extension) return null;
    return resolveMatch(this.extractor.extract(baseName), this.catalog);
  }

  /**
   * Process one file. Never throws: collaborator failures are reported as
   * the file's status.
   */
  async processFile(filePath: string): Promise<IntakeReport> {
    let report: IntakeReport;
    try {
      report = await this.run(filePath);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      this.logger.error({ err, file: filePath }, "file processing failed");
      report = {
        file: filePath,
        status: IntakeStatus.FAILED,
        bookId: null,
        outcome: null,
        message,
      };
    }

    this.logger.info(
      { file: filePath, status: report.status, bookId: report.bookId },
      describeReport(report),
    );
    return report;
  }

  /** Process files one after another; one failure does not stop the rest. */
  async processBatch(filePaths: readonly string[]): Promise<IntakeReport[]> {
    const reports: IntakeReport[] = [];
    for (const [index, filePath] of filePaths.entries()) {
      const report = await this.processFile(filePath);
      reports.push(report);
      this.logger.debug(
        { progress: `${index + 1}/${filePaths.length}`, status: report.status },
        "batch progress",
      );
    }
    return reports;
  }

  private async run(filePath: string): Promise<IntakeReport> {
    const base = { file: filePath, bookId: null, outcome: null };

    const { baseName, extension } = splitFileName(filePath);
    if (!extension) return { ...base, status: IntakeStatus.NO_EXTENSION };

    const extraction = this.extractor.extract(baseName);
    const outcome = resolveMatch(extraction, this.catalog);
    if (extraction.status !== ExtractionStatus.RESOLVED || outcome.kind === MatchKind.UNRESOLVABLE) {
      return { ...base, outcome, status: IntakeStatus.CANNOT_EXTRACT_TITLE };
    }

    let bookId: number;
    let title: string;
    if (outcome.kind === MatchKind.EXISTING) {
      bookId = outcome.record.id;
      title = outcome.record.title;
    } else {
      const [addedId] = parseAddedBookIds(await this.tool.add(filePath));
      if (addedId === undefined) {
        return { ...base, outcome, status: IntakeStatus.UNABLE_TO_ADD_BOOK };
      }
      bookId = addedId;
      title = outcome.title;
      this.logger.info({ file: filePath, bookId, title }, "added new book");
    }

    const formats = parseBookFormats(await this.tool.listFormats(title), bookId);
    const plan = planConversion(filePath, formats, this.config.conversion);
    const found = { file: filePath, bookId, outcome };

    if (plan.action === "abandoned") {
      return { ...found, status: IntakeStatus.CONVERSION_ABANDONED, message: plan.reason };
    }
    if (plan.action === "format_present") {
      this.logger.debug({ file: filePath, bookId, format: plan.format }, "format already stored");
      return { ...found, status: IntakeStatus.FORMAT_PRESENT };
    }

    this.logger.debug(
      { file: filePath, bookId, format: plan.format, destination: plan.destination },
      "converting",
    );
    let converted: string | null;
    try {
      converted = parseConversionOutput(
        await this.converter.convert(plan.source, plan.destination),
      );
    } catch (err) {
      if (!(err instanceof ConversionError)) throw err;
      this.logger.warn({ err, file: filePath, source: err.source }, "converter failed");
      return { ...found, status: IntakeStatus.CONVERSION_FAILED, message: err.message };
    }
    if (!converted) return { ...found, status: IntakeStatus.CONVERSION_FAILED };

    try {
      await this.tool.addFormat(bookId, converted);
    } catch (err) {
      if (!(err instanceof CatalogToolError)) throw err;
      this.logger.warn(
        { err, file: filePath, bookId, operation: err.operation },
        "adding format failed",
      );
      return { ...found, status: IntakeStatus.UNABLE_TO_ADD_FORMAT, message: err.message };
    }

    return { ...found, status: IntakeStatus.PROCESSED };
  }
}
