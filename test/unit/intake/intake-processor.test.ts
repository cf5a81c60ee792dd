// ---------------------------------------------------------------------------
// Tests for the intake processor, with in-process fakes for the catalog
// tool and the converter.
// ---------------------------------------------------------------------------

import path from "node:path";
import { describe, it, expect, vi } from "vitest";

import { IntakeProcessor } from "../../../src/intake/intake-processor.js";
import type { CatalogTool, FormatConverter } from "../../../src/intake/ports.js";
import { CatalogToolError, ConversionError } from "../../../src/core/errors.js";
import type { Logger } from "../../../src/logging/logger.js";
import { createLogger, createSilentLogger } from "../../../src/logging/logger.js";
import type { AppConfig } from "../../../src/core/types.js";

const LISTING = [
  "id  title                 authors",
  "1   Dune                  Frank Herbert",
  "2   Foundation            Isaac Asimov",
].join("\n");

const config: AppConfig = {
  logging: { level: "silent", prettyPrint: false },
  matching: { brandingMarkers: ["z-lib"], hyphenRecursionLimit: 2 },
  conversion: { targetFormat: "mobi", skipExtensions: ["pdf"], outputDir: "/tmp/out" },
};

/** Catalog tool fake: canned output per call, with call recording. */
class FakeCatalogTool implements CatalogTool {
  formats = "";
  addOutput = "Added book ids: 3";
  addError: Error | null = null;
  addFormatError: Error | null = null;

  list = vi.fn(async () => LISTING);

  add = vi.fn(async (_filePath: string) => {
    if (this.addError) throw this.addError;
    return this.addOutput;
  });

  listFormats = vi.fn(async (_title: string) => this.formats);

  addFormat = vi.fn(async (_bookId: number, _filePath: string) => {
    if (this.addFormatError) throw this.addFormatError;
  });
}

class FakeConverter implements FormatConverter {
  output: string | null = null;
  error: Error | null = null;

  convert = vi.fn(async (_source: string, destination: string) => {
    if (this.error) throw this.error;
    return this.output ?? `Conversion done\nOutput saved to ${destination}\n`;
  });
}

async function setup(logger: Logger = createSilentLogger()) {
  const tool = new FakeCatalogTool();
  const converter = new FakeConverter();
  const processor = await IntakeProcessor.create(tool, converter, config, logger);
  return { tool, converter, processor };
}

/** A debug-level logger whose JSON lines land in `lines`. */
function recordingLogger() {
  const lines: Record<string, unknown>[] = [];
  const logger = createLogger(
    { level: "debug", prettyPrint: false },
    {
      write(msg: string) {
        const line: Record<string, unknown> = JSON.parse(msg);
        lines.push(line);
      },
    },
  );
  const find = (msg: string) => lines.find((line) => line["msg"] === msg);
  return { logger, find };
}

describe("IntakeProcessor", () => {
  // ── Existing books ────────────────────────────────────────────────────

  it("converts a file for an existing record and attaches the format", async () => {
    const { tool, converter, processor } = await setup();
    tool.formats = "2  [/lib/Foundation.epub]";
    const destination = path.join("/tmp/out", "Isaac Asimov - Foundation.mobi");

    const report = await processor.processFile("Isaac Asimov - Foundation.epub");

    expect(report).toEqual({
      file: "Isaac Asimov - Foundation.epub",
      bookId: 2,
      status: "processed",
      outcome: {
        kind: "existing",
        record: { id: 2, title: "Foundation", author: "Isaac Asimov" },
      },
    });
    expect(tool.add).not.toHaveBeenCalled();
    expect(tool.listFormats).toHaveBeenCalledWith("Foundation");
    expect(converter.convert).toHaveBeenCalledWith("Isaac Asimov - Foundation.epub", destination);
    expect(tool.addFormat).toHaveBeenCalledWith(2, destination);
  });

  it("skips conversion when the record already has the target format", async () => {
    const { tool, converter, processor } = await setup();
    tool.formats = "1  [/lib/Dune.epub, /lib/Dune.mobi]";

    const report = await processor.processFile("Dune.epub");

    expect(report.status).toBe("format_present");
    expect(report.bookId).toBe(1);
    expect(converter.convert).not.toHaveBeenCalled();
  });

  // ── New books ─────────────────────────────────────────────────────────

  it("adds a new book before converting it", async () => {
    const { tool, processor } = await setup();

    const report = await processor.processFile("Snow Crash by Neal Stephenson.epub");

    expect(report.status).toBe("processed");
    expect(report.bookId).toBe(3);
    expect(report.outcome).toEqual({
      kind: "new",
      title: "Snow Crash",
      author: "Neal Stephenson",
    });
    expect(tool.add).toHaveBeenCalledWith("Snow Crash by Neal Stephenson.epub");
    expect(tool.listFormats).toHaveBeenCalledWith("Snow Crash");
    expect(tool.addFormat).toHaveBeenCalledWith(3, path.join("/tmp/out", "Snow Crash by Neal Stephenson.mobi"));
  });

  it("reports a book the tool refused to add", async () => {
    const { tool, processor } = await setup();
    tool.addOutput = "The following books were not added as they already exist";

    const report = await processor.processFile("Snow Crash.epub");

    expect(report.status).toBe("unable_to_add_book");
    expect(report.bookId).toBeNull();
    expect(tool.listFormats).not.toHaveBeenCalled();
  });

  it("leaves PDF conversion to the user", async () => {
    const { tool, converter, processor } = await setup();
    tool.addOutput = "Added book ids: 5";

    const report = await processor.processFile("Emma.pdf");

    expect(report.status).toBe("conversion_abandoned");
    expect(report.bookId).toBe(5);
    expect(report.message).toBe("pdf files are converted manually");
    expect(converter.convert).not.toHaveBeenCalled();
  });

  // ── Failures ──────────────────────────────────────────────────────────

  it("rejects a file without extension", async () => {
    const { tool, processor } = await setup();
    const report = await processor.processFile("README");
    expect(report).toEqual({ file: "README", status: "no_extension", bookId: null, outcome: null });
    expect(tool.add).not.toHaveBeenCalled();
  });

  it("rejects a file whose name holds no title", async () => {
    const { processor } = await setup();
    const report = await processor.processFile("(Book 1).epub");
    expect(report.status).toBe("cannot_extract_title");
    expect(report.outcome).toEqual({ kind: "unresolvable", reason: "title is empty" });
  });

  it("reports converter output without a saved file", async () => {
    const { tool, converter, processor } = await setup();
    converter.output = "Conversion error: unsupported input";

    const report = await processor.processFile("Dune.epub");

    expect(report.status).toBe("conversion_failed");
    expect(tool.addFormat).not.toHaveBeenCalled();
  });

  it("reports a converter that throws", async () => {
    const { converter, processor } = await setup();
    converter.error = new ConversionError("converter exited with 1", "Dune.epub");

    const report = await processor.processFile("Dune.epub");

    expect(report.status).toBe("conversion_failed");
    expect(report.message).toBe("converter exited with 1");
  });

  it("reports a format the tool refused to attach", async () => {
    const { tool, processor } = await setup();
    tool.addFormatError = new CatalogToolError("add_format failed", "add_format");

    const report = await processor.processFile("Dune.epub");

    expect(report.status).toBe("unable_to_add_format");
    expect(report.bookId).toBe(1);
  });

  // ── Logging ───────────────────────────────────────────────────────────

  it("logs the catalog operation that failed", async () => {
    const { logger, find } = recordingLogger();
    const { tool, processor } = await setup(logger);
    tool.addFormatError = new CatalogToolError("add_format failed", "add_format");

    await processor.processFile("Dune.epub");

    expect(find("adding format failed")).toMatchObject({
      level: "warn",
      component: "intake",
      file: "Dune.epub",
      bookId: 1,
      operation: "add_format",
    });
  });

  it("logs the source the converter choked on", async () => {
    const { logger, find } = recordingLogger();
    const { converter, processor } = await setup(logger);
    converter.error = new ConversionError("converter exited with 1", "Dune.epub");

    await processor.processFile("Dune.epub");

    expect(find("converter failed")).toMatchObject({ level: "warn", source: "Dune.epub" });
  });

  it("logs the target format of each decision", async () => {
    const { logger, find } = recordingLogger();
    const { tool, processor } = await setup(logger);
    tool.formats = "1  [/lib/Dune.mobi]";

    await processor.processFile("Dune.epub");
    await processor.processFile("Isaac Asimov - Foundation.epub");

    expect(find("format already stored")).toMatchObject({ bookId: 1, format: "mobi" });
    expect(find("converting")).toMatchObject({
      bookId: 2,
      format: "mobi",
      destination: path.join("/tmp/out", "Isaac Asimov - Foundation.mobi"),
    });
  });

  // ── Batches ───────────────────────────────────────────────────────────

  it("keeps going after a file fails", async () => {
    const { tool, processor } = await setup();
    tool.formats = "1  [/lib/Dune.mobi]";
    tool.add.mockImplementationOnce(async () => {
      throw new Error("tool crashed");
    });

    const reports = await processor.processBatch(["README", "Boom.epub", "Dune.epub"]);

    expect(reports.map((r) => r.status)).toEqual(["no_extension", "failed", "format_present"]);
    expect(reports[1]?.message).toBe("tool crashed");
  });

  it("reads the catalog listing once per run", async () => {
    const { tool, processor } = await setup();
    await processor.processBatch(["Snow Crash.epub", "Snow Crash.epub"]);
    expect(tool.list).toHaveBeenCalledTimes(1);
    expect(tool.add).toHaveBeenCalledTimes(2);
  });

  // ── Dry resolution ────────────────────────────────────────────────────

  it("resolves a file name without calling any collaborator", async () => {
    const { tool, converter, processor } = await setup();

    expect(processor.resolve("Isaac Asimov - Foundation.epub")).toEqual({
      kind: "existing",
      record: { id: 2, title: "Foundation", author: "Isaac Asimov" },
    });
    expect(processor.resolve("README")).toBeNull();
    expect(tool.add).not.toHaveBeenCalled();
    expect(converter.convert).not.toHaveBeenCalled();
  });
});
