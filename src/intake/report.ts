import type { IntakeReport } from "../core/types.js";
import { IntakeStatus } from "../core/types.js";

/** One-line, human-readable summary of what happened to a file. */
export function describeReport(report: IntakeReport): string {
  const file = JSON.stringify(report.file);
  const id = report.bookId ?? "?";

  switch (report.status) {
    case IntakeStatus.NO_EXTENSION:
      return `${file} has no extension, skipped`;
    case IntakeStatus.CANNOT_EXTRACT_TITLE:
      return `No book title could be extracted from ${file}`;
    case IntakeStatus.UNABLE_TO_ADD_BOOK:
      return `Catalog refused to add ${file}`;
    case IntakeStatus.CONVERSION_ABANDONED:
      return `${file} is in the catalog as #${id}; convert it manually`;
    case IntakeStatus.FORMAT_PRESENT:
      return `${file} is in the catalog as #${id} and already has the target format`;
    case IntakeStatus.CONVERSION_FAILED:
      return `Converting ${file} failed`;
    case IntakeStatus.UNABLE_TO_ADD_FORMAT:
      return `Could not attach the converted ${file} to #${id}`;
    case IntakeStatus.PROCESSED:
      return `${file} is in the catalog as #${id} and converted`;
    case IntakeStatus.FAILED:
      return `Processing ${file} failed: ${report.message ?? "unknown error"}`;
  }
}
