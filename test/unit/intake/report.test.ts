import { describe, it, expect } from "vitest";

import { describeReport } from "../../../src/intake/report.js";

describe("describeReport", () => {
  it("summarises a processed file", () => {
    expect(
      describeReport({ file: "Dune.epub", status: "processed", bookId: 1, outcome: null }),
    ).toBe('"Dune.epub" is in the catalog as #1 and converted');
  });

  it("includes the failure message", () => {
    expect(
      describeReport({
        file: "Boom.epub",
        status: "failed",
        bookId: null,
        outcome: null,
        message: "tool crashed",
      }),
    ).toBe('Processing "Boom.epub" failed: tool crashed');
  });

  it("uses a placeholder when the id is unknown", () => {
    expect(
      describeReport({ file: "x.epub", status: "unable_to_add_format", bookId: null, outcome: null }),
    ).toBe('Could not attach the converted "x.epub" to #?');
  });
});
