// ---------------------------------------------------------------------------
// Collaborator contracts for the intake processor.
// Implementations own process invocation; they hand back the tool's raw
// stdout and throw CatalogToolError / ConversionError when a call fails.
// ---------------------------------------------------------------------------

/**
 * The external catalog-management tool.
 */
export interface CatalogTool {
  /** Full `list` output: id, title and author columns. */
  list(): Promise<string>;
  /** Adds a book file; output contains "Added book ids: <id>". */
  add(filePath: string): Promise<string>;
  /** `list` output restricted to `title`, with the formats column. */
  listFormats(title: string): Promise<string>;
  /** Attaches another format to an existing record. */
  addFormat(bookId: number, filePath: string): Promise<void>;
}

/**
 * The external e-book format converter.
 */
export interface FormatConverter {
  /** Converts `source` to `destination`; output names the saved file. */
  convert(source: string, destination: string): Promise<string>;
}
