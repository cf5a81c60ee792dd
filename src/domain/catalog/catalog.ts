// ---------------------------------------------------------------------------
// In-memory catalog snapshot.
// ---------------------------------------------------------------------------

import type { CatalogRecord } from "../../core/types.js";
import { parseCatalogListing } from "./listing-parser.js";
import { fuzzyMatchStrict } from "../matching/fuzzy-set.js";

/**
 * Read-only view over the catalog records taken at start-up.
 *
 * Record order is the order of the tool's listing; every lookup that returns
 * several records keeps it, so "first match" means "first listed".
 */
export class Catalog {
  private readonly records: readonly CatalogRecord[];
  private readonly members: ReadonlySet<CatalogRecord>;

  constructor(records: readonly CatalogRecord[]) {
    this.records = Object.freeze([...records]);
    this.members = new Set(this.records);
  }

  static fromListing(listing: string | readonly string[]): Catalog {
    return new Catalog(parseCatalogListing(listing));
  }

  static empty(): Catalog {
    return new Catalog([]);
  }

  get size(): number {
    return this.records.length;
  }

  all(): readonly CatalogRecord[] {
    return this.records;
  }

  /**
   * Is `record` one of this snapshot's own records? Compared by identity, so
   * rows sharing an id stay distinct.
   */
  has(record: CatalogRecord): boolean {
    return this.members.has(record);
  }

  /** Records whose title word-set contains, or is contained in, `text`. */
  findByTitle(text: string): CatalogRecord[] {
    return this.records.filter((r) => fuzzyMatchStrict(text, r.title));
  }

  /** Records whose author word-set contains, or is contained in, `text`. */
  findByAuthor(text: string): CatalogRecord[] {
    return this.records.filter((r) => fuzzyMatchStrict(text, r.author));
  }

  isKnownTitle(text: string): boolean {
    return this.records.some((r) => fuzzyMatchStrict(text, r.title));
  }

  isKnownAuthor(text: string): boolean {
    return this.records.some((r) => fuzzyMatchStrict(text, r.author));
  }
}
