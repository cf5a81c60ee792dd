// ---------------------------------------------------------------------------
// Error hierarchy for shelf-intake.
// The matching engine never throws; these cover configuration and the
// collaborators the intake processor drives.
// ---------------------------------------------------------------------------

// ── Base error ──────────────────────────────────────────────────────────────

/**
 * Root of all shelf-intake errors.
 */
export class IntakeError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "IntakeError";
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

// ── Collaborator errors ─────────────────────────────────────────────────────

/** A call into the catalog tool failed. */
export class CatalogToolError extends IntakeError {
  public readonly operation: string;

  constructor(message: string, operation: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "CatalogToolError";
    this.operation = operation;
  }
}

/** The format converter failed to run. */
export class ConversionError extends IntakeError {
  public readonly source: string;

  constructor(message: string, source: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ConversionError";
    this.source = source;
  }
}

// ── Infrastructure errors ───────────────────────────────────────────────────

/** A required configuration value is missing or invalid. */
export class ConfigurationError extends IntakeError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ConfigurationError";
  }
}
