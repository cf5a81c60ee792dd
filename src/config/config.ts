// ---------------------------------------------------------------------------
// Typed configuration loader.
// Reads an optional YAML file, validates it with Zod and applies
// environment-variable overrides on top.
// ---------------------------------------------------------------------------

import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { z } from "zod";
import { parse } from "yaml";
import type { AppConfig } from "../core/types.js";
import { ConfigurationError } from "../core/errors.js";

// ── Zod schemas ─────────────────────────────────────────────────────────────

export const LoggingConfigSchema = z.object({
  level: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  prettyPrint: z.boolean().default(false),
});

export const MatchingConfigSchema = z.object({
  brandingMarkers: z.array(z.string().min(1)).default(["z-lib"]),
  hyphenRecursionLimit: z.number().int().min(0).max(10).default(2),
});

export const ConversionConfigSchema = z.object({
  targetFormat: z
    .string()
    .regex(/^[a-z0-9]+$/i, "must be a bare extension such as mobi")
    .default("mobi"),
  skipExtensions: z.array(z.string().min(1)).default(["pdf"]),
  outputDir: z.string().min(1).default("~/temp"),
});

export const AppConfigSchema = z.object({
  logging: LoggingConfigSchema.default({}),
  matching: MatchingConfigSchema.default({}),
  conversion: ConversionConfigSchema.default({}),
});

// ── Helpers ─────────────────────────────────────────────────────────────────

function expandHome(dir: string): string {
  if (dir === "~") return os.homedir();
  if (dir.startsWith("~/")) return path.join(os.homedir(), dir.slice(2));
  return dir;
}

function readConfigFile(filePath: string): unknown {
  let raw: string;
  try {
    raw = fs.readFileSync(filePath, "utf-8");
  } catch (err) {
    throw new ConfigurationError(`Cannot read config file ${filePath}`, {
      cause: err,
    });
  }

  try {
    // An empty document parses to null; treat it as "all defaults".
    return parse(raw) ?? {};
  } catch (err) {
    throw new ConfigurationError(`Config file ${filePath} is not valid YAML`, {
      cause: err,
    });
  }
}

/** Environment overrides, applied to the raw document before validation. */
function applyEnvOverrides(
  raw: Record<string, unknown>,
  env: NodeJS.ProcessEnv,
): Record<string, unknown> {
  const section = (key: string): Record<string, unknown> => {
    const value = raw[key];
    return value !== null && typeof value === "object" && !Array.isArray(value)
      ? { ...value }
      : {};
  };

  const logging = section("logging");
  const conversion = section("conversion");

  const level = env["SHELF_INTAKE_LOG_LEVEL"];
  if (level) logging["level"] = level;

  const pretty = env["SHELF_INTAKE_PRETTY_LOGS"];
  if (pretty) logging["prettyPrint"] = pretty === "true" || pretty === "1";

  const target = env["SHELF_INTAKE_TARGET_FORMAT"];
  if (target) conversion["targetFormat"] = target;

  return { ...raw, logging, conversion };
}

// ── Public API ──────────────────────────────────────────────────────────────

export interface LoadConfigOptions {
  /** YAML file to read; falls back to `SHELF_INTAKE_CONFIG`. */
  filePath?: string;
  env?: NodeJS.ProcessEnv;
}

/**
 * Load the application configuration.
 *
 * Every setting has a default so the engine can run with zero
 * configuration. Throws {@link ConfigurationError} when the file cannot be
 * read or a value fails validation.
 */
export function loadConfig(options: LoadConfigOptions = {}): AppConfig {
  const env = options.env ?? process.env;
  const filePath = options.filePath ?? env["SHELF_INTAKE_CONFIG"];

  const document = filePath ? readConfigFile(path.resolve(filePath)) : {};
  if (document === null || typeof document !== "object" || Array.isArray(document)) {
    throw new ConfigurationError(
      `Config file ${filePath ?? ""} must contain a mapping at the top level`,
    );
  }

  const result = AppConfigSchema.safeParse(
    applyEnvOverrides({ ...document }, env),
  );
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigurationError(`Invalid configuration: ${issues}`, {
      cause: result.error,
    });
  }

  const validated = result.data;
  return {
    logging: validated.logging,
    matching: validated.matching,
    conversion: {
      targetFormat: validated.conversion.targetFormat.toLowerCase(),
      skipExtensions: validated.conversion.skipExtensions.map((ext) =>
        ext.replace(/^\./, "").toLowerCase(),
      ),
      outputDir: expandHome(validated.conversion.outputDir),
    },
  };
}
