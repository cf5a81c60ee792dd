import path from "node:path";
import type { FileNameParts } from "../../core/types.js";

const EXTENSION = /\.([a-zA-Z0-9]+)$/;

/**
 * Split a dropped file's name into base name and extension.
 * Directory components are discarded: "sub/Dune.epub" -> "Dune", "epub".
 */
export function splitFileName(fileName: string): FileNameParts {
  const name = path.basename(fileName.trim());
  const match = EXTENSION.exec(name);
  if (!match || match.index === 0) {
    return { baseName: name, extension: null };
  }
  return {
    baseName: name.slice(0, match.index),
    extension: match[1] ?? null,
  };
}

/** Base name of `fileName` with `extension` in place of its own. */
export function replaceExtension(fileName: string, extension: string): string {
  const { baseName } = splitFileName(fileName);
  return `${baseName}.${extension}`;
}
