import path from "node:path";
import type { ConversionConfig, ConversionPlan } from "../../core/types.js";
import { replaceExtension, splitFileName } from "../files/file-name.js";

/**
 * Decide what to do about converting `source` to the target format.
 *
 * Sources whose extension is listed in `skipExtensions` are left for manual
 * conversion; a book that already has the target format needs nothing.
 */
export function planConversion(
  source: string,
  existingFormats: readonly string[],
  config: ConversionConfig,
): ConversionPlan {
  const extension = splitFileName(source).extension?.toLowerCase() ?? "";
  const format = config.targetFormat.toLowerCase();

  if (config.skipExtensions.includes(extension)) {
    return { action: "abandoned", reason: `${extension} files are converted manually` };
  }

  if (existingFormats.some((f) => f.toLowerCase() === format)) {
    return { action: "format_present", format };
  }

  return {
    action: "convert",
    source,
    destination: path.join(config.outputDir, replaceExtension(source, format)),
    format,
  };
}
