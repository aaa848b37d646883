/**
 * SVG export
 *
 * Renders a plant at its current age into a standalone SVG document, for
 * saving a finished session's plant.
 */

import type { Plant } from "../Plant.js";
import { SvgSurface } from "../surface/SvgSurface.js";

export interface SvgExportOptions {
  width: number;
  height: number;
  /** Output file name; `.svg` is appended when missing */
  filename: string;
  /** Decimal places kept for coordinates */
  precision: number;
  /** Background fill, or null for a transparent document */
  background: string | null;
}

export interface SvgExportResult {
  filename: string;
  mimeType: "image/svg+xml";
  data: string;
  /** Number of shape elements in the document */
  elementCount: number;
}

export const DEFAULT_SVG_EXPORT_OPTIONS: Readonly<SvgExportOptions> = {
  width: 300,
  height: 300,
  filename: "plant",
  precision: 3,
  background: null,
};

export function mergeSvgExportOptions(
  partial: Partial<SvgExportOptions> = {},
): SvgExportOptions {
  return { ...DEFAULT_SVG_EXPORT_OPTIONS, ...partial };
}

/**
 * Export a plant to an SVG document.
 */
export function exportToSVG(
  plant: Plant,
  options: Partial<SvgExportOptions> = {},
): SvgExportResult {
  const { width, height, filename, precision, background } =
    mergeSvgExportOptions(options);

  const surface = new SvgSurface(width, height, { precision, background });
  plant.draw(surface, width, height);

  if (surface.elementCount === 0) {
    console.warn(`[SvgExporter] ${plant.kind} produced an empty document`);
  }

  return {
    filename: filename.endsWith(".svg") ? filename : `${filename}.svg`,
    mimeType: "image/svg+xml",
    data: surface.toString(),
    elementCount: surface.elementCount,
  };
}

/**
 * Export a plant to an SVG file.
 *
 * @param outputPath - Full path to the output file
 */
export async function exportToSVGFile(
  plant: Plant,
  outputPath: string,
  options: Partial<SvgExportOptions> = {},
): Promise<SvgExportResult> {
  const result = exportToSVG(plant, options);

  const { writeFile } = await import("node:fs/promises");
  await writeFile(outputPath, result.data, "utf8");

  return result;
}
