export {
  DEFAULT_SVG_EXPORT_OPTIONS,
  exportToSVG,
  exportToSVGFile,
  mergeSvgExportOptions,
} from "./SvgExporter.js";
export type { SvgExportOptions, SvgExportResult } from "./SvgExporter.js";
