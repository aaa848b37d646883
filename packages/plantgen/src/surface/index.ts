/**
 * Drawable surfaces
 */

export {
  DEFAULT_SHAPE_STYLE,
  type AffineMatrix,
  type DrawableSurface,
  type ShapeStyle,
} from "./types.js";
export { PlantPath, type PathSegment } from "./PlantPath.js";
export { TransformStack, applyAffine } from "./TransformStack.js";
export {
  RecordingSurface,
  devicePoints,
  deviceCenter,
  type RecordedShape,
  type RecordedPolygon,
  type RecordedEllipse,
  type RecordedPath,
  type SurfaceCall,
} from "./RecordingSurface.js";
export { SvgSurface, type SvgSurfaceOptions } from "./SvgSurface.js";
