/**
 * Geometry module for path translation, transforms and view box calculation.
 */

export {
  PathBuilder,
  calculatePathBounds,
  commandPoints,
  formatNumber,
  pathDataToSvg,
} from './PathBuilder.js';
export { PathEventBuilder } from './PathEventBuilder.js';
export { translatePathEvents } from './PathTranslator.js';
export {
  TransformCalculator,
  defaultTransformCalculator,
  fromRow,
  fromTranslate,
  fromScale,
  fromRotate,
  fromRotateAt,
  fromSkew,
} from './TransformCalculator.js';
export { computeViewBox, type ViewBoxResult } from './ViewBoxCalculator.js';
