/**
 * Document model exports.
 */

export { rgb, parseHexColor, toSvgColor, effectiveOpacity, fill, stroke } from './Paint.js';
export {
  createPathNode,
  createImageNode,
  placeImage,
  createTextNode,
  createGroupNode,
  cloneNode,
  type ImagePlacement,
} from './NodeFactory.js';
export { calculateNodeBounds, unionBounds } from './NodeBounds.js';
export { SvgSerializer, type SvgSerializerConfig, type OrderedXmlNode } from './SvgSerializer.js';
