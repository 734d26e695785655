/**
 * Construction of document nodes from events, images and text.
 */

import type { Transform2D } from '../types/geometry.js';
import { IDENTITY_TRANSFORM } from '../types/geometry.js';
import type { PathEvent } from '../types/events.js';
import type {
  DocumentNode,
  DominantBaseline,
  Fill,
  GroupNode,
  ImageNode,
  ImageRendering,
  PathNode,
  Stroke,
  TextNode,
} from '../types/nodes.js';
import { translatePathEvents } from '../geometry/PathTranslator.js';
import { SvgWriterError } from '../core/errors.js';
import { ImageDecoder, type DecodedImage } from '../utils/ImageDecoder.js';

/**
 * Placement options for {@link placeImage}.
 */
export interface ImagePlacement {
  /** Left edge, defaults to 0 */
  x?: number;
  /** Top edge, defaults to 0 */
  y?: number;
  /** Defaults to the intrinsic pixel width */
  width?: number;
  /** Defaults to the intrinsic pixel height */
  height?: number;
  transform?: Transform2D;
  rendering?: ImageRendering;
}

const defaultDecoder = new ImageDecoder();

/**
 * Translates path events into a path node.
 *
 * @returns The node, or undefined when the events do not form a valid path
 */
export function createPathNode(
  events: Iterable<PathEvent>,
  fill?: Fill,
  stroke?: Stroke,
  transform?: Transform2D
): PathNode | undefined {
  const data = translatePathEvents(events);
  if (!data) {
    return undefined;
  }

  return {
    kind: 'path',
    data,
    fill,
    stroke,
    transform: { ...(transform ?? IDENTITY_TRANSFORM) },
  };
}

/**
 * Creates an image node placed at the transform's translation with the given size.
 * Only the translation of `transform` is used; the node itself gets the identity.
 * The format is detected from the data and assumed PNG when unrecognized.
 *
 * @throws SvgWriterError 'wrongBoundingBox' when the size is not positive
 */
export function createImageNode(
  data: Uint8Array,
  transform: Transform2D,
  width: number,
  height: number
): ImageNode {
  if (!(width > 0 && height > 0 && Number.isFinite(width) && Number.isFinite(height))) {
    throw SvgWriterError.wrongBoundingBox({
      minX: transform.e - width / 2,
      maxX: transform.e + width / 2,
      minY: transform.f - height / 2,
      maxY: transform.f + height / 2,
    });
  }

  const detected = defaultDecoder.detectFormat(data);

  return {
    kind: 'image',
    format: detected === 'unknown' ? 'png' : detected,
    data: Uint8Array.from(data),
    viewRect: { x: transform.e, y: transform.f, width, height },
    rendering: 'optimizeQuality',
    transform: { ...IDENTITY_TRANSFORM },
  };
}

/**
 * Creates an image node from any supported format. Missing width or height
 * is taken from the image header.
 *
 * @throws SvgWriterError 'imageFailure' when the format is unsupported or the header unreadable
 * @throws SvgWriterError 'wrongBoundingBox' when the resulting size is not positive
 */
export function placeImage(
  data: Uint8Array,
  placement: ImagePlacement = {},
  decoder: ImageDecoder = defaultDecoder
): ImageNode {
  let decoded: DecodedImage;
  try {
    decoded = decoder.decode(data);
  } catch (error) {
    throw new SvgWriterError(
      'imageFailure',
      error instanceof Error ? error.message : String(error),
      { cause: error }
    );
  }

  const width = placement.width ?? decoded.width;
  const height = placement.height ?? decoded.height;
  const x = placement.x ?? 0;
  const y = placement.y ?? 0;
  if (!(width > 0 && height > 0 && Number.isFinite(width) && Number.isFinite(height))) {
    throw SvgWriterError.wrongBoundingBox({ minX: x, maxX: x + width, minY: y, maxY: y + height });
  }

  return {
    kind: 'image',
    format: decoded.format,
    data: Uint8Array.from(data),
    viewRect: { x, y, width, height },
    rendering: placement.rendering ?? 'optimizeQuality',
    transform: { ...(placement.transform ?? IDENTITY_TRANSFORM) },
  };
}

/**
 * Creates a single-chunk text node whose style applies to all of the text.
 *
 * @throws SvgWriterError 'fontFailure' when the font size is not positive
 */
export function createTextNode(
  text: string,
  transform: Transform2D,
  fill: Fill | undefined,
  stroke: Stroke | undefined,
  fontFamilies: string[],
  fontSize: number,
  dominantBaseline: DominantBaseline = 'auto'
): TextNode {
  if (!(fontSize > 0 && Number.isFinite(fontSize))) {
    throw new SvgWriterError('fontFailure', `Font size must be a positive number, got ${fontSize}`);
  }

  return {
    kind: 'text',
    text,
    fontFamilies: [...fontFamilies],
    fontSize,
    fill,
    stroke,
    dominantBaseline,
    transform: { ...transform },
  };
}

/**
 * Wraps nodes in a group sharing one transform.
 */
export function createGroupNode(
  children: DocumentNode[],
  transform: Transform2D = IDENTITY_TRANSFORM,
  opacity?: number
): GroupNode {
  return {
    kind: 'group',
    transform: { ...transform },
    opacity,
    children: children.map(cloneNode),
  };
}

/**
 * Deep copy of a node so that no two trees share a primitive.
 */
export function cloneNode<T extends DocumentNode>(node: T): T;
export function cloneNode(node: DocumentNode): DocumentNode {
  switch (node.kind) {
    case 'path':
      return {
        ...node,
        transform: { ...node.transform },
        fill: node.fill && { ...node.fill, color: { ...node.fill.color } },
        stroke: node.stroke && {
          ...node.stroke,
          color: { ...node.stroke.color },
          dashArray: node.stroke.dashArray && [...node.stroke.dashArray],
        },
      };
    case 'image':
      return {
        ...node,
        transform: { ...node.transform },
        viewRect: { ...node.viewRect },
        data: Uint8Array.from(node.data),
      };
    case 'text':
      return {
        ...node,
        transform: { ...node.transform },
        fontFamilies: [...node.fontFamilies],
        fill: node.fill && { ...node.fill, color: { ...node.fill.color } },
        stroke: node.stroke && { ...node.stroke, color: { ...node.stroke.color } },
      };
    case 'group':
      return {
        ...node,
        transform: { ...node.transform },
        children: node.children.map(cloneNode),
      };
  }
}
