/**
 * Bounding boxes of document nodes in their parent's coordinate space.
 */

import type { Bounds } from '../types/geometry.js';
import type { DocumentNode } from '../types/nodes.js';
import { defaultTransformCalculator } from '../geometry/TransformCalculator.js';

/**
 * Smallest box containing both inputs.
 */
export function unionBounds(a: Bounds | undefined, b: Bounds | undefined): Bounds | undefined {
  if (!a) return b && { ...b };
  if (!b) return { ...a };
  return {
    minX: Math.min(a.minX, b.minX),
    minY: Math.min(a.minY, b.minY),
    maxX: Math.max(a.maxX, b.maxX),
    maxY: Math.max(a.maxY, b.maxY),
  };
}

/**
 * Calculates a node's bounds with its own transform applied.
 *
 * Paths use every command point, images their placement rectangle and groups
 * the union of their children. Text has no geometry until it is converted to
 * paths, and neither has an empty group: both return undefined.
 */
export function calculateNodeBounds(node: DocumentNode): Bounds | undefined {
  let local: Bounds | undefined;

  switch (node.kind) {
    case 'path':
      local = node.data.bounds;
      break;

    case 'image':
      local = {
        minX: node.viewRect.x,
        minY: node.viewRect.y,
        maxX: node.viewRect.x + node.viewRect.width,
        maxY: node.viewRect.y + node.viewRect.height,
      };
      break;

    case 'text':
      return undefined;

    case 'group':
      local = node.children.reduce<Bounds | undefined>(
        (acc, child) => unionBounds(acc, calculateNodeBounds(child)),
        undefined
      );
      break;
  }

  return local && defaultTransformCalculator.getBoundingBounds(local, node.transform);
}
