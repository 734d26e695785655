/**
 * Converts text nodes to path nodes using glyph outlines from a FontDatabase.
 */

import type { Font, PathCommand } from 'opentype.js';
import type { DocumentNode, DominantBaseline, GroupNode, PathNode, TextNode } from '../types/nodes.js';
import { PathBuilder } from '../geometry/PathBuilder.js';
import type { ILogger } from '../utils/Logger.js';
import { createLogger } from '../utils/Logger.js';
import type { FontDatabase } from './FontDatabase.js';

/**
 * Configuration for TextConverter.
 */
export interface TextConverterConfig {
  logger?: ILogger;
}

/**
 * Y position of the alphabetic baseline so that the requested baseline sits at y = 0.
 * Glyph space is y-up; the returned offset is in y-down user units.
 */
export function baselineOffset(font: Font, fontSize: number, baseline: DominantBaseline): number {
  const scale = fontSize / font.unitsPerEm;
  switch (baseline) {
    case 'auto':
    case 'alphabetic':
      return 0;
    case 'hanging':
    case 'text-before-edge':
      return font.ascender * scale;
    case 'middle':
    case 'central':
      return ((font.ascender + font.descender) / 2) * scale;
    case 'text-after-edge':
    case 'ideographic':
      return font.descender * scale;
  }
}

function appendCommand(builder: PathBuilder, command: PathCommand): void {
  switch (command.type) {
    case 'M':
      builder.moveTo(command.x, command.y);
      break;
    case 'L':
      builder.lineTo(command.x, command.y);
      break;
    case 'Q':
      builder.quadTo(command.x1, command.y1, command.x, command.y);
      break;
    case 'C':
      builder.cubicTo(command.x1, command.y1, command.x2, command.y2, command.x, command.y);
      break;
    case 'Z':
      builder.close();
      break;
  }
}

/**
 * Outlines text with the fonts of a database.
 */
export class TextConverter {
  private readonly logger: ILogger;

  constructor(config: TextConverterConfig = {}) {
    this.logger = config.logger ?? createLogger('warn', 'TextConverter');
  }

  /**
   * Converts one text node to a path node carrying the text's paint and transform.
   *
   * @returns The path node, or undefined when no font is available or the text has no outline
   */
  convertText(node: TextNode, fontdb: FontDatabase): PathNode | undefined {
    const face = fontdb.query(node.fontFamilies);
    if (!face) {
      this.logger.warn('No font available for text', { families: node.fontFamilies });
      return undefined;
    }

    const y = baselineOffset(face.font, node.fontSize, node.dominantBaseline);
    const outline = face.font.getPath(node.text, 0, y, node.fontSize);

    const builder = new PathBuilder();
    for (const command of outline.commands) {
      appendCommand(builder, command);
    }

    const data = builder.finish();
    if (!data) {
      this.logger.debug('Text has no outline', { text: node.text, family: face.family });
      return undefined;
    }

    return {
      kind: 'path',
      id: node.id,
      data,
      fill: node.fill,
      stroke: node.stroke,
      transform: { ...node.transform },
    };
  }

  /**
   * Returns a copy of the tree with every text node replaced by its outline.
   * Text that cannot be outlined is dropped.
   */
  convertTree(group: GroupNode, fontdb: FontDatabase): GroupNode {
    const children: DocumentNode[] = [];

    for (const child of group.children) {
      switch (child.kind) {
        case 'text': {
          const path = this.convertText(child, fontdb);
          if (path) children.push(path);
          break;
        }
        case 'group':
          children.push(this.convertTree(child, fontdb));
          break;
        default:
          children.push(child);
      }
    }

    return { ...group, transform: { ...group.transform }, children };
  }
}

/**
 * Creates a text converter.
 */
export function createTextConverter(logger?: ILogger): TextConverter {
  return new TextConverter({ logger });
}
