/**
 * Serializes document trees to SVG markup.
 * Builds an order-preserving node list for fast-xml-parser's XMLBuilder so
 * that sibling order in the output matches paint order in the tree.
 */

import { XMLBuilder } from 'fast-xml-parser';
import type { Transform2D } from '../types/geometry.js';
import type {
  DocumentNode,
  GroupNode,
  ImageNode,
  PathNode,
  SvgDocument,
} from '../types/nodes.js';
import { SVG_NAMESPACE, XLINK_NAMESPACE } from '../core/constants.js';
import { formatNumber, pathDataToSvg } from '../geometry/PathBuilder.js';
import { defaultTransformCalculator } from '../geometry/TransformCalculator.js';
import { ImageDecoder } from '../utils/ImageDecoder.js';
import type { ILogger } from '../utils/Logger.js';
import { createLogger } from '../utils/Logger.js';
import { effectiveOpacity, toSvgColor } from './Paint.js';

const ATTR_PREFIX = '@_';

/**
 * One element in XMLBuilder's preserveOrder input: a single tag key holding
 * the children, and ':@' holding the prefixed attributes.
 */
export interface OrderedXmlNode {
  [tagName: string]: OrderedXmlNode[] | Record<string, string>;
}

/**
 * Configuration for SvgSerializer.
 */
export interface SvgSerializerConfig {
  /** Decimal places kept for numbers */
  precision?: number;
  /** Indent the output */
  pretty?: boolean;
  logger?: ILogger;
}

const XML_DECLARATION = '<?xml version="1.0" encoding="UTF-8"?>';

/**
 * Turns an {@link SvgDocument} into SVG text.
 */
export class SvgSerializer {
  private readonly precision: number;
  private readonly pretty: boolean;
  private readonly logger: ILogger;
  private readonly builder: XMLBuilder;
  private readonly imageDecoder: ImageDecoder;

  constructor(config: SvgSerializerConfig = {}) {
    this.precision = config.precision ?? 8;
    this.pretty = config.pretty ?? false;
    this.logger = config.logger ?? createLogger('warn', 'SvgSerializer');
    this.imageDecoder = new ImageDecoder({ logger: this.logger.child('ImageDecoder') });
    this.builder = new XMLBuilder({
      preserveOrder: true,
      ignoreAttributes: false,
      attributeNamePrefix: ATTR_PREFIX,
      suppressEmptyNode: true,
      format: this.pretty,
      indentBy: '  ',
    });
  }

  /**
   * Serializes a finalized document, XML declaration included.
   */
  serialize(document: SvgDocument): string {
    const { size, viewBox, root } = document;
    const n = (value: number): string => this.num(value);

    const svg = this.element(
      'svg',
      {
        xmlns: SVG_NAMESPACE,
        'xmlns:xlink': XLINK_NAMESPACE,
        width: n(size.width),
        height: n(size.height),
        viewBox: `${n(viewBox.x)} ${n(viewBox.y)} ${n(viewBox.width)} ${n(viewBox.height)}`,
      },
      this.children(root)
    );

    const body = this.builder.build([svg]);
    return `${XML_DECLARATION}\n${String(body).trim()}\n`;
  }

  private children(group: GroupNode): OrderedXmlNode[] {
    const nodes: OrderedXmlNode[] = [];
    for (const child of group.children) {
      const node = this.node(child);
      if (node) {
        nodes.push(node);
      }
    }
    return nodes;
  }

  private node(node: DocumentNode): OrderedXmlNode | undefined {
    switch (node.kind) {
      case 'path':
        return this.path(node);
      case 'image':
        return this.image(node);
      case 'group':
        return this.group(node);
      case 'text':
        this.logger.warn('Skipping text that was not converted to paths', { text: node.text });
        return undefined;
    }
  }

  private group(node: GroupNode): OrderedXmlNode {
    const attrs: Record<string, string> = {};
    this.common(attrs, node);
    if (node.opacity !== undefined && node.opacity !== 1) {
      attrs['opacity'] = this.num(node.opacity);
    }
    return this.element('g', attrs, this.children(node));
  }

  private path(node: PathNode): OrderedXmlNode {
    const attrs: Record<string, string> = {};
    if (node.id) attrs['id'] = node.id;
    attrs['d'] = pathDataToSvg(node.data.commands, this.precision);

    if (node.fill) {
      attrs['fill'] = toSvgColor(node.fill.color);
      const opacity = effectiveOpacity(node.fill.color, node.fill.opacity);
      if (opacity !== 1) attrs['fill-opacity'] = this.num(opacity);
      if (node.fill.rule === 'evenodd') attrs['fill-rule'] = 'evenodd';
    } else {
      attrs['fill'] = 'none';
    }

    if (node.stroke) {
      const { stroke } = node;
      attrs['stroke'] = toSvgColor(stroke.color);
      const opacity = effectiveOpacity(stroke.color, stroke.opacity);
      if (opacity !== 1) attrs['stroke-opacity'] = this.num(opacity);
      attrs['stroke-width'] = this.num(stroke.width);
      if (stroke.lineCap !== 'butt') attrs['stroke-linecap'] = stroke.lineCap;
      if (stroke.lineJoin !== 'miter') attrs['stroke-linejoin'] = stroke.lineJoin;
      if (stroke.dashArray && stroke.dashArray.length > 0) {
        attrs['stroke-dasharray'] = stroke.dashArray.map((value) => this.num(value)).join(' ');
      }
    }

    this.transform(attrs, node.transform);
    return this.element('path', attrs, []);
  }

  private image(node: ImageNode): OrderedXmlNode {
    const attrs: Record<string, string> = {};
    if (node.id) attrs['id'] = node.id;
    attrs['x'] = this.num(node.viewRect.x);
    attrs['y'] = this.num(node.viewRect.y);
    attrs['width'] = this.num(node.viewRect.width);
    attrs['height'] = this.num(node.viewRect.height);
    attrs['preserveAspectRatio'] = 'none';
    attrs['image-rendering'] = node.rendering;
    this.transform(attrs, node.transform);
    attrs['xlink:href'] = this.imageDecoder.toDataUri(node.data, node.format);
    return this.element('image', attrs, []);
  }

  private common(attrs: Record<string, string>, node: DocumentNode): void {
    if (node.id) attrs['id'] = node.id;
    this.transform(attrs, node.transform);
  }

  private transform(attrs: Record<string, string>, transform: Transform2D): void {
    if (defaultTransformCalculator.isIdentity(transform)) {
      return;
    }
    const { a, b, c, d, e, f } = transform;
    attrs['transform'] = `matrix(${[a, b, c, d, e, f].map((value) => this.num(value)).join(' ')})`;
  }

  private element(tag: string, attrs: Record<string, string>, children: OrderedXmlNode[]): OrderedXmlNode {
    const prefixed: Record<string, string> = {};
    for (const [name, value] of Object.entries(attrs)) {
      prefixed[`${ATTR_PREFIX}${name}`] = value;
    }
    return { [tag]: children, ':@': prefixed };
  }

  private num(value: number): string {
    return formatNumber(value, this.precision);
  }
}
