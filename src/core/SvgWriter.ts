import { writeFile } from 'node:fs/promises';
import type { PathEvent } from '../types/events.js';
import type { Transform2D } from '../types/geometry.js';
import { IDENTITY_TRANSFORM } from '../types/geometry.js';
import type {
  DocumentNode,
  DominantBaseline,
  Fill,
  GroupNode,
  Stroke,
  SvgDocument,
} from '../types/nodes.js';
import type { ResolvedWriterOptions, WriterOptions } from '../types/options.js';
import { resolveWriterOptions } from '../types/options.js';
import type { RenderResult, WriteResult } from '../types/results.js';
import { computeViewBox } from '../geometry/ViewBoxCalculator.js';
import {
  cloneNode,
  createGroupNode,
  createImageNode,
  createPathNode,
  createTextNode,
  placeImage,
  type ImagePlacement,
} from '../document/NodeFactory.js';
import { calculateNodeBounds } from '../document/NodeBounds.js';
import { SvgSerializer } from '../document/SvgSerializer.js';
import { FontDatabase } from '../text/FontDatabase.js';
import { TextConverter } from '../text/TextConverter.js';
import { PngOptimizer, isOptimizationDisabled } from '../utils/PngOptimizer.js';
import { ImageDecoder } from '../utils/ImageDecoder.js';
import type { ILogger } from '../utils/Logger.js';
import { createLogger } from '../utils/Logger.js';
import { SvgWriterError } from './errors.js';

/**
 * Everything a writer owns, moved as a whole when fonts are attached.
 */
interface WriterState<TFonts extends FontDatabase | undefined> {
  options: ResolvedWriterOptions;
  logger: ILogger;
  fonts: TFonts;
  nodes: DocumentNode[];
  transform: Transform2D | undefined;
}

/**
 * Collects paths, images, groups and text, then finalizes them into one SVG document.
 *
 * The type parameter records whether a font database is attached. Text can
 * only be pushed on a `SvgWriter<FontDatabase>`, obtained through
 * {@link SvgWriter.addFonts}, {@link SvgWriter.addFontSource} or
 * {@link SvgWriter.addFontsDir}.
 *
 * A writer is single use: rendering, writing or attaching fonts consumes it,
 * and any later call throws a 'consumed' error.
 *
 * @example
 * ```typescript
 * const events = new PathEventBuilder()
 *   .begin({ x: 0, y: 0 })
 *   .lineTo({ x: 10, y: 0 })
 *   .lineTo({ x: 10, y: 10 })
 *   .end(true)
 *   .build();
 *
 * await createWriter()
 *   .push(events, fill('#ff0000'))
 *   .withTransform(fromScale(2))
 *   .write('triangle.svg');
 * ```
 */
export class SvgWriter<TFonts extends FontDatabase | undefined = undefined> {
  private state: WriterState<TFonts> | undefined;

  private constructor(state: WriterState<TFonts>) {
    this.state = state;
  }

  /**
   * Creates an empty writer without fonts.
   */
  static create(options: WriterOptions = {}): SvgWriter {
    const resolved = resolveWriterOptions(options);
    return new SvgWriter<undefined>({
      options: resolved,
      logger: createLogger(resolved.logLevel, 'SvgWriter'),
      fonts: undefined,
      nodes: [],
      transform: undefined,
    });
  }

  /**
   * Attached font database, undefined for a writer without fonts.
   */
  get fonts(): TFonts {
    return this.use('fonts').fonts;
  }

  /**
   * Number of top-level nodes pushed so far.
   */
  get nodeCount(): number {
    return this.use('nodeCount').nodes.length;
  }

  /**
   * Whether the writer was already finalized or moved.
   */
  get isConsumed(): boolean {
    return this.state === undefined;
  }

  /**
   * Translates path events and appends the resulting path.
   *
   * @throws SvgWriterError 'svgFailure' when the events do not form a valid path
   */
  push(events: Iterable<PathEvent>, fill?: Fill, stroke?: Stroke, transform?: Transform2D): this {
    const state = this.use('push');
    const node = createPathNode(events, fill, stroke, transform);
    if (!node) {
      throw new SvgWriterError('svgFailure', 'Path events do not form a valid path');
    }
    state.nodes.push(node);
    state.logger.debug('Path pushed', { commands: node.data.commands.length });
    return this;
  }

  /**
   * Appends a copy of an already built node.
   */
  pushNode(node: DocumentNode): this {
    this.use('pushNode').nodes.push(cloneNode(node));
    return this;
  }

  /**
   * Appends an encoded image placed at the transform's translation.
   *
   * @throws SvgWriterError 'wrongBoundingBox' when the size is not positive
   */
  pushPng(data: Uint8Array, transform: Transform2D, width: number, height: number): this {
    this.use('pushPng').nodes.push(createImageNode(data, transform, width, height));
    return this;
  }

  /**
   * Appends an image of any supported format, sized from its header unless given.
   *
   * @throws SvgWriterError 'imageFailure' or 'wrongBoundingBox'
   */
  pushImage(data: Uint8Array, placement: ImagePlacement = {}): this {
    const state = this.use('pushImage');
    const decoder = new ImageDecoder({ logger: state.logger.child('ImageDecoder') });
    state.nodes.push(placeImage(data, placement, decoder));
    return this;
  }

  /**
   * Appends copies of the nodes wrapped in one group.
   */
  pushGroup(nodes: DocumentNode[], transform: Transform2D = IDENTITY_TRANSFORM): this {
    this.use('pushGroup').nodes.push(createGroupNode(nodes, transform));
    return this;
  }

  /**
   * Sets or replaces the transform applied to the whole document.
   */
  withTransform(transform: Transform2D): this {
    this.use('withTransform').transform = { ...transform };
    return this;
  }

  /**
   * Appends a single-style text block, outlined when the document is finalized.
   *
   * @throws SvgWriterError 'noFonts' when no font database is attached
   * @throws SvgWriterError 'fontFailure' when the font size is not positive
   */
  pushText(
    this: SvgWriter<FontDatabase>,
    text: string,
    transform: Transform2D,
    fill: Fill | undefined,
    stroke: Stroke | undefined,
    fontFamilies: string[],
    fontSize: number,
    dominantBaseline: DominantBaseline = 'auto'
  ): SvgWriter<FontDatabase> {
    const state = this.use('pushText');
    if (!(state.fonts instanceof FontDatabase)) {
      throw new SvgWriterError('noFonts', 'Text requires fonts; call addFonts() first');
    }
    state.nodes.push(
      createTextNode(text, transform, fill, stroke, fontFamilies, fontSize, dominantBaseline)
    );
    return this;
  }

  /**
   * Moves the pushed nodes into a writer that carries the given fonts,
   * replacing any database attached before. This writer is consumed.
   */
  addFonts(fontdb: FontDatabase): SvgWriter<FontDatabase> {
    const state = this.take('addFonts');
    state.logger.debug('Fonts attached', { fonts: fontdb.size });
    return new SvgWriter<FontDatabase>({ ...state, fonts: fontdb });
  }

  /**
   * Parses one font file and adds it to the attached database, or to a new
   * one on a writer without fonts. This writer is consumed only when the font parses.
   *
   * @throws SvgWriterError 'fontFailure' when the data is not a font
   */
  addFontSource(data: Uint8Array): SvgWriter<FontDatabase> {
    const state = this.use('addFontSource');
    const attached: FontDatabase | undefined = state.fonts;
    const fontdb = attached ?? new FontDatabase({ logger: state.logger.child('FontDatabase') });
    fontdb.addFontSource(data);
    return this.addFonts(fontdb);
  }

  /**
   * Loads the font files of a directory into a new font database and attaches
   * it in place of any earlier one. This writer is consumed immediately.
   *
   * @throws SvgWriterError 'fontFailure' when the directory cannot be read
   */
  async addFontsDir(dir: string): Promise<SvgWriter<FontDatabase>> {
    const state = this.take('addFontsDir');
    const fontdb = new FontDatabase({ logger: state.logger.child('FontDatabase') });
    try {
      await fontdb.loadFontsDir(dir);
    } catch (error) {
      throw new SvgWriterError('fontFailure', `Failed to read font directory: ${dir}`, {
        cause: error,
      });
    }
    return new SvgWriter<FontDatabase>({ ...state, fonts: fontdb });
  }

  /**
   * Finalizes the pushed content into a document tree.
   * Text is outlined first so that it contributes to the bounds.
   *
   * @throws SvgWriterError 'wrongBoundingBox' when the bounds are not finite
   */
  async finish(): Promise<SvgDocument> {
    const state = this.take('finish');
    return this.prepare(state);
  }

  /**
   * Finalizes the document and serializes it to SVG.
   */
  async render(): Promise<RenderResult> {
    const state = this.take('render');
    const document = await this.prepare(state);
    const serializer = new SvgSerializer({
      precision: state.options.precision,
      pretty: state.options.pretty,
      logger: state.logger.child('Serializer'),
    });

    return {
      svg: serializer.serialize(document),
      width: document.size.width,
      height: document.size.height,
      viewBox: document.viewBox,
    };
  }

  /**
   * Renders the document and writes it to a file.
   *
   * @throws SvgWriterError 'ioWrite' when the file cannot be written
   */
  async write(filePath: string): Promise<WriteResult> {
    const logger = this.use('write').logger;
    const result = await this.render();

    try {
      await writeFile(filePath, result.svg, 'utf8');
    } catch (error) {
      throw new SvgWriterError(
        'ioWrite',
        `Failed to write ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error }
      );
    }

    const bytesWritten = Buffer.byteLength(result.svg, 'utf8');
    logger.info('Document written', { filePath, bytesWritten });

    return {
      filePath,
      bytesWritten,
      width: result.width,
      height: result.height,
      viewBox: result.viewBox,
    };
  }

  private async prepare(state: WriterState<TFonts>): Promise<SvgDocument> {
    let content = createGroupNode(state.nodes, state.transform ?? IDENTITY_TRANSFORM);

    const fonts: FontDatabase | undefined = state.fonts;
    if (fonts) {
      const converter = new TextConverter({ logger: state.logger.child('TextConverter') });
      content = converter.convertTree(content, fonts);
    }

    const { width, height, viewBox } = computeViewBox(
      content.children.map(calculateNodeBounds),
      content.transform
    );
    state.logger.debug('View box computed', { width, height, viewBox });

    if (!isOptimizationDisabled(state.options.pngOptimization)) {
      const optimizer = new PngOptimizer(state.logger.child('PngOptimizer'));
      await optimizer.initialize();
      content = await this.optimizeImages(content, optimizer, state.options);
    }

    return {
      size: { width, height },
      viewBox,
      root: { kind: 'group', transform: { ...IDENTITY_TRANSFORM }, children: [content] },
    };
  }

  private async optimizeImages(
    group: GroupNode,
    optimizer: PngOptimizer,
    options: ResolvedWriterOptions
  ): Promise<GroupNode> {
    const children: DocumentNode[] = [];
    for (const child of group.children) {
      if (child.kind === 'image' && child.format === 'png') {
        children.push({ ...child, data: await optimizer.optimize(child.data, options.pngOptimization) });
      } else if (child.kind === 'group') {
        children.push(await this.optimizeImages(child, optimizer, options));
      } else {
        children.push(child);
      }
    }
    return { ...group, children };
  }

  private use(operation: string): WriterState<TFonts> {
    if (!this.state) {
      throw new SvgWriterError('consumed', `Cannot call ${operation}() on a consumed writer`);
    }
    return this.state;
  }

  private take(operation: string): WriterState<TFonts> {
    const state = this.use(operation);
    this.state = undefined;
    return state;
  }
}

/**
 * Creates an empty writer without fonts.
 */
export function createWriter(options: WriterOptions = {}): SvgWriter {
  return SvgWriter.create(options);
}
