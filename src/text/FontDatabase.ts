/**
 * In-memory collection of fonts used to outline text.
 * Fonts are added as parsed opentype.js objects, raw font files, or every
 * font file of a directory, and looked up by family with substitution.
 */

import { readdir, readFile } from 'node:fs/promises';
import { extname, join } from 'node:path';
import * as opentype from 'opentype.js';
import type { Font } from 'opentype.js';
import { FONT_FILE_EXTENSIONS } from '../core/constants.js';
import { SvgWriterError } from '../core/errors.js';
import type { ILogger } from '../utils/Logger.js';
import { createLogger } from '../utils/Logger.js';

/**
 * A font registered in the database.
 */
export interface FontFace {
  /** Family name as reported by the font's name table */
  family: string;
  /** Subfamily, e.g. "Regular" or "Bold" */
  style: string;
  font: Font;
}

/**
 * Configuration for FontDatabase.
 */
export interface FontDatabaseConfig {
  logger?: ILogger;
}

/**
 * Substitution chains tried when a requested family is not loaded.
 */
const FONT_FALLBACK_CHAINS: Record<string, string[]> = {
  'arial': ['Helvetica', 'Liberation Sans', 'DejaVu Sans'],
  'helvetica': ['Arial', 'Liberation Sans', 'DejaVu Sans'],
  'times new roman': ['Times', 'Liberation Serif', 'DejaVu Serif'],
  'times': ['Times New Roman', 'Liberation Serif', 'DejaVu Serif'],
  'courier new': ['Courier', 'Liberation Mono', 'DejaVu Sans Mono'],
  'courier': ['Courier New', 'Liberation Mono', 'DejaVu Sans Mono'],
  'georgia': ['Times New Roman', 'Liberation Serif', 'DejaVu Serif'],
  'verdana': ['DejaVu Sans', 'Arial', 'Helvetica'],
};

/**
 * Families behind the CSS generic family names.
 */
const GENERIC_FAMILIES: Record<string, string[]> = {
  'serif': ['Times New Roman', 'Times', 'Liberation Serif', 'DejaVu Serif', 'Noto Serif'],
  'sans-serif': ['Arial', 'Helvetica', 'Liberation Sans', 'DejaVu Sans', 'Noto Sans', 'Roboto'],
  'monospace': ['Courier New', 'Courier', 'Liberation Mono', 'DejaVu Sans Mono', 'Noto Sans Mono'],
};

/**
 * Reads a name table entry. The name record layout differs between
 * opentype.js releases, so the lookup goes through `getEnglishName`.
 */
function englishName(font: Font, key: 'fontFamily' | 'fontSubfamily'): string | undefined {
  const value: string | undefined = font.getEnglishName(key);
  return value || undefined;
}

function toArrayBuffer(data: Uint8Array): ArrayBuffer {
  const buffer = new ArrayBuffer(data.byteLength);
  new Uint8Array(buffer).set(data);
  return buffer;
}

/**
 * Registry of fonts with family lookup.
 */
export class FontDatabase {
  private readonly logger: ILogger;
  private readonly faces: FontFace[] = [];

  constructor(config: FontDatabaseConfig = {}) {
    this.logger = config.logger ?? createLogger('warn', 'FontDatabase');
  }

  /**
   * Number of registered fonts.
   */
  get size(): number {
    return this.faces.length;
  }

  /**
   * Registers a parsed font.
   */
  addFont(font: Font): FontFace {
    const family = englishName(font, 'fontFamily') ?? 'Unknown';
    const style = englishName(font, 'fontSubfamily') ?? 'Regular';
    const face: FontFace = { family, style, font };
    this.faces.push(face);
    this.logger.debug('Font registered', { family, style });
    return face;
  }

  /**
   * Parses and registers a TrueType, OpenType or WOFF file.
   *
   * @throws SvgWriterError 'fontFailure' when the data is not a font
   */
  addFontSource(data: Uint8Array): FontFace {
    let font: Font;
    try {
      font = opentype.parse(toArrayBuffer(data));
    } catch (error) {
      throw new SvgWriterError(
        'fontFailure',
        `Failed to parse font: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error }
      );
    }
    return this.addFont(font);
  }

  /**
   * Loads every font file directly inside a directory.
   * Files that fail to parse are logged and skipped.
   *
   * @returns Number of fonts loaded
   */
  async loadFontsDir(dir: string): Promise<number> {
    const entries = await readdir(dir, { withFileTypes: true });
    const extensions: readonly string[] = FONT_FILE_EXTENSIONS;
    let loaded = 0;

    for (const entry of entries) {
      if (!entry.isFile() || !extensions.includes(extname(entry.name).toLowerCase())) {
        continue;
      }

      const filePath = join(dir, entry.name);
      try {
        this.addFontSource(await readFile(filePath));
        loaded++;
      } catch (error) {
        this.logger.warn('Skipping unreadable font file', {
          filePath,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }

    this.logger.info('Fonts loaded from directory', { dir, loaded });
    return loaded;
  }

  /**
   * Distinct family names in registration order.
   */
  families(): string[] {
    return [...new Set(this.faces.map((face) => face.family))];
  }

  /**
   * Finds the font for a list of requested families.
   *
   * Tries each family by name, then each family's substitution chain, then
   * the generic families among the request, and finally the first registered font.
   *
   * @returns The font, or undefined when the database is empty
   */
  query(families: readonly string[]): FontFace | undefined {
    const requested = families.map((family) => family.trim().toLowerCase()).filter(Boolean);

    for (const family of requested) {
      const face = this.findFamily(family);
      if (face) return face;
    }

    for (const family of requested) {
      for (const substitute of FONT_FALLBACK_CHAINS[family] ?? []) {
        const face = this.findFamily(substitute.toLowerCase());
        if (face) {
          this.logger.debug('Substituted font family', { requested: family, used: face.family });
          return face;
        }
      }
    }

    for (const family of requested) {
      for (const candidate of GENERIC_FAMILIES[family] ?? []) {
        const face = this.findFamily(candidate.toLowerCase());
        if (face) return face;
      }
    }

    const first = this.faces[0];
    if (first && requested.length > 0) {
      this.logger.debug('No requested family loaded, using first font', {
        requested: families,
        used: first.family,
      });
    }
    return first;
  }

  private findFamily(family: string): FontFace | undefined {
    const matches = this.faces.filter((face) => face.family.toLowerCase() === family);
    return matches.find((face) => face.style.toLowerCase() === 'regular') ?? matches[0];
  }
}

/**
 * Creates an empty font database.
 */
export function createFontDatabase(logger?: ILogger): FontDatabase {
  return new FontDatabase({ logger });
}
