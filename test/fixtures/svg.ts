import { XMLParser } from 'fast-xml-parser';

/**
 * Parsed SVG element: prefixed attributes plus the child elements the tests inspect.
 */
export interface ParsedElement {
  [attribute: `@_${string}`]: string | undefined;
  g?: ParsedElement[];
  path?: ParsedElement[];
  image?: ParsedElement[];
}

const REPEATED_ELEMENTS = new Set(['g', 'path', 'image']);

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: '@_',
  isArray: (name) => REPEATED_ELEMENTS.has(name),
});

/**
 * Parses serialized SVG and returns the root svg element.
 */
export function parseSvg(svg: string): ParsedElement {
  const document: { svg: ParsedElement } = parser.parse(svg);
  return document.svg;
}
