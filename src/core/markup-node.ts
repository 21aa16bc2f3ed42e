/**
 * Markup Node Model
 *
 * Lossless, immutable tree for the simulator's material and scene-object
 * markup. Every token keeps its raw text so that an untouched document
 * serializes back to the exact bytes it was parsed from.
 */

/**
 * Attribute of an element
 *
 * `value` is the raw, entity-encoded text between the quotes.
 */
export interface MarkupAttribute {
  readonly name: string;
  readonly value: string;
  readonly quote: '"' | "'";
  /** Whitespace between the previous token and the attribute name */
  readonly leading: string;
  /** Raw separator between name and opening quote, e.g. `=` or ` = ` */
  readonly equals: string;
}

export interface MarkupText {
  readonly kind: 'text';
  readonly raw: string;
}

export interface MarkupComment {
  readonly kind: 'comment';
  readonly content: string;
}

export interface MarkupCData {
  readonly kind: 'cdata';
  readonly content: string;
}

export interface MarkupInstruction {
  readonly kind: 'instruction';
  readonly target: string;
  readonly body: string;
}

export interface MarkupDoctype {
  readonly kind: 'doctype';
  readonly body: string;
}

export interface MarkupElement {
  readonly kind: 'element';
  readonly tag: string;
  readonly attributes: readonly MarkupAttribute[];
  readonly children: readonly MarkupContent[];
  readonly selfClosing: boolean;
  /** Whitespace after the last attribute, before `>` or `/>` */
  readonly openTrailing: string;
  /** Whitespace between the closing tag name and `>` */
  readonly closeTrailing: string;
}

export type MarkupContent =
  | MarkupElement
  | MarkupText
  | MarkupComment
  | MarkupCData
  | MarkupInstruction;

export type MarkupMisc =
  | MarkupText
  | MarkupComment
  | MarkupInstruction
  | MarkupDoctype;

export interface MarkupDocument {
  readonly bom: boolean;
  readonly prolog: readonly MarkupMisc[];
  readonly root: MarkupElement;
  readonly epilog: readonly MarkupMisc[];
}

/**
 * Scalar view of a raw value
 */
export type Scalar =
  | { readonly type: 'integer'; readonly value: number; readonly raw: string }
  | { readonly type: 'float'; readonly value: number; readonly raw: string }
  | { readonly type: 'string'; readonly value: string; readonly raw: string };

const INTEGER_PATTERN = /^[+-]?\d+$/;
const FLOAT_PATTERN = /^[+-]?(?:\d+\.\d*|\.\d+|\d+)(?:[eE][+-]?\d+)?$/;

/**
 * Classify a decoded token as integer, float or string
 */
export function readScalar(raw: string): Scalar {
  const token = raw.trim();
  if (INTEGER_PATTERN.test(token)) {
    return { type: 'integer', value: Number(token), raw };
  }
  if (FLOAT_PATTERN.test(token)) {
    return { type: 'float', value: Number(token), raw };
  }
  return { type: 'string', value: raw, raw };
}

const NAMED_ENTITIES: Readonly<Record<string, string>> = {
  amp: '&',
  lt: '<',
  gt: '>',
  quot: '"',
  apos: "'",
};

/**
 * Decode the predefined and numeric character references of raw markup text
 */
export function decodeEntities(raw: string): string {
  return raw.replace(/&(#x[0-9a-fA-F]+|#\d+|[A-Za-z]+);/g, (match, name: string) => {
    if (name.startsWith('#x')) {
      return String.fromCodePoint(parseInt(name.slice(2), 16));
    }
    if (name.startsWith('#')) {
      return String.fromCodePoint(parseInt(name.slice(1), 10));
    }
    return NAMED_ENTITIES[name] ?? match;
  });
}

/**
 * Encode text for use as element content or inside a quoted attribute
 */
export function encodeEntities(text: string, quote?: '"' | "'"): string {
  let encoded = text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
  if (quote === '"') encoded = encoded.replace(/"/g, '&quot;');
  if (quote === "'") encoded = encoded.replace(/'/g, '&apos;');
  return encoded;
}

/**
 * Child elements, skipping text, comments and instructions
 */
export function childElements(element: MarkupElement): MarkupElement[] {
  return element.children.filter((child): child is MarkupElement => child.kind === 'element');
}

/**
 * Attribute lookup by name
 */
export function getAttribute(element: MarkupElement, name: string): MarkupAttribute | undefined {
  return element.attributes.find(attribute => attribute.name === name);
}

/**
 * Decoded attribute value
 */
export function getAttributeValue(element: MarkupElement, name: string): string | undefined {
  const attribute = getAttribute(element, name);
  return attribute ? decodeEntities(attribute.value) : undefined;
}

/**
 * Raw text of an element that holds nothing but text (or nothing at all)
 *
 * Returns undefined for elements with child elements, comments or CDATA,
 * since those are structure rather than a field value.
 */
export function getLeafText(element: MarkupElement): string | undefined {
  if (element.selfClosing) return undefined;
  if (element.children.length === 0) return '';
  if (element.children.length === 1 && element.children[0].kind === 'text') {
    return element.children[0].raw;
  }
  return undefined;
}

/**
 * Decoded, trimmed text of a leaf element
 */
export function getTextValue(element: MarkupElement): string | undefined {
  const raw = getLeafText(element);
  return raw === undefined ? undefined : decodeEntities(raw).trim();
}

/**
 * New element with its leaf text replaced
 */
export function withLeafText(element: MarkupElement, raw: string): MarkupElement {
  return { ...element, children: [{ kind: 'text', raw }] };
}

/**
 * All elements under the root matching a slash separated tag path
 *
 * The root element itself is not part of the path; `*` matches any tag.
 */
export function findElements(document: MarkupDocument, path: string): MarkupElement[] {
  const segments = path.split('/').filter(segment => segment.length > 0);
  let current: MarkupElement[] = [document.root];
  for (const segment of segments) {
    current = current.flatMap(element =>
      childElements(element).filter(child => segment === '*' || child.tag === segment)
    );
  }
  return current;
}
