/**
 * Markup Parser
 *
 * Parses material (.nl2mat), scene-object (.nl2sco) and template markup into
 * the lossless node model. Whitespace, quoting, comments and attribute order
 * are kept as tokens so the serializer can reproduce the input exactly.
 */

import {
  MarkupAttribute,
  MarkupCData,
  MarkupComment,
  MarkupContent,
  MarkupDoctype,
  MarkupDocument,
  MarkupElement,
  MarkupInstruction,
  MarkupMisc,
} from '../../core/markup-node';
import { MalformedInputError } from '../../errors';

const BOM = '\uFEFF';
const NAME_START = /[A-Za-z_:\u00C0-\uFFFF]/;
const NAME_CHAR = /[A-Za-z0-9_:.\-\u00B7\u00C0-\uFFFF]/;
const WHITESPACE = /[ \t\r\n]/;
const BARE_AMPERSAND = /&(?!(?:#x[0-9a-fA-F]+|#\d+|[A-Za-z_][\w.-]*);)/;
const NUMERIC_REFERENCE = /&#(x[0-9a-fA-F]+|\d+);/g;
const MAX_CODE_POINT = 0x10ffff;

/**
 * Markup Parser
 *
 * One instance parses one text; use `parseMarkup` for the common case.
 */
export class MarkupParser {
  private position = 0;

  constructor(
    private readonly text: string,
    private readonly source: string = '<input>'
  ) {}

  /**
   * Parse the whole text into a document
   */
  parse(): MarkupDocument {
    const bom = this.text.startsWith(BOM);
    if (bom) this.position = BOM.length;

    const prolog = this.parseMisc(true);
    if (this.atEnd()) {
      this.fail('Document has no root element');
    }
    const root = this.parseElement();
    const epilog = this.parseMisc(false);

    if (!this.atEnd()) {
      this.fail('Only one root element is allowed');
    }

    return { bom, prolog, root, epilog };
  }

  /**
   * Parse whitespace, comments, instructions and (in the prolog) a doctype
   *
   * Stops at the root element in the prolog or at the end of input.
   */
  private parseMisc(inProlog: boolean): MarkupMisc[] {
    const items: MarkupMisc[] = [];

    while (!this.atEnd()) {
      if (WHITESPACE.test(this.peek())) {
        items.push({ kind: 'text', raw: this.readWhile(WHITESPACE) });
      } else if (this.lookingAt('<?')) {
        items.push(this.parseInstruction());
      } else if (this.lookingAt('<!--')) {
        items.push(this.parseComment());
      } else if (this.lookingAt('<!DOCTYPE')) {
        if (!inProlog) this.fail('Doctype is only allowed before the root element');
        items.push(this.parseDoctype());
      } else if (this.lookingAt('<') && inProlog) {
        break;
      } else if (this.lookingAt('<')) {
        this.fail('Only one root element is allowed');
      } else {
        this.fail(inProlog
          ? 'Text is not allowed before the root element'
          : 'Text is not allowed after the root element');
      }
    }

    return items;
  }

  private parseElement(): MarkupElement {
    const start = this.position;
    this.expect('<');
    const tag = this.readName('element name');

    const attributes: MarkupAttribute[] = [];
    let openTrailing = '';
    let selfClosing = false;

    for (;;) {
      const whitespace = this.readWhile(WHITESPACE);
      if (this.atEnd()) {
        this.fail(`Unterminated start tag <${tag}>`, start);
      }
      if (this.lookingAt('/>')) {
        this.position += 2;
        openTrailing = whitespace;
        selfClosing = true;
        break;
      }
      if (this.lookingAt('>')) {
        this.position += 1;
        openTrailing = whitespace;
        break;
      }
      if (whitespace.length === 0) {
        this.fail(`Expected whitespace, '>' or '/>' in start tag <${tag}>`);
      }

      const attribute = this.parseAttribute(whitespace);
      if (attributes.some(existing => existing.name === attribute.name)) {
        this.fail(`Duplicate attribute '${attribute.name}' on <${tag}>`);
      }
      attributes.push(attribute);
    }

    if (selfClosing) {
      return { kind: 'element', tag, attributes, children: [], selfClosing, openTrailing, closeTrailing: '' };
    }

    const children = this.parseContent(tag, start);
    const closeTrailing = this.parseClosingTag(tag);

    return { kind: 'element', tag, attributes, children, selfClosing, openTrailing, closeTrailing };
  }

  private parseAttribute(leading: string): MarkupAttribute {
    const name = this.readName('attribute name');
    const equals = this.readWhile(WHITESPACE) + this.expect('=') + this.readWhile(WHITESPACE);

    const quote = this.peek();
    if (quote !== '"' && quote !== "'") {
      return this.fail(`Attribute '${name}' value must be quoted`);
    }
    this.position += 1;

    const valueStart = this.position;
    const end = this.text.indexOf(quote, valueStart);
    if (end < 0) {
      this.fail(`Unterminated value of attribute '${name}'`, valueStart);
    }
    const value = this.text.slice(valueStart, end);
    const lessThan = value.indexOf('<');
    if (lessThan >= 0) {
      this.fail(`'<' is not allowed in the value of attribute '${name}'`, valueStart + lessThan);
    }
    this.checkReferences(value, valueStart);
    this.position = end + 1;

    return { name, value, quote, leading, equals };
  }

  /**
   * Parse element content up to (not including) the closing tag
   */
  private parseContent(tag: string, start: number): MarkupContent[] {
    const children: MarkupContent[] = [];

    for (;;) {
      if (this.atEnd()) {
        this.fail(`Unclosed element <${tag}>`, start);
      }
      if (this.lookingAt('</')) {
        return children;
      }
      if (this.lookingAt('<!--')) {
        children.push(this.parseComment());
      } else if (this.lookingAt('<![CDATA[')) {
        children.push(this.parseCData());
      } else if (this.lookingAt('<?')) {
        children.push(this.parseInstruction());
      } else if (this.lookingAt('<!')) {
        this.fail('Unexpected markup declaration inside an element');
      } else if (this.lookingAt('<')) {
        children.push(this.parseElement());
      } else {
        const textStart = this.position;
        const next = this.text.indexOf('<', textStart);
        const end = next < 0 ? this.text.length : next;
        const raw = this.text.slice(textStart, end);
        this.checkReferences(raw, textStart);
        this.position = end;
        children.push({ kind: 'text', raw });
      }
    }
  }

  private parseClosingTag(tag: string): string {
    const start = this.position;
    this.expect('</');
    const name = this.readName('closing tag name');
    if (name !== tag) {
      this.fail(`Mismatched closing tag </${name}>, expected </${tag}>`, start);
    }
    const closeTrailing = this.readWhile(WHITESPACE);
    this.expect('>');
    return closeTrailing;
  }

  private parseComment(): MarkupComment {
    const start = this.position;
    this.position += 4;
    const end = this.text.indexOf('-->', this.position);
    if (end < 0) {
      this.fail('Unterminated comment', start);
    }
    const content = this.text.slice(this.position, end);
    const doubleDash = content.indexOf('--');
    if (doubleDash >= 0 || content.endsWith('-')) {
      this.fail("'--' is not allowed inside a comment", this.position + Math.max(doubleDash, 0));
    }
    this.position = end + 3;
    return { kind: 'comment', content };
  }

  private parseCData(): MarkupCData {
    const start = this.position;
    this.position += 9;
    const end = this.text.indexOf(']]>', this.position);
    if (end < 0) {
      this.fail('Unterminated CDATA section', start);
    }
    const content = this.text.slice(this.position, end);
    this.position = end + 3;
    return { kind: 'cdata', content };
  }

  private parseInstruction(): MarkupInstruction {
    const start = this.position;
    this.position += 2;
    const target = this.readName('processing instruction target');
    const end = this.text.indexOf('?>', this.position);
    if (end < 0) {
      this.fail(`Unterminated processing instruction <?${target}`, start);
    }
    const body = this.text.slice(this.position, end);
    if (body.length > 0 && !WHITESPACE.test(body[0])) {
      this.fail(`Expected whitespace after <?${target}`);
    }
    this.position = end + 2;
    return { kind: 'instruction', target, body };
  }

  /**
   * Doctype up to its closing '>', skipping over an internal subset in brackets
   */
  private parseDoctype(): MarkupDoctype {
    const start = this.position;
    this.position += '<!DOCTYPE'.length;
    const bodyStart = this.position;
    let depth = 0;

    while (!this.atEnd()) {
      const char = this.peek();
      if (char === '[') depth++;
      if (char === ']') depth--;
      if (char === '>' && depth <= 0) {
        const body = this.text.slice(bodyStart, this.position);
        this.position += 1;
        return { kind: 'doctype', body };
      }
      this.position++;
    }

    return this.fail('Unterminated doctype', start);
  }

  private readName(what: string): string {
    const start = this.position;
    if (this.atEnd() || !NAME_START.test(this.peek())) {
      this.fail(`Expected ${what}`);
    }
    this.position++;
    while (!this.atEnd() && NAME_CHAR.test(this.peek())) {
      this.position++;
    }
    return this.text.slice(start, this.position);
  }

  private readWhile(pattern: RegExp): string {
    const start = this.position;
    while (!this.atEnd() && pattern.test(this.peek())) {
      this.position++;
    }
    return this.text.slice(start, this.position);
  }

  private expect(token: string): string {
    if (!this.lookingAt(token)) {
      this.fail(`Expected '${token}'`);
    }
    this.position += token.length;
    return token;
  }

  private checkReferences(raw: string, offset: number): void {
    const match = BARE_AMPERSAND.exec(raw);
    if (match) {
      this.fail("'&' must start a character or entity reference", offset + match.index);
    }
    for (const numeric of raw.matchAll(NUMERIC_REFERENCE)) {
      const digits = numeric[1];
      const codePoint = digits.startsWith('x') ? parseInt(digits.slice(1), 16) : parseInt(digits, 10);
      if (codePoint === 0 || codePoint > MAX_CODE_POINT) {
        this.fail(`Character reference ${numeric[0]} is outside the Unicode range`, offset + (numeric.index ?? 0));
      }
    }
  }

  private lookingAt(token: string): boolean {
    return this.text.startsWith(token, this.position);
  }

  private peek(): string {
    return this.text[this.position];
  }

  private atEnd(): boolean {
    return this.position >= this.text.length;
  }

  private fail(message: string, offset: number = this.position): never {
    const { line, column } = locate(this.text, offset);
    throw new MalformedInputError(message, this.source, line, column);
  }
}

/**
 * 1-based line and column of an offset
 */
export function locate(text: string, offset: number): { line: number; column: number } {
  let line = 1;
  let lineStart = 0;
  const limit = Math.min(offset, text.length);
  for (let i = 0; i < limit; i++) {
    if (text[i] === '\n') {
      line++;
      lineStart = i + 1;
    }
  }
  return { line, column: limit - lineStart + 1 };
}

/**
 * Parse markup text into a document
 *
 * @param sourceName - Used in error messages, typically the file path
 */
export function parseMarkup(text: string, sourceName?: string): MarkupDocument {
  return new MarkupParser(text, sourceName).parse();
}
