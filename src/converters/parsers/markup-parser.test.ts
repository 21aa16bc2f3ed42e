import { describe, it, expect } from 'vitest';
import { childElements, findElements, getAttributeValue, getTextValue } from '../../core/markup-node';
import { MalformedInputError } from '../../errors';
import { serializeMarkup } from '../serializers/markup-serializer';
import { locate, parseMarkup } from './markup-parser';

const MATERIAL = `<?xml version="1.0" encoding="UTF-8"?>
<root>
  <!-- exported by the editor -->
  <material name='Rail &amp; Tie' custom = "keep"  >
    <renderpass>
      <texunit>
        <map>rail.png</map>
        <tiling><width>10.0</width><height> 2.50 </height></tiling>
        <uvmap scaleu="1.0" scalev="0.5"/>
      </texunit>
    </renderpass>
    <color r="0.80" g="0.1" b="1e-3" />
    <notes><![CDATA[a < b && c]]></notes>
  </material >
</root>
`;

function expectMalformed(text: string): MalformedInputError {
  try {
    parseMarkup(text, 'test.nl2mat');
  } catch (error) {
    expect(error).toBeInstanceOf(MalformedInputError);
    if (error instanceof MalformedInputError) return error;
  }
  throw new Error('Expected the text to be rejected');
}

describe('parseMarkup', () => {
  it('reads elements, attributes and leaf text', () => {
    const document = parseMarkup(MATERIAL);

    expect(document.root.tag).toBe('root');
    const [material] = findElements(document, 'material');
    expect(getAttributeValue(material, 'name')).toBe('Rail & Tie');
    expect(material.attributes.map(attribute => attribute.name)).toEqual(['name', 'custom']);

    const [width] = findElements(document, 'material/renderpass/texunit/tiling/width');
    expect(getTextValue(width)).toBe('10.0');
    const [height] = findElements(document, 'material/renderpass/texunit/tiling/height');
    expect(getTextValue(height)).toBe('2.50');
  });

  it('supports wildcard segments in element lookups', () => {
    const document = parseMarkup(MATERIAL);
    const tags = findElements(document, 'material/renderpass/texunit/*').map(element => element.tag);
    expect(tags).toEqual(['map', 'tiling', 'uvmap']);
  });

  it('keeps comments and CDATA as nodes', () => {
    const document = parseMarkup(MATERIAL);
    const [material] = findElements(document, 'material');
    const [notes] = childElements(material).filter(child => child.tag === 'notes');
    expect(notes.children).toEqual([{ kind: 'cdata', content: 'a < b && c' }]);
    expect(material.children.some(child => child.kind === 'comment')).toBe(false);
    expect(document.root.children.some(child => child.kind === 'comment')).toBe(true);
  });
});

describe('serializeMarkup', () => {
  it('reproduces the parsed text byte for byte', () => {
    expect(serializeMarkup(parseMarkup(MATERIAL))).toBe(MATERIAL);
  });

  it('keeps a byte order mark, CRLF line ends and a doctype', () => {
    const text = '\uFEFF<?xml version="1.0"?>\r\n<!DOCTYPE root [<!ENTITY x "y">]>\r\n<root>\r\n\t<a  b = \'1\'/>\r\n</root>\r\n<!-- trailing -->';
    const document = parseMarkup(text);
    expect(document.bom).toBe(true);
    expect(serializeMarkup(document)).toBe(text);
  });

  it('is stable when applied twice', () => {
    const once = serializeMarkup(parseMarkup(MATERIAL));
    expect(serializeMarkup(parseMarkup(once))).toBe(once);
  });
});

describe('malformed input', () => {
  it('reports a mismatched closing tag with its line and column', () => {
    const error = expectMalformed('<root>\n  <a>\n</root>');
    expect(error.line).toBe(3);
    expect(error.column).toBe(1);
    expect(error.message).toBe('test.nl2mat:3:1: Mismatched closing tag </root>, expected </a>');
  });

  it('rejects unquoted attribute values', () => {
    const error = expectMalformed('<root a=1/>');
    expect(error.line).toBe(1);
    expect(error.column).toBe(9);
  });

  it('rejects a bare ampersand in text', () => {
    const error = expectMalformed('<root>a & b</root>');
    expect(error.column).toBe(9);
  });

  it('rejects character references outside the Unicode range', () => {
    const error = expectMalformed('<root>a&#x110000;</root>');
    expect(error.message).toBe('test.nl2mat:1:8: Character reference &#x110000; is outside the Unicode range');
    expect(expectMalformed('<root a="&#0;"/>').column).toBe(10);
  });

  it('accepts the highest code point', () => {
    expect(serializeMarkup(parseMarkup('<root>&#x10FFFF;</root>', 'test.nl2mat'))).toBe('<root>&#x10FFFF;</root>');
  });

  it('rejects duplicate attributes', () => {
    const error = expectMalformed('<root a="1" a="2"/>');
    expect(error.message).toContain("Duplicate attribute 'a' on <root>");
  });

  it('rejects a second root element', () => {
    const error = expectMalformed('<a/><b/>');
    expect(error.message).toBe('test.nl2mat:1:5: Only one root element is allowed');
  });

  it('rejects a document without a root element', () => {
    const error = expectMalformed('  \n');
    expect(error.line).toBe(2);
    expect(error.column).toBe(1);
  });

  it('rejects unterminated elements', () => {
    const error = expectMalformed('<root>\n<material>');
    expect(error.message).toBe('test.nl2mat:2:1: Unclosed element <material>');
  });
});

describe('locate', () => {
  it('counts lines and columns from 1', () => {
    expect(locate('ab\ncd', 0)).toEqual({ line: 1, column: 1 });
    expect(locate('ab\ncd', 4)).toEqual({ line: 2, column: 2 });
  });
});
