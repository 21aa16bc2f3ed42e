/**
 * Markup Serializer
 *
 * Writes a markup document back to text. Every token is emitted from the raw
 * text the parser captured, so `serializeMarkup(parseMarkup(text)) === text`.
 */

import {
  MarkupAttribute,
  MarkupContent,
  MarkupDocument,
  MarkupElement,
  MarkupMisc,
} from '../../core/markup-node';

const BOM = '\uFEFF';

/**
 * Serialize a document to text
 */
export function serializeMarkup(document: MarkupDocument): string {
  const parts: string[] = [];
  if (document.bom) parts.push(BOM);
  for (const item of document.prolog) parts.push(serializeNode(item));
  parts.push(serializeElement(document.root));
  for (const item of document.epilog) parts.push(serializeNode(item));
  return parts.join('');
}

/**
 * Serialize a single element and its subtree
 */
export function serializeElement(element: MarkupElement): string {
  const open = `<${element.tag}${element.attributes.map(serializeAttribute).join('')}${element.openTrailing}`;
  if (element.selfClosing) {
    return `${open}/>`;
  }
  const content = element.children.map(serializeNode).join('');
  return `${open}>${content}</${element.tag}${element.closeTrailing}>`;
}

function serializeAttribute(attribute: MarkupAttribute): string {
  return `${attribute.leading}${attribute.name}${attribute.equals}${attribute.quote}${attribute.value}${attribute.quote}`;
}

function serializeNode(node: MarkupContent | MarkupMisc): string {
  switch (node.kind) {
    case 'element':
      return serializeElement(node);
    case 'text':
      return node.raw;
    case 'comment':
      return `<!--${node.content}-->`;
    case 'cdata':
      return `<![CDATA[${node.content}]]>`;
    case 'instruction':
      return `<?${node.target}${node.body}?>`;
    case 'doctype':
      return `<!DOCTYPE${node.body}>`;
  }
}
