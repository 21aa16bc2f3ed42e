/**
 * Scale Transform Engine
 *
 * Produces the variant of a parsed document at one scale factor by applying
 * the rule table field by field. Fields without a rule pass through
 * untouched. The input document is never modified; unchanged subtrees are
 * shared with the result.
 */

import {
  decodeEntities,
  encodeEntities,
  getLeafText,
  MarkupAttribute,
  MarkupContent,
  MarkupDocument,
  MarkupElement,
  withLeafText,
} from '../core/markup-node';
import { UnsupportedScaleFactorError } from '../errors';
import {
  DocumentKind,
  FieldPath,
  formatFieldPath,
  matchesFieldPath,
  ScaleFactor,
  ScaleRuleTable,
  TransformKind,
  TransformKindName,
} from '../templates/rule-table';
import { scaledFileName } from './helpers/file-naming';
import { scaleNumericToken } from './helpers/numeric-scaling';

/**
 * A parsed source file
 */
export interface SourceDocument {
  readonly kind: DocumentKind;
  /** Base name of the file, e.g. `rail.nl2mat` */
  readonly fileName: string;
  readonly markup: MarkupDocument;
}

/**
 * What happened to one field covered by a non-identity rule
 */
export interface FieldChange {
  readonly path: string;
  readonly rule: TransformKindName;
  readonly before: string;
  readonly after: string;
  readonly status: 'changed' | 'unchanged' | 'skipped';
  readonly reason?: string;
}

/**
 * A rewritten file reference (filename-suffix field)
 */
export interface FileReference {
  readonly path: string;
  readonly source: string;
  readonly target: string;
}

/**
 * A companion file named by an asset field
 */
export interface AssetReference {
  readonly path: string;
  readonly file: string;
}

export interface TransformResult {
  readonly document: SourceDocument;
  readonly changes: readonly FieldChange[];
  readonly references: readonly FileReference[];
  readonly assets: readonly AssetReference[];
}

interface TransformContext {
  readonly kind: DocumentKind;
  readonly factor: ScaleFactor;
  readonly table: ScaleRuleTable;
  readonly assetPaths: readonly FieldPath[];
  readonly changes: FieldChange[];
  readonly references: FileReference[];
  readonly assets: AssetReference[];
}

/**
 * Split raw text into leading whitespace, value and trailing whitespace
 */
function splitPadding(raw: string): [string, string, string] {
  const match = /^(\s*)(.*?)(\s*)$/s.exec(raw);
  return match ? [match[1], match[2], match[3]] : ['', raw, ''];
}

/**
 * Apply one rule to a raw value
 *
 * @param quote - quote character for attribute values, undefined for element text
 * @returns the new raw value
 */
function applyRule(
  raw: string,
  kind: TransformKind,
  path: FieldPath,
  context: TransformContext,
  quote?: '"' | "'"
): string {
  if (kind.type === 'identity') return raw;

  const location = formatFieldPath(path);
  const record = (after: string, status: FieldChange['status'], reason?: string): string => {
    context.changes.push({ path: location, rule: kind.type, before: raw, after, status, ...(reason ? { reason } : {}) });
    return after;
  };

  if (kind.type === 'filename-suffix') {
    const [leading, value, trailing] = splitPadding(raw);
    const source = decodeEntities(value);
    if (source.length === 0) {
      return record(raw, 'skipped', 'empty file reference');
    }
    const naming = context.table.namingForFile(source, context.kind);
    const target = scaledFileName(source, context.factor, naming);
    context.references.push({ path: location, source, target });
    const after = `${leading}${encodeEntities(target, quote)}${trailing}`;
    return record(after, after === raw ? 'unchanged' : 'changed');
  }

  if (context.factor.value === 1) {
    return record(raw, 'unchanged');
  }

  const operation = kind.type === 'scale-linear' ? 'multiply' : 'divide';
  const after = scaleNumericToken(raw, operation, context.factor.value, kind.precision);
  if (after === undefined) {
    return record(raw, 'skipped', 'value is not numeric');
  }
  return record(after, after === raw ? 'unchanged' : 'changed');
}

function collectAsset(path: FieldPath, raw: string, context: TransformContext): void {
  if (!context.assetPaths.some(pattern => matchesFieldPath(pattern, path))) return;
  const file = decodeEntities(raw).trim();
  if (file.length > 0) {
    context.assets.push({ path: formatFieldPath(path), file });
  }
}

function transformAttribute(
  attribute: MarkupAttribute,
  elements: readonly string[],
  context: TransformContext
): MarkupAttribute {
  const path: FieldPath = { elements, attribute: attribute.name };
  const rule = context.table.resolve(context.kind, path);
  const value = rule ? applyRule(attribute.value, rule.kind, path, context, attribute.quote) : attribute.value;
  collectAsset(path, value, context);
  return value === attribute.value ? attribute : { ...attribute, value };
}

function transformElement(
  element: MarkupElement,
  elements: readonly string[],
  context: TransformContext
): MarkupElement {
  const attributes = element.attributes.map(attribute => transformAttribute(attribute, elements, context));
  const attributesChanged = attributes.some((attribute, index) => attribute !== element.attributes[index]);

  const result: MarkupElement = attributesChanged ? { ...element, attributes } : element;

  const leafText = getLeafText(element);
  if (leafText !== undefined) {
    const path: FieldPath = { elements };
    const rule = context.table.resolve(context.kind, path);
    const text = rule ? applyRule(leafText, rule.kind, path, context) : leafText;
    collectAsset(path, text, context);
    return text === leafText ? result : withLeafText(result, text);
  }

  const children: MarkupContent[] = element.children.map(child =>
    child.kind === 'element' ? transformElement(child, [...elements, child.tag], context) : child
  );
  const childrenChanged = children.some((child, index) => child !== element.children[index]);

  return childrenChanged ? { ...result, children } : result;
}

/**
 * Transform a document to a scale factor
 *
 * @throws UnsupportedScaleFactorError when the factor is not in the table
 */
export function transformDocument(
  source: SourceDocument,
  factor: ScaleFactor,
  table: ScaleRuleTable
): TransformResult {
  if (!table.supports(factor)) {
    throw new UnsupportedScaleFactorError(
      `Scale factor ${factor.tag} (${factor.value}) is not supported by the loaded templates`,
      factor.tag,
      { value: factor.value, supported: table.factors.map(known => known.tag) }
    );
  }

  const rules = table.documentRules(source.kind);
  const context: TransformContext = {
    kind: source.kind,
    factor,
    table,
    assetPaths: rules?.assets ?? [],
    changes: [],
    references: [],
    assets: [],
  };

  const root = transformElement(source.markup.root, [], context);
  const markup: MarkupDocument = root === source.markup.root ? source.markup : { ...source.markup, root };
  const fileName = scaledFileName(source.fileName, factor, rules?.naming ?? { suffix: '' });

  return {
    document: { kind: source.kind, fileName, markup },
    changes: context.changes,
    references: context.references,
    assets: context.assets,
  };
}
