/**
 * Template Loader
 *
 * Loads every template file of the templates directory once at startup and
 * compiles them into a ScaleRuleTable. Any malformed template is fatal.
 */

import * as fs from 'fs';
import * as path from 'path';
import { DEFAULT_INVERSE_PRECISION, FILE_EXTENSIONS } from '../constants/config';
import { ERROR_MESSAGES } from '../constants/errors';
import {
  childElements,
  getAttributeValue,
  MarkupElement,
} from '../core/markup-node';
import { parseMarkup } from '../converters/parsers/markup-parser';
import { MalformedInputError, ScalerErrorFactory } from '../errors';
import {
  TemplateDefinition,
  TemplateDefinitionSchema,
} from '../schemas';
import { Logger, LoggerFactory } from '../utils/logger';
import {
  DocumentKind,
  DocumentRules,
  parseFieldPath,
  ScaleFactor,
  ScaleRuleTable,
  TransformKind,
} from './rule-table';

/**
 * A validated template together with the file it came from
 */
export interface LoadedTemplate {
  readonly templatePath: string;
  readonly definition: TemplateDefinition;
}

/**
 * Template content as read from markup, before validation
 */
interface RawTemplate {
  document?: string;
  extension?: string;
  naming?: Record<string, string>;
  scales: Array<{ tag?: string; factor?: string }>;
  rules: Array<{ path?: string; kind?: string; precision?: string }>;
  assets: Array<{ path?: string }>;
}

/**
 * Read the markup of a template into the plain shape the schema validates
 */
function readTemplateElement(root: MarkupElement): RawTemplate {
  const children = childElements(root);
  const attributesOf = (element: MarkupElement, names: string[]): Record<string, string> => {
    const values: Record<string, string> = {};
    for (const name of names) {
      const value = getAttributeValue(element, name);
      if (value !== undefined) values[name] = value;
    }
    return values;
  };

  const naming = children.find(child => child.tag === 'naming');
  const scales = children
    .filter(child => child.tag === 'scales')
    .flatMap(childElements)
    .filter(child => child.tag === 'scale');

  return {
    document: getAttributeValue(root, 'document'),
    extension: getAttributeValue(root, 'extension'),
    naming: naming ? attributesOf(naming, ['suffix']) : undefined,
    scales: scales.map(scale => ({
      tag: getAttributeValue(scale, 'tag'),
      factor: getAttributeValue(scale, 'factor'),
    })),
    rules: children
      .filter(child => child.tag === 'rule')
      .map(rule => ({
        path: getAttributeValue(rule, 'path'),
        kind: getAttributeValue(rule, 'kind'),
        precision: getAttributeValue(rule, 'precision'),
      })),
    assets: children
      .filter(child => child.tag === 'asset')
      .map(asset => ({ path: getAttributeValue(asset, 'path') })),
  };
}

/**
 * Parse and validate one template
 *
 * @throws TemplateLoadError when the markup or its content is invalid
 */
export function parseTemplate(text: string, templatePath: string): LoadedTemplate {
  let root: MarkupElement;
  try {
    root = parseMarkup(text, templatePath).root;
  } catch (error) {
    if (error instanceof MalformedInputError) {
      throw ScalerErrorFactory.templateLoad(error.message, templatePath, undefined, { line: error.line, column: error.column });
    }
    throw error;
  }

  if (root.tag !== 'template') {
    throw ScalerErrorFactory.templateLoad(
      `Template root element must be <template>, found <${root.tag}>`,
      templatePath
    );
  }

  const result = TemplateDefinitionSchema.safeParse(readTemplateElement(root));
  if (!result.success) {
    const details = result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw ScalerErrorFactory.templateLoad(
      `${ERROR_MESSAGES.TEMPLATE_SCHEMA}: ${details}`,
      templatePath,
      result.error
    );
  }

  return { templatePath, definition: result.data };
}

function toTransformKind(rule: TemplateDefinition['rules'][number]): TransformKind {
  switch (rule.kind) {
    case 'identity':
      return { type: 'identity' };
    case 'scale-linear':
      return { type: 'scale-linear', precision: rule.precision ?? 0 };
    case 'scale-inverse':
      return { type: 'scale-inverse', precision: rule.precision ?? DEFAULT_INVERSE_PRECISION };
    case 'filename-suffix':
      return { type: 'filename-suffix' };
  }
}

/**
 * Compile validated templates into a rule table
 *
 * @throws TemplateLoadError on duplicate document kinds, conflicting or
 * missing scale factors, or an object template without a material template
 */
export function compileTemplates(templates: readonly LoadedTemplate[]): ScaleRuleTable {
  const documents = new Map<DocumentKind, DocumentRules>();
  const factors = new Map<string, ScaleFactor & { templatePath: string }>();

  for (const { templatePath, definition } of templates) {
    const existing = documents.get(definition.document);
    if (existing) {
      throw ScalerErrorFactory.templateLoad(
        `${ERROR_MESSAGES.TEMPLATE_DUPLICATE_KIND}: '${definition.document}' is also defined by ${existing.templatePath}`,
        templatePath
      );
    }

    for (const scale of definition.scales) {
      const known = factors.get(scale.tag);
      if (known && known.value !== scale.factor) {
        throw ScalerErrorFactory.templateLoad(
          `${ERROR_MESSAGES.TEMPLATE_SCALE_CONFLICT}: '${scale.tag}' is ${known.value} in ${known.templatePath} and ${scale.factor} here`,
          templatePath
        );
      }
      factors.set(scale.tag, { tag: scale.tag, value: scale.factor, templatePath });
    }

    documents.set(definition.document, {
      kind: definition.document,
      extension: definition.extension,
      naming: { suffix: definition.naming.suffix },
      rules: definition.rules.map(rule => ({ path: parseFieldPath(rule.path), kind: toTransformKind(rule) })),
      assets: definition.assets.map(asset => parseFieldPath(asset.path)),
      templatePath,
    });
  }

  const firstPath = templates[0]?.templatePath ?? '';
  if (factors.size === 0) {
    throw ScalerErrorFactory.templateLoad(ERROR_MESSAGES.TEMPLATE_NO_SCALES, firstPath);
  }
  const objectRules = documents.get('object');
  if (objectRules && !documents.has('material')) {
    throw ScalerErrorFactory.templateLoad(ERROR_MESSAGES.TEMPLATE_OBJECT_WITHOUT_MATERIAL, objectRules.templatePath);
  }

  return new ScaleRuleTable(
    [...factors.values()].map(({ tag, value }) => ({ tag, value })),
    [...documents.values()]
  );
}

/**
 * List the template files of a directory in a stable order
 */
export function findTemplateFiles(templatesDir: string): string[] {
  return fs.readdirSync(templatesDir, { withFileTypes: true })
    .filter(entry => entry.isFile() && entry.name.toLowerCase().endsWith(FILE_EXTENSIONS.TEMPLATE))
    .map(entry => path.join(templatesDir, entry.name))
    .sort();
}

/**
 * Load all templates found in a directory
 *
 * @throws TemplateLoadError when the directory is missing, holds no
 * templates, or any template is malformed
 */
export function loadTemplates(templatesDir: string, logger: Logger = LoggerFactory.forTemplates()): ScaleRuleTable {
  const directory = path.resolve(templatesDir);
  if (!fs.existsSync(directory) || !fs.statSync(directory).isDirectory()) {
    throw ScalerErrorFactory.templateLoad(`${ERROR_MESSAGES.TEMPLATE_DIR_MISSING}: ${directory}`, directory);
  }

  const files = findTemplateFiles(directory);
  if (files.length === 0) {
    throw ScalerErrorFactory.templateLoad(`${ERROR_MESSAGES.TEMPLATE_DIR_EMPTY} in ${directory}`, directory);
  }

  const templates = files.map(file => {
    let text: string;
    try {
      text = fs.readFileSync(file, 'utf8');
    } catch (error) {
      throw ScalerErrorFactory.templateLoad(
        `Cannot read template: ${error instanceof Error ? error.message : String(error)}`,
        file
      );
    }
    const template = parseTemplate(text, file);
    logger.info(`Found ${template.definition.document} template`, {
      filePath: file,
      rules: template.definition.rules.length,
    });
    return template;
  });

  const table = compileTemplates(templates);
  logger.info('Scale factors', { scales: table.factors.map(factor => `${factor.tag}=${factor.value}`) });
  return table;
}
