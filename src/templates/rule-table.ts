/**
 * Scale Rule Table
 *
 * Immutable mapping from field path to transform kind, per document kind,
 * plus the ordered set of supported scale factors. Built once from the
 * template files and passed to the orchestrator as configuration.
 */

import { fileExtension } from '../converters/helpers/file-naming';

export type DocumentKind = 'material' | 'object';

export const DOCUMENT_KINDS: readonly DocumentKind[] = ['material', 'object'];

/**
 * Transform kind, tagged by `type`
 */
export type TransformKind =
  | { readonly type: 'identity' }
  | { readonly type: 'scale-linear'; readonly precision: number }
  | { readonly type: 'scale-inverse'; readonly precision: number }
  | { readonly type: 'filename-suffix' };

export type TransformKindName = TransformKind['type'];

/**
 * Field path: element tags below the root, optionally ending in an attribute
 */
export interface FieldPath {
  readonly elements: readonly string[];
  readonly attribute?: string;
}

export interface TransformRule {
  readonly path: FieldPath;
  readonly kind: TransformKind;
}

export interface ScaleFactor {
  readonly tag: string;
  readonly value: number;
}

export interface NamingPolicy {
  /** Appended to the file stem; `{tag}` is replaced by the scale tag */
  readonly suffix: string;
}

/**
 * Rules of one document kind, as declared by one template
 */
export interface DocumentRules {
  readonly kind: DocumentKind;
  readonly extension: string;
  readonly naming: NamingPolicy;
  readonly rules: readonly TransformRule[];
  /** Fields naming companion files copied next to each output */
  readonly assets: readonly FieldPath[];
  readonly templatePath: string;
}

/**
 * Parse `a/b/c@attr` into a field path
 */
export function parseFieldPath(path: string): FieldPath {
  const at = path.lastIndexOf('@');
  const elementPart = at >= 0 ? path.slice(0, at) : path;
  const attribute = at >= 0 ? path.slice(at + 1) : undefined;
  const elements = elementPart.split('/').filter(segment => segment.length > 0);
  return attribute === undefined ? { elements } : { elements, attribute };
}

/**
 * Render a field path back to its `a/b/c@attr` form
 */
export function formatFieldPath(path: FieldPath): string {
  const elements = path.elements.join('/');
  return path.attribute === undefined ? elements : `${elements}@${path.attribute}`;
}

/**
 * Whether a rule path matches a concrete path; `*` matches one tag
 */
export function matchesFieldPath(pattern: FieldPath, path: FieldPath): boolean {
  if (pattern.attribute !== path.attribute) return false;
  if (pattern.elements.length !== path.elements.length) return false;
  return pattern.elements.every((segment, index) => segment === '*' || segment === path.elements[index]);
}

interface CompiledRules {
  readonly document: DocumentRules;
  readonly exact: ReadonlyMap<string, TransformRule>;
  readonly wildcard: readonly TransformRule[];
}

/**
 * Scale Rule Table
 */
export class ScaleRuleTable {
  readonly factors: readonly ScaleFactor[];
  private readonly compiled: ReadonlyMap<DocumentKind, CompiledRules>;

  constructor(factors: readonly ScaleFactor[], documents: readonly DocumentRules[]) {
    this.factors = Object.freeze([...factors].sort((a, b) => a.value - b.value));

    const compiled = new Map<DocumentKind, CompiledRules>();
    for (const document of documents) {
      const exact = new Map<string, TransformRule>();
      const wildcard: TransformRule[] = [];
      for (const rule of document.rules) {
        if (rule.path.elements.includes('*')) {
          wildcard.push(rule);
        } else if (!exact.has(formatFieldPath(rule.path))) {
          exact.set(formatFieldPath(rule.path), rule);
        }
      }
      compiled.set(document.kind, { document, exact, wildcard });
    }
    this.compiled = compiled;
  }

  /**
   * Rule for a field, exact paths before wildcards; undefined means identity
   */
  resolve(kind: DocumentKind, path: FieldPath): TransformRule | undefined {
    const rules = this.compiled.get(kind);
    if (!rules) return undefined;
    return rules.exact.get(formatFieldPath(path))
      ?? rules.wildcard.find(rule => matchesFieldPath(rule.path, path));
  }

  /**
   * Rules of a document kind, if a template defines it
   */
  documentRules(kind: DocumentKind): DocumentRules | undefined {
    return this.compiled.get(kind)?.document;
  }

  /**
   * Document kinds with a template
   */
  documentKinds(): DocumentKind[] {
    return DOCUMENT_KINDS.filter(kind => this.compiled.has(kind));
  }

  /**
   * Document kind of a file by its extension
   */
  kindForFile(fileName: string): DocumentKind | undefined {
    const extension = fileExtension(fileName);
    for (const { document } of this.compiled.values()) {
      if (document.extension === extension) return document.kind;
    }
    return undefined;
  }

  /**
   * Naming policy for a referenced file, falling back to the given kind's policy
   */
  namingForFile(fileName: string, fallback: DocumentKind): NamingPolicy {
    const kind = this.kindForFile(fileName) ?? fallback;
    return this.compiled.get(kind)?.document.naming ?? { suffix: '' };
  }

  /**
   * Scale factor by tag
   */
  factor(tag: string): ScaleFactor | undefined {
    return this.factors.find(factor => factor.tag === tag);
  }

  /**
   * Whether the factor (tag and value) belongs to the supported set
   */
  supports(factor: ScaleFactor): boolean {
    return this.factors.some(known => known.tag === factor.tag && known.value === factor.value);
  }

  /**
   * Table restricted to a subset of its factors
   */
  withFactors(factors: readonly ScaleFactor[]): ScaleRuleTable {
    const documents = [...this.compiled.values()].map(rules => rules.document);
    return new ScaleRuleTable(factors.filter(factor => this.supports(factor)), documents);
  }
}
