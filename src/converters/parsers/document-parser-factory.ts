/**
 * Document Parser Factory
 *
 * Parses material and object files into SourceDocuments.
 */

import * as fs from 'fs';
import * as path from 'path';
import type { SourceDocument } from '../scale-transform';
import type { DocumentKind } from '../../templates/rule-table';
import { parseMarkup } from './markup-parser';

export interface IDocumentParser {
  parse(text: string, fileName: string): SourceDocument;
}

class MarkupDocumentParser implements IDocumentParser {
  constructor(private readonly kind: DocumentKind) {}

  parse(text: string, fileName: string): SourceDocument {
    return {
      kind: this.kind,
      fileName: path.basename(fileName),
      markup: parseMarkup(text, fileName),
    };
  }
}

export class DocumentParserFactory {
  static createParser(kind: DocumentKind): IDocumentParser {
    return new MarkupDocumentParser(kind);
  }

  /**
   * Read and parse a source file of a known kind
   *
   * @throws MalformedInputError when the content cannot be parsed
   */
  static async parseFile(filePath: string, kind: DocumentKind): Promise<SourceDocument> {
    const text = await fs.promises.readFile(filePath, 'utf8');
    return this.createParser(kind).parse(text, filePath);
  }
}
