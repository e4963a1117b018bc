import { Extractor } from './extractor';
import { GenericCodeExtractor } from './genericExtractor';
import { NotebookExtractor } from './notebookExtractor';
import { PythonExtractor } from './pythonExtractor';

/**
 * Ordered set of extractors. Earlier entries win when several match.
 */
export class ExtractorRegistry {
  private readonly extractors: Extractor[] = [];

  register(extractor: Extractor): this {
    this.extractors.push(extractor);
    return this;
  }

  list(): readonly Extractor[] {
    return this.extractors;
  }

  /**
   * Pick the extractor for a file.
   *
   * Extensions are checked first across the whole registry; content
   * sniffing only decides for files no extension claims, so a `.js` file
   * importing modules never lands in the Python extractor.
   */
  find(filePath: string, content?: string): Extractor | undefined {
    const byExtension = this.extractors.find(extractor => extractor.canParse(filePath));
    if (byExtension || content === undefined) {
      return byExtension;
    }
    return this.extractors.find(extractor => extractor.canParse(filePath, content));
  }

  supportedExtensions(): string[] {
    return [...new Set(this.extractors.flatMap(extractor => extractor.supportedExtensions()))];
  }
}

/**
 * Registry with the built-in extractors, content-sniffing formats first
 */
export function createDefaultRegistry(): ExtractorRegistry {
  return new ExtractorRegistry()
    .register(new PythonExtractor())
    .register(new NotebookExtractor())
    .register(new GenericCodeExtractor());
}
