/**
 * Tests for ExtractorRegistry
 */

import { GenericCodeExtractor } from '../core/genericExtractor';
import { NotebookExtractor } from '../core/notebookExtractor';
import { PythonExtractor } from '../core/pythonExtractor';
import { ExtractorRegistry, createDefaultRegistry } from '../core/registry';

describe('ExtractorRegistry', () => {
  const registry = createDefaultRegistry();

  it('should list the built-in extractors in selection order', () => {
    expect(registry.list().map(e => e.name)).toEqual([
      'PythonExtractor',
      'NotebookExtractor',
      'GenericCodeExtractor',
    ]);
  });

  it('should select by extension', () => {
    expect(registry.find('main.py')).toBeInstanceOf(PythonExtractor);
    expect(registry.find('analysis.ipynb')).toBeInstanceOf(NotebookExtractor);
    expect(registry.find('index.ts')).toBeInstanceOf(GenericCodeExtractor);
  });

  it('should prefer the extension over content sniffing', () => {
    const content = 'import { readFile } from "fs";\nclass Loader {}\n';

    expect(registry.find('loader.js', content)).toBeInstanceOf(GenericCodeExtractor);
  });

  it('should fall back to content sniffing for unknown extensions', () => {
    expect(registry.find('bin/tool', 'import sys\n')).toBeInstanceOf(PythonExtractor);
  });

  it('should return undefined when nothing matches', () => {
    expect(registry.find('notes.txt', 'plain prose')).toBeUndefined();
    expect(registry.find('notes.txt')).toBeUndefined();
  });

  it('should report every supported extension once', () => {
    const extensions = registry.supportedExtensions();

    expect(extensions).toContain('.py');
    expect(extensions).toContain('.ipynb');
    expect(extensions).toContain('.rs');
    expect(new Set(extensions).size).toBe(extensions.length);
  });

  it('should honour registration order for custom registries', () => {
    const custom = new ExtractorRegistry()
      .register(new GenericCodeExtractor())
      .register(new PythonExtractor());

    expect(custom.find('bin/tool', 'def main():\n    pass\n')).toBeInstanceOf(PythonExtractor);
    expect(custom.list()).toHaveLength(2);
  });
});
