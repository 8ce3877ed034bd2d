/**
 * Extractor Tests
 *
 * One block per extractor variant. Python goes through the real
 * tree-sitter grammar.
 */

import { describe, it, expect } from 'vitest';

import {
  braceExtractor,
  declarationExtractor,
  genericExtractor,
  indentationExtractor,
  findClassMembers,
  parsePython,
} from '../extractors/index.js';

function summarize(chunks: Array<{ kind: string; name: string; startLine: number; endLine: number }>) {
  return chunks.map((c) => `${c.kind}:${c.name}:${c.startLine}-${c.endLine}`);
}

// ============================================================================
// Brace (JavaScript / TypeScript)
// ============================================================================

describe('braceExtractor', () => {
  const source = [
    "import x from 'y';",
    '',
    'export async function load(path: string) {',
    '  return read(path);',
    '}',
    '',
    'const handler = async (req) => {',
    '  if (req) {',
    '    return 1;',
    '  }',
    '  return 0;',
    '};',
    '',
    'export const double = (n: number) => n * 2;',
    '',
    'export default class Store {',
    '  private items = [];',
    '  constructor() {',
    '    this.items = [];',
    '  }',
    '  async get(id: string) {',
    '    if (id) {',
    '      return this.items[0];',
    '    }',
    '    return null;',
    '  }',
    '  static create() {',
    '    return new Store();',
    '  }',
    '}',
  ].join('\n');

  it('should find functions, arrow functions and classes', () => {
    const chunks = braceExtractor.extract('src/store.ts', source);

    expect(summarize(chunks)).toEqual([
      'function:load:2-5',
      'function:handler:6-12',
      'function:double:13-14',
      'class:Store:15-30',
    ]);
  });

  it('should keep expression-bodied arrows to their own line', () => {
    const chunks = braceExtractor.extract('src/store.ts', source);
    expect(chunks[2]?.text).toBe('export const double = (n: number) => n * 2;');
  });

  it('should list class methods without control keywords', () => {
    const chunks = braceExtractor.extract('src/store.ts', source);
    const store = chunks[3];

    expect(store?.members).toEqual(['constructor', 'get', 'create']);
    expect(chunks[0]?.members).toEqual([]);
  });

  it('should carry language and source path', () => {
    const [first] = braceExtractor.extract('src/store.ts', source);
    expect(first?.language).toBe('ts');
    expect(first?.sourcePath).toBe('src/store.ts');
    expect(first?.project).toBeUndefined();
  });

  it('should emit nested functions as separate chunks', () => {
    const chunks = braceExtractor.extract(
      'a.js',
      'function outer() {\n  function inner() {\n  }\n}\n'
    );
    expect(summarize(chunks)).toEqual(['function:outer:0-4', 'function:inner:1-3']);
  });

  it('should recognize generator functions', () => {
    const chunks = braceExtractor.extract('gen.js', 'function* ids() {\n  yield 1;\n}');
    expect(summarize(chunks)).toEqual(['function:ids:0-3']);
  });

  it('should fall back to a file chunk when nothing matches', () => {
    const chunks = braceExtractor.extract('src/consts.ts', 'const x = 1;\n');
    expect(summarize(chunks)).toEqual(['file:consts:0-2']);
  });

  it('should skip the declaration line when collecting members', () => {
    expect(findClassMembers(['class A {', '  run() {', '  }', '}'])).toEqual(['run']);
  });
});

// ============================================================================
// Declaration (Java / Kotlin)
// ============================================================================

describe('declarationExtractor', () => {
  it('should extract a Java class with its methods', () => {
    const source = [
      'package demo;',
      '',
      'public class UserService {',
      '    private final Repo repo;',
      '',
      '    public User find(String id) {',
      '        if (id == null) {',
      '            return null;',
      '        }',
      '        return repo.get(id);',
      '    }',
      '',
      '    private static List<User> all() {',
      '        return new ArrayList<>();',
      '    }',
      '}',
    ].join('\n');

    const chunks = declarationExtractor.extract('UserService.java', source);

    expect(summarize(chunks)).toEqual(['class:UserService:2-16']);
    expect(chunks[0]?.members).toEqual(['find', 'all']);
    expect(chunks[0]?.language).toBe('java');
  });

  it('should extract Kotlin objects and fun members', () => {
    const source = [
      'object Registry {',
      '    fun register(p: Point) {',
      '        println(p)',
      '    }',
      '    suspend fun <T> load(): T? = null',
      '}',
    ].join('\n');

    const chunks = declarationExtractor.extract('Registry.kt', source);

    expect(summarize(chunks)).toEqual(['class:Registry:0-6']);
    expect(chunks[0]?.members).toEqual(['register', 'load']);
  });

  it('should not extract top-level functions', () => {
    const chunks = declarationExtractor.extract('Main.kt', 'fun main() {\n}\n');
    expect(summarize(chunks)).toEqual(['file:Main:0-3']);
  });
});

// ============================================================================
// Indentation (Python)
// ============================================================================

describe('indentationExtractor', () => {
  const source = [
    'import os',
    '',
    '',
    'class Greeter:',
    '    """Says hello."""',
    '',
    '    def __init__(self, name):',
    '        self.name = name',
    '',
    '    @property',
    '    def greeting(self):',
    '        return "Hello, " + self.name',
    '',
    '',
    'def main():',
    '    print(Greeter("x").greeting)',
    '',
  ].join('\n');

  it('should visit definitions in pre-order', () => {
    const chunks = indentationExtractor.extract('app/greeter.py', source);

    expect(summarize(chunks)).toEqual([
      'class:Greeter:3-12',
      'function:__init__:6-8',
      'function:greeting:10-12',
      'function:main:14-16',
    ]);
  });

  it('should list methods including decorated ones', () => {
    const [greeter] = indentationExtractor.extract('app/greeter.py', source);
    expect(greeter?.members).toEqual(['__init__', 'greeting']);
  });

  it('should slice the exact source lines', () => {
    const chunks = indentationExtractor.extract('app/greeter.py', source);
    expect(chunks[3]?.text).toBe('def main():\n    print(Greeter("x").greeting)');
  });

  it('should return a file chunk for source with syntax errors', () => {
    const chunks = indentationExtractor.extract('bad.py', 'def broken(:\n    pass\n');
    expect(summarize(chunks)).toEqual(['file:bad:0-3']);
  });

  it('should end a definition at its last line of code', () => {
    const chunks = indentationExtractor.extract('notes.py', 'def a():\n    x = 1\n    # trailing note\n');
    expect(summarize(chunks)).toEqual(['function:a:0-2']);
  });

  it('should keep closing brackets of a multi-line last statement', () => {
    const source = 'def g():\n    return foo(\n        1,\n    )\n    # done\n';
    expect(summarize(indentationExtractor.extract('calls.py', source))).toEqual(['function:g:0-4']);
  });

  it('should treat Python 2 print statements as syntax errors', () => {
    const chunks = indentationExtractor.extract('legacy.py', 'def f():\n    print "hi"\n');
    expect(summarize(chunks)).toEqual(['file:legacy:0-3']);
  });

  it('should return nothing for a file without definitions', () => {
    expect(indentationExtractor.extract('consts.py', 'X = 1\n')).toEqual([]);
  });

  it('should reject unparseable input in parsePython', () => {
    expect(parsePython('def broken(:\n')).toBeNull();
    expect(parsePython('x = 1\n')).not.toBeNull();
  });
});

// ============================================================================
// Generic
// ============================================================================

describe('genericExtractor', () => {
  it('should return the whole file as one chunk', () => {
    const chunks = genericExtractor.extract('/srv/projects/shop/README.md', '# Shop\n');

    expect(chunks).toHaveLength(1);
    expect(chunks[0]).toMatchObject({
      kind: 'file',
      name: 'README',
      text: '# Shop\n',
      project: { name: 'shop', relativePath: 'README.md' },
    });
  });
});
