/**
 * Dispatcher Tests
 */

import { describe, it, expect } from 'vitest';

import { getExtractorKind, parseFile } from '../dispatcher.js';

/**
 * A Python class of about fifty lines with two methods.
 */
function buildPythonClass(): string {
  const lines = ['class Inventory:', '    """Tracks stock levels."""', ''];
  lines.push('    def add(self, sku, qty):');
  for (let i = 0; i < 20; i++) {
    lines.push(`        self.log.append(("add", sku, qty, ${i}))`);
  }
  lines.push('');
  lines.push('    def remove(self, sku, qty):');
  for (let i = 0; i < 20; i++) {
    lines.push(`        self.log.append(("remove", sku, qty, ${i}))`);
  }
  lines.push('');
  return lines.join('\n');
}

describe('getExtractorKind', () => {
  it('should normalize the dot and case', () => {
    expect(getExtractorKind('.TS')).toBe('brace');
    expect(getExtractorKind('py')).toBe('indentation');
    expect(getExtractorKind('.kt')).toBe('declaration');
  });

  it('should default to generic', () => {
    expect(getExtractorKind('.go')).toBe('generic');
    expect(getExtractorKind('')).toBe('generic');
  });
});

describe('parseFile', () => {
  it('should split a Python class into one class and two function chunks', () => {
    const chunks = parseFile('inventory.py', buildPythonClass());

    const counts = { function: 0, class: 0, file: 0 };
    for (const chunk of chunks) counts[chunk.kind]++;

    expect(chunks).toHaveLength(3);
    expect(counts).toEqual({ function: 2, class: 1, file: 0 });
    expect(chunks[0]?.members).toEqual(['add', 'remove']);
  });

  it('should return one file chunk for JSON', () => {
    const source = [
      '{',
      '  "name": "shop",',
      '  "version": "1.0.0",',
      '  "private": true,',
      '  "scripts": {',
      '    "test": "vitest run"',
      '  },',
      '  "license": "MIT",',
      '  "author": "test"',
      '}',
    ].join('\n');

    const chunks = parseFile('config/settings.json', source);

    expect(chunks).toEqual([
      {
        text: source,
        kind: 'file',
        name: 'settings',
        members: [],
        startLine: 0,
        endLine: 10,
        language: 'json',
        sourcePath: 'config/settings.json',
      },
    ]);
  });

  it('should keep the structure of Python files larger than 32 KB', () => {
    const lines = ['def first():', '    return 1'];
    for (let i = 0; i < 1200; i++) {
      lines.push(`X_${i} = "${'v'.repeat(24)}"`);
    }
    lines.push('def second():', '    return 2', '');
    const source = lines.join('\n');
    expect(source.length).toBeGreaterThan(32 * 1024);

    const chunks = parseFile('big.py', source);

    expect(chunks.map((c) => `${c.kind}:${c.name}:${c.startLine}-${c.endLine}`)).toEqual([
      'function:first:0-2',
      'function:second:1202-1204',
    ]);
  });

  it('should fall back to a file chunk for Python without definitions', () => {
    const chunks = parseFile('empty.py', '');
    expect(chunks).toHaveLength(1);
    expect(chunks[0]).toMatchObject({ kind: 'file', name: 'empty', text: '', endLine: 1 });
  });

  it('should attach project context to every chunk', () => {
    const chunks = parseFile('/srv/projects/shop/api/app.ts', 'export function run() {\n}\n');

    expect(chunks).toHaveLength(1);
    expect(chunks[0]?.project).toEqual({ name: 'shop', relativePath: 'api/app.ts' });
  });

  it('should be deterministic', () => {
    const source = buildPythonClass();
    expect(parseFile('inventory.py', source)).toEqual(parseFile('inventory.py', source));
  });
});
