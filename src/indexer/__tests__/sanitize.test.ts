/**
 * Metadata Sanitization Tests
 */

import { describe, it, expect } from 'vitest';

import { sanitizeMetadata, sanitizeValue, toChunkRecord } from '../sanitize.js';
import type { CodeChunk } from '../chunker/types.js';

describe('sanitizeValue', () => {
  it('should keep primitives', () => {
    expect(sanitizeValue('a')).toBe('a');
    expect(sanitizeValue(3)).toBe(3);
    expect(sanitizeValue(false)).toBe(false);
  });

  it('should map absent values to null', () => {
    expect(sanitizeValue(undefined)).toBeNull();
    expect(sanitizeValue(null)).toBeNull();
  });

  it('should join arrays with commas', () => {
    expect(sanitizeValue(['a', 1, true])).toBe('a,1,true');
    expect(sanitizeValue([])).toBe('');
  });

  it('should serialize dates and plain objects', () => {
    expect(sanitizeValue(new Date(Date.UTC(2024, 0, 2)))).toBe('2024-01-02T00:00:00.000Z');
    expect(sanitizeValue({ a: 1, b: ['x'] })).toBe('{"a":1,"b":["x"]}');
  });

  it('should stringify anything else', () => {
    expect(sanitizeValue(new Map())).toBe('[object Map]');
  });
});

describe('sanitizeMetadata', () => {
  it('should sanitize every value and keep keys', () => {
    expect(sanitizeMetadata({ tags: ['a', 'b'], missing: undefined, n: 2 })).toEqual({
      tags: 'a,b',
      missing: null,
      n: 2,
    });
  });
});

describe('toChunkRecord', () => {
  const loadedAt = new Date(Date.UTC(2024, 5, 1, 12, 0, 0));

  it('should flatten a chunk into record metadata', () => {
    const chunk: CodeChunk = {
      text: 'def f():\n    pass',
      kind: 'function',
      name: 'f',
      members: [],
      startLine: 0,
      endLine: 2,
      language: 'py',
      sourcePath: '/repo/pkg/f.py',
    };

    expect(toChunkRecord(chunk, { repoRoot: '/repo', loadedAt })).toEqual({
      text: 'def f():\n    pass',
      metadata: {
        source_path: '/repo/pkg/f.py',
        kind: 'function',
        name: 'f',
        members: '',
        start_line: 0,
        end_line: 2,
        language: 'py',
        project_name: null,
        project_relative_path: null,
        repo_relative_path: 'pkg/f.py',
        repo_root_path: '/repo',
        load_timestamp: '2024-06-01T12:00:00.000Z',
        character_count: 17,
      },
    });
  });

  it('should carry class members and project context', () => {
    const chunk: CodeChunk = {
      text: 'class A {}',
      kind: 'class',
      name: 'A',
      members: ['run', 'stop'],
      startLine: 4,
      endLine: 5,
      language: 'ts',
      project: { name: 'shop', relativePath: 'a.ts' },
      sourcePath: '/repo/projects/shop/a.ts',
    };

    const { metadata } = toChunkRecord(chunk, { repoRoot: '/repo', loadedAt });

    expect(metadata.members).toBe('run,stop');
    expect(metadata.project_name).toBe('shop');
    expect(metadata.project_relative_path).toBe('a.ts');
    expect(metadata.repo_relative_path).toBe('projects/shop/a.ts');
  });
});
