/**
 * Configuration Tests
 *
 * CBI_HOME points at a temp directory, so config.toml never touches the
 * real home directory.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { homedir, tmpdir } from 'node:os';
import { join } from 'node:path';

import {
  deepMerge,
  getConfigValue,
  listConfig,
  loadConfig,
  parseValue,
  resolveConfig,
  resolveStoragePath,
  setConfigValue,
} from '../loader.js';
import { DEFAULT_CONFIG } from '../defaults.js';
import { _clearEnvCache, hasApiKey, loadEnv } from '../env.js';
import { expandHome, getCbiDir, getConfigPath } from '../paths.js';
import { ConfigError } from '../../errors/index.js';

let home: string;

beforeEach(() => {
  home = mkdtempSync(join(tmpdir(), 'cbi-config-'));
  vi.stubEnv('CBI_HOME', home);
  vi.stubEnv('LLM_MODEL', '');
  _clearEnvCache();
});

afterEach(() => {
  vi.unstubAllEnvs();
  _clearEnvCache();
  rmSync(home, { recursive: true, force: true });
});

// ============================================================================
// Pure helpers
// ============================================================================

describe('deepMerge', () => {
  it('should merge nested objects and replace arrays', () => {
    const merged = deepMerge(
      { a: { x: 1, y: 2 }, list: ['a', 'b'] },
      { a: { y: 3 }, list: ['c'], extra: undefined }
    );
    expect(merged).toEqual({ a: { x: 1, y: 3 }, list: ['c'] });
  });
});

describe('parseValue', () => {
  it('should parse booleans, numbers and lists', () => {
    expect(parseValue('true')).toBe(true);
    expect(parseValue('FALSE')).toBe(false);
    expect(parseValue('8')).toBe(8);
    expect(parseValue('0.5')).toBe(0.5);
    expect(parseValue('py, ts,')).toEqual(['py', 'ts']);
  });

  it('should keep other strings', () => {
    expect(parseValue('gpt-4o-mini')).toBe('gpt-4o-mini');
    expect(parseValue('')).toBe('');
  });
});

describe('resolveConfig', () => {
  it('should return the defaults for no overrides', () => {
    expect(resolveConfig({})).toEqual(DEFAULT_CONFIG);
  });

  it('should merge sparse overrides', () => {
    const config = resolveConfig({ search: { top_k: 8 } });
    expect(config.search.top_k).toBe(8);
    expect(config.llm).toEqual(DEFAULT_CONFIG.llm);
  });

  it('should reject values of the wrong type', () => {
    expect(() => resolveConfig({ search: { top_k: 'many' } })).toThrow(ConfigError);
  });

  it('should reject MCP connections with an unknown transport', () => {
    const legacy = { transport: 'sse', url: 'http://localhost:8001/sse' };
    expect(() => resolveConfig({ mcp: { connections: { legacy } } })).toThrow(ConfigError);
  });

  it('should require a command for stdio connections', () => {
    expect(() => resolveConfig({ mcp: { connections: { files: { transport: 'stdio' } } } })).toThrow(
      /mcp\.connections\.files\.command/
    );
  });

  it('should reject an overlap that is not smaller than the chunk size', () => {
    expect(() => resolveConfig({ chunking: { chunk_size: 100, chunk_overlap: 100 } })).toThrow(
      'chunking.chunk_overlap: must be smaller than chunking.chunk_size'
    );
  });
});

// ============================================================================
// Paths and environment
// ============================================================================

describe('paths', () => {
  it('should use CBI_HOME when set', () => {
    expect(getCbiDir()).toBe(home);
    expect(getConfigPath()).toBe(join(home, 'config.toml'));
  });

  it('should default to ~/.cbi', () => {
    vi.stubEnv('CBI_HOME', '');
    _clearEnvCache();
    expect(getCbiDir()).toBe(join(homedir(), '.cbi'));
  });

  it('should expand a leading tilde', () => {
    expect(expandHome('~/x.db')).toBe(join(homedir(), 'x.db'));
    expect(expandHome('/abs/x.db')).toBe('/abs/x.db');
  });

  it('should resolve the storage path', () => {
    expect(resolveStoragePath(DEFAULT_CONFIG)).toBe(join(home, 'index.db'));
    expect(resolveStoragePath(resolveConfig({ storage: { path: '/data/idx.db' } }))).toBe(
      '/data/idx.db'
    );
  });
});

describe('env', () => {
  it('should report whether an API key is set', () => {
    vi.stubEnv('OPENAI_API_KEY', 'test-secret');
    _clearEnvCache();
    expect(hasApiKey()).toBe(true);

    vi.stubEnv('OPENAI_API_KEY', '   ');
    _clearEnvCache();
    expect(hasApiKey()).toBe(false);
  });

  it('should drop a malformed base URL', () => {
    vi.stubEnv('OPENAI_API_KEY', 'test-secret');
    vi.stubEnv('OPENAI_BASE_URL', 'not a url');
    _clearEnvCache();

    const env = loadEnv();
    expect(env.OPENAI_BASE_URL).toBeUndefined();
    expect(env.OPENAI_API_KEY).toBe('test-secret');
  });
});

// ============================================================================
// config.toml
// ============================================================================

describe('loadConfig', () => {
  it('should write the template on first run and return the defaults', () => {
    const config = loadConfig();

    expect(existsSync(join(home, 'config.toml'))).toBe(true);
    expect(config).toEqual(DEFAULT_CONFIG);
  });

  it('should not write anything when createIfMissing is false', () => {
    loadConfig(false);
    expect(existsSync(join(home, 'config.toml'))).toBe(false);
  });

  it('should apply the file over the defaults', () => {
    writeFileSync(join(home, 'config.toml'), '[search]\ntop_k = 3\n');
    expect(loadConfig().search.top_k).toBe(3);
  });

  it('should read MCP connections by name', () => {
    writeFileSync(
      join(home, 'config.toml'),
      [
        '[mcp.connections.utility]',
        'transport = "streamable_http"',
        'url = "http://localhost:8001/mcp/"',
        '',
        '[mcp.connections.files]',
        'transport = "stdio"',
        'command = "mcp-files"',
        '',
      ].join('\n')
    );

    expect(loadConfig().mcp.connections).toEqual({
      utility: { transport: 'streamable_http', url: 'http://localhost:8001/mcp/' },
      files: { transport: 'stdio', command: 'mcp-files', args: [] },
    });
  });

  it('should let LLM_MODEL override llm.model', () => {
    vi.stubEnv('LLM_MODEL', 'local-model');
    _clearEnvCache();
    expect(loadConfig().llm.model).toBe('local-model');
  });

  it('should reject invalid TOML', () => {
    writeFileSync(join(home, 'config.toml'), '[search\n');
    expect(() => loadConfig()).toThrow(/^Invalid TOML in config file/);
  });
});

describe('getConfigValue / setConfigValue', () => {
  it('should read values by dotted key', () => {
    expect(getConfigValue('embedding.model')).toBe('text-embedding-3-small');
    expect(getConfigValue('embedding.nope')).toBeUndefined();
  });

  it('should write a value back to config.toml', () => {
    setConfigValue('search.top_k', '8');

    expect(getConfigValue('search.top_k')).toBe(8);
    expect(readFileSync(join(home, 'config.toml'), 'utf-8')).toContain('top_k = 8');
  });

  it('should reject unknown keys', () => {
    expect(() => setConfigValue('nope.key', '1')).toThrow('Unknown config key: nope.key');
  });

  it('should reject values that fail validation', () => {
    expect(() => setConfigValue('search.top_k', '0')).toThrow(
      /^Invalid value for 'search\.top_k'/
    );
  });
});

describe('listConfig', () => {
  it('should flatten every value to a dotted key', () => {
    const entries = new Map(listConfig());

    expect(entries.get('search.top_k')).toBe(5);
    expect(entries.get('repository.include_extensions')).toEqual([]);
    expect(entries.get('server.port')).toBe(8000);
    expect([...entries.keys()].filter((key) => key.startsWith('mcp.'))).toEqual([]);
  });

  it('should list each MCP connection field', () => {
    writeFileSync(
      join(home, 'config.toml'),
      '[mcp.connections.files]\ntransport = "stdio"\ncommand = "mcp-files"\nargs = ["--root", "."]\n'
    );
    const entries = new Map(listConfig());

    expect(entries.get('mcp.connections.files.command')).toBe('mcp-files');
    expect(entries.get('mcp.connections.files.args')).toEqual(['--root', '.']);
  });
});
