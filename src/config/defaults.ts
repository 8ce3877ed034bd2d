/**
 * Default Configuration Values
 *
 * The loader merges the user's config.toml on top of these.
 */

import type { Config } from './schema.js';

export const DEFAULT_CONFIG: Config = {
  repository: {
    path: '.',
    include_extensions: [],
  },

  // Empty means <cbi home>/index.db
  storage: {
    path: '',
  },

  embedding: {
    provider: 'openai',
    model: 'text-embedding-3-small',
    batch_size: 64,
  },

  llm: {
    model: 'gpt-4o-mini',
    temperature: 0.3,
    max_iterations: 8,
  },

  chunking: {
    chunk_size: 2000,
    chunk_overlap: 200,
  },

  search: {
    top_k: 5,
  },

  server: {
    host: '127.0.0.1',
    port: 8000,
  },

  mcp: {
    connections: {},
  },
};

/**
 * Written to config.toml on first run
 */
export const CONFIG_TEMPLATE = `# codebase-intel configuration
# Location: ~/.cbi/config.toml (or $CBI_HOME/config.toml)

[repository]
path = "${DEFAULT_CONFIG.repository.path}"
# include_extensions = ["py", "ts", "java"]   # empty = every non-binary file

[storage]
# path = "~/.cbi/index.db"

[embedding]
provider = "${DEFAULT_CONFIG.embedding.provider}"
model = "${DEFAULT_CONFIG.embedding.model}"
batch_size = ${DEFAULT_CONFIG.embedding.batch_size}

# LLM_MODEL in the environment overrides llm.model
[llm]
model = "${DEFAULT_CONFIG.llm.model}"
temperature = ${DEFAULT_CONFIG.llm.temperature}
max_iterations = ${DEFAULT_CONFIG.llm.max_iterations}

# Records longer than chunk_size characters are split before embedding
[chunking]
chunk_size = ${DEFAULT_CONFIG.chunking.chunk_size}
chunk_overlap = ${DEFAULT_CONFIG.chunking.chunk_overlap}

[search]
top_k = ${DEFAULT_CONFIG.search.top_k}

[server]
host = "${DEFAULT_CONFIG.server.host}"
port = ${DEFAULT_CONFIG.server.port}

# Tools from MCP servers are offered to the agent next to search_codebase
# [mcp.connections.utility]
# transport = "streamable_http"
# url = "http://localhost:8001/mcp/"
#
# [mcp.connections.files]
# transport = "stdio"
# command = "npx"
# args = ["-y", "@modelcontextprotocol/server-filesystem", "."]
`;
