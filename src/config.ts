/**
 * Server configuration: command-line flags over an optional JSON config file.
 */

import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { z } from 'zod';
import { DEFAULT_CHUNK_OVERLAP, DEFAULT_CHUNK_SIZE, validateChunkParameters } from './chunking/chunker.js';
import { DEFAULT_DB_PATH, DEFAULT_STATE_DIR } from './db/connection.js';
import { EMBEDDING_PROVIDER_TYPES, type EmbeddingProviderType } from './embeddings/provider.js';
import { ConfigurationError, errorMessage } from './errors.js';
import { DEFAULT_COLLECTION_PREFIX } from './sync/sync-manager.js';

export const DEFAULT_INDEX_PATH = resolve(DEFAULT_STATE_DIR, 'index.db');
export const DEFAULT_LEDGER_BIN = 'dolt';

const ConfigFileSchema = z
  .object({
    repo: z.string().min(1),
    dbPath: z.string().min(1),
    indexPath: z.string().min(1),
    ledgerBin: z.string().min(1),
    collectionPrefix: z.string(),
    chunkSize: z.number().int().positive(),
    chunkOverlap: z.number().int().nonnegative(),
    embeddingProvider: z.enum(EMBEDDING_PROVIDER_TYPES),
    openaiApiKey: z.string().min(1),
    embeddingModel: z.string().min(1),
  })
  .partial()
  .strict();

export type ConfigInput = z.infer<typeof ConfigFileSchema>;

export interface ServerConfig {
  repo: string;
  dbPath: string;
  indexPath: string;
  ledgerBin: string;
  collectionPrefix: string;
  chunkSize: number;
  chunkOverlap: number;
  embeddingProvider: EmbeddingProviderType;
  openaiApiKey?: string;
  embeddingModel?: string;
}

export interface ParsedArgs {
  options: ConfigInput;
  configPath?: string;
  help: boolean;
}

export const USAGE = `
kb-ledger-sync — keeps a versioned ledger and its search index in sync (MCP Server)

Usage:
  kb-ledger-sync --repo <path> [options]

Options:
  --repo <path>                 Ledger working directory (required)
  --db-path <path>              Local state database (default: ~/.kb-ledger-sync/state.db)
  --index-path <path>           Index database (default: ~/.kb-ledger-sync/index.db)
  --ledger-bin <cmd>            Ledger executable (default: dolt)
  --collection-prefix <prefix>  Prefix of per-branch index collections (default: kb_)
  --chunk-size <n>              Characters per chunk (default: 512)
  --chunk-overlap <n>           Characters shared by neighbouring chunks (default: 50)
  --embedding-provider <type>   Embedding provider: none (default) or openai
  --openai-api-key <key>        API key for OpenAI embeddings (or set OPENAI_API_KEY env var)
  --embedding-model <model>     Override the default embedding model
  --config <file>               JSON file with any of the options above, in camelCase
  --help                        Show this help message
`;

function parseInteger(flag: string, value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new ConfigurationError(`${flag} expects an integer, got "${value}"`);
  }
  return parsed;
}

function parseProvider(value: string): EmbeddingProviderType {
  const provider = EMBEDDING_PROVIDER_TYPES.find((type) => type === value);
  if (!provider) {
    throw new ConfigurationError(
      `--embedding-provider must be one of ${EMBEDDING_PROVIDER_TYPES.join(', ')}, got "${value}"`,
    );
  }
  return provider;
}

/** Parse command-line flags. Unknown flags are ignored. */
export function parseArgs(args: readonly string[]): ParsedArgs {
  const options: ConfigInput = {};
  let configPath: string | undefined;
  let help = false;

  for (let i = 0; i < args.length; i++) {
    const flag = args[i];
    const value = args[i + 1];

    if (flag === '--help') {
      help = true;
      continue;
    }
    if (value === undefined) continue;

    switch (flag) {
      case '--repo':
        options.repo = value;
        break;
      case '--db-path':
        options.dbPath = value;
        break;
      case '--index-path':
        options.indexPath = value;
        break;
      case '--ledger-bin':
        options.ledgerBin = value;
        break;
      case '--collection-prefix':
        options.collectionPrefix = value;
        break;
      case '--chunk-size':
        options.chunkSize = parseInteger(flag, value);
        break;
      case '--chunk-overlap':
        options.chunkOverlap = parseInteger(flag, value);
        break;
      case '--embedding-provider':
        options.embeddingProvider = parseProvider(value);
        break;
      case '--openai-api-key':
        options.openaiApiKey = value;
        break;
      case '--embedding-model':
        options.embeddingModel = value;
        break;
      case '--config':
        configPath = value;
        break;
      default:
        continue;
    }
    i++;
  }

  return { options, configPath, help };
}

/** Parse and validate the text of a config file. */
export function parseConfigFile(text: string, source: string): ConfigInput {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new ConfigurationError(`Config file ${source} is not valid JSON: ${errorMessage(error)}`);
  }

  const parsed = ConfigFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new ConfigurationError(`Invalid config file ${source}: ${issues.join('; ')}`);
  }
  return parsed.data;
}

export function loadConfigFile(path: string): ConfigInput {
  let text: string;
  try {
    text = readFileSync(path, 'utf-8');
  } catch (error) {
    throw new ConfigurationError(`Cannot read config file ${path}: ${errorMessage(error)}`);
  }
  return parseConfigFile(text, path);
}

/**
 * Merge defaults, the config file and flags, in that order of precedence.
 * The API key falls back to OPENAI_API_KEY.
 */
export function resolveConfig(
  flags: ConfigInput,
  file: ConfigInput = {},
  env: NodeJS.ProcessEnv = process.env,
): ServerConfig {
  const merged: ConfigInput = { ...file, ...flags };

  if (!merged.repo) {
    throw new ConfigurationError('A ledger repository is required: pass --repo <path> or set "repo" in the config file');
  }

  const config: ServerConfig = {
    repo: resolve(merged.repo),
    dbPath: merged.dbPath ?? DEFAULT_DB_PATH,
    indexPath: merged.indexPath ?? DEFAULT_INDEX_PATH,
    ledgerBin: merged.ledgerBin ?? DEFAULT_LEDGER_BIN,
    collectionPrefix: merged.collectionPrefix ?? DEFAULT_COLLECTION_PREFIX,
    chunkSize: merged.chunkSize ?? DEFAULT_CHUNK_SIZE,
    chunkOverlap: merged.chunkOverlap ?? DEFAULT_CHUNK_OVERLAP,
    embeddingProvider: merged.embeddingProvider ?? 'none',
    openaiApiKey: merged.openaiApiKey ?? env.OPENAI_API_KEY,
    embeddingModel: merged.embeddingModel,
  };

  validateChunkParameters(config.chunkSize, config.chunkOverlap);
  return config;
}
