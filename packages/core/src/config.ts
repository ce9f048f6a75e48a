import fs from 'fs'
import os from 'os'
import path from 'path'
import yaml from 'js-yaml'
import { isRecord } from './guards'

export const EMBEDDING_PROVIDERS = ['ollama', 'openai', 'azure', 'http'] as const
export type EmbeddingProviderName = (typeof EMBEDDING_PROVIDERS)[number]

export interface EmbeddingConfig {
  provider: EmbeddingProviderName
  model?: string
  apiKey?: string
  baseUrl?: string
  dim: number
  azureApiVersion?: string
}

export interface QsearchConfig {
  databaseUrl: string
  indexName: string
  batchSize: number
  /** Rethrow per-batch ingestion failures instead of logging and moving on. */
  strict: boolean
  embedding: EmbeddingConfig
  server: {
    host: string
    port: number
  }
}

export const DEFAULT_CONFIG_PATH = path.join(os.homedir(), '.qsearch', 'config.yaml')

/** Vector size of each provider's default model. */
const DEFAULT_DIMS: Record<EmbeddingProviderName, number> = {
  ollama: 768,    // nomic-embed-text
  openai: 1536,   // text-embedding-3-small
  azure: 1536,    // text-embedding-ada-002
  http: 1536,
}

const INDEX_NAME_PATTERN = /^[a-z][a-z0-9_]*$/

export function isValidIndexName(name: string): boolean {
  return INDEX_NAME_PATTERN.test(name) && name.length <= 63
}

export interface LoadConfigOptions {
  /** YAML file to read. Missing files are not an error. */
  path?: string
  env?: NodeJS.ProcessEnv
}

/**
 * Effective configuration: defaults, then the YAML file, then environment variables.
 * Throws on values that can't work (bad index name, non-positive batch size, ...).
 */
export function loadConfig(options: LoadConfigOptions = {}): QsearchConfig {
  const env = options.env ?? process.env
  const configPath = options.path ?? env.QSEARCH_CONFIG ?? DEFAULT_CONFIG_PATH
  const file = readConfigFile(configPath)
  const fileEmbedding = isRecord(file.embedding) ? file.embedding : {}
  const fileServer = isRecord(file.server) ? file.server : {}

  const provider = parseProvider(env.EMBEDDING_PROVIDER ?? str(fileEmbedding.provider) ?? 'ollama')

  const config: QsearchConfig = {
    databaseUrl: env.DATABASE_URL ?? str(file.databaseUrl) ?? 'postgres://localhost:5432/qsearch',
    indexName: env.QSEARCH_INDEX ?? str(file.indexName) ?? 'questions',
    batchSize: int(env.QSEARCH_BATCH_SIZE, 'QSEARCH_BATCH_SIZE') ?? int(file.batchSize, 'batchSize') ?? 32,
    strict: bool(env.QSEARCH_STRICT) ?? bool(file.strict) ?? false,
    embedding: {
      provider,
      model: env.EMBEDDING_MODEL ?? str(fileEmbedding.model),
      apiKey: env.EMBEDDING_API_KEY ?? str(fileEmbedding.apiKey),
      baseUrl: env.EMBEDDING_BASE_URL ?? str(fileEmbedding.baseUrl),
      dim: int(env.EMBEDDING_DIM, 'EMBEDDING_DIM') ?? int(fileEmbedding.dim, 'embedding.dim') ?? DEFAULT_DIMS[provider],
      azureApiVersion: env.AZURE_API_VERSION ?? str(fileEmbedding.azureApiVersion),
    },
    server: {
      host: env.HOST ?? str(fileServer.host) ?? '0.0.0.0',
      port: int(env.PORT, 'PORT') ?? int(fileServer.port, 'server.port') ?? 3000,
    },
  }

  if (!isValidIndexName(config.indexName)) {
    throw new Error(`Invalid index name "${config.indexName}": use lowercase letters, digits and underscores`)
  }
  if (config.batchSize <= 0) throw new Error(`batchSize must be > 0, got ${config.batchSize}`)
  if (config.embedding.dim <= 0) throw new Error(`embedding.dim must be > 0, got ${config.embedding.dim}`)
  return config
}

function readConfigFile(configPath: string): Record<string, unknown> {
  if (!fs.existsSync(configPath)) return {}
  const parsed: unknown = yaml.load(fs.readFileSync(configPath, 'utf-8'))
  if (parsed === undefined || parsed === null) return {}
  if (!isRecord(parsed)) throw new Error(`Config file ${configPath} must contain a mapping`)
  return parsed
}

function parseProvider(value: string): EmbeddingProviderName {
  const name = value.toLowerCase()
  const match = EMBEDDING_PROVIDERS.find(p => p === name)
  if (!match) {
    throw new Error(`Unknown embedding provider "${value}" (expected one of: ${EMBEDDING_PROVIDERS.join(', ')})`)
  }
  return match
}

function str(value: unknown): string | undefined {
  return typeof value === 'string' && value !== '' ? value : undefined
}

function int(value: unknown, name: string): number | undefined {
  if (value === undefined || value === null || value === '') return undefined
  const n = typeof value === 'number' ? value : Number(value)
  if (!Number.isInteger(n)) throw new Error(`${name} must be an integer, got "${String(value)}"`)
  return n
}

function bool(value: unknown): boolean | undefined {
  if (typeof value === 'boolean') return value
  if (typeof value !== 'string' || value === '') return undefined
  return ['1', 'true', 'yes', 'on'].includes(value.toLowerCase())
}
