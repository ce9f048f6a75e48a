import { InvalidArgumentError } from 'commander';
import { isValidIndexName } from '@qsearch/core';
import type { QsearchConfig } from '@qsearch/core';

export const OUTPUT_FORMATS = ['text', 'json'] as const;
export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

export function parsePositiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n <= 0) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return n;
}

export function parseOutputFormat(value: string): OutputFormat {
  const format = OUTPUT_FORMATS.find(f => f === value);
  if (!format) {
    throw new InvalidArgumentError(`Must be one of: ${OUTPUT_FORMATS.join(', ')}.`);
  }
  return format;
}

export interface ConfigOverrides {
  index?: string;
  batchSize?: number;
  strict?: boolean;
}

/** Command-line flags win over the loaded configuration. */
export function applyOverrides(config: QsearchConfig, overrides: ConfigOverrides): QsearchConfig {
  if (overrides.index !== undefined && !isValidIndexName(overrides.index)) {
    throw new Error(`Invalid index name "${overrides.index}": use lowercase letters, digits and underscores`);
  }
  return {
    ...config,
    indexName: overrides.index ?? config.indexName,
    batchSize: overrides.batchSize ?? config.batchSize,
    strict: overrides.strict === true || config.strict,
  };
}

/** Copy of the config that is safe to print: no API key, no database password. */
export function redactConfig(config: QsearchConfig): QsearchConfig {
  return {
    ...config,
    databaseUrl: redactUrl(config.databaseUrl),
    embedding: {
      ...config.embedding,
      apiKey: config.embedding.apiKey ? '***' : undefined,
    },
  };
}

function redactUrl(value: string): string {
  let url: URL;
  try {
    url = new URL(value);
  } catch {
    return value;
  }
  if (!url.password) return value;
  url.password = '***';
  return url.toString();
}
