/**
 * Tests for command-line option parsing and config overrides
 */

import { InvalidArgumentError } from 'commander';
import { QsearchConfig } from '@qsearch/core';
import { applyOverrides, parseOutputFormat, parsePositiveInt, redactConfig } from '../src/options';

const config: QsearchConfig = {
  databaseUrl: 'postgres://app:test-secret@db:5432/qsearch',
  indexName: 'questions',
  batchSize: 32,
  strict: false,
  embedding: { provider: 'openai', apiKey: 'test-key', dim: 1536 },
  server: { host: '0.0.0.0', port: 3000 },
};

describe('parsePositiveInt', () => {
  it('should accept positive integers', () => {
    expect(parsePositiveInt('5')).toBe(5);
  });

  it.each(['0', '-1', '2.5', 'ten', ''])('should reject %j', value => {
    expect(() => parsePositiveInt(value)).toThrow(InvalidArgumentError);
  });
});

describe('parseOutputFormat', () => {
  it('should accept text and json only', () => {
    expect(parseOutputFormat('json')).toBe('json');
    expect(parseOutputFormat('text')).toBe('text');
    expect(() => parseOutputFormat('xml')).toThrow('Must be one of: text, json.');
  });
});

describe('applyOverrides', () => {
  it('should let flags win over the loaded config', () => {
    const result = applyOverrides(config, { index: 'posts', batchSize: 8, strict: true });
    expect(result).toMatchObject({ indexName: 'posts', batchSize: 8, strict: true });
  });

  it('should keep the config where no flag is given', () => {
    expect(applyOverrides(config, {})).toEqual(config);
  });

  it('should reject an invalid index name', () => {
    expect(() => applyOverrides(config, { index: 'My-Index' })).toThrow(
      'Invalid index name "My-Index": use lowercase letters, digits and underscores',
    );
  });
});

describe('redactConfig', () => {
  it('should hide the API key and the database password', () => {
    const redacted = redactConfig(config);
    expect(redacted.databaseUrl).toBe('postgres://app:***@db:5432/qsearch');
    expect(redacted.embedding.apiKey).toBe('***');
    expect(config.embedding.apiKey).toBe('test-key');
  });

  it('should leave URLs without a password alone', () => {
    const redacted = redactConfig({ ...config, databaseUrl: 'postgres://localhost:5432/qsearch' });
    expect(redacted.databaseUrl).toBe('postgres://localhost:5432/qsearch');
  });
});
