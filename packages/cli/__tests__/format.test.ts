/**
 * Tests for console formatting of search results and ingestion reports
 */

import { bodyPreview, formatProgress, formatReport, formatResults } from '../src/format';
import { IngestReport } from '@qsearch/shared';

function report(overrides: Partial<IngestReport> = {}): IngestReport {
  return {
    indexName: 'questions',
    dim: 3,
    batchSize: 2,
    read: 5,
    skipped: 1,
    invalid: 1,
    batches: 2,
    indexed: 3,
    failed: 0,
    failures: [],
    durationMs: 40,
    ...overrides,
  };
}

describe('formatResults', () => {
  it('should print the header with timings and one ranked entry per hit', () => {
    const text = formatResults('gpu speed', {
      results: [
        { id: 'questions-1', score: 1.5, title: 'CUDA performance', body: '<p>My   kernel\nis slow</p>' },
        { id: 'questions-2', score: 1.25, title: 'C# closures', body: '' },
      ],
      embedMs: 12.34,
      searchMs: 0.5,
    });

    expect(text.split('\n')).toEqual([
      '🔎 "gpu speed": 2 result(s) (embed 12.3ms, search 0.5ms)',
      '',
      '  1. [1.5000] CUDA performance',
      '     My kernel is slow',
      '  2. [1.2500] C# closures',
    ]);
  });

  it('should say so when nothing matched', () => {
    expect(formatResults('x', { results: [], embedMs: 1, searchMs: 0 })).toBe(
      '🔎 "x": 0 result(s) (embed 1.0ms, search 0.0ms)\n  No matching questions.',
    );
  });
});

describe('bodyPreview', () => {
  it('should strip tags and collapse whitespace', () => {
    expect(bodyPreview('<pre><code>int  x;</code></pre>\n<p>Why?</p>')).toBe('int x; Why?');
  });

  it('should truncate long bodies with an ellipsis', () => {
    const preview = bodyPreview('a'.repeat(150));
    expect(preview).toHaveLength(100);
    expect(preview.endsWith('a…')).toBe(true);
  });
});

describe('formatReport', () => {
  it('should summarise a clean run', () => {
    expect(formatReport(report()).split('\n')).toEqual([
      '✅ Indexed 3 question(s) into "questions" in 40ms',
      '   read 5 · skipped 1 · invalid 1 · failed 0 · batches 2 (size 2, dim 3)',
    ]);
  });

  it('should list failed batches', () => {
    const text = formatReport(report({
      indexed: 2,
      failed: 1,
      failures: [{ batch: 2, kind: 'embedding', message: 'Embedding request failed: timeout', count: 1 }],
    }));

    expect(text.split('\n')).toEqual([
      '⚠️  Indexed 2 question(s) into "questions" in 40ms',
      '   read 5 · skipped 1 · invalid 1 · failed 1 · batches 2 (size 2, dim 3)',
      '   ✗ batch 2 (embedding, 1 record(s)): Embedding request failed: timeout',
    ]);
  });
});

describe('formatProgress', () => {
  it('should show the steps worth a line', () => {
    expect(formatProgress({ step: 'recreating', message: 'questions' })).toBe('🗂️  Recreating index "questions"...');
    expect(formatProgress({ step: 'embedding', batch: 1, batchSize: 32 })).toBe('  batch 1: embedding 32 title(s)');
    expect(formatProgress({ step: 'writing', batch: 1, indexed: 32 })).toBe('  batch 1: 32 indexed so far');
    expect(formatProgress({ step: 'refreshing', indexed: 32 })).toBe('🔄 Refreshing index...');
  });

  it('should stay quiet for the rest', () => {
    expect(formatProgress({ step: 'writing', batch: 1, batchSize: 32 })).toBeNull();
    expect(formatProgress({ step: 'done', indexed: 32, failed: 0, durationMs: 10 })).toBeNull();
    expect(formatProgress({ step: 'error', message: 'boom' })).toBeNull();
  });
});
