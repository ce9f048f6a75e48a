import type { IngestProgress, IngestReport, QueryResponse } from '@qsearch/shared';

const PREVIEW_LENGTH = 100;

export function formatResults(query: string, response: QueryResponse): string {
  const { results, embedMs, searchMs } = response;
  const lines = [
    `🔎 "${query}": ${results.length} result(s) (embed ${embedMs.toFixed(1)}ms, search ${searchMs.toFixed(1)}ms)`,
  ];
  if (results.length === 0) {
    lines.push('  No matching questions.');
    return lines.join('\n');
  }

  lines.push('');
  results.forEach((result, i) => {
    lines.push(`  ${i + 1}. [${result.score.toFixed(4)}] ${result.title}`);
    const preview = bodyPreview(result.body);
    if (preview) lines.push(`     ${preview}`);
  });
  return lines.join('\n');
}

/** Bodies are stored as HTML; show the text, on one line. */
export function bodyPreview(body: string, max = PREVIEW_LENGTH): string {
  const text = body.replace(/<[^>]*>/g, ' ').replace(/\s+/g, ' ').trim();
  return text.length > max ? `${text.slice(0, max - 1)}…` : text;
}

export function formatReport(report: IngestReport): string {
  const icon = report.failed > 0 ? '⚠️ ' : '✅';
  const lines = [
    `${icon} Indexed ${report.indexed} question(s) into "${report.indexName}" in ${report.durationMs}ms`,
    `   read ${report.read} · skipped ${report.skipped} · invalid ${report.invalid} · failed ${report.failed}` +
      ` · batches ${report.batches} (size ${report.batchSize}, dim ${report.dim})`,
  ];
  for (const failure of report.failures) {
    lines.push(`   ✗ batch ${failure.batch} (${failure.kind}, ${failure.count} record(s)): ${failure.message}`);
  }
  return lines.join('\n');
}

/** One console line per progress step worth showing, or null. */
export function formatProgress(progress: IngestProgress): string | null {
  switch (progress.step) {
    case 'recreating':
      return `🗂️  Recreating index "${progress.message}"...`;
    case 'embedding':
      return `  batch ${progress.batch}: embedding ${progress.batchSize} title(s)`;
    case 'writing':
      return progress.indexed !== undefined
        ? `  batch ${progress.batch}: ${progress.indexed} indexed so far`
        : null;
    case 'refreshing':
      return '🔄 Refreshing index...';
    default:
      return null;
  }
}
