import { EmbeddingProvider, PostgresRecordStore, createEmbeddingAdapter } from '@qsearch/core';
import type { QsearchConfig, RecordStore } from '@qsearch/core';

export interface Runtime {
  store: RecordStore;
  provider: EmbeddingProvider;
  close(): Promise<void>;
}

/**
 * Connects to the store and opens the embedding provider. Either failing is
 * fatal for the command; the store is closed again before the error propagates.
 */
export async function openRuntime(config: QsearchConfig): Promise<Runtime> {
  const store = new PostgresRecordStore(config.databaseUrl);
  try {
    await store.ping();
    const provider = await EmbeddingProvider.open(createEmbeddingAdapter(config.embedding));
    return {
      store,
      provider,
      close: async () => {
        provider.close();
        await store.close();
      },
    };
  } catch (err) {
    await store.close();
    throw err;
  }
}
