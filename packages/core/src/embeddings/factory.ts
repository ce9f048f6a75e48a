/**
 * Creates an EmbeddingAdapter from the `embedding` section of the config.
 *
 * Supported providers:
 *   ollama  — local Ollama (default, CPU-friendly)
 *   openai  — OpenAI text-embedding-3-small / text-embedding-3-large
 *   azure   — Azure OpenAI deployment (api-key header + api-version query param)
 *   http    — any OpenAI-compatible endpoint (Together, Voyage, a local server, ...)
 *
 * Throws when a provider is missing what it needs; there is no search without embeddings.
 */
import type { EmbeddingConfig } from '../config'
import type { EmbeddingAdapter } from './EmbeddingAdapter'
import { HttpEmbeddingAdapter } from './HttpEmbeddingAdapter'
import { OllamaEmbeddingAdapter } from './OllamaEmbeddingAdapter'
import { OpenAIEmbeddingAdapter } from './OpenAIEmbeddingAdapter'

export function createEmbeddingAdapter(config: EmbeddingConfig): EmbeddingAdapter {
  const { model, apiKey, baseUrl, dim } = config

  switch (config.provider) {
    case 'ollama':
      return new OllamaEmbeddingAdapter({ baseUrl, model, dim })

    case 'openai':
      if (!apiKey) throw new Error('EMBEDDING_PROVIDER=openai requires EMBEDDING_API_KEY')
      return new OpenAIEmbeddingAdapter({ apiKey, model, baseUrl, dim })

    case 'azure':
      // EMBEDDING_BASE_URL: https://<resource>.openai.azure.com/openai/deployments/<deployment>
      if (!baseUrl) throw new Error('EMBEDDING_PROVIDER=azure requires EMBEDDING_BASE_URL')
      if (!apiKey) throw new Error('EMBEDDING_PROVIDER=azure requires EMBEDDING_API_KEY')
      return new HttpEmbeddingAdapter({
        baseUrl,
        model: model ?? 'text-embedding-ada-002',
        dim,
        headers: { 'api-key': apiKey },
        queryParams: { 'api-version': config.azureApiVersion ?? '2024-02-01' },
      })

    case 'http':
      if (!baseUrl) throw new Error('EMBEDDING_PROVIDER=http requires EMBEDDING_BASE_URL')
      return new HttpEmbeddingAdapter({
        baseUrl,
        apiKey,
        model: model ?? 'text-embedding-3-small',
        dim,
      })
  }
}
