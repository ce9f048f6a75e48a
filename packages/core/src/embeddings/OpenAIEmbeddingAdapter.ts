import { HttpEmbeddingAdapter } from './HttpEmbeddingAdapter'

export interface OpenAIEmbeddingConfig {
  apiKey: string
  model?: string          // default: text-embedding-3-small (1536-dim)
  baseUrl?: string        // default: https://api.openai.com/v1
  dim?: number            // default: 1536
}

export class OpenAIEmbeddingAdapter extends HttpEmbeddingAdapter {
  constructor(config: OpenAIEmbeddingConfig) {
    super({
      apiKey: config.apiKey,
      model: config.model ?? 'text-embedding-3-small',
      baseUrl: config.baseUrl ?? 'https://api.openai.com/v1',
      // text-embedding-3-small=1536, text-embedding-3-large=3072
      dim: config.dim ?? 1536,
    })
  }
}
