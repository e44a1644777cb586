import { Embeddings } from '@langchain/core/embeddings';
import { OpenAIEmbeddings } from '@langchain/openai';
import { logger } from '../utils/logger.js';

/** Bag-of-words vectors hashed (djb2) into a fixed dimension, L2-normalised. No network. */
export class LocalHashEmbeddings extends Embeddings {
  constructor(private readonly dim = 512) {
    super({});
  }

  vec(text: string): number[] {
    const v = new Array<number>(this.dim).fill(0);
    const tokens = String(text || '').toLowerCase().split(/[^a-z0-9]+/g).filter(Boolean);
    for (const t of tokens) {
      let h = 5381;
      for (let i = 0; i < t.length; i++) h = ((h << 5) + h + t.charCodeAt(i)) | 0;
      const idx = Math.abs(h) % this.dim;
      v[idx] = (v[idx] ?? 0) + 1;
    }
    let norm = 0;
    for (const x of v) norm += x * x;
    norm = Math.sqrt(norm) || 1;
    return v.map((x) => x / norm);
  }

  async embedDocuments(texts: string[]): Promise<number[][]> {
    return texts.map((t) => this.vec(t));
  }

  async embedQuery(text: string): Promise<number[]> {
    return this.vec(text);
  }
}

export interface EmbeddingsConfig {
  embeddings: 'openai' | 'local';
  embedDim: number;
  openaiApiKey: string;
  openaiModel: string;
}

export function createEmbeddings(cfg: EmbeddingsConfig): Embeddings {
  if (cfg.embeddings === 'openai' && cfg.openaiApiKey) {
    return new OpenAIEmbeddings({ model: cfg.openaiModel, apiKey: cfg.openaiApiKey });
  }
  if (cfg.embeddings === 'openai') logger.warn('rag_embeddings_missing_provider_fallback_local_hash');
  else logger.info('rag_embeddings_local_hash');
  return new LocalHashEmbeddings(cfg.embedDim);
}
