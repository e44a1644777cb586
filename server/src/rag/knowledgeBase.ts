// Per-namespace in-memory vector index over scraped articles and classified posts
import { Document } from '@langchain/core/documents';
import type { Embeddings } from '@langchain/core/embeddings';
import { MemoryVectorStore } from 'langchain/vectorstores/memory';
import { RecursiveCharacterTextSplitter } from 'langchain/text_splitter';
import { logger } from '../utils/logger.js';

export type Namespace = 'news' | 'sentiment';

export type Metadata = Record<string, string | number>;

export interface KnowledgeDocument {
  id: string;
  ticker: string;
  text: string;
  metadata?: Metadata;
}

export interface SearchHit {
  text: string;
  score: number;
  metadata: Metadata;
}

/** The only call the agent makes into the index. */
export interface KnowledgeRetriever {
  semanticSearch(query: string, namespace: Namespace, topK: number, ticker?: string): Promise<SearchHit[]>;
}

function toMetadata(raw: Record<string, unknown>): Metadata {
  const out: Metadata = {};
  for (const [k, v] of Object.entries(raw)) {
    if (typeof v === 'string' || typeof v === 'number') out[k] = v;
  }
  return out;
}

export class KnowledgeBase implements KnowledgeRetriever {
  private stores = new Map<Namespace, MemoryVectorStore>();
  private ids = new Map<Namespace, Set<string>>();
  private splitter = new RecursiveCharacterTextSplitter({ chunkSize: 1000, chunkOverlap: 150 });

  constructor(private readonly embeddings: Embeddings) {}

  private store(ns: Namespace): MemoryVectorStore {
    let store = this.stores.get(ns);
    if (!store) {
      store = new MemoryVectorStore(this.embeddings);
      this.stores.set(ns, store);
    }
    return store;
  }

  has(ns: Namespace, id: string): boolean {
    return this.ids.get(ns)?.has(id) ?? false;
  }

  /** Adds documents not indexed yet; known ids are skipped (documents are immutable once indexed). */
  async upsert(ns: Namespace, docs: KnowledgeDocument[]): Promise<{ added: number; skipped: number; chunks: number }> {
    const known = this.ids.get(ns) ?? new Set<string>();
    this.ids.set(ns, known);
    const fresh = docs.filter((d) => d.text.trim() && !known.has(d.id));
    const skipped = docs.length - fresh.length;
    if (!fresh.length) return { added: 0, skipped, chunks: 0 };
    // claim ids before awaiting so a concurrent upsert of the same id is skipped
    for (const d of fresh) known.add(d.id);
    let chunks: Document[];
    try {
      chunks = await this.splitter.splitDocuments(
        fresh.map((d) => new Document({
          pageContent: d.text,
          metadata: { ...(d.metadata ?? {}), docId: d.id, ticker: d.ticker.toUpperCase() },
        }))
      );
      await this.store(ns).addDocuments(chunks);
    } catch (err) {
      for (const d of fresh) known.delete(d.id);
      throw err;
    }
    logger.info({ ns, added: fresh.length, chunks: chunks.length }, 'kb_indexed');
    return { added: fresh.length, skipped, chunks: chunks.length };
  }

  async semanticSearch(query: string, namespace: Namespace, topK: number, ticker?: string): Promise<SearchHit[]> {
    const store = this.stores.get(namespace);
    if (!store || !this.ids.get(namespace)?.size) return [];
    const symbol = ticker?.toUpperCase();
    const filter = symbol ? (doc: Document) => doc.metadata.ticker === symbol : undefined;
    const results = await store.similaritySearchWithScore(query, topK, filter);
    return results.map(([doc, score]) => ({
      text: doc.pageContent,
      score: Number(score.toFixed(4)),
      metadata: toMetadata(doc.metadata),
    }));
  }

  stats(): Record<Namespace, number> {
    return { news: this.ids.get('news')?.size ?? 0, sentiment: this.ids.get('sentiment')?.size ?? 0 };
  }
}
