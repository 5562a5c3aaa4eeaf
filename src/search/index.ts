import type { SearchConfig } from "../config/types.js";
import type { Logger } from "../logging/logger.js";
import type { EventStore } from "../store/db.js";
import type { ItemStore } from "../store/items.js";
import { blobOrNull, count, num, text, toRows, type Row } from "../store/rows.js";
import type { Item } from "../store/types.js";
import { ValidationError } from "../utils/errors.js";
import { withTimeout } from "../utils/timeout.js";
import { chunkDocument, chunkId, stripQuotedReplies } from "./chunker.js";
import { cosineSimilarity, decodeEmbedding, encodeEmbedding, type EmbeddingPort } from "./embeddings.js";
import { reciprocalRankFusion, type RankedHit } from "./fusion.js";

export const SEARCH_MODES = ["lexical", "vector", "hybrid"] as const;
export type SearchMode = (typeof SEARCH_MODES)[number];

const SNIPPET_LENGTH = 200;
const CANDIDATE_FACTOR = 5;

export interface SearchOptions {
  mode?: SearchMode;
  limit?: number;
}

export interface SearchHit {
  readonly itemId: string;
  readonly chunkId: string;
  readonly subject: string;
  readonly sender: string;
  readonly receivedAt: number;
  readonly snippet: string;
  readonly score: number;
}

export interface IndexResult {
  readonly indexed: number;
  readonly chunks: number;
  readonly failed: number;
}

export interface RetrievalIndexDeps {
  store: EventStore;
  items: ItemStore;
  embedder?: EmbeddingPort;
  embedTimeoutMs: number;
  config: SearchConfig;
  logger: Logger;
  clock?: () => number;
}

interface PendingChunk {
  readonly id: string;
  readonly sourceType: "item" | "attachment";
  readonly sourceId: string;
  readonly index: number;
  readonly content: string;
  embedding: Buffer | null;
}

/** Quotes every word so user input never reaches the FTS5 query syntax. */
export function toFtsQuery(query: string): string {
  const tokens = query.match(/[\p{L}\p{N}_]+/gu) ?? [];
  return tokens.map((t) => `"${t}"`).join(" ");
}

/**
 * Chunked full-text and vector index over item bodies and attachment text.
 * Chunks live in `chunks`; `chunks_fts` follows them through triggers.
 */
export class RetrievalIndex {
  private readonly db;
  private readonly logger: Logger;
  private readonly clock: () => number;

  constructor(private readonly deps: RetrievalIndexDeps) {
    this.db = deps.store.raw();
    this.logger = deps.logger.child({ component: "retrieval-index" });
    this.clock = deps.clock ?? Date.now;
  }

  get hasEmbedder(): boolean {
    return this.deps.embedder !== undefined;
  }

  // ── Indexing ──

  async indexPending(): Promise<IndexResult> {
    const pending = this.deps.items.listUnindexed(this.deps.config.indexBatchSize);
    let indexed = 0;
    let chunks = 0;
    let failed = 0;

    for (const item of pending) {
      let built: PendingChunk[];
      try {
        built = await this.buildChunks(item);
      } catch (err) {
        failed++;
        this.logger.warn({ err, itemId: item.id }, "Embedding failed, item stays pending");
        continue;
      }
      if (this.replaceChunks(item, built)) {
        indexed++;
        chunks += built.length;
      }
    }

    if (pending.length > 0) {
      this.logger.debug({ indexed, chunks, failed }, "Index pass complete");
    }
    return { indexed, chunks, failed };
  }

  private async buildChunks(item: Item): Promise<PendingChunk[]> {
    const { chunkSize, chunkOverlap } = this.deps.config;
    const body = stripQuotedReplies(item.bodyText ?? item.bodyPreview);
    const document = item.subject ? `${item.subject}\n\n${body}` : body;

    const chunks: PendingChunk[] = chunkDocument(document, chunkSize, chunkOverlap).map((content, index) => ({
      id: chunkId("item", item.id, index),
      sourceType: "item",
      sourceId: item.id,
      index,
      content,
      embedding: null,
    }));

    for (const attachment of this.deps.items.listAttachments(item.id)) {
      if (attachment.extractionStatus !== "complete" || !attachment.extractedText) continue;
      chunkDocument(attachment.extractedText, chunkSize, chunkOverlap).forEach((content, index) => {
        chunks.push({
          id: chunkId("attachment", attachment.id, index),
          sourceType: "attachment",
          sourceId: attachment.id,
          index,
          content,
          embedding: null,
        });
      });
    }

    const embedder = this.deps.embedder;
    if (embedder && chunks.length > 0) {
      const vectors = await withTimeout("embed", this.deps.embedTimeoutMs, (signal) =>
        embedder.embed(
          chunks.map((c) => c.content),
          signal,
        ),
      );
      chunks.forEach((chunk, i) => {
        const vector = vectors[i];
        chunk.embedding = vector && vector.length > 0 ? encodeEmbedding(vector) : null;
      });
    }
    return chunks;
  }

  /**
   * Swaps the item's chunks in one transaction. Skipped when the item changed
   * while its chunks were being built; the next pass picks it up again.
   */
  private replaceChunks(item: Item, chunks: readonly PendingChunk[]): boolean {
    const insert = this.db.prepare(
      `INSERT INTO chunks (id, item_id, source_type, source_id, chunk_index, content, embedding, created_at)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?)`,
    );
    return this.deps.store.transaction(() => {
      const now = this.clock();
      const marked = this.db
        .prepare(
          `UPDATE items SET indexed_at = ?
           WHERE id = ? AND indexed_at IS NULL AND deleted_at IS NULL AND updated_at = ?`,
        )
        .run(now, item.id, item.updatedAt);
      if (marked.changes === 0) return false;

      this.db.prepare("DELETE FROM chunks WHERE item_id = ?").run(item.id);
      for (const c of chunks) {
        insert.run(c.id, item.id, c.sourceType, c.sourceId, c.index, c.content, c.embedding, now);
      }
      return true;
    });
  }

  countChunks(): { chunks: number; embedded: number } {
    return {
      chunks: count(this.db.prepare("SELECT COUNT(*) AS cnt FROM chunks").get()),
      embedded: count(this.db.prepare("SELECT COUNT(*) AS cnt FROM chunks WHERE embedding IS NOT NULL").get()),
    };
  }

  // ── Queries ──

  async search(query: string, opts: SearchOptions = {}): Promise<SearchHit[]> {
    if (!query.trim()) {
      throw new ValidationError("Search query is empty");
    }
    const limit = opts.limit ?? this.deps.config.defaultLimit;
    switch (opts.mode ?? "hybrid") {
      case "lexical":
        return this.lexical(query, limit);
      case "vector":
        return this.vector(query, limit);
      case "hybrid":
        return this.hybrid(query, limit);
    }
  }

  lexical(query: string, limit: number): SearchHit[] {
    const match = toFtsQuery(query);
    if (!match) return [];
    const rows = this.db
      .prepare(
        `SELECT c.id AS chunk_id, c.item_id, c.content, bm25(chunks_fts) AS score,
                i.subject, i.sender, i.received_at
         FROM chunks_fts
         JOIN chunks c ON c.rowid = chunks_fts.rowid
         JOIN items i ON i.id = c.item_id
         WHERE chunks_fts MATCH ? AND i.deleted_at IS NULL
         ORDER BY score ASC, i.received_at DESC, c.id ASC
         LIMIT ?`,
      )
      .all(match, limit * CANDIDATE_FACTOR);

    // bm25 is lower-is-better; flip it so every mode reports higher-is-better.
    return bestPerItem(toRows(rows).map((r) => toHit(r, -num(r, "score"))), limit);
  }

  async vector(query: string, limit: number): Promise<SearchHit[]> {
    const embedder = this.deps.embedder;
    if (!embedder) return [];

    const [queryVector] = await withTimeout("embed query", this.deps.embedTimeoutMs, (signal) =>
      embedder.embed([query], signal),
    );
    if (!queryVector || queryVector.length === 0) return [];

    const rows = this.db
      .prepare(
        `SELECT c.id AS chunk_id, c.item_id, c.content, c.embedding, i.subject, i.sender, i.received_at
         FROM chunks c
         JOIN items i ON i.id = c.item_id
         WHERE c.embedding IS NOT NULL AND i.deleted_at IS NULL`,
      )
      .all();

    const hits: SearchHit[] = [];
    for (const row of toRows(rows)) {
      const blob = blobOrNull(row, "embedding");
      if (!blob) continue;
      const score = cosineSimilarity(queryVector, decodeEmbedding(blob));
      if (score >= this.deps.config.minVectorScore) hits.push(toHit(row, score));
    }
    hits.sort((a, b) => b.score - a.score || b.receivedAt - a.receivedAt || a.chunkId.localeCompare(b.chunkId));
    return bestPerItem(hits, limit);
  }

  async hybrid(query: string, limit: number): Promise<SearchHit[]> {
    const candidates = limit * CANDIDATE_FACTOR;
    const lexical = this.lexical(query, candidates);
    const vector = await this.vector(query, candidates);

    const byItem = new Map<string, SearchHit>();
    for (const hit of [...lexical, ...vector]) {
      if (!byItem.has(hit.itemId)) byItem.set(hit.itemId, hit);
    }
    const ranked = (hits: readonly SearchHit[]): RankedHit[] =>
      hits.map((h) => ({ id: h.itemId, timestamp: h.receivedAt }));

    const fused = reciprocalRankFusion([ranked(lexical), ranked(vector)], {
      k: this.deps.config.rrfK,
      missingRank: this.deps.config.missingRank,
    });

    const results: SearchHit[] = [];
    for (const f of fused.slice(0, limit)) {
      const hit = byItem.get(f.id);
      if (hit) results.push({ ...hit, score: f.score });
    }
    return results;
  }
}

function toHit(row: Row, score: number): SearchHit {
  return {
    itemId: text(row, "item_id"),
    chunkId: text(row, "chunk_id"),
    subject: text(row, "subject"),
    sender: text(row, "sender"),
    receivedAt: num(row, "received_at"),
    snippet: text(row, "content").slice(0, SNIPPET_LENGTH),
    score,
  };
}

/** Keeps the first (best) chunk of each item. Input must already be ordered. */
function bestPerItem(hits: readonly SearchHit[], limit: number): SearchHit[] {
  const seen = new Set<string>();
  const out: SearchHit[] = [];
  for (const hit of hits) {
    if (seen.has(hit.itemId)) continue;
    seen.add(hit.itemId);
    out.push(hit);
    if (out.length >= limit) break;
  }
  return out;
}
