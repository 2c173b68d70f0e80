import type {
  Embedder,
  ImportanceRater,
  Logger,
  MemoryKind,
  MemoryRecord,
  RetrievedMemory,
} from "@tickvale/schemas";
import { callWithTimeout, silentLogger } from "@tickvale/schemas";

// ─── Scoring Helpers ────────────────────────────────────────────────

/** Importance used when the rater fails, times out or returns garbage. */
export const FALLBACK_IMPORTANCE: Readonly<Record<MemoryKind, number>> = Object.freeze({
  observation: 2,
  action: 3,
  plan: 1,
  reflection: 3,
});

export const DEFAULT_RECENCY_DECAY = 0.01;
export const DEFAULT_COLLABORATOR_TIMEOUT_MS = 5000;

export function estimateTokens(text: string): number {
  return Math.ceil(text.length / 4);
}

/** Rounds and clamps a rating to [1, 10]; null when it is not a finite number. */
export function clampImportance(raw: unknown): number | null {
  if (typeof raw !== "number" || !Number.isFinite(raw)) return null;
  return Math.min(10, Math.max(1, Math.round(raw)));
}

/** Cosine similarity; 0 when either vector is empty, zero or the lengths differ. */
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  if (a.length === 0 || a.length !== b.length) return 0;
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    const x = a[i]!;
    const y = b[i]!;
    dot += x * y;
    normA += x * x;
    normB += y * y;
  }
  if (normA === 0 || normB === 0) return 0;
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

/** Min-max normalisation. A degenerate range maps every value to 0. */
export function minMaxNormalize(values: readonly number[]): number[] {
  if (values.length === 0) return [];
  const min = Math.min(...values);
  const max = Math.max(...values);
  const range = max - min;
  if (range === 0) return values.map(() => 0);
  return values.map((v) => (v - min) / range);
}

// ─── Memory Stream ──────────────────────────────────────────────────

export interface MemoryStreamOptions {
  embedder: Embedder;
  rater: ImportanceRater;
  /** Exponential decay per tick applied to recency. Default: 0.01 */
  recencyDecay?: number;
  /** Upper bound for each rater/embedder call. Default: 5000 */
  timeoutMs?: number;
  logger?: Logger;
}

export interface RetrieveOptions {
  k: number;
  budgetTokens: number;
}

export type MemoryListener = (agentId: string, record: MemoryRecord) => void;

interface StreamEntry {
  record: MemoryRecord;
  embedding: number[];
}

function copyRecord(record: MemoryRecord): MemoryRecord {
  return { ...record, links: [...record.links] };
}

/**
 * Append-only memory of a single agent. Records keep their stream order;
 * `last_accessed_at` is the only field that changes after append.
 */
export class MemoryStream {
  readonly agentId: string;
  private entries: StreamEntry[] = [];
  private byId = new Map<string, StreamEntry>();
  private nextSeq = 1;
  private listeners: MemoryListener[] = [];
  private embedder: Embedder;
  private rater: ImportanceRater;
  private recencyDecay: number;
  private timeoutMs: number;
  private logger: Logger;

  constructor(agentId: string, options: MemoryStreamOptions) {
    this.agentId = agentId;
    this.embedder = options.embedder;
    this.rater = options.rater;
    this.recencyDecay = options.recencyDecay ?? DEFAULT_RECENCY_DECAY;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_COLLABORATOR_TIMEOUT_MS;
    this.logger = options.logger ?? silentLogger;
  }

  get size(): number {
    return this.entries.length;
  }

  has(id: string): boolean {
    return this.byId.has(id);
  }

  get(id: string): MemoryRecord | undefined {
    const entry = this.byId.get(id);
    return entry ? copyRecord(entry.record) : undefined;
  }

  /** Records from stream position `from` onwards, in append order. */
  records(from = 0): MemoryRecord[] {
    return this.entries.slice(from).map((e) => copyRecord(e.record));
  }

  on(listener: MemoryListener): () => void {
    this.listeners.push(listener);
    return () => {
      this.listeners = this.listeners.filter((l) => l !== listener);
    };
  }

  async append(description: string, kind: MemoryKind, tick: number, links: string[] = []): Promise<MemoryRecord> {
    const importance = await this.rate(description, kind);
    const embedding = await this.embed(description);
    const record: MemoryRecord = {
      id: `${this.agentId}#${this.nextSeq}`,
      description,
      created_at: tick,
      last_accessed_at: tick,
      importance,
      kind,
      links: [...links],
    };
    this.nextSeq += 1;
    const entry = { record, embedding };
    this.entries.push(entry);
    this.byId.set(record.id, entry);

    for (const listener of this.listeners) {
      try {
        listener(this.agentId, copyRecord(record));
      } catch (err) {
        this.logger.warn("memory listener failed", { agent_id: this.agentId, error: String(err) });
      }
    }
    return copyRecord(record);
  }

  /**
   * Scores every record against `query`, then takes the best ones greedily
   * while they fit the token budget, up to `k`. Taken records are touched:
   * their `last_accessed_at` becomes `tick`.
   */
  async retrieve(query: string, tick: number, options: RetrieveOptions): Promise<RetrievedMemory[]> {
    if (this.entries.length === 0 || options.k <= 0) return [];

    const queryEmbedding = await this.embed(query);
    const recency = minMaxNormalize(
      this.entries.map((e) => Math.exp(-this.recencyDecay * (tick - e.record.last_accessed_at))),
    );
    const relevance = minMaxNormalize(this.entries.map((e) => cosineSimilarity(queryEmbedding, e.embedding)));
    const importance = minMaxNormalize(this.entries.map((e) => (e.record.importance - 1) / 9));

    const ranked = this.entries
      .map((entry, index) => ({ entry, index, score: recency[index]! + relevance[index]! + importance[index]! }))
      .sort((a, b) => b.score - a.score || a.index - b.index);

    const taken: RetrievedMemory[] = [];
    let remaining = options.budgetTokens;
    for (const candidate of ranked) {
      if (taken.length >= options.k) break;
      const cost = estimateTokens(candidate.entry.record.description);
      if (cost > remaining) continue;
      remaining -= cost;
      candidate.entry.record.last_accessed_at = tick;
      taken.push({ record: copyRecord(candidate.entry.record), score: candidate.score });
    }
    return taken;
  }

  private async rate(description: string, kind: MemoryKind): Promise<number> {
    try {
      const raw = await callWithTimeout(() => this.rater.rate(description, kind), this.timeoutMs, "Importance rater");
      const clamped = clampImportance(raw);
      if (clamped !== null) return clamped;
      this.logger.warn("importance rater returned a non-numeric rating", { agent_id: this.agentId, kind });
    } catch (err) {
      this.logger.warn("importance rater failed, using fallback", {
        agent_id: this.agentId,
        kind,
        error: err instanceof Error ? err.message : String(err),
      });
    }
    return FALLBACK_IMPORTANCE[kind];
  }

  private async embed(text: string): Promise<number[]> {
    try {
      const vector = await callWithTimeout(() => this.embedder.embed(text), this.timeoutMs, "Embedder");
      return vector.every((v) => Number.isFinite(v)) ? [...vector] : [];
    } catch (err) {
      this.logger.warn("embedder failed, relevance will be 0", {
        agent_id: this.agentId,
        error: err instanceof Error ? err.message : String(err),
      });
      return [];
    }
  }
}
