import type { ImportanceRater, MemoryKind } from "@tickvale/schemas";

export class FixedImportanceRater implements ImportanceRater {
  private value: number;

  constructor(value: number) {
    this.value = value;
  }

  async rate(_description: string, _kind: MemoryKind): Promise<number> {
    return this.value;
  }
}

export const DEFAULT_KIND_BASE: Readonly<Record<MemoryKind, number>> = {
  observation: 2,
  action: 3,
  plan: 2,
  reflection: 5,
};

export const DEFAULT_KEYWORDS: Readonly<Record<string, number>> = {
  says: 1,
  arrived: 1,
  "could not": 2,
  empty: 2,
};

export interface KeywordRaterConfig {
  base?: Partial<Record<MemoryKind, number>>;
  /** Lower-case phrase → bump added when the description contains it. */
  keywords?: Record<string, number>;
}

/** Base rating per kind plus keyword bumps, clamped to [1, 10]. */
export class KeywordImportanceRater implements ImportanceRater {
  private base: Record<MemoryKind, number>;
  private keywords: Array<[string, number]>;

  constructor(config: KeywordRaterConfig = {}) {
    this.base = { ...DEFAULT_KIND_BASE, ...config.base };
    this.keywords = Object.entries(config.keywords ?? DEFAULT_KEYWORDS).map(([k, v]) => [k.toLowerCase(), v]);
  }

  async rate(description: string, kind: MemoryKind): Promise<number> {
    const lower = description.toLowerCase();
    let score = this.base[kind];
    for (const [phrase, bump] of this.keywords) {
      if (lower.includes(phrase)) score += bump;
    }
    return Math.min(10, Math.max(1, score));
  }
}
