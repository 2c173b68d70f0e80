import type { Insight, InsightGenerator, MemoryKind, MemoryRecord, NameLookup } from "@tickvale/schemas";

const KIND_PHRASES: Record<MemoryKind, string> = {
  observation: "watching what goes on",
  action: "busy doing things",
  plan: "making plans",
  reflection: "lost in thought",
};

const MAX_SUPPORT = 5;

/**
 * Produces three canned insights from a reflection window: the most
 * important memory, the dominant kind of memory, and a tally. Good enough to
 * exercise reflection without a language model.
 */
export class TemplateInsightGenerator implements InsightGenerator {
  private names: NameLookup;

  constructor(opts?: { names?: NameLookup }) {
    this.names = opts?.names ?? ((id) => id);
  }

  async reflect(agentId: string, records: MemoryRecord[]): Promise<Insight[]> {
    if (records.length === 0) return [];
    const name = this.names(agentId);

    // First of the highest importance wins
    let top = records[0]!;
    for (const record of records) {
      if (record.importance > top.importance) top = record;
    }

    const byKind = new Map<MemoryKind, MemoryRecord[]>();
    for (const record of records) {
      const bucket = byKind.get(record.kind);
      if (bucket) bucket.push(record);
      else byKind.set(record.kind, [record]);
    }
    let dominant: [MemoryKind, MemoryRecord[]] = [top.kind, []];
    for (const entry of byKind) {
      if (entry[1].length > dominant[1].length) dominant = entry;
    }

    return [
      { text: `${name} keeps coming back to this: ${top.description}`, supporting_ids: [top.id] },
      {
        text: `${name} has mostly been ${KIND_PHRASES[dominant[0]]}.`,
        supporting_ids: dominant[1].slice(-MAX_SUPPORT).map((r) => r.id),
      },
      {
        text: `${name} has ${records.length} new ${records.length === 1 ? "memory" : "memories"} to think over.`,
        supporting_ids: records.slice(-MAX_SUPPORT).map((r) => r.id),
      },
    ];
  }
}
