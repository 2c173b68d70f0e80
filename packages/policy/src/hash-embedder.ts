import { createHash } from "node:crypto";
import type { Embedder } from "@tickvale/schemas";

/**
 * Deterministic stand-in for a real embedding backend. Identical text maps
 * to identical vectors; anything else is effectively noise, so relevance
 * only rewards exact repeats.
 */
export class HashEmbedder implements Embedder {
  readonly dimensions: number;

  constructor(opts?: { dimensions?: number }) {
    this.dimensions = Math.max(1, Math.floor(opts?.dimensions ?? 8));
  }

  async embed(text: string): Promise<number[]> {
    const bytes: number[] = [];
    for (let block = 0; bytes.length < this.dimensions; block++) {
      const digest = createHash("sha256").update(`${block}:${text}`).digest();
      bytes.push(...digest);
    }
    return bytes.slice(0, this.dimensions).map((b) => b / 127.5 - 1);
  }
}
