import { devDebug } from "../shared/index.js";
import type { Chunk } from "./types.js";

/**
 * Chunk sets keyed by immutable document id. Each key is written at most
 * once; when two computations race, the first stored result wins and the
 * other is discarded (chunking is a pure function of immutable text).
 */
export class ChunkCache {
  private readonly entries = new Map<string, readonly Chunk[]>();

  get size(): number {
    return this.entries.size;
  }

  peek(documentId: string): readonly Chunk[] | undefined {
    return this.entries.get(documentId);
  }

  /** Stores `chunks` unless the key is already populated; returns the stored set. */
  put(documentId: string, chunks: readonly Chunk[]): readonly Chunk[] {
    const existing = this.entries.get(documentId);
    if (existing) return existing;
    const frozen = Object.freeze([...chunks]);
    this.entries.set(documentId, frozen);
    devDebug(`Cached ${frozen.length} chunk(s) for ${documentId}`);
    return frozen;
  }

  async getOrCompute(documentId: string, compute: () => Promise<readonly Chunk[]>): Promise<readonly Chunk[]> {
    const cached = this.entries.get(documentId);
    if (cached) return cached;
    const computed = await compute();
    return this.put(documentId, computed);
  }
}
