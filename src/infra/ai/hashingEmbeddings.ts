import { tokenize } from "../../utils/text.js";
import { l2Normalize } from "../../utils/vector.js";
import { Embeddings } from "./types.js";

const FNV_OFFSET = 0x811c9dc5;
const FNV_PRIME = 0x01000193;

/**
 * Local bag-of-words embedder using the hashing trick. Lets the index run
 * without a model server; similarity is lexical only.
 */
export class HashingEmbeddings implements Embeddings {
  readonly model: string;

  constructor(private readonly dimension: number) {
    if (!Number.isInteger(dimension) || dimension <= 0) {
      throw new Error(`Hashing embedding dimension must be a positive integer, got ${dimension}.`);
    }
    this.model = `hashing-${dimension}`;
  }

  async embedDocuments(texts: string[]): Promise<number[][]> {
    return texts.map((text) => this.embed(text));
  }

  async embedQuery(text: string): Promise<number[]> {
    return this.embed(text);
  }

  private embed(text: string): number[] {
    const vector = new Array<number>(this.dimension).fill(0);
    for (const token of tokenize(text)) {
      const hash = fnv1a(token);
      const bucket = hash % this.dimension;
      vector[bucket] += (hash & 0x80000000) === 0 ? 1 : -1;
    }
    return l2Normalize(vector);
  }
}

function fnv1a(value: string): number {
  let hash = FNV_OFFSET;
  for (let i = 0; i < value.length; i += 1) {
    hash ^= value.charCodeAt(i);
    hash = Math.imul(hash, FNV_PRIME);
  }
  return hash >>> 0;
}
