import { tokenizeWithRepeats } from "../../utils/text.js";
import { l2Normalize } from "../../utils/vector.js";
import { EmbeddingProvider } from "./types.js";

const FNV_OFFSET = 0x811c9dc5;
const FNV_PRIME = 0x01000193;

/**
 * Local feature-hashing embedder: each token (with its plural variant) is
 * hashed into one of `dimension` buckets and the term-frequency vector is
 * L2-normalized. Runs without a model download or network access.
 */
export class HashEmbeddingProvider implements EmbeddingProvider {
  readonly version: string;

  constructor(private readonly dimension: number = 384) {
    if (!Number.isInteger(dimension) || dimension <= 0) {
      throw new Error(`Invalid hash embedding dimension: ${dimension}`);
    }
    this.version = `hash-v1:${dimension}`;
  }

  async embedTexts(texts: string[]): Promise<number[][]> {
    return texts.map((text) => this.embedOne(text));
  }

  private embedOne(text: string): number[] {
    const vector = new Array<number>(this.dimension).fill(0);
    for (const token of tokenizeWithRepeats(text)) {
      vector[fnv1a(token) % this.dimension] += 1;
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
