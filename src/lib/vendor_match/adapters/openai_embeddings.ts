import OpenAI from "openai";
import type { EmbeddingAdapter } from "../types";

export function resolveNativeDimensions(model: string) {
  if (model === "text-embedding-3-large") return 3072;
  if (model === "text-embedding-3-small") return 1536;
  return 1536;
}

/**
 * Embeddings through the OpenAI API, one client per credential. SDK retries
 * are disabled; the generator owns retry and rotation, so provider errors are
 * rethrown untouched.
 */
export class OpenAiEmbeddingAdapter implements EmbeddingAdapter {
  readonly native_dimensions: number;
  private readonly clients = new Map<string, OpenAI>();

  constructor(private readonly model: string) {
    this.native_dimensions = resolveNativeDimensions(model);
  }

  private clientFor(credential: string) {
    let client = this.clients.get(credential);
    if (!client) {
      client = new OpenAI({ apiKey: credential, maxRetries: 0 });
      this.clients.set(credential, client);
    }
    return client;
  }

  async embed(text: string, dimensions: number, credential: string): Promise<number[] | null> {
    const response = await this.clientFor(credential).embeddings.create({
      model: this.model,
      input: text,
      ...(dimensions < this.native_dimensions ? { dimensions } : {}),
    });
    const embedding = response.data[0]?.embedding;
    return embedding && embedding.length > 0 ? embedding : null;
  }
}
