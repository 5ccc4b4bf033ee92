import { Embeddings } from "./types.js";

interface OpenAiClientOptions {
  apiKey: string | null;
  embeddingModel: string;
  baseUrl?: string;
  batchSize?: number;
}

interface EmbeddingResponse {
  data: Array<{
    embedding: number[];
    index: number;
  }>;
}

const DEFAULT_BASE_URL = "https://api.openai.com/v1";
const DEFAULT_BATCH_SIZE = 96;

export class OpenAiClient implements Embeddings {
  readonly model: string;

  constructor(private readonly options: OpenAiClientOptions) {
    this.model = options.embeddingModel;
  }

  async embedDocuments(texts: string[]): Promise<number[][]> {
    const batchSize = this.options.batchSize ?? DEFAULT_BATCH_SIZE;
    const embeddings: number[][] = [];
    for (let start = 0; start < texts.length; start += batchSize) {
      embeddings.push(...(await this.embedBatch(texts.slice(start, start + batchSize))));
    }
    return embeddings;
  }

  async embedQuery(text: string): Promise<number[]> {
    const [embedding] = await this.embedBatch([text]);
    if (!embedding) {
      throw new Error("OpenAI embeddings returned no vector for query.");
    }
    return embedding;
  }

  private async embedBatch(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }
    const apiKey = this.requireApiKey();

    const response = await fetch(`${this.options.baseUrl ?? DEFAULT_BASE_URL}/embeddings`, {
      method: "POST",
      headers: {
        Authorization: `Bearer ${apiKey}`,
        "Content-Type": "application/json",
      },
      body: JSON.stringify({
        model: this.options.embeddingModel,
        input: texts,
      }),
    });

    if (!response.ok) {
      throw new Error(
        `OpenAI embeddings failed (${response.status}): ${await response.text()}`,
      );
    }

    const data = (await response.json()) as EmbeddingResponse;
    if (data.data.length !== texts.length) {
      throw new Error(
        `OpenAI embeddings count mismatch (${data.data.length} for ${texts.length} inputs).`,
      );
    }
    return data.data
      .sort((a, b) => a.index - b.index)
      .map((item) => item.embedding);
  }

  private requireApiKey(): string {
    if (!this.options.apiKey) {
      throw new Error("OPENAI_API_KEY is required for OpenAI embeddings.");
    }
    return this.options.apiKey;
  }
}
