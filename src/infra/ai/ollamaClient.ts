import { Embeddings } from "./types.js";

interface OllamaClientOptions {
  baseUrl: string;
  embeddingModel: string;
  concurrency?: number;
}

interface OllamaEmbeddingsResponse {
  embedding?: number[];
}

const DEFAULT_CONCURRENCY = 4;

export class OllamaClient implements Embeddings {
  readonly model: string;

  constructor(private readonly options: OllamaClientOptions) {
    this.model = options.embeddingModel;
  }

  async embedDocuments(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }

    const workers = Math.min(this.options.concurrency ?? DEFAULT_CONCURRENCY, texts.length);
    const embeddings: number[][] = new Array(texts.length);
    let cursor = 0;

    const runWorker = async () => {
      while (true) {
        const index = cursor;
        cursor += 1;
        if (index >= texts.length) {
          return;
        }
        embeddings[index] = await this.embedQuery(texts[index]);
      }
    };

    await Promise.all(Array.from({ length: workers }, () => runWorker()));
    return embeddings;
  }

  async embedQuery(text: string): Promise<number[]> {
    const response = await fetch(`${this.options.baseUrl.replace(/\/+$/, "")}/api/embeddings`, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
      },
      body: JSON.stringify({
        model: this.options.embeddingModel,
        prompt: text,
      }),
    });

    if (!response.ok) {
      throw new Error(
        `Ollama embeddings failed (${response.status}): ${await response.text()}`,
      );
    }

    const data = (await response.json()) as OllamaEmbeddingsResponse;
    if (!data.embedding || data.embedding.length === 0) {
      throw new Error("Ollama embeddings returned empty vector.");
    }
    return data.embedding;
  }
}
