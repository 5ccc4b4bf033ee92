import { AppConfig } from "../../config/env.js";
import { HashingEmbeddings } from "./hashingEmbeddings.js";
import { OllamaClient } from "./ollamaClient.js";
import { OpenAiClient } from "./openAiClient.js";
import { Embeddings } from "./types.js";

export function createEmbeddings(config: AppConfig): Embeddings {
  switch (config.embeddingProvider) {
    case "ollama":
      return new OllamaClient({
        baseUrl: config.ollamaBaseUrl,
        embeddingModel: config.ollamaEmbeddingModel,
      });
    case "openai":
      return new OpenAiClient({
        apiKey: config.openaiApiKey,
        embeddingModel: config.openaiEmbeddingModel,
      });
    case "hashing":
      return new HashingEmbeddings(config.vectorDimension);
  }
}
