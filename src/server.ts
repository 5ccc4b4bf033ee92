#!/usr/bin/env node
import "dotenv/config";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { createAppServer } from "./appServer.js";
import { loadConfig } from "./config/env.js";
import { createEmbeddings } from "./infra/ai/createEmbeddings.js";
import { createLogger } from "./infra/logging/logger.js";
import { FileTypeSniffer } from "./infra/parsers/contentSniffer.js";
import { createVectorStores } from "./infra/store/createVectorStores.js";
import { IngestionPipeline } from "./pipelines/ingestion.js";
import { HierarchicalRetriever } from "./pipelines/retrieval.js";
import { FileValidator } from "./pipelines/validation.js";
import { DocumentIndexService } from "./services/documentIndexService.js";

async function main() {
  const config = loadConfig();
  const logger = createLogger(config.logLevel);
  const embeddings = createEmbeddings(config);

  const { scope, close } = await createVectorStores(config, embeddings);
  const validator = new FileValidator(new FileTypeSniffer(), logger);
  const ingestion = new IngestionPipeline(
    scope,
    validator,
    {
      maxFileSizeBytes: config.maxFileSizeBytes,
      chunkWindow: config.chunkSize,
      chunkOverlap: config.chunkOverlap,
      summaryMaxChars: config.summaryMaxChars,
      replaceExisting: config.replaceExisting,
    },
    logger,
  );
  const retriever = new HierarchicalRetriever(scope, {
    nDocs: config.retrievalNDocs,
    nChunksPerDoc: config.retrievalNChunksPerDoc,
    logger,
  });
  const service = new DocumentIndexService(scope, ingestion, retriever, logger);

  const server = createAppServer(service, {
    vectorStore: config.vectorStore,
    documentScope: scope.kind,
    collection: scope.collection,
    embeddingModel: embeddings.model,
  });
  await server.connect(new StdioServerTransport());
  logger.info(
    { vectorStore: config.vectorStore, scope: scope.kind, collection: scope.collection },
    "MCP stdio server ready",
  );

  const shutdown = async () => {
    logger.info("shutting down");
    await server.close();
    await close();
    process.exit(0);
  };

  process.on("SIGINT", () => {
    shutdown().catch((error) => {
      logger.error({ err: error }, "shutdown failed");
      process.exit(1);
    });
  });
  process.on("SIGTERM", () => {
    shutdown().catch((error) => {
      logger.error({ err: error }, "shutdown failed");
      process.exit(1);
    });
  });
}

main().catch((error) => {
  createLogger("error").fatal({ err: error }, "failed to start MCP server");
  process.exit(1);
});
