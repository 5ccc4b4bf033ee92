import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { DocumentIndexService } from "../services/documentIndexService.js";
import { errorResponse, jsonResponse } from "./toolResponse.js";

export function registerHierarchicalSearchTool(
  server: McpServer,
  service: DocumentIndexService,
) {
  server.registerTool(
    "hierarchical_search",
    {
      title: "Hierarchical Search",
      description:
        "Finds the most relevant documents by summary, then the best chunks inside each of them.",
      inputSchema: {
        query: z.string().min(1).describe("Search query"),
        k: z
          .number()
          .int()
          .min(1)
          .max(20)
          .optional()
          .describe("Total result budget, spread over several documents"),
        n_docs: z.number().int().min(1).max(20).optional().describe("Documents to expand"),
        n_chunks_per_doc: z
          .number()
          .int()
          .min(1)
          .max(20)
          .optional()
          .describe("Chunks returned per document"),
      },
    },
    async ({ query, k, n_docs, n_chunks_per_doc }) => {
      try {
        return jsonResponse(
          await service.search({ query, k, nDocs: n_docs, nChunksPerDoc: n_chunks_per_doc }),
        );
      } catch (error) {
        return errorResponse(error);
      }
    },
  );
}
