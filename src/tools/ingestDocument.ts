import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { DocumentIndexService } from "../services/documentIndexService.js";
import { errorResponse, jsonResponse } from "./toolResponse.js";

export function registerIngestDocumentTool(server: McpServer, service: DocumentIndexService) {
  server.registerTool(
    "ingest_document",
    {
      title: "Ingest Document",
      description:
        "Validates, chunks and indexes local .md, .txt or .pdf files as one summary plus chunk records each.",
      inputSchema: {
        paths: z.array(z.string().min(1)).min(1).describe("File paths to ingest"),
      },
    },
    async ({ paths }) => {
      if (paths.length === 1) {
        try {
          return jsonResponse(await service.ingestDocument(paths[0]));
        } catch (error) {
          return errorResponse(error);
        }
      }

      const result = await service.ingestDocuments(paths);
      return {
        ...jsonResponse(result),
        isError: result.ingested_count === 0,
      };
    },
  );
}
