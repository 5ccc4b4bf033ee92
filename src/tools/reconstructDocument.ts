import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { DocumentIndexService } from "../services/documentIndexService.js";
import { errorResponse, jsonResponse } from "./toolResponse.js";

export function registerReconstructDocumentTool(
  server: McpServer,
  service: DocumentIndexService,
) {
  server.registerTool(
    "reconstruct_document",
    {
      title: "Reconstruct Document",
      description: "Returns the stored summary and all chunks of one document in order.",
      inputSchema: {
        source_id: z.string().min(1).describe("Source id as returned by list_documents"),
      },
    },
    async ({ source_id }) => {
      try {
        return jsonResponse(await service.reconstructDocument(source_id));
      } catch (error) {
        return errorResponse(error);
      }
    },
  );
}
