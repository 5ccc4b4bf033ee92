import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { DocumentIndexService } from "../services/documentIndexService.js";
import { errorResponse, jsonResponse } from "./toolResponse.js";

export function registerListDocumentsTool(server: McpServer, service: DocumentIndexService) {
  server.registerTool(
    "list_documents",
    {
      title: "List Documents",
      description: "Lists the source ids of every indexed document.",
      inputSchema: {},
    },
    async () => {
      try {
        return jsonResponse({ documents: await service.listDocuments() });
      } catch (error) {
        return errorResponse(error);
      }
    },
  );

  server.registerTool(
    "index_stats",
    {
      title: "Index Stats",
      description: "Counts summaries, chunks and documents in the index.",
      inputSchema: {},
    },
    async () => {
      try {
        return jsonResponse(await service.getStats());
      } catch (error) {
        return errorResponse(error);
      }
    },
  );
}
