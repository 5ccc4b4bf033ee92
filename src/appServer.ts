import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { DocumentIndexService } from "./services/documentIndexService.js";
import { registerHierarchicalSearchTool } from "./tools/hierarchicalSearch.js";
import { registerIngestDocumentTool } from "./tools/ingestDocument.js";
import { registerListDocumentsTool } from "./tools/listDocuments.js";
import { registerReconstructDocumentTool } from "./tools/reconstructDocument.js";
import { jsonResponse } from "./tools/toolResponse.js";

export const SERVER_NAME = "hierarchical-doc-index";
export const SERVER_VERSION = "0.1.0";

export interface ServerStatus {
  vectorStore: string;
  documentScope: string;
  collection: string;
  embeddingModel: string;
}

export function createAppServer(service: DocumentIndexService, status: ServerStatus): McpServer {
  const server = new McpServer({
    name: SERVER_NAME,
    version: SERVER_VERSION,
  });

  server.registerTool(
    "health_check",
    {
      title: "Health Check",
      description: "Returns basic server status.",
      inputSchema: {
        name: z.string().optional().describe("Optional caller name"),
      },
    },
    async ({ name }) => {
      const who = name?.trim() || "anonymous";
      return jsonResponse({
        status: "ok",
        server: `${SERVER_NAME} ${SERVER_VERSION}`,
        caller: who,
        ...status,
      });
    },
  );

  registerIngestDocumentTool(server, service);
  registerHierarchicalSearchTool(server, service);
  registerListDocumentsTool(server, service);
  registerReconstructDocumentTool(server, service);

  return server;
}
