import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from "@modelcontextprotocol/sdk/types.js";
import { tools, handleToolCall, type ToolContext } from "./tools/index.js";

/**
 * Create and configure the MCP server.
 *
 * Mail tools: list_emails, read_email, search_emails, send_email,
 * download_attachment, check_bounced_emails, verify_email.
 * Signature tools: save_signature, create_signature, get_signature,
 * list_signatures, delete_signature.
 */
export function createServer(context: ToolContext): Server {
  const server = new Server(
    {
      name: "mail-assistant",
      version: "0.1.0",
    },
    {
      capabilities: {
        tools: {},
      },
    }
  );

  // List available tools
  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return { tools: [...tools] };
  });

  // Dispatch tool calls; handleToolCall turns failures into error results
  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;
    return handleToolCall(context, name, args || {});
  });

  return server;
}
