/**
 * MCP tool surface over {@link RagService}.
 *
 * Tool contracts:
 *  rag_query
 *    Input:  { query: string, top_k?: number }
 *    Output: { matches: Array<{ id, path, chunk, score, snippet, metadata }> }
 *  rag_answer
 *    Input:  { query: string, top_k?: number }
 *    Output: { answer: string, sources: [...] }, or an isError result with the
 *            sources when the language model could not be reached.
 *  rebuild_index
 *    Input:  {}
 *    Output: { chunks: number, fingerprint }
 *
 * Invalid arguments map to InvalidRequest, unknown tools to MethodNotFound.
 */
import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import {
  CallToolRequestSchema,
  ErrorCode,
  ListToolsRequestSchema,
  McpError,
  type CallToolResult,
  type Tool,
} from "@modelcontextprotocol/sdk/types.js";
import { APP_VERSION, MAX_TOP_K } from "./config";
import { GenerationError } from "./errors";
import type { RagService } from "./rag-service";
import type { RetrievalResult } from "./types";

interface QueryArgs {
  query: string;
  topK: number | undefined;
}

export const queryInputSchema = {
  type: "object",
  properties: {
    query: {
      type: "string",
      description: "Natural language question or search text.",
    },
    top_k: {
      type: "number",
      description: `Maximum number of chunks to use (1-${MAX_TOP_K}). Defaults to the configured TOP_K.`,
      minimum: 1,
      maximum: MAX_TOP_K,
    },
  },
  required: ["query"],
} satisfies Tool["inputSchema"];

export const TOOLS: Tool[] = [
  {
    name: "rag_query",
    description:
      "Semantically search the indexed documents and return the most relevant chunks with source path, chunk index, score and metadata.",
    inputSchema: queryInputSchema,
  },
  {
    name: "rag_answer",
    description: "Answer a question from the indexed documents using the local language model, with sources.",
    inputSchema: queryInputSchema,
  },
  {
    name: "rebuild_index",
    description: "Rebuild the document index from the source directory and swap it in once complete.",
    inputSchema: { type: "object", properties: {} },
  },
];

function parseQueryArgs(args: Record<string, unknown> | undefined): QueryArgs {
  const query = args?.query;
  if (typeof query !== "string" || !query.trim()) {
    throw new McpError(ErrorCode.InvalidRequest, "Missing query");
  }
  const raw = args?.top_k;
  if (raw === undefined || raw === null) return { query, topK: undefined };
  if (typeof raw !== "number" || !Number.isFinite(raw)) {
    throw new McpError(ErrorCode.InvalidRequest, "top_k must be a number");
  }
  return { query, topK: Math.max(1, Math.min(MAX_TOP_K, Math.floor(raw))) };
}

function toMatches(result: RetrievalResult) {
  return result.map((h) => ({
    id: h.id,
    path: h.path,
    chunk: h.chunk,
    score: Number(h.score.toFixed(4)),
    snippet: h.text,
    metadata: h.metadata,
  }));
}

function json(value: unknown, isError = false): CallToolResult {
  return { content: [{ type: "text", text: JSON.stringify(value, null, 2) }], ...(isError ? { isError } : {}) };
}

/** Execute one tool call against the service. */
export async function handleToolCall(
  rag: RagService,
  name: string,
  args: Record<string, unknown> | undefined,
): Promise<CallToolResult> {
  if (name === "rag_query") {
    const { query, topK } = parseQueryArgs(args);
    const hits = await rag.retrieve(query, topK);
    return json({ matches: toMatches(hits) });
  }

  if (name === "rag_answer") {
    const { query, topK } = parseQueryArgs(args);
    try {
      const { answer, sources } = await rag.answer(query, topK);
      return json({ answer, sources: toMatches(sources) });
    } catch (e) {
      if (!(e instanceof GenerationError)) throw e;
      return json({ error: "Could not generate a response", detail: e.message, sources: toMatches(e.context) }, true);
    }
  }

  if (name === "rebuild_index") {
    const index = await rag.rebuildIndex();
    return json({ chunks: index.size, fingerprint: index.fingerprint });
  }

  throw new McpError(ErrorCode.MethodNotFound, `Unknown tool: ${name}`);
}

/**
 * Factory for a fresh MCP Server bound to the shared service. HTTP mode
 * creates one per session; the index itself is shared.
 */
export function createServer(rag: RagService): Server {
  const server = new Server({ name: "docs-rag-server", version: APP_VERSION }, { capabilities: { tools: {} } });
  server.setRequestHandler(ListToolsRequestSchema, async () => ({ tools: TOOLS }));
  server.setRequestHandler(CallToolRequestSchema, async (req) =>
    handleToolCall(rag, req.params.name, req.params.arguments),
  );
  return server;
}
