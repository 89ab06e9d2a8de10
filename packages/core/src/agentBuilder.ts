import type { ChatReply, EsConfig, KibanaConfig } from "@tailscope/contracts";
import type { ChatClient, ConverseRequest } from "./dataSource.js";
import { BackendError, isAbortError } from "./errors.js";
import { authorizationHeader } from "./esClient.js";
import { DEFAULT_KIBANA_URL } from "./kibana.js";
import { asRecord, asString } from "./utils.js";

export const CHAT_WELCOME =
  "Hello! Ask me anything about your observability data: logs, traces or metrics. " +
  "I can see your current filters and selection.";

export interface ChatContext {
  signal: string;
  index: string;
  timeRange: string;
  filters: Array<[string, string]>;
  selected: string;
}

export function formatChatContext(ctx: ChatContext): string {
  const parts: string[] = [];
  if (ctx.signal) parts.push(`Currently viewing: ${ctx.signal}`);
  if (ctx.index) parts.push(`Index: ${ctx.index}`);
  if (ctx.timeRange) parts.push(`Time range: ${ctx.timeRange}`);
  if (ctx.filters.length > 0) {
    parts.push(`Filters: ${ctx.filters.map(([key, value]) => `${key}=${value}`).join(", ")}`);
  }
  if (ctx.selected) parts.push(`Selected: ${ctx.selected}`);
  return parts.length > 0 ? `Current context:\n${parts.join("\n")}` : "";
}

/** Prefixes the opening user message with the context block; later turns are sent as typed. */
export function withContext(messages: ConverseRequest["messages"], context: string): ConverseRequest["messages"] {
  return messages.map((message, i) =>
    i === 0 && message.role === "user" && context ? { ...message, content: `${context}\n\n${message.content}` } : message,
  );
}

export interface AgentBuilderOptions {
  kibana: KibanaConfig;
  credentials: Partial<Pick<EsConfig, "apiKey" | "username" | "password">>;
  fetchImpl?: typeof fetch;
  now?: () => number;
}

export class AgentBuilderClient implements ChatClient {
  private readonly fetchImpl: typeof fetch;
  private readonly now: () => number;

  constructor(private readonly options: AgentBuilderOptions) {
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.now = options.now ?? Date.now;
  }

  endpoint(path: string): string {
    const base = (this.options.kibana.url || DEFAULT_KIBANA_URL).replace(/\/+$/, "");
    return this.options.kibana.space ? `${base}/s/${this.options.kibana.space}${path}` : `${base}${path}`;
  }

  async converse(request: ConverseRequest, signal: AbortSignal): Promise<ChatReply> {
    const headers: Record<string, string> = { "content-type": "application/json", "kbn-xsrf": "true" };
    const auth = authorizationHeader(this.options.credentials);
    if (auth) headers.authorization = auth;

    const body: Record<string, unknown> = { messages: request.messages };
    if (request.conversationId) body.conversationId = request.conversationId;

    let response: Response;
    try {
      response = await this.fetchImpl(this.endpoint("/api/agent_builder/converse"), {
        method: "POST",
        headers,
        body: JSON.stringify(body),
        signal,
      });
    } catch (error) {
      if (isAbortError(error)) throw error;
      throw new Error("failed to reach Agent Builder", { cause: error });
    }

    const text = await response.text();
    if (response.status >= 400) {
      throw new BackendError(`API error (status ${response.status}): ${text}`, response.status, text);
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch (error) {
      throw new Error("failed to parse Agent Builder response", { cause: error });
    }
    const record = asRecord(parsed);
    const agentError = asString(record.error);
    if (agentError) {
      throw new Error(`agent error: ${agentError}`);
    }
    const message = asRecord(record.message);
    return {
      conversationId: asString(record.conversationId),
      message: {
        role: "assistant",
        content: asString(message.content),
        timestampMs: this.now(),
      },
    };
  }
}
