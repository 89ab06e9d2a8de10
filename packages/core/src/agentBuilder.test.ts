import { describe, expect, it, vi } from "vitest";
import { AgentBuilderClient, formatChatContext, withContext } from "./agentBuilder.js";
import { BackendError } from "./errors.js";

function client(response: Response) {
  const fetchImpl = vi.fn<typeof fetch>(async () => response);
  const agent = new AgentBuilderClient({
    kibana: { url: "http://kibana.test:5601", space: "ops" },
    credentials: { apiKey: "test-key" },
    fetchImpl,
    now: () => 7,
  });
  return { agent, fetchImpl };
}

const signal = new AbortController().signal;

describe("chat context", () => {
  it("lists only what is set", () => {
    expect(
      formatChatContext({
        signal: "logs",
        index: "logs-*",
        timeRange: "last hour",
        filters: [["service", "api"]],
        selected: "",
      }),
    ).toBe("Current context:\nCurrently viewing: logs\nIndex: logs-*\nTime range: last hour\nFilters: service=api");
    expect(formatChatContext({ signal: "", index: "", timeRange: "", filters: [], selected: "" })).toBe("");
  });

  it("prefixes only the opening user message", () => {
    const messages = withContext(
      [
        { role: "user", content: "why?" },
        { role: "assistant", content: "because" },
        { role: "user", content: "ok" },
      ],
      "Current context:\nIndex: logs-*",
    );
    expect(messages.map((message) => message.content)).toEqual(["Current context:\nIndex: logs-*\n\nwhy?", "because", "ok"]);
  });
});

describe("AgentBuilderClient", () => {
  it("posts the conversation and reads the reply", async () => {
    const { agent, fetchImpl } = client(
      new Response(JSON.stringify({ conversationId: "conv-9", message: { content: "Check the disk." } })),
    );
    const reply = await agent.converse({ conversationId: "conv-8", messages: [{ role: "user", content: "hi" }] }, signal);

    expect(reply).toEqual({
      conversationId: "conv-9",
      message: { role: "assistant", content: "Check the disk.", timestampMs: 7 },
    });
    const [url, init] = fetchImpl.mock.calls[0] ?? [];
    expect(url).toBe("http://kibana.test:5601/s/ops/api/agent_builder/converse");
    expect(init?.headers).toEqual({
      "content-type": "application/json",
      "kbn-xsrf": "true",
      authorization: "ApiKey test-key",
    });
    expect(init?.body).toBe(JSON.stringify({ messages: [{ role: "user", content: "hi" }], conversationId: "conv-8" }));
  });

  it("raises HTTP failures with the body", async () => {
    const { agent } = client(new Response("nope", { status: 401 }));
    const error = await agent.converse({ conversationId: "", messages: [] }, signal).catch((err: unknown) => err);
    expect(error).toBeInstanceOf(BackendError);
    expect(error instanceof Error ? error.message : "").toBe("API error (status 401): nope");
  });

  it("raises agent errors", async () => {
    const { agent } = client(new Response(JSON.stringify({ error: "quota exceeded" })));
    await expect(agent.converse({ conversationId: "", messages: [] }, signal)).rejects.toThrow("agent error: quota exceeded");
  });

  it("rejects unreadable replies", async () => {
    const { agent } = client(new Response("<html>"));
    await expect(agent.converse({ conversationId: "", messages: [] }, signal)).rejects.toThrow(
      "failed to parse Agent Builder response",
    );
  });
});
