import { describe, it } from "node:test";
import * as assert from "node:assert/strict";
import { AgentListener, AgentRunResult } from "../modules/agent/agent.service";
import {
  CHAT_ERROR_MESSAGE,
  ChatAgent,
  ChatService,
  NO_REPLY_MESSAGE,
  STREAM_ERROR_MESSAGE,
  STREAM_START_STATUS,
  toAgentMessages,
} from "../modules/chat/chat.service";
import { InMemoryConversationStore } from "../modules/chat/conversation.store";
import { AgentTool } from "../modules/tools/tool";
import { AgentMessage, StreamEvent } from "../types";

type Behaviour = (listener: AgentListener) => Promise<AgentRunResult>;

class FakeAgent implements ChatAgent {
  calls: AgentMessage[][] = [];

  constructor(private readonly behaviour: Behaviour) {}

  async run(messages: AgentMessage[], listener: AgentListener = {}): Promise<AgentRunResult> {
    this.calls.push(messages);
    return this.behaviour(listener);
  }
}

const replying = (reply: string, toolsUsed: string[] = []) =>
  new FakeAgent(async () => ({ messages: [], reply, toolsUsed }));

const failing = () =>
  new FakeAgent(async () => {
    throw new Error("model unavailable");
  });

const knowledgeTool: AgentTool = {
  name: "rag_tool",
  description: "Search",
  parameters: {},
  activity: "📚 Searching the health knowledge base...",
  run: async () => "",
};

const setup = (agent: ChatAgent, historyTurns = 5, historyLimit = 10) => {
  const store = new InMemoryConversationStore();
  return { store, service: new ChatService({ agent, store, historyTurns, historyLimit }) };
};

describe("toAgentMessages", () => {
  it("replays exchanges as user and model turns", () => {
    const messages = toAgentMessages(
      [{ userMessage: "q1", botResponse: "a1", timestamp: new Date(0), toolsUsed: [] }],
      "q2"
    );
    assert.deepEqual(messages, [
      { role: "user", content: "q1" },
      { role: "model", content: "a1", toolCalls: [] },
      { role: "user", content: "q2" },
    ]);
  });
});

describe("ChatService.sendMessage", () => {
  it("returns the reply with rendered HTML and stores the exchange", async () => {
    const { service } = setup(replying("**Rest** well.", ["rag_tool"]));

    const reply = await service.sendMessage("s1", "How do I recover from flu?");

    assert.equal(reply.response, "**Rest** well.");
    assert.equal(reply.response_html, "<p><strong>Rest</strong> well.</p>\n");
    assert.deepEqual(reply.tools_used, ["rag_tool"]);
    assert.equal(typeof reply.processing_time, "number");

    const history = await service.getHistory("s1");
    assert.equal(history?.length, 1);
    assert.equal(history?.[0].userMessage, "How do I recover from flu?");
    assert.equal(history?.[0].botResponse, "**Rest** well.");
    assert.deepEqual(history?.[0].toolsUsed, ["rag_tool"]);
  });

  it("replays only the recent turns and keeps only the newest exchanges", async () => {
    const agent = replying("ok");
    const { service } = setup(agent, 2, 3);

    for (const question of ["q1", "q2", "q3", "q4"]) {
      await service.sendMessage("s1", question);
    }

    assert.deepEqual(agent.calls[3], [
      { role: "user", content: "q2" },
      { role: "model", content: "ok", toolCalls: [] },
      { role: "user", content: "q3" },
      { role: "model", content: "ok", toolCalls: [] },
      { role: "user", content: "q4" },
    ]);
    const history = await service.getHistory("s1");
    assert.deepEqual(
      history?.map((exchange) => exchange.userMessage),
      ["q2", "q3", "q4"]
    );
  });

  it("substitutes an apology for an empty reply", async () => {
    const { service } = setup(replying(""));
    const reply = await service.sendMessage("s1", "hello");

    assert.equal(reply.response, NO_REPLY_MESSAGE);
    assert.equal((await service.getHistory("s1"))?.[0].botResponse, NO_REPLY_MESSAGE);
  });

  it("answers agent failures with the canned error and stores nothing", async () => {
    const { service } = setup(failing());
    const reply = await service.sendMessage("s1", "hello");

    assert.equal(reply.response, CHAT_ERROR_MESSAGE);
    assert.equal(reply.response_html, `<p>${CHAT_ERROR_MESSAGE}</p>`);
    assert.deepEqual(reply.tools_used, []);
    assert.equal(await service.getHistory("s1"), null);
  });
});

describe("ChatService.streamMessage", () => {
  const collect = async (service: ChatService, message: string): Promise<StreamEvent[]> => {
    const events: StreamEvent[] = [];
    await service.streamMessage("s1", message, (event) => events.push(event));
    return events;
  };

  it("emits tool progress, content chunks and completion in order", async () => {
    const agent = new FakeAgent(async (listener) => {
      const known = { id: "c1", name: "rag_tool", args: { query: "dengue" } };
      const unknown = { id: "c2", name: "mystery", args: {} };
      listener.onToolStart?.(known, knowledgeTool);
      listener.onToolEnd?.(known, "passages");
      listener.onToolStart?.(unknown, undefined);
      listener.onToolEnd?.(unknown, "error");
      return { messages: [], reply: "## Dengue\nRest and fluids.", toolsUsed: ["rag_tool", "mystery"] };
    });
    const { service } = setup(agent);

    const events = await collect(service, "What is dengue?");

    assert.deepEqual(events, [
      { type: "start", status: STREAM_START_STATUS },
      { type: "tool_start", tool_name: "rag_tool", message: "📚 Searching the health knowledge base..." },
      { type: "tool_end", tool_name: "rag_tool" },
      { type: "tool_start", tool_name: "mystery", message: "Running mystery..." },
      { type: "tool_end", tool_name: "mystery" },
      { type: "tool_end" },
      { type: "response_start" },
      { type: "content", content: "## Dengue" },
      { type: "content", content: "Rest and fluids." },
      { type: "complete", tools_used: ["rag_tool", "mystery"] },
      { type: "end" },
    ]);
    assert.equal((await service.getHistory("s1"))?.[0].botResponse, "## Dengue\nRest and fluids.");
  });

  it("reports an empty reply as an error without storing it", async () => {
    const { service } = setup(replying(""));
    const events = await collect(service, "hello");

    assert.deepEqual(events, [
      { type: "start", status: STREAM_START_STATUS },
      { type: "tool_end" },
      { type: "error", content: NO_REPLY_MESSAGE },
      { type: "end" },
    ]);
    assert.equal(await service.getHistory("s1"), null);
  });

  it("always ends with an end event after a failure", async () => {
    const { service } = setup(failing());
    const events = await collect(service, "hello");

    assert.deepEqual(events, [
      { type: "start", status: STREAM_START_STATUS },
      { type: "error", content: STREAM_ERROR_MESSAGE },
      { type: "end" },
    ]);
  });
});

describe("InMemoryConversationStore", () => {
  const exchange = (userMessage: string) => ({
    userMessage,
    botResponse: "ok",
    timestamp: new Date(0),
    toolsUsed: [],
  });

  it("returns no recent turns when asked for none", async () => {
    const store = new InMemoryConversationStore();
    await store.append("s1", exchange("q1"), 10);
    assert.deepEqual(await store.recent("s1", 0), []);
    assert.equal((await store.recent("s1", 5)).length, 1);
  });

  it("clears existing sessions and ignores unknown ones", async () => {
    const store = new InMemoryConversationStore();
    await store.append("s1", exchange("q1"), 10);

    await store.clear("s1");
    await store.clear("never-seen");

    assert.deepEqual(await store.history("s1"), []);
    assert.equal(await store.history("never-seen"), null);
  });

  it("drops the least recently written session past the cap", async () => {
    const store = new InMemoryConversationStore(2);
    await store.append("s1", exchange("q1"), 10);
    await store.append("s2", exchange("q2"), 10);
    await store.append("s3", exchange("q3"), 10);

    assert.equal(await store.history("s1"), null);
    assert.equal((await store.history("s2"))?.length, 1);
    assert.equal((await store.history("s3"))?.length, 1);
  });

  it("counts a new message as recent use of the session", async () => {
    const store = new InMemoryConversationStore(2);
    await store.append("s1", exchange("q1"), 10);
    await store.append("s2", exchange("q2"), 10);
    await store.append("s1", exchange("q3"), 10);
    await store.append("s3", exchange("q4"), 10);

    assert.equal(await store.history("s2"), null);
    assert.deepEqual(
      (await store.history("s1"))?.map((entry) => entry.userMessage),
      ["q1", "q3"]
    );
  });
});
