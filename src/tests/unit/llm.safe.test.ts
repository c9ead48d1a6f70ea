import assert from "node:assert/strict";
import { describe, it } from "node:test";
import type { ChatCompletionRequest, ChatCompletionTransport } from "../../ai/llm.client";
import { callChatSafe } from "../../ai/llm.safe";
import { noopLogger } from "../../config/logger";
import { ScriptedTransport } from "../helpers/scripted-transport";

const REQUEST: ChatCompletionRequest = {
  messages: [{ role: "user", content: "Hello" }],
  temperature: 0.7,
  maxTokens: 100,
  promptName: "chat",
};

describe("callChatSafe", () => {
  it("returns trimmed text on success", async () => {
    const transport = new ScriptedTransport().queue("chat", "  ok  ");

    assert.deepEqual(await callChatSafe({ transport, request: REQUEST }), { ok: true, text: "ok" });
  });

  it("retries once after a transient failure", async () => {
    const transport = new ScriptedTransport().queue(
      "chat",
      new Error("LLM API error: HTTP 503 - down"),
      "recovered",
    );

    const result = await callChatSafe({ transport, request: REQUEST, logger: noopLogger });

    assert.deepEqual(result, { ok: true, text: "recovered" });
    assert.equal(transport.countFor("chat"), 2);
  });

  it("does not retry a permanent failure", async () => {
    const transport = new ScriptedTransport().queue("chat", new Error("LLM API error: HTTP 400 - bad request"));

    assert.deepEqual(await callChatSafe({ transport, request: REQUEST }), { ok: false, error_code: "llm_failure" });
    assert.equal(transport.countFor("chat"), 1);
  });

  it("reports a transient failure that survives the retry", async () => {
    const transport = new ScriptedTransport().queue(
      "chat",
      new Error("socket hang up ECONNRESET"),
      new Error("socket hang up ECONNRESET"),
    );

    assert.deepEqual(await callChatSafe({ transport, request: REQUEST }), {
      ok: false,
      error_code: "transient_failure",
    });
  });

  it("treats blank output as a failure", async () => {
    const transport = new ScriptedTransport().queue("chat", "   ");

    assert.deepEqual(await callChatSafe({ transport, request: REQUEST }), { ok: false, error_code: "llm_failure" });
  });

  it("times out a hanging call", async () => {
    let calls = 0;
    const transport: ChatCompletionTransport = {
      createChatCompletion: () => {
        calls += 1;
        return new Promise<string>(() => undefined);
      },
    };

    const result = await callChatSafe({ transport, request: REQUEST, timeoutMs: 20 });

    assert.deepEqual(result, { ok: false, error_code: "timeout" });
    assert.equal(calls, 2);
  });
});
