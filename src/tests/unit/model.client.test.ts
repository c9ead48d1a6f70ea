import assert from "node:assert/strict";
import { describe, it } from "node:test";
import { MODEL_UNAVAILABLE_REPLY, parseSentimentReply, ScreeningModelClient } from "../../ai/model.client";
import { noopLogger } from "../../config/logger";
import { ScriptedTransport } from "../helpers/scripted-transport";

describe("ScreeningModelClient.complete", () => {
  it("prepends the system prompt and uses the chat defaults", async () => {
    const transport = new ScriptedTransport().queue("chat", "Hi!");
    const client = new ScreeningModelClient(transport, noopLogger);

    const reply = await client.complete([{ role: "user", content: "Hello" }], "You are Scout.");

    assert.equal(reply, "Hi!");
    assert.deepEqual(transport.requests[0], {
      messages: [
        { role: "system", content: "You are Scout." },
        { role: "user", content: "Hello" },
      ],
      temperature: 0.7,
      maxTokens: 1024,
      promptName: "chat",
    });
  });

  it("omits a blank system prompt", async () => {
    const transport = new ScriptedTransport().queue("greeting_v1", "Welcome!");
    const client = new ScreeningModelClient(transport, noopLogger, { temperature: 0.2, maxTokens: 300 });

    await client.complete([{ role: "user", content: "Hello" }], "  ", undefined, undefined, {
      promptName: "greeting_v1",
    });

    assert.deepEqual(transport.requests[0]?.messages, [{ role: "user", content: "Hello" }]);
    assert.equal(transport.requests[0]?.temperature, 0.2);
    assert.equal(transport.requests[0]?.maxTokens, 300);
  });

  it("returns the fixed apology when the provider fails", async () => {
    const transport = new ScriptedTransport().queue("chat", new Error("LLM API error: HTTP 401 - invalid key"));
    const client = new ScreeningModelClient(transport, noopLogger);

    assert.equal(await client.complete([{ role: "user", content: "Hello" }], "sys"), MODEL_UNAVAILABLE_REPLY);
  });
});

describe("ScreeningModelClient.analyzeSentiment", () => {
  it("parses the label and confidence", async () => {
    const transport = new ScriptedTransport().queue("sentiment_v1", '{"sentiment": "Excited", "confidence": 0.92}');
    const client = new ScreeningModelClient(transport, noopLogger);

    assert.deepEqual(await client.analyzeSentiment("I can't wait to start!"), {
      sentiment: "excited",
      confidence: 0.92,
    });
    assert.equal(transport.requests[0]?.temperature, 0.3);
    assert.equal(transport.requests[0]?.maxTokens, 100);
    assert.equal(transport.requests[0]?.messages[0]?.role, "user");
  });

  it("falls back to neutral on unparseable output", async () => {
    const transport = new ScriptedTransport().queue("sentiment_v1", "I think they are happy");
    const client = new ScreeningModelClient(transport, noopLogger);

    assert.deepEqual(await client.analyzeSentiment("hello"), { sentiment: "neutral", confidence: 0.5 });
  });

  it("falls back to neutral when the provider fails", async () => {
    const transport = new ScriptedTransport().queue("sentiment_v1", new Error("LLM API error: HTTP 400 - bad"));
    const client = new ScreeningModelClient(transport, noopLogger);

    assert.deepEqual(await client.analyzeSentiment("hello"), { sentiment: "neutral", confidence: 0.5 });
  });
});

describe("parseSentimentReply", () => {
  it("clamps confidence and defaults it when missing", () => {
    assert.deepEqual(parseSentimentReply('{"sentiment": "nervous", "confidence": 3}'), {
      sentiment: "nervous",
      confidence: 1,
    });
    assert.deepEqual(parseSentimentReply('{"sentiment": "confident", "confidence": -0.4}'), {
      sentiment: "confident",
      confidence: 0,
    });
    assert.deepEqual(parseSentimentReply('{"sentiment": "negative"}'), { sentiment: "negative", confidence: 0.5 });
  });

  it("rejects unknown labels and non-objects", () => {
    assert.equal(parseSentimentReply('{"sentiment": "angry", "confidence": 0.8}'), null);
    assert.equal(parseSentimentReply("[1, 2]"), null);
  });
});

describe("ScreeningModelClient.generateTechnicalQuestions", () => {
  it("sends a single user prompt with the question budget", async () => {
    const transport = new ScriptedTransport().queue("tech_questions_v1", "### Go\n1. How do channels block?");
    const client = new ScreeningModelClient(transport, noopLogger);

    const raw = await client.generateTechnicalQuestions({
      name: "Jane",
      experience: "5",
      positions: "Backend Engineer",
      techStack: "Go",
    });

    assert.equal(raw, "### Go\n1. How do channels block?");
    const request = transport.requests[0];
    assert.equal(request?.messages.length, 1);
    assert.equal(request?.messages[0]?.role, "user");
    assert.ok(request?.messages[0]?.content.includes("Tech stack: Go"));
    assert.equal(request?.temperature, 0.6);
    assert.equal(request?.maxTokens, 2048);
  });
});
