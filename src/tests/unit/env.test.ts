import assert from "node:assert/strict";
import { afterEach, beforeEach, describe, it } from "node:test";
import { loadEnv } from "../../config/env";

const MANAGED_KEYS = [
  "PORT",
  "OPENAI_API_KEY",
  "OPENAI_BASE_URL",
  "OPENAI_CHAT_MODEL",
  "LLM_TEMPERATURE",
  "LLM_MAX_TOKENS",
  "LLM_TIMEOUT_MS",
  "LOG_LEVEL",
  "DEBUG_MODE",
  "SCREENING_EXIT_KEYWORDS",
  "COMPANY_NAME",
  "ASSISTANT_NAME",
];

describe("loadEnv", () => {
  const saved = new Map<string, string | undefined>();

  beforeEach(() => {
    for (const key of MANAGED_KEYS) {
      saved.set(key, process.env[key]);
      delete process.env[key];
    }
    process.env.OPENAI_API_KEY = "test-secret";
  });

  afterEach(() => {
    for (const [key, value] of saved) {
      if (value === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = value;
      }
    }
  });

  it("applies defaults", () => {
    assert.deepEqual(loadEnv(), {
      debugMode: false,
      logLevel: "info",
      port: 3000,
      openaiApiKey: "test-secret",
      openaiBaseUrl: "https://api.openai.com/v1",
      openaiChatModel: "gpt-4o-mini",
      llmTemperature: 0.7,
      llmMaxTokens: 1024,
      llmTimeoutMs: 25000,
      exitKeywords: undefined,
      companyName: "Northwind Talent",
      assistantName: "Scout",
    });
  });

  it("requires the api key", () => {
    delete process.env.OPENAI_API_KEY;

    assert.throws(() => loadEnv(), { message: "Missing required environment variable: OPENAI_API_KEY" });
  });

  it("rejects a temperature outside 0..1", () => {
    process.env.LLM_TEMPERATURE = "1.5";

    assert.throws(() => loadEnv(), /Invalid LLM_TEMPERATURE value: 1\.5/);
  });

  it("rejects a timeout below one second", () => {
    process.env.LLM_TIMEOUT_MS = "500";

    assert.throws(() => loadEnv(), { message: "Invalid LLM_TIMEOUT_MS value: 500" });
  });

  it("normalizes exit keywords and the base url", () => {
    process.env.SCREENING_EXIT_KEYWORDS = " Ciao, adios ,ciao,";
    process.env.OPENAI_BASE_URL = "http://localhost:8080/v1///";

    const env = loadEnv();

    assert.deepEqual(env.exitKeywords, ["ciao", "adios"]);
    assert.equal(env.openaiBaseUrl, "http://localhost:8080/v1");
  });

  it("switches to debug logging in debug mode", () => {
    process.env.DEBUG_MODE = "yes";

    const env = loadEnv();

    assert.equal(env.debugMode, true);
    assert.equal(env.logLevel, "debug");
  });

  it("rejects an unknown log level", () => {
    process.env.LOG_LEVEL = "verbose";

    assert.throws(() => loadEnv(), { message: "Invalid LOG_LEVEL value: verbose" });
  });
});
