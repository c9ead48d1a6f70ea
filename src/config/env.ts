import dotenv from "dotenv";
import type { LogLevel } from "./logger";

dotenv.config();

export interface EnvConfig {
  debugMode: boolean;
  logLevel: LogLevel;
  port: number;
  openaiApiKey: string;
  openaiBaseUrl: string;
  openaiChatModel: string;
  llmTemperature: number;
  llmMaxTokens: number;
  llmTimeoutMs: number;
  exitKeywords?: string[];
  companyName: string;
  assistantName: string;
}

function getRequiredString(name: string): string {
  const value = process.env[name];
  if (!value) {
    throw new Error(`Missing required environment variable: ${name}`);
  }
  const trimmed = value.trim();
  if (!trimmed) {
    throw new Error(`Missing required environment variable: ${name}`);
  }
  return trimmed;
}

function getOptionalTrimmed(name: string): string | undefined {
  const value = process.env[name];
  if (typeof value !== "string") {
    return undefined;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

export function loadEnv(): EnvConfig {
  const portRaw = process.env.PORT ?? "3000";
  const port = Number(portRaw);
  const temperatureRaw = process.env.LLM_TEMPERATURE ?? "0.7";
  const llmTemperature = Number(temperatureRaw);
  const maxTokensRaw = process.env.LLM_MAX_TOKENS ?? "1024";
  const llmMaxTokens = Number(maxTokensRaw);
  const timeoutRaw = process.env.LLM_TIMEOUT_MS ?? "25000";
  const llmTimeoutMs = Number(timeoutRaw);
  const debugMode = parseBoolean(process.env.DEBUG_MODE ?? "false");
  const logLevel = parseLogLevel((process.env.LOG_LEVEL ?? (debugMode ? "debug" : "info")).trim().toLowerCase());

  if (!Number.isInteger(port) || port <= 0) {
    throw new Error(`Invalid PORT value: ${portRaw}`);
  }
  if (!Number.isFinite(llmTemperature) || llmTemperature < 0 || llmTemperature > 1) {
    throw new Error(`Invalid LLM_TEMPERATURE value: ${temperatureRaw}. Expected number between 0 and 1.`);
  }
  if (!Number.isInteger(llmMaxTokens) || llmMaxTokens <= 0) {
    throw new Error(`Invalid LLM_MAX_TOKENS value: ${maxTokensRaw}`);
  }
  if (!Number.isInteger(llmTimeoutMs) || llmTimeoutMs < 1000) {
    throw new Error(`Invalid LLM_TIMEOUT_MS value: ${timeoutRaw}`);
  }

  return {
    debugMode,
    logLevel,
    port,
    openaiApiKey: getRequiredString("OPENAI_API_KEY"),
    openaiBaseUrl: (getOptionalTrimmed("OPENAI_BASE_URL") ?? "https://api.openai.com/v1").replace(/\/+$/, ""),
    openaiChatModel: getOptionalTrimmed("OPENAI_CHAT_MODEL") ?? "gpt-4o-mini",
    llmTemperature,
    llmMaxTokens,
    llmTimeoutMs,
    exitKeywords: parseKeywordList(process.env.SCREENING_EXIT_KEYWORDS),
    companyName: getOptionalTrimmed("COMPANY_NAME") ?? "Northwind Talent",
    assistantName: getOptionalTrimmed("ASSISTANT_NAME") ?? "Scout",
  };
}

function parseKeywordList(rawValue: string | undefined): string[] | undefined {
  const values = (rawValue || "")
    .split(",")
    .map((item) => item.trim().toLowerCase())
    .filter((item) => item.length > 0);
  return values.length > 0 ? Array.from(new Set(values)) : undefined;
}

function parseBoolean(value: string): boolean {
  const normalized = value.trim().toLowerCase();
  if (normalized === "true" || normalized === "1" || normalized === "yes") {
    return true;
  }
  if (normalized === "false" || normalized === "0" || normalized === "no") {
    return false;
  }
  throw new Error(`Invalid boolean value: ${value}`);
}

function parseLogLevel(value: string): LogLevel {
  if (value === "debug" || value === "info" || value === "warn" || value === "error") {
    return value;
  }
  throw new Error(`Invalid LOG_LEVEL value: ${value}`);
}
