import { MAX_INPUT_LENGTH } from "../../config/screening.config";

const FENCED_BLOCK_PATTERN = /```[a-zA-Z]*[^\S\n]*\n?([\s\S]*?)```/g;
const DANGLING_JSON_FENCE_PATTERN = /```(?:json)?\s*\{[\s\S]*$/i;
const EXTRACTION_KEY = "\"extracted\"";

interface TextSpan {
  start: number;
  end: number;
}

export function sanitizeInput(text: string): string {
  const collapsed = text.trim().replace(/\s+/g, " ");
  // Cut by code point so a surrogate pair is never split.
  // Cutting can leave a trailing space behind, trim again so a second pass is a no-op.
  return Array.from(collapsed).slice(0, MAX_INPUT_LENGTH).join("").trimEnd();
}

export function detectExitIntent(text: string, exitKeywords: Iterable<string>): boolean {
  const normalized = text.trim().toLowerCase();
  if (!normalized) {
    return false;
  }
  for (const rawKeyword of exitKeywords) {
    const keyword = rawKeyword.trim().toLowerCase();
    if (!keyword) {
      continue;
    }
    if (normalized === keyword || normalized.startsWith(keyword)) {
      return true;
    }
  }
  return false;
}

export function extractStructuredBlock(responseText: string): Record<string, unknown> | null {
  for (const match of responseText.matchAll(FENCED_BLOCK_PATTERN)) {
    const body = (match[1] ?? "").trim();
    if (!body.startsWith("{")) {
      continue;
    }
    const parsed = tryParseObject(body);
    if (parsed && "extracted" in parsed) {
      return parsed;
    }
  }

  for (const span of findBalancedObjects(responseText)) {
    const candidate = responseText.slice(span.start, span.end);
    if (!candidate.includes(EXTRACTION_KEY)) {
      continue;
    }
    const parsed = tryParseObject(candidate);
    if (parsed && "extracted" in parsed) {
      return parsed;
    }
  }

  return null;
}

export function stripStructuredBlock(responseText: string): string {
  let cleaned = responseText.replace(FENCED_BLOCK_PATTERN, (block: string, body: string | undefined) =>
    (body ?? "").trim().startsWith("{") ? "" : block,
  );

  const rawSpans = findBalancedObjects(cleaned).filter((span) =>
    cleaned.slice(span.start, span.end).includes(EXTRACTION_KEY),
  );
  for (const span of [...rawSpans].reverse()) {
    cleaned = `${cleaned.slice(0, span.start)}${cleaned.slice(span.end)}`;
  }

  const dangling = cleaned.match(DANGLING_JSON_FENCE_PATTERN);
  if (dangling && dangling[0].includes(EXTRACTION_KEY)) {
    cleaned = cleaned.slice(0, dangling.index);
  }

  return cleaned.trim().replace(/\n{3,}/g, "\n\n");
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function tryParseObject(raw: string): Record<string, unknown> | null {
  try {
    const parsed: unknown = JSON.parse(raw);
    return isRecord(parsed) ? parsed : null;
  } catch {
    return null;
  }
}

function findBalancedObjects(text: string): TextSpan[] {
  const spans: TextSpan[] = [];
  let index = 0;
  while (index < text.length) {
    if (text[index] !== "{") {
      index += 1;
      continue;
    }
    const end = findClosingBrace(text, index);
    if (end === null) {
      index += 1;
      continue;
    }
    spans.push({ start: index, end: end + 1 });
    index = end + 1;
  }
  return spans;
}

function findClosingBrace(text: string, openIndex: number): number | null {
  let depth = 0;
  let inString = false;
  let escaped = false;
  for (let index = openIndex; index < text.length; index += 1) {
    const char = text[index];
    if (inString) {
      if (escaped) {
        escaped = false;
      } else if (char === "\\") {
        escaped = true;
      } else if (char === "\"") {
        inString = false;
      }
      continue;
    }
    if (char === "\"") {
      inString = true;
    } else if (char === "{") {
      depth += 1;
    } else if (char === "}") {
      depth -= 1;
      if (depth === 0) {
        return index;
      }
    }
  }
  return null;
}
