import type { TechQuestionGroup } from "../../shared/types/conversation.types";

const HEADING_PATTERN = /^#{1,4}(?!#)\s*(?:🔹|\*)*\s*\[?\s*(.+?)\s*\]?\s*\**\s*$/u;
const BOLD_LINE_PATTERN = /^\*\*(.+?)\*\*\s*$/;
const NUMBERED_PATTERN = /^\d+[.)]\s*(.+)$/;
const BULLET_PATTERN = /^[-•]\s*(.+)$/;
const MIN_QUESTION_LENGTH = 10;

export function parseTechnicalQuestions(markdownText: string): TechQuestionGroup[] {
  const groups: TechQuestionGroup[] = [];
  let currentTechnology: string | null = null;
  let currentQuestions: string[] = [];

  const flush = (): void => {
    if (currentTechnology && currentQuestions.length > 0) {
      groups.push({ technology: currentTechnology, questions: currentQuestions });
    }
  };

  for (const rawLine of markdownText.split("\n")) {
    const line = rawLine.trim();
    if (!line) {
      continue;
    }

    const header = matchTechnologyHeader(line);
    if (header !== null) {
      flush();
      currentTechnology = header;
      currentQuestions = [];
      continue;
    }

    const questionMatch = line.match(NUMBERED_PATTERN) ?? line.match(BULLET_PATTERN);
    if (!questionMatch || !currentTechnology) {
      continue;
    }
    const question = (questionMatch[1] ?? "").trim();
    if (question.length > MIN_QUESTION_LENGTH) {
      currentQuestions.push(question);
    }
  }

  flush();
  return groups;
}

function matchTechnologyHeader(line: string): string | null {
  const match = line.match(HEADING_PATTERN) ?? line.match(BOLD_LINE_PATTERN);
  if (!match) {
    return null;
  }
  const technology = (match[1] ?? "")
    .replace(/🔹/gu, "")
    .trim()
    .replace(/^\*+|\*+$/g, "")
    .trim();
  return technology.length > 0 ? technology : null;
}
