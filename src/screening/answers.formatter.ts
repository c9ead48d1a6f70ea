import type { TechQuestionGroup, TechnicalAnswer } from "../shared/types/conversation.types";

export interface FormattedAnswers {
  text: string;
  answeredCount: number;
}

export const ANSWERS_HEADER = "Here are my answers to the technical questions:";
export const NO_ANSWER_PLACEHOLDER = "_No answer provided_";

/**
 * Compiles per-question answers into one candidate message, in question order.
 * Answers are keyed by group position, since two groups may share a technology name.
 * Answers pointing at unknown groups or question indexes are ignored.
 */
export function formatTechnicalAnswers(
  groups: ReadonlyArray<TechQuestionGroup>,
  answers: ReadonlyArray<TechnicalAnswer>,
): FormattedAnswers {
  const byKey = new Map<string, string>();
  for (const answer of answers) {
    const text = answer.answer.trim();
    if (text) {
      byKey.set(answerKey(answer.groupIndex, answer.questionIndex), text);
    }
  }

  const blocks: string[] = [];
  let answeredCount = 0;
  groups.forEach((group, groupIndex) => {
    group.questions.forEach((question, index) => {
      const answer = byKey.get(answerKey(groupIndex, index));
      if (answer) {
        answeredCount += 1;
      }
      blocks.push(`**${group.technology} - Q${index + 1}: ${question}**\n${answer ?? NO_ANSWER_PLACEHOLDER}`);
    });
  });

  return {
    text: [ANSWERS_HEADER, ...blocks].join("\n\n"),
    answeredCount,
  };
}

function answerKey(groupIndex: number, questionIndex: number): string {
  return `${groupIndex}::${questionIndex}`;
}
