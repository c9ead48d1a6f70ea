import { ChatCompletionRequest, ChatCompletionTransport } from "../src/ai/llm.client";
import { ScreeningModelClient } from "../src/ai/model.client";
import { createLogger } from "../src/config/logger";
import { buildCandidateExport } from "../src/privacy/candidate-export.service";
import { formatTechnicalAnswers } from "../src/screening/answers.formatter";
import { ConversationEngine } from "../src/screening/conversation.engine";

const EXTRACTION_BLOCKS: string[] = [
  `Nice to meet you, Ada! What is the best email address to reach you?
\`\`\`json
{"extracted": {"full_name": "Ada Park", "email": null, "phone": null, "years_of_experience": null, "desired_positions": null, "current_location": null, "tech_stack": null}, "all_collected": false}
\`\`\``,
  `Thanks! Could you share your phone number, experience, target role, location and tech stack?
\`\`\`json
{"extracted": {"email": "ada.park@example.com", "phone": "+44 20 7946 0000"}, "all_collected": false}
\`\`\``,
  `Great, that is everything I need. Let's move on to a few technical questions.
\`\`\`json
{"extracted": {"years_of_experience": "6", "desired_positions": "Backend Engineer", "current_location": "Leeds, UK", "tech_stack": "TypeScript, Node.js, PostgreSQL"}, "all_collected": true}
\`\`\``,
];

const TECH_QUESTIONS = `### 🔹 TypeScript
1. How do conditional types help model API responses?
2. When would you reach for a discriminated union?

### 🔹 PostgreSQL
1. How do you decide between a B-tree and a GIN index?`;

/** Answers by prompt name, the way the model would for a cooperative candidate. */
class ScriptedTransport implements ChatCompletionTransport {
  private extractionIndex = 0;

  getModelName(): string {
    return "scripted";
  }

  async createChatCompletion(request: ChatCompletionRequest): Promise<string> {
    switch (request.promptName) {
      case "sentiment_v1":
        return "{\"sentiment\": \"positive\", \"confidence\": 0.8}";
      case "greeting_v1":
        return "Hi, I'm Scout from Northwind Talent. Could you tell me your full name?";
      case "info_gathering_v1": {
        const block = EXTRACTION_BLOCKS[Math.min(this.extractionIndex, EXTRACTION_BLOCKS.length - 1)] ?? "";
        this.extractionIndex += 1;
        return block;
      }
      case "tech_questions_v1":
        return TECH_QUESTIONS;
      case "tech_interaction":
        return "Thanks for the detailed answers. Anything you would like to add?";
      case "closing_v1":
        return "Thank you, Ada. Our recruiters will review your profile and reach out within a few days.";
      default:
        return "Let's get back to your screening.";
    }
  }
}

async function run(): Promise<void> {
  const logger = createLogger({ minLevel: "warn" });
  const modelClient = new ScreeningModelClient(new ScriptedTransport(), logger);
  const engine = new ConversationEngine(modelClient, logger, { sessionId: "simulation" });

  await engine.generateGreeting();
  await engine.processMessage("I'm Ada Park");
  await engine.processMessage("ada.park@example.com");
  const questionsTurn = await engine.processMessage(
    "+44 20 7946 0000, 6 years, Backend Engineer, Leeds UK, TypeScript, Node.js, PostgreSQL",
  );

  assert(engine.getPhase() === "answering_questions", `expected answering_questions, got ${engine.getPhase()}`);
  assert(questionsTurn.reply.includes("discriminated union"), "questions were not appended to the reply");

  const groups = engine.getTechQuestionGroups();
  assert(groups.length === 2, `expected 2 question groups, got ${groups.length}`);
  const answers = formatTechnicalAnswers(groups, [
    { groupIndex: 0, questionIndex: 0, answer: "They map response shapes to types at compile time." },
    { groupIndex: 1, questionIndex: 0, answer: "B-tree for ranges, GIN for jsonb and arrays." },
  ]);
  assert(answers.answeredCount === 2, "answers were not matched to questions");
  await engine.processMessage(answers.text);

  const farewell = await engine.close();
  assert(engine.isEnded(), "conversation did not end after close");

  const exported = buildCandidateExport(engine.getProfile());
  assert(exported.completion_percentage === 100, "profile is not complete");
  assert(exported.candidate.email !== "ada.park@example.com", "email was exported in clear text");

  process.stdout.write(`${farewell}\n`);
  process.stdout.write("simulate-flow passed\n");
}

function assert(condition: unknown, message: string): void {
  if (!condition) {
    throw new Error(`simulate-flow failed, ${message}`);
  }
}

run().catch((error) => {
  process.stderr.write(`${error instanceof Error ? error.message : String(error)}\n`);
  process.exit(1);
});
