export interface TechQuestionsPromptInput {
  name: string;
  experience: string;
  positions: string;
  techStack: string;
}

export function buildTechQuestionsV1Prompt(input: TechQuestionsPromptInput): string {
  return [
    "You are a senior technical interviewer. Write screening questions for this candidate:",
    "",
    `Candidate: ${input.name}`,
    `Experience: ${input.experience} years`,
    `Desired position: ${input.positions}`,
    `Tech stack: ${input.techStack}`,
    "",
    "## Instructions",
    "1. For EACH technology in the tech stack, write 3-5 technical questions.",
    "2. Match the experience level:",
    "   - 0-2 years: fundamentals, basic usage, simple problem solving.",
    "   - 3-5 years: intermediate concepts, design decisions, good practice.",
    "   - 6+ years: advanced topics, architecture, optimisation, leadership.",
    "3. Mix conceptual, practical and scenario questions.",
    "4. Every question must be answerable in a text chat.",
    "5. Do NOT include answers.",
    "",
    "## Format",
    "Group the questions by technology exactly like this:",
    "",
    "### 🔹 [Technology Name]",
    "1. [Question 1]",
    "2. [Question 2]",
    "3. [Question 3]",
    "",
    "After all questions, tell the candidate they can take their time, answer in any order and ask for clarification.",
  ].join("\n");
}
