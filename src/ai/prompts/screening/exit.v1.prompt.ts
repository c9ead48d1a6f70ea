export function buildExitV1Prompt(input: { name: string; infoStatus: string }): string {
  return [
    "The candidate wants to end the conversation.",
    "",
    `Candidate name: ${input.name}`,
    `Information collected: ${input.infoStatus}`,
    "",
    "Write a brief goodbye:",
    "1. Thank them for their time.",
    "2. If the screening is incomplete, tell them they can come back any time.",
    "3. If it is complete, mention the next steps (team review within 3-5 business days).",
    "4. Wish them well.",
    "",
    "Two or three sentences.",
  ].join("\n");
}
