import type { ScreeningBranding } from "../../../config/screening.config";

export function buildClosingV1Prompt(input: {
  name: string;
  positions: string;
  branding: ScreeningBranding;
}): string {
  return [
    "The screening interview is finishing. Write a warm closing message.",
    "",
    `Candidate name: ${input.name}`,
    `Position applied for: ${input.positions}`,
    "",
    "## Include",
    "1. Thanks for their time.",
    "2. A one-line recap: profile information and technical screening.",
    `3. Next steps: the ${input.branding.companyName} team reviews the answers and a recruiter reaches out within 3-5 business days.`,
    "4. Good wishes.",
    "",
    "Keep it warm, professional and concise.",
  ].join("\n");
}
