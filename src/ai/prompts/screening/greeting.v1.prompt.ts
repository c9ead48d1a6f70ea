import type { ScreeningBranding } from "../../../config/screening.config";

export function buildGreetingV1Prompt(branding: ScreeningBranding): string {
  return [
    `Write the opening message for a candidate who just opened the ${branding.companyName} screening chat.`,
    "",
    "Include:",
    "1. A friendly welcome.",
    `2. Your name (${branding.assistantName}) and role.`,
    "3. One sentence explaining this is an initial screening for technology positions.",
    "4. A short reassurance about data privacy.",
    "5. A request for their full name to get started.",
    "",
    "Keep it to 3-5 sentences, professional but approachable.",
  ].join("\n");
}
