export function splitTechStack(techStack: string): string[] {
  const seen = new Set<string>();
  const result: string[] = [];
  for (const part of techStack.split(/[,;/\n]+/)) {
    const cleaned = part.trim().replace(/^[-•\s]+|[-•\s]+$/g, "");
    if (!cleaned) {
      continue;
    }
    const key = cleaned.toLowerCase();
    if (seen.has(key)) {
      continue;
    }
    seen.add(key);
    result.push(cleaned);
  }
  return result;
}
