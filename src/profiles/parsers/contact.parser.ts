const EMAIL_PATTERN = /^[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}$/;
const PHONE_PATTERN = /^\+?\d{7,15}$/;

export function isPlausibleEmail(value: string): boolean {
  return EMAIL_PATTERN.test(value.trim());
}

export function isPlausiblePhone(value: string): boolean {
  const cleaned = value.trim().replace(/[\s\-().]+/g, "");
  return PHONE_PATTERN.test(cleaned);
}
