import { MAX_PHONE_DIGITS, MIN_PHONE_DIGITS } from "../../shared/constants";

// The reply is kept as typed; only the digit count decides acceptance.
export function extractPhone(text: string): string | null {
  const digits = text.replace(/\D/g, "");
  if (digits.length < MIN_PHONE_DIGITS || digits.length > MAX_PHONE_DIGITS) {
    return null;
  }
  return text.trim();
}
