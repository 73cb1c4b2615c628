import { MAX_EXPERIENCE_YEARS, MIN_EXPERIENCE_YEARS } from "../../shared/constants";

export function extractYears(text: string): number | null {
  const match = text.match(/\d+/);
  if (!match) {
    return null;
  }

  const years = Number(match[0]);
  if (!Number.isSafeInteger(years)) {
    return null;
  }
  if (years < MIN_EXPERIENCE_YEARS || years > MAX_EXPERIENCE_YEARS) {
    return null;
  }
  return years;
}
