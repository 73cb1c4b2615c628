export const TERMINATION_KEYWORDS: ReadonlyArray<string> = [
  "goodbye",
  "bye",
  "exit",
  "quit",
  "end",
  "stop",
  "thanks",
  "thank you",
  "done",
  "finish",
  "complete",
];

export const MIN_PHONE_DIGITS = 10;
export const MAX_PHONE_DIGITS = 15;
export const MIN_EXPERIENCE_YEARS = 0;
export const MAX_EXPERIENCE_YEARS = 50;
export const MAX_TECH_STACK_ITEMS = 10;
export const MAX_TECHNICAL_QUESTIONS = 5;

export const CANDIDATE_ID_PREFIX = "CAND_";
