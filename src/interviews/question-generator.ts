export interface QuestionGenerator {
  /** Deterministic for a given input pair; returns between 0 and 5 questions. */
  generate(techStack: ReadonlyArray<string>, experienceYears: number): string[];
}

export type ExperienceLevel = "junior" | "mid" | "senior";

export const EXPERIENCE_LEVELS: ReadonlyArray<ExperienceLevel> = ["junior", "mid", "senior"];

export function resolveExperienceLevel(experienceYears: number): ExperienceLevel {
  if (experienceYears < 2) {
    return "junior";
  }
  if (experienceYears < 5) {
    return "mid";
  }
  return "senior";
}
