export type CandidateField =
  | "fullName"
  | "email"
  | "phone"
  | "experienceYears"
  | "desiredPosition"
  | "location"
  | "techStack";

export interface TechnicalAnswer {
  readonly question: string;
  readonly answer: string;
}

export interface CandidateRecord {
  fullName: string;
  email: string;
  phone: string;
  experienceYears: number | null;
  desiredPosition: string;
  location: string;
  techStack: string[];
  technicalAnswers: Record<string, TechnicalAnswer>;
}

/**
 * On-disk shape of a candidate. Keys stay snake_case so the collection document
 * remains readable by the tools that already consume it.
 */
export interface CandidateDocument {
  full_name: string;
  email: string;
  phone: string;
  experience_years: number | null;
  desired_position: string;
  location: string;
  tech_stack: string[];
  technical_answers: Record<string, TechnicalAnswer>;
}

export interface StoredCandidate extends CandidateDocument {
  readonly id: string;
  readonly timestamp: string;
}
