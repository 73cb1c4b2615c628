import {
  CandidateDocument,
  CandidateField,
  CandidateRecord,
  TechnicalAnswer,
} from "../shared/types/candidate.types";

export const CANDIDATE_FIELD_ORDER: ReadonlyArray<CandidateField> = [
  "fullName",
  "email",
  "phone",
  "experienceYears",
  "desiredPosition",
  "location",
  "techStack",
];

export function createEmptyCandidateRecord(): CandidateRecord {
  return {
    fullName: "",
    email: "",
    phone: "",
    experienceYears: null,
    desiredPosition: "",
    location: "",
    techStack: [],
    technicalAnswers: {},
  };
}

export function cloneCandidateRecord(record: CandidateRecord): CandidateRecord {
  return {
    ...record,
    techStack: [...record.techStack],
    technicalAnswers: { ...record.technicalAnswers },
  };
}

export function isFieldPopulated(record: CandidateRecord, field: CandidateField): boolean {
  switch (field) {
    case "experienceYears":
      return record.experienceYears !== null && record.experienceYears >= 0;
    case "techStack":
      return record.techStack.length > 0;
    default:
      return record[field].length > 0;
  }
}

export function getMissingFields(record: CandidateRecord): CandidateField[] {
  return CANDIDATE_FIELD_ORDER.filter((field) => !isFieldPopulated(record, field));
}

export function countCollectedFields(record: CandidateRecord): number {
  return CANDIDATE_FIELD_ORDER.length - getMissingFields(record).length;
}

export function isCandidateComplete(record: CandidateRecord): boolean {
  return getMissingFields(record).length === 0;
}

export function hasContactIdentity(record: CandidateRecord): boolean {
  return record.fullName.length > 0 || record.email.length > 0;
}

export function technicalAnswerKey(questionIndex: number): string {
  return `question_${questionIndex + 1}`;
}

export function recordTechnicalAnswer(
  record: CandidateRecord,
  questionIndex: number,
  answer: TechnicalAnswer,
): void {
  record.technicalAnswers[technicalAnswerKey(questionIndex)] = answer;
}

export function toCandidateDocument(record: CandidateRecord): CandidateDocument {
  return {
    full_name: record.fullName,
    email: record.email,
    phone: record.phone,
    experience_years: record.experienceYears,
    desired_position: record.desiredPosition,
    location: record.location,
    tech_stack: [...record.techStack],
    technical_answers: { ...record.technicalAnswers },
  };
}
