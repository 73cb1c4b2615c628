import { CandidateField, CandidateRecord } from "../shared/types/candidate.types";
import {
  emailFailureMessage,
  emailPrompt,
  experienceFailureMessage,
  experiencePrompt,
  locationFailureMessage,
  locationPrompt,
  nameFailureMessage,
  namePrompt,
  phoneFailureMessage,
  phonePrompt,
  positionFailureMessage,
  positionPrompt,
  techStackFailureMessage,
  techStackPrompt,
} from "../ui/messages";
import { isFieldPopulated } from "./candidate-record";
import { extractEmail } from "./parsers/email.parser";
import { extractYears } from "./parsers/experience.parser";
import { extractFreeText } from "./parsers/free-text.parser";
import { extractName } from "./parsers/name.parser";
import { extractPhone } from "./parsers/phone.parser";
import { extractTechStack } from "./parsers/tech-stack.parser";

export interface CandidateFieldStep {
  readonly field: CandidateField;
  readonly prompt: string;
  readonly failureMessage: string;
  /** Returns false and leaves the record untouched when the reply is not recognized. */
  tryFill(record: CandidateRecord, text: string): boolean;
}

interface FieldStepDefinition<T> {
  field: CandidateField;
  prompt: string;
  failureMessage: string;
  extract(text: string): T | null;
  assign(record: CandidateRecord, value: T): void;
}

function defineFieldStep<T>(definition: FieldStepDefinition<T>): CandidateFieldStep {
  return {
    field: definition.field,
    prompt: definition.prompt,
    failureMessage: definition.failureMessage,
    tryFill(record, text) {
      const value = definition.extract(text);
      if (value === null) {
        return false;
      }
      definition.assign(record, value);
      return true;
    },
  };
}

export const CANDIDATE_FIELD_STEPS: ReadonlyArray<CandidateFieldStep> = [
  defineFieldStep({
    field: "fullName",
    prompt: namePrompt(),
    failureMessage: nameFailureMessage(),
    extract: extractName,
    assign(record, value) {
      if (!record.fullName) {
        record.fullName = value;
      }
    },
  }),
  defineFieldStep({
    field: "email",
    prompt: emailPrompt(),
    failureMessage: emailFailureMessage(),
    extract: extractEmail,
    assign(record, value) {
      record.email = value;
    },
  }),
  defineFieldStep({
    field: "phone",
    prompt: phonePrompt(),
    failureMessage: phoneFailureMessage(),
    extract: extractPhone,
    assign(record, value) {
      record.phone = value;
    },
  }),
  defineFieldStep({
    field: "experienceYears",
    prompt: experiencePrompt(),
    failureMessage: experienceFailureMessage(),
    extract: extractYears,
    assign(record, value) {
      record.experienceYears = value;
    },
  }),
  defineFieldStep({
    field: "desiredPosition",
    prompt: positionPrompt(),
    failureMessage: positionFailureMessage(),
    extract: extractFreeText,
    assign(record, value) {
      record.desiredPosition = value;
    },
  }),
  defineFieldStep({
    field: "location",
    prompt: locationPrompt(),
    failureMessage: locationFailureMessage(),
    extract: extractFreeText,
    assign(record, value) {
      record.location = value;
    },
  }),
  defineFieldStep({
    field: "techStack",
    prompt: techStackPrompt(),
    failureMessage: techStackFailureMessage(),
    extract: extractTechStack,
    assign(record, value) {
      record.techStack = value;
    },
  }),
];

export function findNextFieldStep(record: CandidateRecord): CandidateFieldStep | null {
  return CANDIDATE_FIELD_STEPS.find((step) => !isFieldPopulated(record, step.field)) ?? null;
}

export function getFieldStep(field: CandidateField): CandidateFieldStep {
  const step = CANDIDATE_FIELD_STEPS.find((item) => item.field === field);
  if (!step) {
    throw new Error(`Unknown candidate field: ${field}`);
  }
  return step;
}
