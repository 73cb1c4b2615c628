import { CandidateRecord } from "./candidate.types";

export type ConversationStage =
  | "greeting"
  | "collecting_info"
  | "tech_questions"
  | "conclusion"
  | "ended";

export interface TurnResult {
  reply: string;
  ended: boolean;
}

export interface ConversationMessage {
  readonly role: "user" | "assistant";
  readonly content: string;
  readonly timestamp: string;
}

export interface ConversationSummary {
  stage: ConversationStage;
  candidate: CandidateRecord;
  questionsAsked: number;
  questionsAnswered: number;
  conversationLength: number;
  fieldsCollected: number;
  fieldsTotal: number;
}
