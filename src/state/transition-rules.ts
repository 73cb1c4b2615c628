import { ConversationStage } from "../shared/types/conversation.types";

const transitionRules: Record<ConversationStage, ConversationStage[]> = {
  greeting: ["collecting_info", "ended"],
  collecting_info: ["tech_questions", "conclusion", "ended"],
  tech_questions: ["conclusion", "ended"],
  conclusion: ["ended"],
  ended: [],
};

export function isAllowedTransition(from: ConversationStage, to: ConversationStage): boolean {
  return transitionRules[from].includes(to);
}
