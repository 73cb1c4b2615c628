import { ConversationStage } from "../shared/types/conversation.types";
import { isAllowedTransition } from "./transition-rules";

export function assertTransition(from: ConversationStage, to: ConversationStage): void {
  if (!isAllowedTransition(from, to)) {
    throw new Error(`Invalid transition from ${from} to ${to}`);
  }
}
