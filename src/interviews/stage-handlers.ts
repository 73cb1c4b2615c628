import { getFieldStep, findNextFieldStep } from "../profiles/candidate-fields";
import { recordTechnicalAnswer } from "../profiles/candidate-record";
import { CandidateRecord } from "../shared/types/candidate.types";
import { ConversationStage } from "../shared/types/conversation.types";
import {
  closingMessage,
  conclusionMessage,
  fallbackMessage,
  firstQuestionMessage,
  nameAcceptedMessage,
  nextQuestionMessage,
  techStackRecordedMessage,
  welcomeMessage,
} from "../ui/messages";
import { QuestionGenerator } from "./question-generator";

export interface ConversationSession {
  record: CandidateRecord;
  questions: string[];
  questionIndex: number;
}

export interface StageContext {
  session: ConversationSession;
  questionGenerator: QuestionGenerator;
}

export interface StageOutcome {
  nextStage: ConversationStage;
  reply: string;
}

export type StageHandler = (context: StageContext, input: string) => StageOutcome;

export function handleGreeting(context: StageContext, input: string): StageOutcome {
  const nameStep = getFieldStep("fullName");
  if (!input.trim()) {
    return { nextStage: "greeting", reply: `${welcomeMessage()}\n\n${nameStep.prompt}` };
  }

  if (!nameStep.tryFill(context.session.record, input)) {
    return { nextStage: "greeting", reply: nameStep.failureMessage };
  }
  return {
    nextStage: "collecting_info",
    reply: nameAcceptedMessage(context.session.record.fullName),
  };
}

export function handleCollectingInfo(context: StageContext, input: string): StageOutcome {
  const { record } = context.session;
  const step = findNextFieldStep(record);
  if (!step) {
    return startTechnicalQuestions(context);
  }

  if (!step.tryFill(record, input)) {
    return { nextStage: "collecting_info", reply: step.failureMessage };
  }

  const nextStep = findNextFieldStep(record);
  if (nextStep) {
    return { nextStage: "collecting_info", reply: nextStep.prompt };
  }
  return startTechnicalQuestions(context);
}

export function handleTechQuestions(context: StageContext, input: string): StageOutcome {
  const { session } = context;
  if (session.questionIndex < session.questions.length) {
    recordTechnicalAnswer(session.record, session.questionIndex, {
      question: session.questions[session.questionIndex],
      answer: input,
    });
  }

  session.questionIndex += 1;
  if (session.questionIndex < session.questions.length) {
    return {
      nextStage: "tech_questions",
      reply: nextQuestionMessage(session.questionIndex, session.questions[session.questionIndex]),
    };
  }
  return { nextStage: "conclusion", reply: conclusionMessage() };
}

export function handleConclusion(): StageOutcome {
  return { nextStage: "ended", reply: closingMessage() };
}

export function handleEnded(): StageOutcome {
  return { nextStage: "ended", reply: fallbackMessage() };
}

export const STAGE_HANDLERS: Record<ConversationStage, StageHandler> = {
  greeting: handleGreeting,
  collecting_info: handleCollectingInfo,
  tech_questions: handleTechQuestions,
  conclusion: handleConclusion,
  ended: handleEnded,
};

// The generator runs once per session; its result is cached on the session.
function startTechnicalQuestions(context: StageContext): StageOutcome {
  const { session } = context;
  const { techStack, experienceYears } = session.record;
  const questions = context.questionGenerator.generate(techStack, experienceYears ?? 0);
  session.questions = [...questions];
  session.questionIndex = 0;

  if (session.questions.length === 0) {
    return {
      nextStage: "conclusion",
      reply: `${techStackRecordedMessage(techStack)}\n\n${conclusionMessage()}`,
    };
  }
  return {
    nextStage: "tech_questions",
    reply: firstQuestionMessage(techStack, session.questions[0]),
  };
}
