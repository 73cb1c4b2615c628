import { randomUUID } from "node:crypto";
import { errorMessage, Logger, logContext } from "../config/logger";
import {
  CANDIDATE_FIELD_ORDER,
  cloneCandidateRecord,
  countCollectedFields,
  createEmptyCandidateRecord,
  hasContactIdentity,
} from "../profiles/candidate-record";
import { TERMINATION_KEYWORDS } from "../shared/constants";
import { CandidateRecord } from "../shared/types/candidate.types";
import {
  ConversationMessage,
  ConversationStage,
  ConversationSummary,
  TurnResult,
} from "../shared/types/conversation.types";
import { assertTransition } from "../state/state-machine";
import { CandidateSink } from "../storage/candidate-store.service";
import { fallbackMessage, farewellMessage } from "../ui/messages";
import { QuestionGenerator } from "./question-generator";
import { ConversationSession, STAGE_HANDLERS, StageOutcome } from "./stage-handlers";

export interface ConversationEngineOptions {
  sessionId?: string;
  now?: () => Date;
}

type PersistReason = "conclusion" | "termination";

export function isTerminationRequest(input: string): boolean {
  const normalized = input.toLowerCase().trim();
  return TERMINATION_KEYWORDS.some((keyword) => normalized.includes(keyword));
}

/**
 * Drives one screening session. Each call to processTurn runs to completion and
 * always produces a reply; the candidate record is handed to the sink at most once.
 */
export class ConversationEngine {
  private stage: ConversationStage = "greeting";
  private readonly session: ConversationSession = {
    record: createEmptyCandidateRecord(),
    questions: [],
    questionIndex: 0,
  };
  private readonly history: ConversationMessage[] = [];
  private persisted = false;
  private readonly sessionId: string;
  private readonly now: () => Date;

  constructor(
    private readonly questionGenerator: QuestionGenerator,
    private readonly candidateSink: CandidateSink,
    private readonly logger: Logger,
    options: ConversationEngineOptions = {},
  ) {
    this.sessionId = options.sessionId ?? randomUUID();
    this.now = options.now ?? (() => new Date());
  }

  processTurn(input: string): TurnResult {
    this.appendHistory("user", input);
    const reply = isTerminationRequest(input) ? this.terminate() : this.dispatch(input);
    this.appendHistory("assistant", reply);
    return {
      reply,
      ended: this.stage === "ended",
    };
  }

  getStage(): ConversationStage {
    return this.stage;
  }

  getSessionId(): string {
    return this.sessionId;
  }

  getRecord(): CandidateRecord {
    return cloneCandidateRecord(this.session.record);
  }

  getQuestions(): ReadonlyArray<string> {
    return [...this.session.questions];
  }

  getHistory(): ReadonlyArray<ConversationMessage> {
    return [...this.history];
  }

  getSummary(): ConversationSummary {
    return {
      stage: this.stage,
      candidate: this.getRecord(),
      questionsAsked: this.session.questions.length,
      questionsAnswered: Math.min(this.session.questionIndex, this.session.questions.length),
      conversationLength: this.history.length,
      fieldsCollected: countCollectedFields(this.session.record),
      fieldsTotal: CANDIDATE_FIELD_ORDER.length,
    };
  }

  private dispatch(input: string): string {
    const from = this.stage;
    let outcome: StageOutcome;
    try {
      outcome = STAGE_HANDLERS[from](
        {
          session: this.session,
          questionGenerator: this.questionGenerator,
        },
        input,
      );
      if (outcome.nextStage !== from) {
        assertTransition(from, outcome.nextStage);
      }
    } catch (error) {
      logContext(
        this.logger,
        "error",
        "conversation.stage_handler_failed",
        { session_id: this.sessionId, stage: from, ok: false },
        { error: errorMessage(error) },
      );
      return fallbackMessage();
    }

    this.moveTo(outcome.nextStage);
    if (outcome.nextStage === "conclusion" && from !== "conclusion") {
      this.persistOnce("conclusion");
    }
    return outcome.reply;
  }

  private terminate(): string {
    if (hasContactIdentity(this.session.record)) {
      this.persistOnce("termination");
    }
    this.moveTo("ended");
    return farewellMessage();
  }

  private moveTo(nextStage: ConversationStage): void {
    if (nextStage === this.stage) {
      return;
    }
    logContext(this.logger, "debug", "conversation.stage_transition", {
      session_id: this.sessionId,
      stage: this.stage,
      next_stage: nextStage,
    });
    this.stage = nextStage;
  }

  private persistOnce(reason: PersistReason): void {
    if (this.persisted) {
      return;
    }
    this.persisted = true;

    let saved: boolean;
    try {
      saved = this.candidateSink.save(cloneCandidateRecord(this.session.record));
    } catch (error) {
      logContext(
        this.logger,
        "error",
        "conversation.record_persist_failed",
        { session_id: this.sessionId, stage: this.stage, action: reason, ok: false },
        { error: errorMessage(error) },
      );
      return;
    }

    logContext(
      this.logger,
      saved ? "info" : "warn",
      saved ? "conversation.record_persisted" : "conversation.record_persist_failed",
      { session_id: this.sessionId, stage: this.stage, action: reason, ok: saved },
    );
  }

  private appendHistory(role: ConversationMessage["role"], content: string): void {
    this.history.push({
      role,
      content,
      timestamp: this.now().toISOString(),
    });
  }
}
