import { readFileSync } from "node:fs";
import { MAX_TECHNICAL_QUESTIONS } from "../shared/constants";
import {
  EXPERIENCE_LEVELS,
  ExperienceLevel,
  QuestionGenerator,
  resolveExperienceLevel,
} from "./question-generator";

export type LeveledQuestions = Record<ExperienceLevel, string[]>;

export interface QuestionBankTopic {
  name: string;
  aliases: string[];
  questions: LeveledQuestions;
}

export interface QuestionBank {
  general: LeveledQuestions;
  topics: QuestionBankTopic[];
}

export class QuestionBankGenerator implements QuestionGenerator {
  private readonly topicsByToken = new Map<string, QuestionBankTopic>();

  constructor(
    private readonly bank: QuestionBank,
    private readonly maxQuestions = MAX_TECHNICAL_QUESTIONS,
  ) {
    for (const topic of bank.topics) {
      for (const token of [topic.name, ...topic.aliases]) {
        const key = normalizeToken(token);
        if (key && !this.topicsByToken.has(key)) {
          this.topicsByToken.set(key, topic);
        }
      }
    }
  }

  generate(techStack: ReadonlyArray<string>, experienceYears: number): string[] {
    const level = resolveExperienceLevel(experienceYears);
    const topics = this.matchTopics(techStack);
    if (topics.length === 0) {
      return this.bank.general[level].slice(0, this.maxQuestions);
    }

    const pools = topics.map((topic) => topic.questions[level]);
    const deepest = Math.max(...pools.map((pool) => pool.length));
    const questions: string[] = [];
    for (let round = 0; round < deepest; round += 1) {
      for (const pool of pools) {
        if (questions.length >= this.maxQuestions) {
          return questions;
        }
        if (round < pool.length) {
          questions.push(pool[round]);
        }
      }
    }
    return questions;
  }

  private matchTopics(techStack: ReadonlyArray<string>): QuestionBankTopic[] {
    const matched: QuestionBankTopic[] = [];
    for (const item of techStack) {
      const topic = this.topicsByToken.get(normalizeToken(item));
      if (topic && !matched.includes(topic)) {
        matched.push(topic);
      }
    }
    return matched;
  }
}

export function loadQuestionBank(filePath: string): QuestionBank {
  const raw = readFileSync(filePath, "utf-8");
  return parseQuestionBank(JSON.parse(raw));
}

export function parseQuestionBank(value: unknown): QuestionBank {
  if (!isRecord(value)) {
    throw new Error("Invalid question bank: expected an object");
  }
  if (!Array.isArray(value.topics)) {
    throw new Error("Invalid question bank: topics must be an array");
  }

  return {
    general: parseLeveledQuestions(value.general, "general"),
    topics: value.topics.map((topic, index) => parseTopic(topic, index)),
  };
}

function parseTopic(value: unknown, index: number): QuestionBankTopic {
  if (!isRecord(value) || typeof value.name !== "string" || !value.name.trim()) {
    throw new Error(`Invalid question bank: topic #${index} needs a name`);
  }
  const aliases = Array.isArray(value.aliases)
    ? value.aliases.filter((alias): alias is string => typeof alias === "string")
    : [];
  return {
    name: value.name,
    aliases,
    questions: parseLeveledQuestions(value.questions, value.name),
  };
}

function parseLeveledQuestions(value: unknown, owner: string): LeveledQuestions {
  if (!isRecord(value)) {
    throw new Error(`Invalid question bank: ${owner} questions must be an object`);
  }
  const parsed: LeveledQuestions = { junior: [], mid: [], senior: [] };
  for (const level of EXPERIENCE_LEVELS) {
    const list = value[level];
    if (!Array.isArray(list)) {
      throw new Error(`Invalid question bank: ${owner}.${level} must be an array`);
    }
    parsed[level] = list
      .filter((item): item is string => typeof item === "string")
      .map((item) => item.trim())
      .filter((item) => item.length > 0);
  }
  return parsed;
}

function normalizeToken(token: string): string {
  return token.trim().toLowerCase();
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
