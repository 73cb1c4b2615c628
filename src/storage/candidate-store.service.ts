import { existsSync, mkdirSync, readFileSync, renameSync, rmSync, writeFileSync } from "node:fs";
import path from "node:path";
import { errorMessage, Logger } from "../config/logger";
import { toCandidateDocument } from "../profiles/candidate-record";
import { anonymizeCandidate, ContactFields } from "../privacy/anonymization";
import { CANDIDATE_ID_PREFIX } from "../shared/constants";
import {
  CandidateRecord,
  StoredCandidate,
  TechnicalAnswer,
} from "../shared/types/candidate.types";

export interface CandidateSink {
  save(record: CandidateRecord): boolean;
}

export interface CandidateStoreOptions {
  dataDir: string;
  fileName?: string;
  now?: () => Date;
}

/**
 * JSON-array backed collection of screened candidates. Every save rewrites the
 * whole document, so only one writer may use a given file at a time.
 */
export class CandidateStore implements CandidateSink {
  private readonly dataDir: string;
  private readonly filePath: string;
  private readonly now: () => Date;

  constructor(
    private readonly logger: Logger,
    options: CandidateStoreOptions,
  ) {
    this.dataDir = options.dataDir;
    this.filePath = path.join(options.dataDir, options.fileName ?? "candidates.json");
    this.now = options.now ?? (() => new Date());
    this.ensureCollection();
  }

  getFilePath(): string {
    return this.filePath;
  }

  save(record: CandidateRecord): boolean {
    const savedAt = this.now();
    const stored: StoredCandidate = {
      ...toCandidateDocument(record),
      timestamp: savedAt.toISOString(),
      id: generateCandidateId(savedAt),
    };

    try {
      const entries = this.readEntries();
      this.writeCollection([...entries, stored]);
    } catch (error) {
      this.logger.warn("candidate_store.save_failed", {
        file: this.filePath,
        error: errorMessage(error),
      });
      return false;
    }

    this.logger.info("candidate_store.saved", { candidate_id: stored.id });
    return true;
  }

  loadAll(): StoredCandidate[] {
    let entries: unknown[];
    try {
      entries = this.readEntries();
    } catch (error) {
      this.logger.warn("candidate_store.read_failed", {
        file: this.filePath,
        error: errorMessage(error),
      });
      return [];
    }

    const candidates: StoredCandidate[] = [];
    for (const entry of entries) {
      const candidate = toStoredCandidate(entry);
      if (candidate) {
        candidates.push(candidate);
      }
    }
    return candidates;
  }

  findById(candidateId: string): StoredCandidate | null {
    return this.loadAll().find((candidate) => candidate.id === candidateId) ?? null;
  }

  anonymize<T extends ContactFields>(candidate: T): T {
    return anonymizeCandidate(candidate);
  }

  private ensureCollection(): void {
    try {
      mkdirSync(this.dataDir, { recursive: true });
      if (!existsSync(this.filePath)) {
        this.writeCollection([]);
      }
    } catch (error) {
      this.logger.warn("candidate_store.init_failed", {
        file: this.filePath,
        error: errorMessage(error),
      });
    }
  }

  /**
   * Raw entries of the collection document, left exactly as stored. A missing file
   * or a document that is not a JSON array reads as empty; other read errors throw.
   */
  private readEntries(): unknown[] {
    let raw: string;
    try {
      raw = readFileSync(this.filePath, "utf-8");
    } catch (error) {
      if (isMissingFileError(error)) {
        return [];
      }
      throw error;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      this.logger.warn("candidate_store.document_unreadable", {
        file: this.filePath,
        error: errorMessage(error),
      });
      return [];
    }

    if (!Array.isArray(parsed)) {
      this.logger.warn("candidate_store.document_unreadable", {
        file: this.filePath,
        error: "Collection document is not an array",
      });
      return [];
    }
    return parsed;
  }

  private writeCollection(entries: ReadonlyArray<unknown>): void {
    const tempPath = `${this.filePath}.${process.pid}.tmp`;
    try {
      writeFileSync(tempPath, `${JSON.stringify(entries, null, 2)}\n`, "utf-8");
      renameSync(tempPath, this.filePath);
    } catch (error) {
      if (existsSync(tempPath)) {
        rmSync(tempPath);
      }
      throw error;
    }
  }
}

/** Second granularity only: two saves within the same second share an id. */
export function generateCandidateId(date: Date): string {
  const parts = [
    String(date.getFullYear()).padStart(4, "0"),
    pad2(date.getMonth() + 1),
    pad2(date.getDate()),
    pad2(date.getHours()),
    pad2(date.getMinutes()),
    pad2(date.getSeconds()),
  ];
  return `${CANDIDATE_ID_PREFIX}${parts.join("")}`;
}

function isMissingFileError(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

function pad2(value: number): string {
  return String(value).padStart(2, "0");
}

function toStoredCandidate(value: unknown): StoredCandidate | null {
  if (!isRecord(value)) {
    return null;
  }
  return {
    full_name: readString(value.full_name),
    email: readString(value.email),
    phone: readString(value.phone),
    experience_years:
      typeof value.experience_years === "number" && Number.isFinite(value.experience_years)
        ? value.experience_years
        : null,
    desired_position: readString(value.desired_position),
    location: readString(value.location),
    tech_stack: Array.isArray(value.tech_stack)
      ? value.tech_stack.filter((item): item is string => typeof item === "string")
      : [],
    technical_answers: readTechnicalAnswers(value.technical_answers),
    timestamp: readString(value.timestamp),
    id: readString(value.id),
  };
}

function readTechnicalAnswers(value: unknown): Record<string, TechnicalAnswer> {
  const answers: Record<string, TechnicalAnswer> = {};
  if (!isRecord(value)) {
    return answers;
  }
  for (const [key, entry] of Object.entries(value)) {
    if (isRecord(entry)) {
      answers[key] = {
        question: readString(entry.question),
        answer: readString(entry.answer),
      };
    }
  }
  return answers;
}

function readString(value: unknown): string {
  return typeof value === "string" ? value : "";
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
