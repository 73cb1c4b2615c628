import { isCandidateComplete } from "../profiles/candidate-record";
import { StoredCandidate } from "../shared/types/candidate.types";
import { CandidateStore } from "../storage/candidate-store.service";

export interface CandidatesOverview {
  stats: {
    total: number;
    complete: number;
    partial: number;
  };
  candidates: StoredCandidate[];
}

/** Read-only operator view. Contact fields always leave this service masked. */
export class CandidatesAdminService {
  constructor(private readonly candidateStore: CandidateStore) {}

  getOverview(): CandidatesOverview {
    const stored = this.candidateStore.loadAll();
    const complete = stored.filter((candidate) => isStoredCandidateComplete(candidate)).length;
    return {
      stats: {
        total: stored.length,
        complete,
        partial: stored.length - complete,
      },
      candidates: stored.map((candidate) => this.candidateStore.anonymize(candidate)),
    };
  }

  getCandidate(candidateId: string): StoredCandidate | null {
    const candidate = this.candidateStore.findById(candidateId);
    return candidate ? this.candidateStore.anonymize(candidate) : null;
  }
}

function isStoredCandidateComplete(candidate: StoredCandidate): boolean {
  return isCandidateComplete({
    fullName: candidate.full_name,
    email: candidate.email,
    phone: candidate.phone,
    experienceYears: candidate.experience_years,
    desiredPosition: candidate.desired_position,
    location: candidate.location,
    techStack: candidate.tech_stack,
    technicalAnswers: candidate.technical_answers,
  });
}
