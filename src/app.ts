import express, { Express, NextFunction, Request, Response } from "express";
import { CandidatesAdminService } from "./admin/candidates-admin.service";
import { EnvConfig } from "./config/env";
import { errorMessage, Logger } from "./config/logger";
import { buildCandidateStore, buildLogger } from "./config/runtime";
import { CandidateStore } from "./storage/candidate-store.service";

export interface AppContext {
  app: Express;
  logger: Logger;
  candidateStore: CandidateStore;
}

export interface AppOverrides {
  logger?: Logger;
  candidateStore?: CandidateStore;
}

export function createApp(env: EnvConfig, overrides: AppOverrides = {}): AppContext {
  const logger = overrides.logger ?? buildLogger(env);
  const candidateStore = overrides.candidateStore ?? buildCandidateStore(env, logger);
  const candidatesAdminService = new CandidatesAdminService(candidateStore);
  const app = express();

  app.use(express.json({ limit: "100kb" }));

  app.get("/health", (_request: Request, response: Response) => {
    response.status(200).json({ ok: true });
  });

  function requireAdminSecret(request: Request, response: Response, next: NextFunction): void {
    if (!env.adminSecret) {
      response.status(503).json({ ok: false, error: "Admin API is not configured" });
      return;
    }
    const providedSecret = request.header("x-admin-secret");
    if (!providedSecret || providedSecret !== env.adminSecret) {
      response.status(401).json({ ok: false, error: "Unauthorized" });
      return;
    }
    next();
  }

  app.use("/admin/api", requireAdminSecret);

  app.get("/admin/api/candidates", (_request: Request, response: Response) => {
    try {
      const overview = candidatesAdminService.getOverview();
      response.status(200).json({ ok: true, ...overview });
    } catch (error) {
      logger.error("admin.candidates.list_failed", { error: errorMessage(error) });
      response.status(500).json({ ok: false, error: "Failed to load candidates" });
    }
  });

  app.get("/admin/api/candidates/:candidateId", (request: Request, response: Response) => {
    try {
      const candidate = candidatesAdminService.getCandidate(String(request.params.candidateId ?? ""));
      if (!candidate) {
        response.status(404).json({ ok: false, error: "Candidate not found" });
        return;
      }
      response.status(200).json({ ok: true, candidate });
    } catch (error) {
      logger.error("admin.candidates.get_failed", { error: errorMessage(error) });
      response.status(500).json({ ok: false, error: "Failed to load candidate" });
    }
  });

  return { app, logger, candidateStore };
}
