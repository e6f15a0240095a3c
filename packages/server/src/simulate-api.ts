// =============================================================================
// @reinforce-lab/server — Simulation REST API routes
// =============================================================================
// Express Router mounted at /api/rl. Bodies are validated with zod before a
// single episode runs; domain errors map to 400 / 504 JSON responses.
// =============================================================================

import { Router, type Request, type Response } from "express";
import { ZodError } from "zod";
import {
  SimulationCancelledError,
  SimulationValidationError,
  createRequestId,
  createSimulateRequestSchema,
} from "@reinforce-lab/shared";
import type { AppDependencies } from "./server.js";
import { runSimulation } from "./simulation.js";

export interface HttpError {
  status: number;
  body: { error: string; details?: unknown };
}

/** Maps a thrown value to the status and JSON body the API answers with. */
export function toHttpError(err: unknown): HttpError {
  if (err instanceof ZodError) {
    return {
      status: 400,
      body: { error: "Invalid request body", details: err.issues },
    };
  }
  if (err instanceof SimulationValidationError) {
    return { status: 400, body: { error: err.message } };
  }
  if (err instanceof SimulationCancelledError) {
    return { status: 504, body: { error: err.message } };
  }
  return { status: 500, body: { error: "Internal server error" } };
}

export function createSimulationRouter(deps: AppDependencies): Router {
  const { config } = deps;
  const router = Router();
  const requestSchema = createSimulateRequestSchema(config.SIM_MAX_EPISODES);

  // -------------------------------------------------------------------------
  // POST /api/rl/simulate — run one isolated policy-gradient simulation
  // -------------------------------------------------------------------------
  router.post("/simulate", (req: Request, res: Response) => {
    const logger = deps.logger.child({ requestId: createRequestId() });
    const start = performance.now();

    try {
      const request = requestSchema.parse(req.body);
      const response = runSimulation(request, config);

      logger.info("Simulation completed", {
        episodes: request.episodes,
        seeded: request.seed !== undefined,
        durationMs: Math.round(performance.now() - start),
      });
      res.json(response);
    } catch (err) {
      const { status, body } = toHttpError(err);
      const log = status >= 500 ? logger.error : logger.warn;
      log("Simulation request failed", {
        status,
        durationMs: Math.round(performance.now() - start),
        error: err instanceof Error ? err.message : String(err),
      });
      res.status(status).json(body);
    }
  });

  return router;
}
