import type { NextFunction, Request, Response } from "express";

import type { HealthUseCase } from "@app/health/HealthUseCase";

/** GET /health: 200 when the cluster is reachable and not red, 503 otherwise. */
export function createHealthController(useCase: HealthUseCase) {
  return {
    async check(_req: Request, res: Response, next: NextFunction): Promise<void> {
      try {
        const health = await useCase.check({ signal: res.locals.signal });

        res.status(health.status === "healthy" ? 200 : 503).json(health);
      } catch (err: unknown) {
        next(err);
      }
    },
  };
}

export type HealthController = ReturnType<typeof createHealthController>;
