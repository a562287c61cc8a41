import { Router } from "express";

import type { HealthController } from "@interfaces/http/HealthController";

export function createHealthRouter(controller: HealthController): Router {
  const router = Router();

  router.get("/", controller.check);

  return router;
}
