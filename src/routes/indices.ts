import { Router } from "express";

import type { IndexController } from "@interfaces/http/IndexController";

export function createIndicesRouter(controller: IndexController): Router {
  const router = Router();

  router.get("/:index", controller.exists);
  router.put("/:index", controller.create);
  router.delete("/:index", controller.delete);

  return router;
}
