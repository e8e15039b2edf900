import { Router } from "express";
import { errorHandler, rateLimiter } from "../middleware/index";
import { OppositionController } from "../controllers/opposition-controller";

export function createRouter(controller: OppositionController = new OppositionController()): Router {
  const router = Router();

  router.get("/health", controller.healthCheck);

  // Job polling (not rate limited)
  router.get("/batches/:jobId", controller.getJobStatus);
  router.get("/batches/:jobId/download", controller.downloadResults);

  router.use(rateLimiter);

  router.get("/oppositions/:number", controller.getOpposition);
  router.get("/oppositions/:number/analysis", controller.analyzeOpposition);
  router.get("/oppositions/:number/export", controller.exportOpposition);

  router.post("/batches/url", controller.startUrlBatch);
  router.post("/batches/party", controller.startPartyBatch);
  router.post("/batches/analysis", controller.startAnalysisBatch);

  router.use(errorHandler);

  return router;
}

export default createRouter;
