import { Request, Response, Router } from "express";
import { Logger } from "../config/logger";
import { SearchIndex, SearchIndexHealth } from "../matching/search/search-index";
import { errorMessage } from "../shared/errors";

interface HealthControllerDeps {
  searchIndex: SearchIndex;
  logger: Logger;
}

const HEALTHY_STATUSES = new Set(["green", "yellow"]);

export function buildHealthController(deps: HealthControllerDeps): Router {
  const router = Router();

  router.get("/", async (_request: Request, response: Response) => {
    let details: SearchIndexHealth | { error: string };
    let connected = false;
    try {
      const health = await deps.searchIndex.getHealth();
      connected = HEALTHY_STATUSES.has(health.status);
      details = health;
    } catch (error) {
      deps.logger.error("Search index health check failed", { error: errorMessage(error) });
      details = { error: errorMessage(error) };
    }

    response.status(connected ? 200 : 503).json({
      status: connected ? "healthy" : "unhealthy",
      elasticsearch: {
        connected,
        details,
      },
    });
  });

  return router;
}
