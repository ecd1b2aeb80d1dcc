import { Request, Response, Router } from "express";
import { Logger, logContext } from "../config/logger";
import { MatchingService } from "../matching/matching.service";
import { sendError } from "./error-response";
import { parseMatchRequest } from "./request.parsers";

interface MatchingControllerDeps {
  matchingService: MatchingService;
  logger: Logger;
}

export function buildMatchingController(deps: MatchingControllerDeps): Router {
  const router = Router();

  router.post("/", async (request: Request, response: Response) => {
    const startedAt = Date.now();
    try {
      const input = parseMatchRequest(request.body);
      const matches = await deps.matchingService.findMatches(
        input.id,
        input.docType,
        input.filters,
        input.scoring,
      );
      logContext(
        deps.logger,
        "info",
        "Matches computed",
        {
          route: "POST /matches",
          doc_type: input.docType,
          doc_id: input.id,
          status_code: 200,
          latency_ms: Date.now() - startedAt,
        },
        { scoring: input.scoring, filters: Array.from(input.filters), matches: matches.length },
      );
      response.status(200).json({
        matches: matches.map((match) => ({ id: match.id, relevance_score: match.score })),
      });
    } catch (error) {
      sendError(response, error, deps.logger, "POST /matches");
    }
  });

  return router;
}
