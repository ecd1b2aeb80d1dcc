import express, { Express, NextFunction, Request, Response } from "express";
import { EnvConfig } from "./config/env";
import { createLogger, Logger } from "./config/logger";
import { CandidatesRepository } from "./db/repositories/candidates.repo";
import { JobsRepository } from "./db/repositories/jobs.repo";
import { DocumentService } from "./documents/document.service";
import { MatchingService } from "./matching/matching.service";
import { IndexRelevanceScorer, WeightedMatchScorer } from "./matching/scoring/match-scorers";
import { ElasticsearchClient } from "./matching/search/elasticsearch.client";
import { InMemorySearchIndex } from "./matching/search/in-memory-search.index";
import { loadMockDocuments } from "./matching/search/mock-documents";
import { SearchIndex } from "./matching/search/search-index";
import { buildDocumentsController } from "./routes/documents.controller";
import { buildHealthController } from "./routes/health.controller";
import { sendError } from "./routes/error-response";
import { buildMatchingController } from "./routes/matching.controller";
import { FILTER_CONFIGS } from "./shared/constants";
import { ValidationError } from "./shared/errors";
import { isRecord } from "./shared/utils/type-guards";

export interface AppContext {
  app: Express;
  logger: Logger;
  searchIndex: SearchIndex;
  elasticsearchClient?: ElasticsearchClient;
}

export interface AppOverrides {
  logger?: Logger;
  searchIndex?: SearchIndex;
}

export function createApp(env: EnvConfig, overrides: AppOverrides = {}): AppContext {
  const logger = overrides.logger ?? createLogger({ minLevel: env.logLevel });
  const app = express();

  app.use(express.json({ limit: "1mb" }));

  let searchIndex: SearchIndex;
  let elasticsearchClient: ElasticsearchClient | undefined;
  if (overrides.searchIndex) {
    searchIndex = overrides.searchIndex;
  } else if (env.mockSearchIndex) {
    logger.warn("MOCK_SEARCH_INDEX is enabled, serving documents from fixture", {
      path: env.mockDocumentsPath,
    });
    searchIndex = new InMemorySearchIndex(loadMockDocuments(env.mockDocumentsPath));
  } else {
    elasticsearchClient = new ElasticsearchClient(
      {
        baseUrl: env.elasticsearchUrl,
        apiKey: env.elasticsearchApiKey,
        indices: {
          jobs: env.jobsIndex,
          candidates: env.candidatesIndex,
        },
      },
      logger,
    );
    searchIndex = elasticsearchClient;
  }

  const matchSearchConfig = {
    minMatchingSkills: env.minMatchingSkills,
    pageSize: env.matchPageSize,
    filterConfigs: FILTER_CONFIGS,
  };
  const jobsRepository = new JobsRepository(searchIndex, matchSearchConfig, logger);
  const candidatesRepository = new CandidatesRepository(searchIndex, matchSearchConfig, logger);
  const documentService = new DocumentService(jobsRepository, candidatesRepository);
  const matchingService = new MatchingService({
    jobsRepository,
    candidatesRepository,
    scorers: [
      new IndexRelevanceScorer(),
      new WeightedMatchScorer(jobsRepository, candidatesRepository, FILTER_CONFIGS),
    ],
  });

  app.use("/health", buildHealthController({ searchIndex, logger }));
  app.use("/document", buildDocumentsController({ documentService, logger }));
  app.use("/matches", buildMatchingController({ matchingService, logger }));

  app.use((_request: Request, response: Response) => {
    response.status(404).json({ ok: false, error: "Not found" });
  });

  // Errors raised before a controller runs, e.g. by the JSON body parser.
  app.use((error: unknown, request: Request, response: Response, _next: NextFunction) => {
    const route = `${request.method} ${request.path}`;
    if (isRecord(error) && error.type === "entity.parse.failed") {
      sendError(response, new ValidationError("Validation error", ["body: must be valid JSON"]), logger, route);
      return;
    }
    sendError(response, error, logger, route);
  });

  return { app, logger, searchIndex, elasticsearchClient };
}
