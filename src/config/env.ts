import dotenv from "dotenv";
import { DEFAULT_MATCH_PAGE_SIZE, DEFAULT_MIN_MATCHING_SKILLS } from "../shared/constants";
import { LogLevel, isLogLevel } from "./logger";

dotenv.config();

export interface EnvConfig {
  nodeEnv: string;
  port: number;
  logLevel: LogLevel;
  elasticsearchUrl: string;
  elasticsearchApiKey?: string;
  jobsIndex: string;
  candidatesIndex: string;
  elasticsearchStartupRetries: number;
  elasticsearchStartupDelayMs: number;
  minMatchingSkills: number;
  matchPageSize: number;
  mockSearchIndex: boolean;
  mockDocumentsPath: string;
}

type RawEnv = Record<string, string | undefined>;

function getOptionalTrimmed(source: RawEnv, name: string): string | undefined {
  const value = source[name];
  if (typeof value !== "string") {
    return undefined;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

export function loadEnv(source: RawEnv = process.env): EnvConfig {
  const portRaw = source.PORT ?? "3000";
  const port = Number(portRaw);
  const logLevelRaw = (source.LOG_LEVEL ?? "info").trim().toLowerCase();
  const minMatchingSkillsRaw = source.MIN_MATCHING_SKILLS ?? String(DEFAULT_MIN_MATCHING_SKILLS);
  const minMatchingSkills = Number(minMatchingSkillsRaw);
  const matchPageSizeRaw = source.MATCH_PAGE_SIZE ?? String(DEFAULT_MATCH_PAGE_SIZE);
  const matchPageSize = Number(matchPageSizeRaw);
  const startupRetriesRaw = source.ELASTICSEARCH_STARTUP_RETRIES ?? "5";
  const elasticsearchStartupRetries = Number(startupRetriesRaw);
  const startupDelayRaw = source.ELASTICSEARCH_STARTUP_DELAY_MS ?? "5000";
  const elasticsearchStartupDelayMs = Number(startupDelayRaw);
  const mockSearchIndex = parseBoolean(source.MOCK_SEARCH_INDEX ?? "false");

  if (!Number.isInteger(port) || port <= 0) {
    throw new Error(`Invalid PORT value: ${portRaw}`);
  }
  if (!isLogLevel(logLevelRaw)) {
    throw new Error(`Invalid LOG_LEVEL value: ${logLevelRaw}`);
  }
  if (!Number.isInteger(minMatchingSkills) || minMatchingSkills < 1) {
    throw new Error(`Invalid MIN_MATCHING_SKILLS value: ${minMatchingSkillsRaw}`);
  }
  if (!Number.isInteger(matchPageSize) || matchPageSize < 1 || matchPageSize > 1000) {
    throw new Error(`Invalid MATCH_PAGE_SIZE value: ${matchPageSizeRaw}. Expected integer between 1 and 1000.`);
  }
  if (!Number.isInteger(elasticsearchStartupRetries) || elasticsearchStartupRetries < 1) {
    throw new Error(`Invalid ELASTICSEARCH_STARTUP_RETRIES value: ${startupRetriesRaw}`);
  }
  if (!Number.isFinite(elasticsearchStartupDelayMs) || elasticsearchStartupDelayMs < 0) {
    throw new Error(`Invalid ELASTICSEARCH_STARTUP_DELAY_MS value: ${startupDelayRaw}`);
  }

  return {
    nodeEnv: source.NODE_ENV ?? "development",
    port,
    logLevel: logLevelRaw,
    elasticsearchUrl: getOptionalTrimmed(source, "ELASTICSEARCH_URL") ?? "http://localhost:9200",
    elasticsearchApiKey: getOptionalTrimmed(source, "ELASTICSEARCH_API_KEY"),
    jobsIndex: getOptionalTrimmed(source, "ELASTICSEARCH_JOBS_INDEX") ?? "jobs",
    candidatesIndex: getOptionalTrimmed(source, "ELASTICSEARCH_CANDIDATES_INDEX") ?? "candidates",
    elasticsearchStartupRetries,
    elasticsearchStartupDelayMs,
    minMatchingSkills,
    matchPageSize,
    mockSearchIndex,
    mockDocumentsPath: getOptionalTrimmed(source, "MOCK_DOCUMENTS_PATH") ?? "data/mock-documents.json",
  };
}

function parseBoolean(value: string): boolean {
  const normalized = value.trim().toLowerCase();
  if (normalized === "true" || normalized === "1" || normalized === "yes") {
    return true;
  }
  if (normalized === "false" || normalized === "0" || normalized === "no") {
    return false;
  }
  throw new Error(`Invalid boolean value: ${value}`);
}
