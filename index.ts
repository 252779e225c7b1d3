#!/usr/bin/env node

import { HttpChallengeTokenBroker } from "./src/challenge/broker.js";
import { loadConfig, validateConfig } from "./src/config.js";
import { UndiciHttpClient } from "./src/http/client.js";
import { startHttpServer } from "./src/http/server.js";
import { createLogger } from "./src/logger.js";
import { RequestDispatcher } from "./src/proxy/dispatcher.js";
import { SentinelTokenFetcher } from "./src/proxy/sentinel.js";
import { PuidCache, UpstreamPuidAcquirer } from "./src/session/puid.js";

const config = loadConfig(process.env);
const logger = createLogger({ level: config.logLevel, format: config.logFormat });

validateConfig(config);

if (!config.arkoseSolverUrl) {
  logger.warn({ event: "config_warning", arkose_solver: false }, "ARKOSE_SOLVER_URL missing, arkose-gated requests will fail");
}

const client = new UndiciHttpClient({
  headersTimeoutMs: config.upstreamHeadersTimeoutMs,
  bodyTimeoutMs: config.upstreamBodyTimeoutMs,
});

const sessionCache = new PuidCache({
  acquirer: new UpstreamPuidAcquirer(client, config.upstreamOrigin),
  ttlMs: config.puidCacheTtlSec * 1000,
  logger,
});

const dispatcher = new RequestDispatcher({
  client,
  sessionCache,
  sentinel: new SentinelTokenFetcher(client, config.sentinelOrigin),
  broker: new HttpChallengeTokenBroker(config.arkoseSolverUrl),
  arkoseGpt3Experiment: config.arkoseGpt3Experiment,
  logger,
});

process.on("unhandledRejection", (reason) => {
  logger.error({ event: "unhandled_rejection", reason }, "unhandled_rejection");
});

process.on("uncaughtException", (error) => {
  logger.error({ event: "uncaught_exception", error }, "uncaught_exception");
});

await startHttpServer({ config, logger, dispatcher });
