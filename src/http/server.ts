import express, { type Express, type NextFunction, type Request, type Response } from "express";
import { nanoid } from "nanoid";
import type { Logger } from "pino";
import type { ProxyConfig } from "../config.js";
import { type ProxyError, statusForProxyError, toProxyError } from "../errors.js";
import { createUpstreamCookieJar } from "../proxy/cookieJar.js";
import type { CookieJar, InboundRequest, ProxyResponse } from "../proxy/types.js";
import { relayProxyResponse, toHeaderRecord } from "./relay.js";

export interface ProxyDispatcher {
  dispatch(origin: string, request: InboundRequest): Promise<ProxyResponse>;
}

interface HttpServerDependencies {
  config: ProxyConfig;
  logger: Logger;
  dispatcher: ProxyDispatcher;
  createCookieJar?: () => CookieJar;
}

interface OpenAiErrorPayload {
  error: {
    message: string;
    type: "proxy_error";
    code: string;
    param: null;
  };
}

function getRequestId(res: Response): string {
  const locals = res.locals as { rid?: string };
  if (!locals.rid) {
    locals.rid = nanoid();
  }
  return locals.rid;
}

function applyBaseHeaders(config: ProxyConfig, rid: string, res: Response): void {
  res.setHeader("x-proxy-version", config.version);
  res.setHeader("x-proxy-request-id", rid);
}

function buildErrorPayload(code: string, message: string): OpenAiErrorPayload {
  return {
    error: {
      message,
      type: "proxy_error",
      code,
      param: null,
    },
  };
}

function sendProxyError(deps: HttpServerDependencies, req: Request, res: Response, error: ProxyError): void {
  const rid = getRequestId(res);
  const status = statusForProxyError(error);
  const logPayload = {
    rid,
    event: "proxy_request_failed",
    method: req.method,
    path: req.path,
    status,
    code: error.code,
    message: error.message,
    details: error.details,
  };
  if (status >= 500) {
    deps.logger.error(logPayload, "proxy_request_failed");
  } else {
    deps.logger.warn(logPayload, "proxy_request_failed");
  }

  if (res.headersSent) {
    res.destroy(error);
    return;
  }

  applyBaseHeaders(deps.config, rid, res);
  res.status(status).json(buildErrorPayload(error.code, error.message));
}

export interface BodyParserFailure {
  status: number;
  code: string;
  message: string;
}

/** Maps body-parser's own errors (they carry `type` and a 4xx `status`) to client responses. */
export function describeBodyParserError(error: unknown): BodyParserFailure | undefined {
  if (typeof error !== "object" || error === null) {
    return undefined;
  }
  const { type, status } = error as { type?: unknown; status?: unknown };
  if (typeof type !== "string" || typeof status !== "number" || status < 400 || status >= 500) {
    return undefined;
  }

  switch (type) {
    case "entity.too.large":
      return { status: 413, code: "body_too_large", message: "Request body is too large" };
    case "request.aborted":
      return { status, code: "request_aborted", message: "Request was aborted while reading the body" };
    case "request.size.invalid":
      return { status, code: "body_size_mismatch", message: "Request body size did not match content-length" };
    case "encoding.unsupported":
    case "charset.unsupported":
      return { status, code: "unsupported_encoding", message: "Request body encoding is not supported" };
    default:
      return { status, code: "invalid_request_body", message: "Request body could not be read" };
  }
}

function toInboundRequest(req: Request, jar: CookieJar): InboundRequest {
  const body: unknown = req.body;
  return {
    method: req.method,
    pathAndQuery: req.originalUrl,
    headers: toHeaderRecord(req.headers),
    body: Buffer.isBuffer(body) && body.length > 0 ? body : undefined,
    jar,
  };
}

async function handleProxyRequest(deps: HttpServerDependencies, req: Request, res: Response): Promise<void> {
  const rid = getRequestId(res);
  const jar = deps.createCookieJar
    ? deps.createCookieJar()
    : createUpstreamCookieJar(deps.config.upstreamOrigin, deps.config.upstreamCookies);

  deps.logger.debug({ rid, event: "proxy_request", method: req.method, path: req.path }, "proxy_request");

  const response = await deps.dispatcher.dispatch(deps.config.upstreamOrigin, toInboundRequest(req, jar));
  applyBaseHeaders(deps.config, rid, res);
  try {
    await relayProxyResponse(res, response);
  } catch (error) {
    // Client went away or the upstream stream broke mid-body; headers are already out.
    deps.logger.debug(
      {
        rid,
        event: "proxy_relay_aborted",
        message: error instanceof Error ? error.message : String(error),
      },
      "proxy_relay_aborted",
    );
    res.destroy();
  }
}

export function createHttpApp(deps: HttpServerDependencies): Express {
  const app = express();

  app.disable("x-powered-by");

  app.use((req, res, next) => {
    const headerRequestId = req.header("x-request-id");
    const rid = typeof headerRequestId === "string" && headerRequestId.trim().length > 0 ? headerRequestId.trim() : nanoid();
    (res.locals as { rid?: string }).rid = rid;

    applyBaseHeaders(deps.config, rid, res);
    next();
  });

  app.get("/health", (_req, res) => {
    res.json({ ok: true, version: deps.config.version, upstream: deps.config.upstreamOrigin });
  });

  // body-parser would inflate compressed bodies (or refuse them with inflate off);
  // hide the encoding while it reads so the bytes reach the upstream as sent.
  app.use((req, res, next) => {
    const encoding = req.headers["content-encoding"];
    if (encoding !== undefined && encoding.trim().toLowerCase() !== "identity") {
      (res.locals as { contentEncoding?: string }).contentEncoding = encoding;
      delete req.headers["content-encoding"];
    }
    next();
  });

  app.use(express.raw({ type: () => true, inflate: false, limit: deps.config.httpBodyLimit }));

  app.use((req, res, next) => {
    const encoding = (res.locals as { contentEncoding?: string }).contentEncoding;
    if (encoding !== undefined) {
      req.headers["content-encoding"] = encoding;
    }
    next();
  });

  app.use((error: unknown, req: Request, res: Response, next: NextFunction) => {
    const failure = describeBodyParserError(error);
    if (!failure) {
      next(error);
      return;
    }
    deps.logger.warn(
      { rid: getRequestId(res), event: "request_body_rejected", path: req.path, status: failure.status, code: failure.code },
      "request_body_rejected",
    );
    res.status(failure.status).json(buildErrorPayload(failure.code, failure.message));
  });

  app.use((req, res, next) => {
    handleProxyRequest(deps, req, res).catch(next);
  });

  app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
    sendProxyError(deps, req, res, toProxyError(error));
  });

  return app;
}

export async function startHttpServer(deps: HttpServerDependencies): Promise<void> {
  const app = createHttpApp(deps);

  await new Promise<void>((resolve) => {
    app.listen(deps.config.httpPort, deps.config.httpHost, () => {
      deps.logger.info(
        {
          event: "http_server_started",
          host: deps.config.httpHost,
          port: deps.config.httpPort,
          upstream: deps.config.upstreamOrigin,
        },
        "http_server_started",
      );
      resolve();
    });
  });
}
