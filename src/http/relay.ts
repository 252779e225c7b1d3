import type { Request, Response } from "express";
import { pipeline } from "node:stream/promises";
import type { HeaderRecord, ProxyResponse } from "../proxy/types.js";

const HOP_BY_HOP_HEADERS = new Set([
  "connection",
  "keep-alive",
  "proxy-authenticate",
  "proxy-authorization",
  "te",
  "trailer",
  "transfer-encoding",
  "upgrade",
]);

export function toHeaderRecord(headers: Request["headers"]): HeaderRecord {
  const output: HeaderRecord = {};
  for (const [name, value] of Object.entries(headers)) {
    if (value === undefined) continue;
    output[name.toLowerCase()] = Array.isArray(value) ? value.join(", ") : value;
  }
  return output;
}

function isEventStream(headers: ProxyResponse["headers"]): boolean {
  const contentType = headers["content-type"];
  const value = Array.isArray(contentType) ? contentType.join(",") : contentType;
  return value?.toLowerCase().includes("text/event-stream") ?? false;
}

/** Writes status and end-to-end headers, then streams the body through. */
export async function relayProxyResponse(res: Response, response: ProxyResponse): Promise<void> {
  res.status(response.status);
  for (const [name, value] of Object.entries(response.headers)) {
    if (value === undefined || HOP_BY_HOP_HEADERS.has(name.toLowerCase())) {
      continue;
    }
    res.setHeader(name, value);
  }

  if (isEventStream(response.headers)) {
    res.setHeader("Cache-Control", "no-cache");
    res.setHeader("X-Accel-Buffering", "no");
    res.flushHeaders();
  }

  await pipeline(response.body, res);
}
