import { parse, stringify } from "lossless-json";
import { ProxyError } from "../errors.js";
import { setHeader } from "./headers.js";
import type { InboundRequest } from "./types.js";

export type JsonObject = Record<string, unknown>;

function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * A request body parsed once into a mutable object. Writes mark the document
 * dirty; `commit` is the only place the request body is replaced. Numbers keep
 * their source text, so untouched fields are written back as they arrived.
 */
export class JsonBodyDocument {
  private dirty = false;

  private constructor(public readonly value: JsonObject) {}

  public static parse(body: Buffer | undefined): JsonBodyDocument {
    if (!body || body.length === 0) {
      throw new ProxyError("body_required", "Request body is required");
    }

    let parsed: unknown;
    try {
      parsed = parse(body.toString("utf8"));
    } catch (error) {
      throw new ProxyError("invalid_json", "Request body is not valid JSON", {
        message: error instanceof Error ? error.message : String(error),
      });
    }

    if (!isJsonObject(parsed)) {
      throw new ProxyError("body_must_be_json_object", "Request body must be a JSON object");
    }

    return new JsonBodyDocument(parsed);
  }

  public get(key: string): unknown {
    return this.value[key];
  }

  public has(key: string): boolean {
    return Object.hasOwn(this.value, key);
  }

  public set(key: string, value: unknown): void {
    this.value[key] = value;
    this.dirty = true;
  }

  public isDirty(): boolean {
    return this.dirty;
  }

  /** Returns true when the request body was replaced. */
  public commit(request: InboundRequest): boolean {
    if (!this.dirty) {
      return false;
    }

    const text = stringify(this.value);
    if (text === undefined) {
      throw new ProxyError("invalid_json", "Request body could not be serialized");
    }
    request.body = Buffer.from(text, "utf8");
    if (!request.headers["content-type"]?.toLowerCase().includes("json")) {
      setHeader(request.headers, "content-type", "application/json");
    }
    this.dirty = false;
    return true;
  }
}
