import { ProxyError } from "../errors.js";
import type { ChallengeType } from "./types.js";

export type ChatModelFamily = "gpt3" | "gpt4";

export interface ChatModel {
  readonly id: string;
  readonly family: ChatModelFamily;
}

const GPT3_PREFIXES = ["gpt-3.5", "text-davinci-002-render"];
const GPT4_PREFIXES = ["gpt-4"];

export function parseChatModel(id: string): ChatModel {
  if (GPT3_PREFIXES.some((prefix) => id.startsWith(prefix))) {
    return { id, family: "gpt3" };
  }
  if (GPT4_PREFIXES.some((prefix) => id.startsWith(prefix))) {
    return { id, family: "gpt4" };
  }
  throw new ProxyError("unknown_model", `Unsupported model: ${id}`, { model: id });
}

export function isGpt3(model: ChatModel): boolean {
  return model.family === "gpt3";
}

export function isGpt4(model: ChatModel): boolean {
  return model.family === "gpt4";
}

export function challengeTypeFor(model: ChatModel): ChallengeType {
  return model.family === "gpt4" ? "gpt4" : "gpt3";
}
