// ── OpenAI-compatible request/response types ────────────────────────────────
// What chat clients send to the relay and what they get back.

import type { JsonValue } from "./common.js";

export interface ChatMessage {
  role: string;
  content?: JsonValue;
  [field: string]: JsonValue | undefined;
}

export interface ChatCompletionRequest {
  model: string;
  messages: ChatMessage[];
  stream: boolean;
  temperature: number | null;
  max_tokens: number | null;
  top_p: number | null;
  frequency_penalty: number | null;
  presence_penalty: number | null;
  user?: string | null;
}

// ── Non-streaming completion ────────────────────────────────────────────────

export interface ChatCompletionChoice {
  index: number;
  message: {
    role: "assistant";
    content: JsonValue;
  };
  finish_reason: "stop" | "length" | "content_filter" | null;
}

export interface ChatCompletionUsage {
  prompt_tokens: number;
  completion_tokens: number;
  total_tokens: number;
}

export interface ChatCompletionResponse {
  id: string;
  object: "chat.completion";
  created: number;
  model: string;
  choices: ChatCompletionChoice[];
  usage: ChatCompletionUsage;
}

// ── Models ──────────────────────────────────────────────────────────────────

export interface ModelEntry {
  id: string;
  object: "model";
  created: number;
  owned_by: string;
  permission: never[];
  root: string;
  parent: null;
  name: string;
  description: string;
}

export interface ModelList {
  object: "list";
  data: ModelEntry[];
}

// ── Embeddings ──────────────────────────────────────────────────────────────

export interface EmbeddingsResponse {
  object: "list";
  data: Array<{
    object: "embedding";
    embedding: number[];
    index: number;
  }>;
  model: string;
  usage: {
    prompt_tokens: number;
    total_tokens: number;
  };
}
