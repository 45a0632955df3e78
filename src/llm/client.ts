/**
 * LLM client — abstraction layer for calling language models.
 * Currently supports Anthropic. Designed for easy extension to other providers.
 */

import Anthropic from "@anthropic-ai/sdk";
import type { LLMConfig } from "../types/config.ts";

export interface LLMRequest {
  /** System prompt */
  system: string;
  /** User message */
  prompt: string;
  /** Expected JSON output — instructs the model to return valid JSON */
  jsonMode?: boolean;
  /** Max tokens for response */
  maxTokens?: number;
  /** Override temperature (uses config default otherwise) */
  temperature?: number;
}

export interface LLMResponse {
  /** Raw text response from the model */
  text: string;
  /** Parsed JSON if jsonMode was true and the response held a JSON value */
  json?: unknown;
  /** Token usage */
  usage: {
    inputTokens: number;
    outputTokens: number;
  };
}

export class LLMClient {
  private config: LLMConfig;
  private anthropic: Anthropic | null = null;

  constructor(config: LLMConfig) {
    this.config = config;
  }

  /** Call the configured model */
  async interpret(request: LLMRequest): Promise<LLMResponse> {
    return this.call(this.config.model, request);
  }

  /** Check if the LLM client is configured and ready */
  isConfigured(): boolean {
    const apiKey = process.env[this.config.apiKeyEnvVar];
    return !!apiKey && apiKey.length > 0;
  }

  get model(): string {
    return this.config.model;
  }

  get apiKeyEnvVar(): string {
    return this.config.apiKeyEnvVar;
  }

  private async call(model: string, request: LLMRequest): Promise<LLMResponse> {
    if (this.config.provider !== "anthropic") {
      throw new Error(`Unsupported LLM provider: ${this.config.provider}`);
    }

    const client = this.getAnthropicClient();
    const temperature = request.temperature ?? this.config.temperature;

    const response = await client.messages.create({
      model,
      max_tokens: request.maxTokens ?? 4096,
      temperature,
      system: request.system,
      messages: [{ role: "user", content: request.prompt }],
    });

    const text = response.content
      .filter((block): block is Anthropic.TextBlock => block.type === "text")
      .map((block) => block.text)
      .join("");

    return {
      text,
      json: request.jsonMode ? extractJSON(text) : undefined,
      usage: {
        inputTokens: response.usage.input_tokens,
        outputTokens: response.usage.output_tokens,
      },
    };
  }

  private getAnthropicClient(): Anthropic {
    if (!this.anthropic) {
      const apiKey = process.env[this.config.apiKeyEnvVar];
      if (!apiKey) {
        throw new Error(
          `Missing API key: environment variable ${this.config.apiKeyEnvVar} is not set`,
        );
      }
      this.anthropic = new Anthropic({ apiKey });
    }
    return this.anthropic;
  }
}

/**
 * Extract JSON from LLM text response.
 * Handles bare JSON, markdown code blocks, and JSON embedded in prose.
 */
export function extractJSON(text: string): unknown {
  const direct = tryParse(text.trim());
  if (direct !== undefined) return direct;

  const codeBlockMatch = text.match(/```(?:json)?\s*\n([\s\S]*?)\n```/);
  if (codeBlockMatch?.[1]) {
    const fenced = tryParse(codeBlockMatch[1].trim());
    if (fenced !== undefined) return fenced;
  }

  return extractFirstJsonObject(text);
}

/**
 * Scan for the first balanced `{...}` that parses as JSON. Braces inside
 * string literals are skipped; an object that fails to parse moves the
 * scan on to the next opening brace.
 */
export function extractFirstJsonObject(text: string): unknown {
  for (let start = text.indexOf("{"); start !== -1; start = text.indexOf("{", start + 1)) {
    const end = findObjectEnd(text, start);
    if (end === -1) return undefined;

    const parsed = tryParse(text.slice(start, end + 1));
    if (parsed !== undefined) return parsed;
  }
  return undefined;
}

function findObjectEnd(text: string, start: number): number {
  let depth = 0;
  let inString = false;
  let escaped = false;

  for (let i = start; i < text.length; i++) {
    const ch = text[i];
    if (inString) {
      if (escaped) escaped = false;
      else if (ch === "\\") escaped = true;
      else if (ch === '"') inString = false;
      continue;
    }
    if (ch === '"') inString = true;
    else if (ch === "{") depth++;
    else if (ch === "}") {
      depth--;
      if (depth === 0) return i;
    }
  }
  return -1;
}

function tryParse(candidate: string): unknown {
  try {
    return JSON.parse(candidate);
  } catch {
    return undefined;
  }
}
