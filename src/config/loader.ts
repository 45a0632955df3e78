/**
 * Config loader — parses config/server.md for LLM provider and
 * orchestrator settings. Missing files and labels fall back to defaults.
 */

import { readFile } from "node:fs/promises";
import { join } from "node:path";
import {
  DEFAULT_LLM_CONFIG,
  DEFAULT_ORCHESTRATOR_CONFIG,
  REPEAT_POLICIES,
  type LLMConfig,
  type OrchestratorConfig,
  type RepeatPolicy,
  type ServerConfig,
} from "../types/config.ts";
import { isMissingFile } from "../database/errors.ts";

/** Load server configuration from config/server.md */
export async function loadServerConfig(dataPath: string): Promise<ServerConfig> {
  let content: string;
  try {
    content = await readFile(join(dataPath, "config", "server.md"), "utf-8");
  } catch (err) {
    if (!isMissingFile(err)) throw err;
    return defaultServerConfig();
  }
  return parseServerConfig(content);
}

export function defaultServerConfig(): ServerConfig {
  return {
    llm: { ...DEFAULT_LLM_CONFIG },
    orchestrator: { ...DEFAULT_ORCHESTRATOR_CONFIG },
  };
}

export function parseServerConfig(content: string): ServerConfig {
  return {
    llm: parseLLMConfig(content),
    orchestrator: parseOrchestratorConfig(content),
  };
}

/** Extract LLM settings from markdown content */
function parseLLMConfig(content: string): LLMConfig {
  const config = { ...DEFAULT_LLM_CONFIG };

  const provider = label(content, "Provider");
  if (provider) config.provider = provider.toLowerCase();

  const model = label(content, "Model");
  if (model) config.model = model;

  const apiKeyMatch = content.match(
    /\*\*API key:\*\*\s*(?:Environment variable\s+)?(\w+)/i,
  );
  if (apiKeyMatch?.[1]) {
    config.apiKeyEnvVar = apiKeyMatch[1].trim();
  }

  const tempMatch = content.match(/\*\*Temperature:\*\*\s*(\d+(?:\.\d+)?)/i);
  if (tempMatch?.[1]) {
    config.temperature = parseFloat(tempMatch[1]);
  }

  return config;
}

/** Extract orchestrator settings from markdown content */
function parseOrchestratorConfig(content: string): OrchestratorConfig {
  const config = { ...DEFAULT_ORCHESTRATOR_CONFIG };

  // Intervals, ceilings and timeouts of zero keep their defaults
  const pollInterval = parseDuration(label(content, "Poll interval"));
  if (pollInterval) config.pollIntervalMs = pollInterval;

  const maxPolls = parseCount(label(content, "Max polls"));
  if (maxPolls) config.maxPolls = maxPolls;

  const maxSteps = parseCount(label(content, "Max steps"));
  if (maxSteps) config.maxSteps = maxSteps;

  const maxErrors = parseCount(label(content, "Max consecutive errors"));
  if (maxErrors !== null) config.maxConsecutiveErrors = maxErrors;

  const policy = label(content, "Repeat policy")?.toLowerCase().replace(/[-\s]+/g, "_");
  if (policy && isRepeatPolicy(policy)) config.repeatPolicy = policy;

  const minLength = parseCount(label(content, "Minimum transcript length"));
  if (minLength !== null) config.minTranscriptLength = minLength;

  const lockTimeout = parseDuration(label(content, "Case lock timeout"));
  if (lockTimeout) config.caseLockTimeoutMs = lockTimeout;

  return config;
}

/**
 * Parse "250ms", "30s", "2m" or a bare number of milliseconds.
 * Returns null for anything else.
 */
export function parseDuration(value: string | undefined): number | null {
  const match = value?.match(/^(\d+(?:\.\d+)?)\s*(ms|s|m)?$/i);
  if (!match?.[1]) return null;

  const amount = parseFloat(match[1]);
  switch (match[2]?.toLowerCase()) {
    case "s":
      return Math.round(amount * 1000);
    case "m":
      return Math.round(amount * 60_000);
    default:
      return Math.round(amount);
  }
}

function parseCount(value: string | undefined): number | null {
  const match = value?.match(/^(\d+)/);
  return match?.[1] ? parseInt(match[1], 10) : null;
}

/** Value after a `**Label:**` marker, trimmed; undefined when absent */
function label(content: string, name: string): string | undefined {
  const escaped = name.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
  const match = content.match(new RegExp(`\\*\\*${escaped}:\\*\\*[ \\t]*(.+)`, "i"));
  const value = match?.[1]?.trim();
  return value ? value : undefined;
}

function isRepeatPolicy(value: string): value is RepeatPolicy {
  return (REPEAT_POLICIES as readonly string[]).includes(value);
}
