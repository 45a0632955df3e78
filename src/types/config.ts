/** Configuration types parsed from config/server.md */

export interface LLMConfig {
  /** Provider name (e.g. "anthropic") */
  provider: string;
  /** Model used for routing decisions and summarization */
  model: string;
  /** Environment variable name holding the API key */
  apiKeyEnvVar: string;
  /** Temperature for LLM calls (default 0) */
  temperature: number;
}

/** What the engine does when the oracle picks an action it already completed */
export const REPEAT_POLICIES = [
  "force_complete",
  "route_to_error",
  "fail",
] as const;
export type RepeatPolicy = (typeof REPEAT_POLICIES)[number];

export interface OrchestratorConfig {
  /** Delay between two polls of a parked case */
  pollIntervalMs: number;
  /** Polls before a loop gives up and leaves the intervention pending */
  maxPolls: number;
  /** Decisions allowed in a single engine invocation */
  maxSteps: number;
  /** Back-to-back `error` decisions allowed before the run fails */
  maxConsecutiveErrors: number;
  repeatPolicy: RepeatPolicy;
  /** Shortest raw transcript that counts as "provided" */
  minTranscriptLength: number;
  /** How long a run waits for another run of the same case to finish */
  caseLockTimeoutMs: number;
}

export interface ServerConfig {
  llm: LLMConfig;
  orchestrator: OrchestratorConfig;
}

/** Default LLM config when no server.md is found */
export const DEFAULT_LLM_CONFIG: LLMConfig = {
  provider: "anthropic",
  model: "claude-sonnet-4-5-20250929",
  apiKeyEnvVar: "ANTHROPIC_API_KEY",
  temperature: 0,
};

export const DEFAULT_ORCHESTRATOR_CONFIG: OrchestratorConfig = {
  pollIntervalMs: 30_000,
  maxPolls: 120,
  maxSteps: 30,
  maxConsecutiveErrors: 3,
  repeatPolicy: "force_complete",
  minTranscriptLength: 50,
  caseLockTimeoutMs: 120_000,
};
