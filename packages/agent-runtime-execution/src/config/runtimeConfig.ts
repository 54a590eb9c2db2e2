/**
 * Runtime Configuration
 *
 * Engine settings read from TASKLANE_* environment variables, merged with
 * programmatic overrides and validated as a whole.
 */

import { ConfigError } from "@tasklane/agent-runtime-core";
import { z } from "zod";

export const TOOL_EXECUTION_STRATEGIES = ["sequential", "parallel"] as const;
export const XML_ADDING_STRATEGIES = ["user_message", "assistant_message"] as const;

export type ToolExecutionStrategy = (typeof TOOL_EXECUTION_STRATEGIES)[number];
export type XmlAddingStrategy = (typeof XML_ADDING_STRATEGIES)[number];

export const runtimeConfigSchema = z
  .object({
    maxIterations: z.number().int().positive().default(100),
    iterationDelayMs: z.number().int().nonnegative().default(500),
    maxContextTokens: z.number().int().positive().default(8000),
    charsPerToken: z.number().int().positive().default(4),
    toolExecutionStrategy: z.enum(TOOL_EXECUTION_STRATEGIES).default("sequential"),
    xmlAddingStrategy: z.enum(XML_ADDING_STRATEGIES).default("assistant_message"),
    xmlToolCalling: z.boolean().default(true),
    nativeToolCalling: z.boolean().default(true),
    /** 0 means no limit */
    maxXmlToolCalls: z.number().int().nonnegative().default(0),
    responseListTtlSeconds: z.number().int().positive().default(86400),
    todoFilePath: z.string().min(1).default("/workspace/todo.md"),
    modelName: z.string().min(1).default("default"),
    temperature: z.number().min(0).max(2).default(0),
    /** Character bound of user and assistant lines in a summary */
    summaryLineChars: z.number().int().positive().default(100),
    /** Character bound of tool result lines in a summary */
    toolSummaryLineChars: z.number().int().positive().default(50),
  })
  .strict();

export type RuntimeConfig = z.infer<typeof runtimeConfigSchema>;
export type RuntimeConfigOverrides = z.input<typeof runtimeConfigSchema>;

export const ENV_KEYS = {
  maxIterations: "TASKLANE_MAX_ITERATIONS",
  iterationDelayMs: "TASKLANE_ITERATION_DELAY_MS",
  maxContextTokens: "TASKLANE_MAX_CONTEXT_TOKENS",
  charsPerToken: "TASKLANE_CHARS_PER_TOKEN",
  toolExecutionStrategy: "TASKLANE_TOOL_EXECUTION_STRATEGY",
  xmlAddingStrategy: "TASKLANE_XML_ADDING_STRATEGY",
  maxXmlToolCalls: "TASKLANE_MAX_XML_TOOL_CALLS",
  responseListTtlSeconds: "TASKLANE_RESPONSE_TTL_SECONDS",
  todoFilePath: "TASKLANE_TODO_PATH",
  modelName: "TASKLANE_MODEL",
  temperature: "TASKLANE_TEMPERATURE",
} as const;

type EnvBackedKey = keyof typeof ENV_KEYS;

const envSchema = z.object({
  maxIterations: z.coerce.number().optional(),
  iterationDelayMs: z.coerce.number().optional(),
  maxContextTokens: z.coerce.number().optional(),
  charsPerToken: z.coerce.number().optional(),
  toolExecutionStrategy: z.string().optional(),
  xmlAddingStrategy: z.string().optional(),
  maxXmlToolCalls: z.coerce.number().optional(),
  responseListTtlSeconds: z.coerce.number().optional(),
  todoFilePath: z.string().optional(),
  modelName: z.string().optional(),
  temperature: z.coerce.number().optional(),
});

function isEnvBackedKey(key: string): key is EnvBackedKey {
  return Object.hasOwn(ENV_KEYS, key);
}

function describeIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const [field] = issue.path;
    const key = typeof field === "string" && isEnvBackedKey(field) ? ENV_KEYS[field] : field;
    return key === undefined ? issue.message : `${String(key)}: ${issue.message}`;
  });
}

function readEnv(env: NodeJS.ProcessEnv): Record<string, string> {
  const raw: Record<string, string> = {};
  for (const [field, variable] of Object.entries(ENV_KEYS)) {
    const value = env[variable];
    if (value !== undefined && value.trim() !== "") {
      raw[field] = value.trim();
    }
  }
  return raw;
}

/**
 * Resolve the runtime configuration. Overrides win over the environment;
 * anything unset takes its default.
 *
 * @throws ConfigError listing every offending setting
 */
export function loadRuntimeConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: RuntimeConfigOverrides = {}
): RuntimeConfig {
  const fromEnv = envSchema.safeParse(readEnv(env));
  if (!fromEnv.success) {
    throw new ConfigError(describeIssues(fromEnv.error));
  }

  const parsed = runtimeConfigSchema.safeParse({ ...fromEnv.data, ...overrides });
  if (!parsed.success) {
    const issues = describeIssues(parsed.error);
    throw new ConfigError(issues);
  }
  return parsed.data;
}
