import { z } from "zod";
import { MalformedConfigError } from "./errors";

export const ENGINE_CONFIG_DEFAULTS = {
  mode: "hybrid",
  tier0MaxChars: 100,
  tier1MaxChars: 500,
  minConfidenceThreshold: 0.6,
  tokensPerByte: 0.25,
  costPerToken: 0.000001,
  historyCapacity: 50,
  flushEveryQueries: 10,
  classifierEnabled: true,
  tier1Labels: {
    keyPoints: "关键点:",
    sections: "章节:",
    paragraphs: "主要内容:"
  }
} as const;

export const engineConfigSchema = z.object({
  mode: z.enum(["traditional", "tiered-only", "hybrid"]).default(ENGINE_CONFIG_DEFAULTS.mode),
  tier0MaxChars: z.number().int().positive().default(ENGINE_CONFIG_DEFAULTS.tier0MaxChars),
  tier1MaxChars: z.number().int().positive().default(ENGINE_CONFIG_DEFAULTS.tier1MaxChars),
  minConfidenceThreshold: z.number().min(0).max(1).default(ENGINE_CONFIG_DEFAULTS.minConfidenceThreshold),
  tokensPerByte: z.number().positive().default(ENGINE_CONFIG_DEFAULTS.tokensPerByte),
  costPerToken: z.number().nonnegative().default(ENGINE_CONFIG_DEFAULTS.costPerToken),
  historyCapacity: z.number().int().positive().default(ENGINE_CONFIG_DEFAULTS.historyCapacity),
  flushEveryQueries: z.number().int().positive().default(ENGINE_CONFIG_DEFAULTS.flushEveryQueries),
  classifierEnabled: z.boolean().default(ENGINE_CONFIG_DEFAULTS.classifierEnabled),
  tier1Labels: z
    .object({
      keyPoints: z.string().default(ENGINE_CONFIG_DEFAULTS.tier1Labels.keyPoints),
      sections: z.string().default(ENGINE_CONFIG_DEFAULTS.tier1Labels.sections),
      paragraphs: z.string().default(ENGINE_CONFIG_DEFAULTS.tier1Labels.paragraphs)
    })
    .default({})
});

export type EngineConfig = z.infer<typeof engineConfigSchema>;

export type EngineConfigInput = z.input<typeof engineConfigSchema>;

export function formatZodIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`);
}

/**
 * Validates a partial config and fills in defaults. Throws MalformedConfigError
 * listing every invalid field; nothing is silently replaced.
 */
export function parseEngineConfig(input: unknown = {}): EngineConfig {
  const parsed = engineConfigSchema.safeParse(input ?? {});
  if (!parsed.success) {
    throw new MalformedConfigError("Invalid engine config", formatZodIssues(parsed.error));
  }
  return parsed.data;
}

const ENV_NUMBER_FIELDS = {
  TIERWISE_TIER0_MAX_CHARS: "tier0MaxChars",
  TIERWISE_TIER1_MAX_CHARS: "tier1MaxChars",
  TIERWISE_MIN_CONFIDENCE: "minConfidenceThreshold",
  TIERWISE_TOKENS_PER_BYTE: "tokensPerByte",
  TIERWISE_COST_PER_TOKEN: "costPerToken",
  TIERWISE_HISTORY_CAPACITY: "historyCapacity",
  TIERWISE_FLUSH_EVERY_QUERIES: "flushEveryQueries"
} as const;

export function loadEngineConfigFromEnv(
  env: Record<string, string | undefined> = process.env,
  base: Record<string, unknown> = {}
): EngineConfig {
  const raw: Record<string, unknown> = { ...base };

  if (env.TIERWISE_MODE) {
    raw.mode = env.TIERWISE_MODE;
  }

  for (const [envName, field] of Object.entries(ENV_NUMBER_FIELDS)) {
    const value = env[envName];
    if (value !== undefined && value.trim().length > 0) {
      raw[field] = Number(value);
    }
  }

  if (env.TIERWISE_CLASSIFIER_ENABLED) {
    raw.classifierEnabled = env.TIERWISE_CLASSIFIER_ENABLED !== "false";
  }

  return parseEngineConfig(raw);
}
