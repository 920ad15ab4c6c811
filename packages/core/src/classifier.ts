import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { resolve } from "node:path";
import { z } from "zod";
import { formatZodIssues } from "./config";
import { MalformedConfigError } from "./errors";
import type { ClassificationResult, QueryType } from "./types";

export const QUERY_TYPES = [
  "factual_date",
  "administrative",
  "analytical",
  "creative",
  "factual_list",
  "factual",
  "general"
] as const satisfies readonly QueryType[];

const queryTypeSchema = z.enum(QUERY_TYPES);

export const classifierRuleSetSchema = z
  .object({
    version: z.number().int().positive(),
    defaultType: queryTypeSchema,
    defaultConfidence: z.number().min(0).max(1),
    questionBonus: z.object({
      type: queryTypeSchema,
      weight: z.number().nonnegative(),
      markers: z.array(z.string().min(1))
    }),
    rules: z
      .array(
        z.object({
          type: queryTypeSchema,
          keywords: z.array(z.string().min(1))
        })
      )
      .min(1)
  })
  .superRefine((ruleSet, ctx) => {
    const seen = new Set<QueryType>();
    ruleSet.rules.forEach((rule, index) => {
      if (seen.has(rule.type)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["rules", index, "type"],
          message: `duplicate query type ${rule.type}`
        });
      }
      seen.add(rule.type);
    });

    if (!seen.has(ruleSet.questionBonus.type)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["questionBonus", "type"],
        message: `question bonus type ${ruleSet.questionBonus.type} has no rule`
      });
    }
  });

export type ClassifierRuleSet = z.infer<typeof classifierRuleSetSchema>;

export function parseClassifierRules(input: unknown): ClassifierRuleSet {
  const parsed = classifierRuleSetSchema.safeParse(input);
  if (!parsed.success) {
    throw new MalformedConfigError("Invalid classifier rule set", formatZodIssues(parsed.error));
  }
  return parsed.data;
}

export function defaultClassifierRulesPath(): string {
  return resolve(fileURLToPath(new URL("../rules/classifier-rules.json", import.meta.url)));
}

export function loadClassifierRules(filePath: string = defaultClassifierRulesPath()): ClassifierRuleSet {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(filePath, "utf8"));
  } catch (error) {
    throw new MalformedConfigError(`Unable to read classifier rules at ${filePath}`, [
      error instanceof Error ? error.message : String(error)
    ]);
  }
  return parseClassifierRules(raw);
}

let defaultRules: ClassifierRuleSet | null = null;

export function getDefaultClassifierRules(): ClassifierRuleSet {
  if (!defaultRules) {
    defaultRules = loadClassifierRules();
  }
  return defaultRules;
}

/**
 * Keyword routing heuristic. Scores each query type by case-insensitive substring
 * hits; ties go to the type declared first in the rule set.
 */
export function classify(query: string, rules: ClassifierRuleSet = getDefaultClassifierRules()): ClassificationResult {
  const lowerQuery = query.toLowerCase();
  const scores: Partial<Record<QueryType, number>> = {};

  for (const rule of rules.rules) {
    let score = 0;
    for (const keyword of rule.keywords) {
      if (lowerQuery.includes(keyword.toLowerCase())) {
        score += 1;
      }
    }

    const bonus = rules.questionBonus;
    if (rule.type === bonus.type && bonus.markers.some((marker) => query.includes(marker))) {
      score += bonus.weight;
    }

    if (score > 0) {
      scores[rule.type] = score;
    }
  }

  let primaryType: QueryType | null = null;
  let best = 0;
  let total = 0;
  for (const rule of rules.rules) {
    const score = scores[rule.type] ?? 0;
    total += score;
    if (score > best) {
      best = score;
      primaryType = rule.type;
    }
  }

  if (!primaryType || total <= 0) {
    return {
      primaryType: rules.defaultType,
      confidence: rules.defaultConfidence,
      scores: {}
    };
  }

  return {
    primaryType,
    confidence: best / total,
    scores
  };
}
