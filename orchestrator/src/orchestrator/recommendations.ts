import { readFileSync } from "node:fs";
import { z } from "zod";

import { RuleSetError } from "./errors.js";
import type { ThemeAggregate } from "./types.js";

const TemplateSchema = z.object({
  action: z.string().min(1),
  rationale: z.string().min(1),
  tactics: z.array(z.string().min(1)).default([]),
});

const RuleSchema = TemplateSchema.extend({
  id: z.string().min(1),
  pattern: z.string().min(1),
  flags: z
    .string()
    .regex(/^[imsu]*$/, "flags may only contain i, m, s and u")
    .optional(),
  appliesTo: z.enum(["escalated", "negative", "positive", "any"]),
});

const RuleSetSchema = z.object({
  version: z.string().min(1),
  rules: z.array(RuleSchema),
  fallback: TemplateSchema.optional(),
});

export type RecommendationTemplate = z.infer<typeof TemplateSchema>;
export type RuleScope = z.infer<typeof RuleSchema>["appliesTo"];

export interface RecommendationRule extends RecommendationTemplate {
  id: string;
  appliesTo: RuleScope;
  matcher: RegExp;
}

export interface RecommendationRuleSet {
  version: string;
  rules: RecommendationRule[];
  fallback?: RecommendationTemplate;
}

export function parseRecommendationRules(raw: unknown): RecommendationRuleSet {
  const parsed = RuleSetSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new RuleSetError(
      `Invalid recommendation rules: ${issue ? `${issue.path.join(".")} ${issue.message}` : "unknown issue"}`,
    );
  }

  const seen = new Set<string>();
  const rules = parsed.data.rules.map(({ pattern, flags, ...rule }) => {
    if (seen.has(rule.id)) {
      throw new RuleSetError(`Duplicate recommendation rule id: ${rule.id}`);
    }
    seen.add(rule.id);
    try {
      return { ...rule, matcher: new RegExp(pattern, flags ?? "i") };
    } catch (error) {
      throw new RuleSetError(
        `Rule ${rule.id} has an invalid pattern: ${error instanceof Error ? error.message : String(error)}`,
      );
    }
  });

  return { version: parsed.data.version, rules, fallback: parsed.data.fallback };
}

export function loadRecommendationRules(path: string): RecommendationRuleSet {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf8"));
  } catch (error) {
    throw new RuleSetError(
      `Unable to read recommendation rules from ${path}: ${error instanceof Error ? error.message : String(error)}`,
    );
  }
  return parseRecommendationRules(raw);
}

export type TemplateVariables = Record<string, string | number>;

/** Replaces `{name}` placeholders; unknown names are left as written. */
export function renderTemplate(template: string, variables: TemplateVariables): string {
  return template.replace(/\{(\w+)\}/g, (placeholder, name: string) => {
    const value = variables[name];
    return value === undefined ? placeholder : String(value);
  });
}

function inScope(rule: RecommendationRule, aggregate: ThemeAggregate): boolean {
  switch (rule.appliesTo) {
    case "escalated":
      return aggregate.escalated;
    case "negative":
      return aggregate.counts.negative > aggregate.counts.positive;
    case "positive":
      return aggregate.counts.positive > aggregate.counts.negative;
    case "any":
      return true;
  }
}

/** First rule in file order whose scope holds and whose pattern matches the label or keywords. */
export function matchRule(ruleSet: RecommendationRuleSet, aggregate: ThemeAggregate): RecommendationRule | undefined {
  const haystack = [aggregate.theme.label, ...aggregate.theme.keywords].join(" ");
  return ruleSet.rules.find((rule) => inScope(rule, aggregate) && rule.matcher.test(haystack));
}
