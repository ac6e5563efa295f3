/**
 * Role Classifier
 *
 * Assigns exactly one role to a block by folding over an ordered rule
 * list: the first rule with a matching trigger wins. Rules are data
 * (role-rules.json), compiled once at module load.
 */

import { z } from "zod/v4";
import { roleSchema, type Block, type Role, type TaggedBlock } from "../core/schemas";
import rawRules from "./role-rules.json";

const roleRuleSchema = z.object({
  id: z.string().min(1),
  role: roleSchema,
  keywords: z.array(z.string().min(1)),
  patterns: z
    .array(z.object({ name: z.string().min(1), regex: z.string().min(1) }))
    .default([]),
});

export const roleRulesSchema = z.object({
  rules: z.array(roleRuleSchema),
});

export type RoleRule = z.infer<typeof roleRuleSchema>;

export interface RoleMatch {
  role: Role;
  /** "<rule-id>:<trigger>", or "none" for the fallback */
  matchedRule: string;
  confidence: number;
}

interface Trigger {
  label: string;
  regex: RegExp;
}

export interface CompiledRule {
  id: string;
  role: Role;
  triggers: Trigger[];
}

export const FALLBACK: RoleMatch = { role: "GENERAL", matchedRule: "none", confidence: 0.3 };

/**
 * Compile rules into case-insensitive triggers, keywords first (in list
 * order) then named patterns. Keywords match as substrings.
 */
export function compileRoleRules(rules: readonly RoleRule[]): CompiledRule[] {
  return rules.map((rule) => ({
    id: rule.id,
    role: rule.role,
    triggers: [
      ...rule.keywords.map((keyword) => ({ label: keyword, regex: keywordRegex(keyword) })),
      ...rule.patterns.map((p) => ({ label: p.name, regex: new RegExp(p.regex, "iu") })),
    ],
  }));
}

const DEFAULT_RULES = compileRoleRules(roleRulesSchema.parse(rawRules).rules);

/**
 * Classify a block's text. Pure and deterministic.
 */
export function classifyRole(
  text: string,
  rules: readonly CompiledRule[] = DEFAULT_RULES
): RoleMatch {
  for (const rule of rules) {
    const trigger = rule.triggers.find((t) => t.regex.test(text));
    if (trigger) {
      return {
        role: rule.role,
        matchedRule: `${rule.id}:${trigger.label}`,
        confidence: confidenceFor(trigger.label),
      };
    }
  }
  return FALLBACK;
}

export function tagBlock(
  block: Block,
  rules: readonly CompiledRule[] = DEFAULT_RULES
): TaggedBlock {
  const match = classifyRole(block.text, rules);
  return {
    ...block,
    role: match.role,
    matched_rule: match.matchedRule,
    confidence: match.confidence,
  };
}

function confidenceFor(trigger: string): number {
  return Math.round(Math.min(0.9, 0.6 + trigger.length * 0.02) * 100) / 100;
}

function keywordRegex(keyword: string): RegExp {
  // Plain case-insensitive substring: "order" also fires on "reorder"
  const body = keyword
    .trim()
    .replace(/[.*+?^${}()|[\]\\]/g, "\\$&")
    .replace(/\s+/g, String.raw`\s+`);
  return new RegExp(body, "iu");
}
