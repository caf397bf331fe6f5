import type { IgnorePatternConfig } from '../config/schema.js';

/**
 * Prefix, suffix and substring patterns that exclude buckets from a run
 */
export interface IgnoreRuleSet {
  readonly startsWith: readonly string[];
  readonly endsWith: readonly string[];
  readonly contains: readonly string[];
}

export type IgnoreRuleKind = 'starts_with' | 'ends_with' | 'contains';

export type BucketDecision =
  | { readonly included: true }
  | { readonly included: false; readonly rule: IgnoreRuleKind; readonly pattern: string };

export const EMPTY_IGNORE_RULES: IgnoreRuleSet = Object.freeze({
  startsWith: [],
  endsWith: [],
  contains: [],
});

export function ignoreRulesFromConfig(config: IgnorePatternConfig): IgnoreRuleSet {
  return Object.freeze({
    startsWith: Object.freeze([...config.starts_with]),
    endsWith: Object.freeze([...config.ends_with]),
    contains: Object.freeze([...config.contains]),
  });
}

/**
 * Decide whether a bucket is processed, and which rule excluded it if not
 */
export function evaluateBucket(bucketName: string, rules: IgnoreRuleSet): BucketDecision {
  const checks: [IgnoreRuleKind, readonly string[], (pattern: string) => boolean][] = [
    ['starts_with', rules.startsWith, pattern => bucketName.startsWith(pattern)],
    ['ends_with', rules.endsWith, pattern => bucketName.endsWith(pattern)],
    ['contains', rules.contains, pattern => bucketName.includes(pattern)],
  ];

  for (const [rule, patterns, matches] of checks) {
    const pattern = patterns.find(matches);
    if (pattern !== undefined) {
      return { included: false, rule, pattern };
    }
  }

  return { included: true };
}

export function shouldIncludeBucket(bucketName: string, rules: IgnoreRuleSet): boolean {
  return evaluateBucket(bucketName, rules).included;
}
