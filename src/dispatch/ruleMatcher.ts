import type {
  AcceptRule,
  DispatchOutcome,
  DispatchRequest,
  DispatchRule,
  RoomTemplateField,
  RuleSet,
} from './types';
import { isRoomTemplateField } from './types';

const PLACEHOLDER = /\{([A-Za-z]+)\}/g;
const patternCache = new Map<string, RegExp>();

function escapeRegex(value: string): string {
  return value.replace(/[.+?^${}()|[\]\\]/g, '\\$&');
}

export function compilePattern(pattern: string): RegExp {
  const cached = patternCache.get(pattern);
  if (cached) {
    return cached;
  }

  const source = pattern.split('*').map(escapeRegex).join('.*');
  const compiled = new RegExp(`^${source}$`);
  patternCache.set(pattern, compiled);
  return compiled;
}

export function matchesPattern(pattern: string, value: string): boolean {
  if (!pattern.includes('*')) {
    return pattern === value;
  }
  return compilePattern(pattern).test(value);
}

function matchesAny(patterns: readonly string[], value: string): boolean {
  if (patterns.length === 0) {
    return true;
  }
  return patterns.some((pattern) => matchesPattern(pattern, value));
}

export function ruleMatches(rule: DispatchRule, request: DispatchRequest): boolean {
  const { trunkIds, callers, callees } = rule.match;
  if (trunkIds.length > 0 && !trunkIds.includes(request.trunkId)) {
    return false;
  }
  return matchesAny(callers, request.callerId) && matchesAny(callees, request.calleeId);
}

export function renderRoomName(rule: AcceptRule, request: DispatchRequest): string {
  const values: Record<RoomTemplateField, string> = {
    callId: request.callId,
    trunkId: request.trunkId,
    callerId: request.callerId,
    calleeId: request.calleeId,
    ruleId: rule.id,
  };

  return rule.roomTemplate.replace(PLACEHOLDER, (whole, field: string) =>
    isRoomTemplateField(field) ? values[field] : whole,
  );
}

function isBlank(value: string | undefined): boolean {
  return typeof value !== 'string' || value.trim() === '';
}

/**
 * Evaluates the rule set front to back and returns the outcome of the first
 * rule whose predicate holds. A request with a blank identifier is rejected
 * before any rule is consulted.
 */
export function matchCall(ruleSet: RuleSet, request: DispatchRequest): DispatchOutcome {
  if (
    isBlank(request.callId) ||
    isBlank(request.trunkId) ||
    isBlank(request.callerId) ||
    isBlank(request.calleeId)
  ) {
    return { action: 'REJECT', reason: 'MALFORMED_REQUEST', rejectCode: 'MALFORMED_REQUEST', rule: null };
  }

  for (const rule of ruleSet.rules) {
    if (!ruleMatches(rule, request)) {
      continue;
    }

    if (rule.action === 'REJECT') {
      return { action: 'REJECT', reason: 'RULE_REJECTED', rejectCode: rule.rejectCode, rule };
    }

    const profile = ruleSet.profiles.get(rule.agentProfile);
    if (!profile) {
      // The loader refuses rule sets with dangling profile references.
      continue;
    }

    return {
      action: 'ACCEPT',
      rule,
      profile,
      roomName: renderRoomName(rule, request),
    };
  }

  return { action: 'REJECT', reason: 'NO_MATCHING_RULE', rejectCode: 'NO_MATCHING_RULE', rule: null };
}

export class RuleMatcher {
  private ruleSet: RuleSet;

  constructor(ruleSet: RuleSet) {
    this.ruleSet = ruleSet;
  }

  public match(request: DispatchRequest): DispatchOutcome {
    return matchCall(this.ruleSet, request);
  }

  public replace(ruleSet: RuleSet): void {
    this.ruleSet = ruleSet;
  }

  public current(): RuleSet {
    return this.ruleSet;
  }
}
