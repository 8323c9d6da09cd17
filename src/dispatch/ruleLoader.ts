import { readFile } from 'fs/promises';
import { z } from 'zod';
import { log } from '../log';
import { isRoomTemplateField, type AgentProfile, type DispatchRule, type RuleSet } from './types';

const PLACEHOLDER = /\{([A-Za-z]+)\}/g;
const ROOM_NAME_CHARS = /^[A-Za-z0-9_\-.+:{}]+$/;

export class RuleSetError extends Error {
  public readonly source: string;
  public readonly ruleIndex?: number;
  public readonly ruleId?: string;

  constructor(message: string, context: { source: string; ruleIndex?: number; ruleId?: string }) {
    super(message);
    this.name = 'RuleSetError';
    this.source = context.source;
    this.ruleIndex = context.ruleIndex;
    this.ruleId = context.ruleId;
  }
}

const patternList = z.array(z.string().trim().min(1)).default([]);

const MatchSchema = z
  .object({
    trunkIds: patternList,
    callers: patternList,
    callees: patternList,
  })
  .strict()
  .default({});

const RoomTemplateSchema = z
  .string()
  .min(1)
  .regex(ROOM_NAME_CHARS, 'room template may only contain letters, digits and _-.+:')
  .superRefine((template, ctx) => {
    const fields = Array.from(template.matchAll(PLACEHOLDER), (match) => match[1]);
    for (const field of fields) {
      if (!isRoomTemplateField(field)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `unknown placeholder {${field}}`,
        });
      }
    }
    if (!fields.includes('callId')) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'room template must contain {callId}',
      });
    }
  });

const AcceptRuleSchema = z
  .object({
    id: z.string().trim().min(1),
    action: z.literal('ACCEPT'),
    match: MatchSchema,
    roomTemplate: RoomTemplateSchema,
    agentProfile: z.string().trim().min(1),
    roomMetadata: z.record(z.string()).optional(),
  })
  .strict();

const RejectRuleSchema = z
  .object({
    id: z.string().trim().min(1),
    action: z.literal('REJECT'),
    match: MatchSchema,
    rejectCode: z
      .string()
      .trim()
      .regex(/^[A-Z][A-Z0-9_]*$/, 'reject code must be UPPER_SNAKE_CASE')
      .default('RULE_REJECTED'),
  })
  .strict();

const RuleSchema = z.discriminatedUnion('action', [AcceptRuleSchema, RejectRuleSchema]);

const ProfileSchema = z
  .object({
    name: z.string().trim().min(1),
    agentName: z.string().trim().min(1),
    metadata: z.record(z.unknown()).optional(),
  })
  .strict();

const RuleFileSchema = z
  .object({
    agentProfiles: z.array(z.unknown()).min(1, 'at least one agent profile is required'),
    rules: z.array(z.unknown()).min(1, 'at least one rule is required'),
  })
  .passthrough();

function describeIssues(issues: z.ZodIssue[]): string {
  return issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

function readRuleId(raw: unknown): string | undefined {
  if (raw && typeof raw === 'object' && 'id' in raw && typeof raw.id === 'string' && raw.id.trim() !== '') {
    return raw.id.trim();
  }
  return undefined;
}

function ruleLabel(index: number, id?: string): string {
  return id ? `rule[${index}] (id "${id}")` : `rule[${index}]`;
}

function freezeRule(rule: DispatchRule): DispatchRule {
  Object.freeze(rule.match.trunkIds);
  Object.freeze(rule.match.callers);
  Object.freeze(rule.match.callees);
  Object.freeze(rule.match);
  if (rule.action === 'ACCEPT' && rule.roomMetadata) {
    Object.freeze(rule.roomMetadata);
  }
  return Object.freeze(rule);
}

/**
 * Validates a parsed rule document. Rule order in the document is the
 * evaluation priority. Throws RuleSetError naming the first offending rule.
 */
export function parseRuleSet(raw: unknown, source = 'inline'): RuleSet {
  const file = RuleFileSchema.safeParse(raw);
  if (!file.success) {
    throw new RuleSetError(`invalid rule file ${source}: ${describeIssues(file.error.issues)}`, { source });
  }

  const profiles = new Map<string, AgentProfile>();
  file.data.agentProfiles.forEach((entry, index) => {
    const parsed = ProfileSchema.safeParse(entry);
    if (!parsed.success) {
      throw new RuleSetError(
        `invalid agent profile[${index}] in ${source}: ${describeIssues(parsed.error.issues)}`,
        { source },
      );
    }
    if (profiles.has(parsed.data.name)) {
      throw new RuleSetError(`duplicate agent profile "${parsed.data.name}" in ${source}`, { source });
    }
    profiles.set(parsed.data.name, Object.freeze(parsed.data));
  });

  const seenIds = new Set<string>();
  const rules = file.data.rules.map((entry, index): DispatchRule => {
    const rawId = readRuleId(entry);
    const parsed = RuleSchema.safeParse(entry);
    if (!parsed.success) {
      throw new RuleSetError(
        `invalid ${ruleLabel(index, rawId)} in ${source}: ${describeIssues(parsed.error.issues)}`,
        { source, ruleIndex: index, ruleId: rawId },
      );
    }

    const rule = parsed.data;
    if (seenIds.has(rule.id)) {
      throw new RuleSetError(`invalid ${ruleLabel(index, rule.id)} in ${source}: duplicate rule id`, {
        source,
        ruleIndex: index,
        ruleId: rule.id,
      });
    }
    seenIds.add(rule.id);

    if (rule.action === 'ACCEPT' && !profiles.has(rule.agentProfile)) {
      throw new RuleSetError(
        `invalid ${ruleLabel(index, rule.id)} in ${source}: unknown agent profile "${rule.agentProfile}"`,
        { source, ruleIndex: index, ruleId: rule.id },
      );
    }

    return freezeRule(rule);
  });

  return Object.freeze({
    rules: Object.freeze(rules),
    profiles,
    source,
    loadedAt: new Date(),
  });
}

export async function loadRuleSet(path: string): Promise<RuleSet> {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (error) {
    throw new RuleSetError(`cannot read rule file ${path}: ${String(error)}`, { source: path });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new RuleSetError(`rule file ${path} is not valid JSON: ${String(error)}`, { source: path });
  }

  const ruleSet = parseRuleSet(raw, path);
  log.info(
    {
      event: 'dispatch_rules_loaded',
      source: path,
      rules: ruleSet.rules.length,
      profiles: ruleSet.profiles.size,
    },
    'dispatch rules loaded',
  );
  return ruleSet;
}
