export type RuleAction = 'ACCEPT' | 'REJECT';

export interface AgentProfile {
  name: string;
  agentName: string;
  metadata?: Record<string, unknown>;
}

export interface DispatchRuleMatch {
  trunkIds: readonly string[];
  callers: readonly string[];
  callees: readonly string[];
}

interface DispatchRuleBase {
  id: string;
  match: DispatchRuleMatch;
}

export interface AcceptRule extends DispatchRuleBase {
  action: 'ACCEPT';
  roomTemplate: string;
  agentProfile: string;
  roomMetadata?: Record<string, string>;
}

export interface RejectRule extends DispatchRuleBase {
  action: 'REJECT';
  rejectCode: string;
}

export type DispatchRule = AcceptRule | RejectRule;

export interface RuleSet {
  readonly rules: readonly DispatchRule[];
  readonly profiles: ReadonlyMap<string, AgentProfile>;
  readonly source: string;
  readonly loadedAt: Date;
}

export interface DispatchRequest {
  callId: string;
  trunkId: string;
  callerId: string;
  calleeId: string;
}

export type RejectReason = 'MALFORMED_REQUEST' | 'NO_MATCHING_RULE' | 'RULE_REJECTED';

export type DispatchOutcome =
  | {
      action: 'ACCEPT';
      rule: AcceptRule;
      profile: AgentProfile;
      roomName: string;
    }
  | {
      action: 'REJECT';
      reason: RejectReason;
      rejectCode: string;
      rule: RejectRule | null;
    };

export const ROOM_TEMPLATE_FIELDS = ['callId', 'trunkId', 'callerId', 'calleeId', 'ruleId'] as const;
export type RoomTemplateField = (typeof ROOM_TEMPLATE_FIELDS)[number];

export function isRoomTemplateField(field: string): field is RoomTemplateField {
  return ROOM_TEMPLATE_FIELDS.some((known) => known === field);
}
