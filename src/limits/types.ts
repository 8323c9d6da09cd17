export type CapacityFailureReason = 'global_at_capacity' | 'trunk_at_capacity' | 'trunk_rate_limited';

export type CapacityResult = { ok: true } | { ok: false; reason: CapacityFailureReason };

export interface CapacityRequest {
  trunkId: string;
  callId: string;
  requestId?: string;
}

export interface CapacityGuard {
  tryAcquire(request: CapacityRequest): Promise<CapacityResult>;
  release(request: CapacityRequest): Promise<void>;
}
