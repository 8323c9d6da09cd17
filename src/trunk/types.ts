import type { CallId } from '../calls/types';

/** Commands the core issues to the SIP trunk. */
export interface TrunkControl {
  answer(callId: CallId): Promise<void>;
  reject(callId: CallId, reasonCode: string): Promise<void>;
  hangup(callId: CallId, reasonCode: string): Promise<void>;
}
