export const SESSION_ERROR_CODES = [
  'MALFORMED_REQUEST',
  'DUPLICATE_CALL',
  'ROOM_CONFLICT',
  'INVALID_TRANSITION',
  'NOT_FOUND',
  'AGENT_ALREADY_ASSIGNED',
  'INVALID_RULES',
] as const;

export type SessionErrorCode = (typeof SESSION_ERROR_CODES)[number];

export class SessionError extends Error {
  public readonly code: SessionErrorCode;
  public readonly details: Record<string, unknown>;

  constructor(code: SessionErrorCode, message: string, details: Record<string, unknown> = {}) {
    super(message);
    this.name = 'SessionError';
    this.code = code;
    this.details = details;
  }
}

export function isSessionError(error: unknown, code?: SessionErrorCode): error is SessionError {
  return error instanceof SessionError && (code === undefined || error.code === code);
}
