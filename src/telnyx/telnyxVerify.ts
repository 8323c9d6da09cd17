import crypto from 'crypto';
import { env } from '../env';
import { log } from '../log';

/** Telnyx tolerates five minutes of clock drift between signer and receiver. */
const MAX_SKEW_SECONDS = 300;
const MILLISECOND_EPOCH_FLOOR = 1_000_000_000_000;

export type TelnyxSignatureScheme = 'ed25519' | 'hmac-sha256';

export interface TelnyxSignatureInput {
  rawBody: Buffer;
  signature: string;
  timestamp: string;
  /** Which header carried the signature; unknown when neither did. */
  scheme?: TelnyxSignatureScheme;
}

export interface TelnyxVerifyOptions {
  skip?: boolean;
  publicKey?: string;
  webhookSecret?: string;
  nowSeconds?: number;
}

export type SignatureFailure = 'missing_signature' | 'bad_timestamp' | 'stale_timestamp' | 'no_verifier' | 'mismatch';

export type TelnyxSignatureCheck =
  | { ok: true; skipped: boolean }
  | { ok: false; skipped: false; failure: SignatureFailure };

type Verifier =
  | { scheme: 'hmac-sha256'; secret: string }
  | { scheme: 'ed25519'; key: crypto.KeyObject };

function decodeBinary(value: string): Buffer {
  return Buffer.from(value, /^[0-9a-f]+$/i.test(value) ? 'hex' : 'base64');
}

function loadPublicKey(material: string): crypto.KeyObject | undefined {
  try {
    if (material.includes('BEGIN PUBLIC KEY')) {
      return crypto.createPublicKey(material);
    }
    return crypto.createPublicKey({ key: decodeBinary(material), format: 'der', type: 'spki' });
  } catch (error) {
    log.error({ err: error, event: 'telnyx_public_key_invalid' }, 'telnyx public key cannot be loaded');
    return undefined;
  }
}

/**
 * Picks the check for a request. An explicit scheme wins; otherwise a
 * configured webhook secret means HMAC and anything else means ed25519.
 */
function resolveVerifier(scheme: TelnyxSignatureScheme | undefined, options: TelnyxVerifyOptions): Verifier | undefined {
  const secret = (options.webhookSecret ?? env.TELNYX_WEBHOOK_SECRET)?.trim();
  const wantsHmac = scheme === 'hmac-sha256' || (scheme === undefined && !!secret);
  if (wantsHmac) {
    return secret ? { scheme: 'hmac-sha256', secret } : undefined;
  }

  const material = (options.publicKey ?? env.TELNYX_PUBLIC_KEY)?.trim();
  const key = material ? loadPublicKey(material) : undefined;
  return key ? { scheme: 'ed25519', key } : undefined;
}

/** Seconds since the epoch, accepting millisecond timestamps too. */
function readTimestamp(raw: string): number | undefined {
  if (!/^\d+$/.test(raw)) {
    return undefined;
  }
  const value = Number(raw);
  return value > MILLISECOND_EPOCH_FLOOR ? Math.floor(value / 1000) : value;
}

function signatureMatches(verifier: Verifier, signedPayload: Buffer, signature: Buffer): boolean {
  switch (verifier.scheme) {
    case 'hmac-sha256': {
      const expected = crypto.createHmac('sha256', verifier.secret).update(signedPayload).digest();
      return expected.length === signature.length && crypto.timingSafeEqual(expected, signature);
    }
    case 'ed25519':
      return crypto.verify(null, signedPayload, verifier.key, signature);
  }
}

/**
 * Checks a Telnyx webhook signature over `<timestamp>.<raw body>`. Failures
 * carry a reason for the request log; they never throw.
 */
export function verifyTelnyxSignature(input: TelnyxSignatureInput, options: TelnyxVerifyOptions = {}): TelnyxSignatureCheck {
  if (options.skip ?? env.TELNYX_SKIP_SIGNATURE) {
    return { ok: true, skipped: true };
  }

  const signature = input.signature.trim();
  const rawTimestamp = input.timestamp.trim();
  if (!signature || !rawTimestamp) {
    return { ok: false, skipped: false, failure: 'missing_signature' };
  }

  const timestamp = readTimestamp(rawTimestamp);
  if (timestamp === undefined) {
    return { ok: false, skipped: false, failure: 'bad_timestamp' };
  }
  const now = options.nowSeconds ?? Math.floor(Date.now() / 1000);
  if (Math.abs(now - timestamp) > MAX_SKEW_SECONDS) {
    return { ok: false, skipped: false, failure: 'stale_timestamp' };
  }

  const verifier = resolveVerifier(input.scheme, options);
  if (!verifier) {
    return { ok: false, skipped: false, failure: 'no_verifier' };
  }

  const signedPayload = Buffer.concat([Buffer.from(`${rawTimestamp}.`, 'utf8'), input.rawBody]);
  let matches: boolean;
  try {
    matches = signatureMatches(verifier, signedPayload, decodeBinary(signature));
  } catch (error) {
    log.debug({ err: error, event: 'telnyx_signature_unreadable', scheme: verifier.scheme }, 'telnyx signature unreadable');
    matches = false;
  }
  return matches ? { ok: true, skipped: false } : { ok: false, skipped: false, failure: 'mismatch' };
}
