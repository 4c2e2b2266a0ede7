/**
 * Raised when a profile cannot be turned into a usable endpoint.
 * Fatal for the affected channel only.
 */
export class ConfigurationError extends Error {
  override readonly name = 'ConfigurationError';
}

export type TransportErrorKind = 'tls' | 'refused' | 'unreachable' | 'timeout' | 'other';

const TLS_CODES = new Set([
  'DEPTH_ZERO_SELF_SIGNED_CERT',
  'SELF_SIGNED_CERT_IN_CHAIN',
  'UNABLE_TO_VERIFY_LEAF_SIGNATURE',
  'UNABLE_TO_GET_ISSUER_CERT_LOCALLY',
  'CERT_HAS_EXPIRED',
  'CERT_NOT_YET_VALID',
  'ERR_TLS_CERT_ALTNAME_INVALID',
]);

const UNREACHABLE_CODES = new Set(['ENOTFOUND', 'EHOSTUNREACH', 'ENETUNREACH', 'EAI_AGAIN', 'ENETDOWN']);
const TIMEOUT_CODES = new Set(['ETIMEDOUT', 'ESOCKETTIMEDOUT', 'ETIMEOUT']);

function errorCode(error: unknown) {
  if (typeof error !== 'object' || error === null || !('code' in error)) return null;
  const { code } = error;
  return typeof code === 'string' ? code : null;
}

/**
 * Classify a transport failure for logging. Every kind is retried the same way.
 */
export function classifyTransportError(error: unknown): TransportErrorKind {
  const code = errorCode(error);
  if (code !== null) {
    if (TLS_CODES.has(code) || code.startsWith('ERR_SSL_') || code.startsWith('ERR_TLS_')) return 'tls';
    if (code === 'ECONNREFUSED' || code === 'ECONNRESET') return 'refused';
    if (UNREACHABLE_CODES.has(code)) return 'unreachable';
    if (TIMEOUT_CODES.has(code)) return 'timeout';
  }

  const message = error instanceof Error ? error.message : String(error);
  if (/timed? ?out/i.test(message)) return 'timeout';
  return 'other';
}

export function describeError(error: unknown) {
  return error instanceof Error ? error.message : String(error);
}
