/**
 * Error taxonomy for the peer RPC client.
 *
 * Transport errors (launch, handshake, protocol, timeout) are returned as
 * failure values by the supervisor and correlation layer; they are only
 * thrown inside the framer, where the correlation layer catches them.
 */

export type PeerErrorCode =
  | 'LAUNCH'
  | 'HANDSHAKE'
  | 'PROTOCOL'
  | 'TIMEOUT'
  | 'REMOTE'
  | 'CANCELLED';

export abstract class PeerError extends Error {
  abstract readonly code: PeerErrorCode;
}

/** Child could not be spawned, or died before the handshake completed */
export class LaunchError extends PeerError {
  readonly code = 'LAUNCH';
  override readonly name = 'LaunchError';
}

/** `initialize` was rejected or answered with something unusable */
export class HandshakeError extends PeerError {
  readonly code = 'HANDSHAKE';
  override readonly name = 'HandshakeError';
}

/** A line on the wire could not be read as a JSON-RPC envelope, or the pipe closed */
export class ProtocolError extends PeerError {
  readonly code = 'PROTOCOL';
  override readonly name = 'ProtocolError';

  constructor(message: string, readonly line?: string) {
    super(message);
  }
}

export class TimeoutError extends PeerError {
  readonly code = 'TIMEOUT';
  override readonly name = 'TimeoutError';

  constructor(message: string, readonly timeoutMs: number) {
    super(message);
  }
}

/** The peer answered with a JSON-RPC `error` member */
export class RemoteError extends PeerError {
  readonly code = 'REMOTE';
  override readonly name = 'RemoteError';

  constructor(message: string, readonly rpcCode?: number, readonly data?: unknown) {
    super(message);
  }
}

/** Session aborted on request: a controlled termination, not a fault */
export class CancellationError extends PeerError {
  readonly code = 'CANCELLED';
  override readonly name = 'CancellationError';
}

/** Best-effort message extraction from a JSON-RPC error member or tool error field */
export function describeRpcError(error: unknown): string {
  if (typeof error === 'string') return error;
  if (error && typeof error === 'object') {
    if ('message' in error && typeof error.message === 'string') return error.message;
    return JSON.stringify(error);
  }
  return String(error);
}

export function toRemoteError(error: unknown): RemoteError {
  const rpcCode = error && typeof error === 'object' && 'code' in error && typeof error.code === 'number'
    ? error.code
    : undefined;
  const data = error && typeof error === 'object' && 'data' in error ? error.data : undefined;
  return new RemoteError(describeRpcError(error), rpcCode, data);
}
