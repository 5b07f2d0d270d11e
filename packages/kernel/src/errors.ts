// =============================================================================
// CoBridge - Bridge Errors
// =============================================================================

import type { RequestId } from './types'

export type BridgeErrorKind = 'QueueFull' | 'Timeout' | 'HostError' | 'InvalidHandle' | 'PayloadOverflow'

/**
 * Structured failure of a bridged operation.
 *
 * `hostCode` is the host's raw error code for `HostError`, 0 otherwise.
 * `requestId` is 0 when the failure happened before a slot was allocated.
 */
export class BridgeError extends Error {
  readonly kind: BridgeErrorKind
  readonly hostCode: number
  readonly requestId: RequestId

  constructor(kind: BridgeErrorKind, message: string, options: { hostCode?: number; requestId?: RequestId } = {}) {
    super(`${kind}: ${message}`)
    this.name = 'BridgeError'
    this.kind = kind
    this.hostCode = options.hostCode ?? 0
    this.requestId = options.requestId ?? 0
  }
}

export function isBridgeError(error: unknown, kind?: BridgeErrorKind): error is BridgeError {
  return error instanceof BridgeError && (kind === undefined || error.kind === kind)
}
