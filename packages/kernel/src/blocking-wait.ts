// =============================================================================
// CoBridge - Blocking Wait
// =============================================================================

import { SLOT_STATUS } from './constants'
import type { RequestTable } from './request-table'
import type { VirtualClock } from './virtual-clock'
import type { YieldHook } from './yield-hook'
import type { RequestId, WaitOutcome } from './types'

/**
 * Wait for a request to leave Pending.
 *
 * Polls the slot, yields through `hook` between polls, and measures elapsed
 * time on `clock`. Times out once more than `timeoutMs` virtual ms have
 * passed; an undefined timeout, or a clock with its tick disabled, waits
 * without bound.
 *
 * On timeout the slot is left exactly as it was (still Pending). Freeing or
 * retracting it is up to the caller.
 */
export async function blockingWait(
  table: RequestTable,
  hook: YieldHook,
  clock: VirtualClock,
  requestId: RequestId,
  timeoutMs?: number
): Promise<WaitOutcome> {
  const start = clock.nowMs()

  while (true) {
    const status = table.statusOf(requestId)
    if (status === SLOT_STATUS.COMPLETE) return { status: 'complete' }
    if (status === SLOT_STATUS.ERROR) return { status: 'error', code: table.errorCodeOf(requestId) }
    if (status !== SLOT_STATUS.PENDING) return { status: 'invalid' }

    if (timeoutMs !== undefined && clock.isTickEnabled()) {
      const elapsedMs = clock.nowMs() - start
      if (elapsedMs > timeoutMs) return { status: 'timeout', elapsedMs }
    }

    await hook.yield()
  }
}
