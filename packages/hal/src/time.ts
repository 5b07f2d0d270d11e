// =============================================================================
// CoBridge - Time
// =============================================================================

import { OP } from '@cobridge/kernel'
import type { HardwareBridge } from '@cobridge/kernel'
import { unexpectedResponse } from './peripheral'

/**
 * Suspend the caller for `ms` virtual milliseconds. Never times out.
 */
export async function sleep(bridge: HardwareBridge, ms: number): Promise<void> {
  if (!(ms >= 0)) throw new RangeError('sleep length must be non-negative')
  await bridge.sleep(ms)
}

/**
 * Host's monotonic time in fractional milliseconds.
 */
export async function monotonic(bridge: HardwareBridge): Promise<number> {
  const response = await bridge.request({ op: OP.TIME_GET_MONOTONIC })
  if (response.op !== OP.TIME_GET_MONOTONIC) throw unexpectedResponse('monotonic')
  return response.ms
}
