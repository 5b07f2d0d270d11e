// =============================================================================
// CoBridge - Host Port
// =============================================================================
// The only write access a Host Completer gets to the request table.

import { TABLE_ERR, MAX_PAYLOAD } from './constants'
import type { RequestTable } from './request-table'
import type { RequestId, RequestSlot } from './types'

/**
 * Host-side half of the request protocol.
 *
 * A host reads a request with `readRequest()` and answers it with exactly one
 * of `complete()` or `error()`. Both return TABLE_ERR codes; an answer for a
 * retracted, freed or unknown id is rejected with INVALID_HANDLE and has no
 * effect on any other request.
 */
export class HostPort {
  constructor(private readonly table: RequestTable) {}

  /**
   * Write `response` and move the request to Complete.
   */
  complete(requestId: RequestId, response: Uint8Array = new Uint8Array(0)): number {
    if (response.length > MAX_PAYLOAD) return TABLE_ERR.PAYLOAD_OVERFLOW
    const written = this.table.writeResponse(requestId, response)
    if (written !== TABLE_ERR.OK) return written
    return this.table.markComplete(requestId)
  }

  /**
   * Move the request to Error with the host's code. No payload is written.
   */
  error(requestId: RequestId, errorCode: number): number {
    return this.table.markError(requestId, errorCode)
  }

  /**
   * Snapshot of a live request, or null.
   */
  readRequest(requestId: RequestId): RequestSlot | null {
    return this.table.get(requestId)
  }

  /**
   * Ids the host has not answered yet.
   */
  pending(): RequestId[] {
    return this.table.pendingIds()
  }
}
