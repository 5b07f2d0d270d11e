// =============================================================================
// CoBridge - Heartbeat Driver
// =============================================================================
// Periodic wall-clock driver for a RealTime virtual clock.

import { CLOCK_ERR } from '@cobridge/kernel'
import type { VirtualClock } from '@cobridge/kernel'

export interface HeartbeatDriverOptions {
  /** Wall-clock ms between heartbeats (default: 1) */
  intervalMs?: number
  /** Log start/stop to the console (default: false) */
  verbose?: boolean
}

/**
 * Heartbeat Driver.
 *
 * Calls `tickFromHeartbeat()` once per interval. Each heartbeat is one
 * virtual millisecond, whatever the interval. The timer is unref'd so a
 * running driver never keeps the process alive on its own.
 *
 * Beats that arrive while the clock is not in RealTime are counted as missed
 * and leave the clock alone.
 */
export class HeartbeatDriver {
  private readonly intervalMs: number
  private readonly verbose: boolean
  private timer: ReturnType<typeof setInterval> | null = null
  private missed = 0

  constructor(
    private readonly clock: VirtualClock,
    options: HeartbeatDriverOptions = {}
  ) {
    this.intervalMs = Math.max(1, options.intervalMs ?? 1)
    this.verbose = options.verbose ?? false
  }

  start(): void {
    if (this.timer !== null) return
    this.timer = setInterval(this.beat, this.intervalMs)
    this.timer.unref()
    if (this.verbose) console.log(`[HeartbeatDriver] started (${this.intervalMs}ms)`)
  }

  stop(): void {
    if (this.timer === null) return
    clearInterval(this.timer)
    this.timer = null
    if (this.verbose) console.log('[HeartbeatDriver] stopped')
  }

  isRunning(): boolean {
    return this.timer !== null
  }

  getMissedBeats(): number {
    return this.missed
  }

  /**
   * One heartbeat. Public so callers can drive the clock by hand.
   */
  readonly beat = (): void => {
    if (this.clock.tickFromHeartbeat() !== CLOCK_ERR.OK) {
      this.missed = this.missed + 1
    }
  }
}
