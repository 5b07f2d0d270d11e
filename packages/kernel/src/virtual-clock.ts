// =============================================================================
// CoBridge - Virtual Clock
// =============================================================================
// Simulated 32 kHz crystal. Supplies monotonic time to timeouts and to the
// interpreter's own time queries.

import { HDR, CLOCK, CLOCK_MODE, CLOCK_ERR, TICKS_PER_MS } from './constants'
import type { ClockMode } from './constants'
import type { ClockStats, TimelineEntry } from './types'

/**
 * Virtual Clock.
 *
 * A single raw tick counter in the SAB drives everything. It is only ever
 * incremented, so the converted reading never decreases, whatever the mode.
 *
 * **Modes:**
 * - `REALTIME`: an external heartbeat calls `tickFromHeartbeat()` once per ms
 * - `MANUAL`: time moves only through `advance()`
 * - `FAST_FORWARD`: like MANUAL, and `onSleep()` skips ahead instantly
 *
 * Switching modes keeps the current value as the new baseline.
 */
export class VirtualClock {
  private readonly sab: Int32Array
  private readonly sab64: BigInt64Array
  private readonly baseI32: number
  private readonly base64: number
  private readonly ticksPerMs: number
  private timeline: TimelineEntry[] = []

  constructor(buffer: SharedArrayBuffer) {
    this.sab = new Int32Array(buffer)
    this.sab64 = new BigInt64Array(buffer)
    const offset = this.sab[HDR.CLOCK_PTR]
    this.baseI32 = offset / 4
    this.base64 = offset / 8
    this.ticksPerMs = this.sab[HDR.TICKS_PER_MS] || TICKS_PER_MS
  }

  // ===========================================================================
  // Mode control
  // ===========================================================================

  getMode(): ClockMode {
    const raw = Atomics.load(this.sab, this.baseI32 + CLOCK.MODE / 4)
    if (raw === CLOCK_MODE.MANUAL) return CLOCK_MODE.MANUAL
    if (raw === CLOCK_MODE.FAST_FORWARD) return CLOCK_MODE.FAST_FORWARD
    return CLOCK_MODE.REALTIME
  }

  /**
   * Switch mode. The current tick value becomes the baseline of the new mode.
   */
  setMode(mode: ClockMode): void {
    const current = Atomics.load(this.sab64, this.base64 + CLOCK.RAW_TICKS / 8)
    Atomics.store(this.sab64, this.base64 + CLOCK.MODE_BASELINE / 8, current)
    Atomics.store(this.sab, this.baseI32 + CLOCK.MODE / 4, mode)
  }

  /**
   * Raw tick value recorded at the last mode switch.
   */
  getModeBaseline(): number {
    return Number(Atomics.load(this.sab64, this.base64 + CLOCK.MODE_BASELINE / 8))
  }

  // ===========================================================================
  // Advancing time
  // ===========================================================================

  /**
   * Advance virtual time by `ms` milliseconds (MANUAL / FAST_FORWARD only).
   *
   * @returns CLOCK_ERR.OK, CLOCK_ERR.WRONG_MODE in REALTIME, or
   *          CLOCK_ERR.NEGATIVE_DELTA
   */
  advance(ms: number): number {
    if (this.getMode() === CLOCK_MODE.REALTIME) return CLOCK_ERR.WRONG_MODE
    if (!(ms >= 0)) return CLOCK_ERR.NEGATIVE_DELTA
    this.addRawTicks(Math.floor(ms * this.ticksPerMs))
    return CLOCK_ERR.OK
  }

  /**
   * Advance to an absolute virtual time. Never moves backwards.
   */
  advanceTo(targetMs: number): number {
    const now = this.nowMs()
    if (targetMs <= now) {
      return this.getMode() === CLOCK_MODE.REALTIME ? CLOCK_ERR.WRONG_MODE : CLOCK_ERR.OK
    }
    return this.advance(targetMs - now)
  }

  /**
   * One heartbeat quantum (1 ms) from the external periodic driver.
   * Only valid in REALTIME mode.
   */
  tickFromHeartbeat(): number {
    if (this.getMode() !== CLOCK_MODE.REALTIME) return CLOCK_ERR.WRONG_MODE
    this.addRawTicks(this.ticksPerMs)
    Atomics.add(this.sab64, this.base64 + CLOCK.HEARTBEAT_COUNT / 8, 1n)
    return CLOCK_ERR.OK
  }

  /**
   * A sleep of `ms` was requested. In FAST_FORWARD the clock jumps over it.
   *
   * @returns true if virtual time was advanced
   */
  onSleep(ms: number): boolean {
    if (this.getMode() !== CLOCK_MODE.FAST_FORWARD) return false
    return this.advance(ms) === CLOCK_ERR.OK
  }

  private addRawTicks(delta: number): void {
    if (delta <= 0) return
    Atomics.add(this.sab64, this.base64 + CLOCK.RAW_TICKS / 8, BigInt(delta))
  }

  // ===========================================================================
  // Reading time
  // ===========================================================================

  /**
   * Converted reading: canonical ms ticks plus the sub-ms remainder in raw ticks.
   */
  rawTicks(): { ticks: number; subticks: number } {
    const raw = Atomics.load(this.sab64, this.base64 + CLOCK.RAW_TICKS / 8)
    const perMs = BigInt(this.ticksPerMs)
    return {
      ticks: Number(raw / perMs),
      subticks: Number(raw % perMs)
    }
  }

  /**
   * Unconverted 32 kHz counter.
   */
  getRaw(): number {
    return Number(Atomics.load(this.sab64, this.base64 + CLOCK.RAW_TICKS / 8))
  }

  nowMs(): number {
    return this.rawTicks().ticks
  }

  /**
   * Fractional milliseconds, for callers that want sub-ms precision.
   */
  nowPreciseMs(): number {
    return this.getRaw() / this.ticksPerMs
  }

  // ===========================================================================
  // Timeout arming
  // ===========================================================================

  enableTick(): void {
    Atomics.store(this.sab, this.baseI32 + CLOCK.TICK_ENABLED / 4, 1)
  }

  /**
   * Disarm timeout evaluation. Every wait becomes unbounded.
   */
  disableTick(): void {
    Atomics.store(this.sab, this.baseI32 + CLOCK.TICK_ENABLED / 4, 0)
  }

  isTickEnabled(): boolean {
    return Atomics.load(this.sab, this.baseI32 + CLOCK.TICK_ENABLED / 4) === 1
  }

  // ===========================================================================
  // Counters
  // ===========================================================================

  recordYield(): void {
    Atomics.add(this.sab64, this.base64 + CLOCK.YIELD_COUNT / 8, 1n)
  }

  getYieldCount(): number {
    return Number(Atomics.load(this.sab64, this.base64 + CLOCK.YIELD_COUNT / 8))
  }

  getHeartbeatCount(): number {
    return Number(Atomics.load(this.sab64, this.base64 + CLOCK.HEARTBEAT_COUNT / 8))
  }

  setCpuFrequency(hz: number): void {
    Atomics.store(this.sab, this.baseI32 + CLOCK.CPU_FREQUENCY_HZ / 4, Math.max(1, Math.floor(hz)))
  }

  getCpuFrequency(): number {
    return Atomics.load(this.sab, this.baseI32 + CLOCK.CPU_FREQUENCY_HZ / 4)
  }

  stats(): ClockStats {
    return {
      virtualTimeMs: this.nowMs(),
      cpuFrequencyHz: this.getCpuFrequency(),
      yields: this.getYieldCount(),
      heartbeats: this.getHeartbeatCount(),
      timelineEvents: this.timeline.length
    }
  }

  // ===========================================================================
  // Timeline
  // ===========================================================================

  /**
   * Record an event at the current virtual time, e.g. "GPIO 5 set HIGH".
   */
  recordEvent(event: string): void {
    this.timeline.push({ rawTicks: this.getRaw(), event })
  }

  getTimeline(): TimelineEntry[] {
    return [...this.timeline]
  }

  /**
   * Timeline as `T+<ms>ms: <event>` lines.
   */
  formatTimeline(): string[] {
    return this.timeline.map((entry) => {
      const ms = entry.rawTicks / this.ticksPerMs
      return `T+${ms.toFixed(3)}ms: ${entry.event}`
    })
  }

  clearTimeline(): void {
    this.timeline = []
  }
}
