// =============================================================================
// CoBridge - Yield Hook
// =============================================================================
// The cooperative suspension point shared by waits and the dispatch loop.

import { setImmediate as nextTurn } from 'node:timers/promises'
import type { VirtualClock } from './virtual-clock'
import type { BackgroundTask, SuspendFn } from './types'

export interface YieldHookOptions {
  /** Dispatch-loop calls between background runs (default: 100) */
  hookCallsPerYield?: number
  /** Virtual ms between requested yields (default: 100) */
  yieldIntervalMs?: number
  /** Hands control to other tasks (default: one event-loop turn) */
  suspend?: SuspendFn
}

const defaultSuspend: SuspendFn = () => nextTurn()

/**
 * Yield Hook.
 *
 * `yield()` runs every background task, records the yield on the clock and
 * then awaits `suspend`, which really leaves the current call frame. Hosts
 * that complete requests from their own tasks get to run there.
 *
 * `checkYieldPoint()` is the cheap counter an interpreter calls from its
 * dispatch loop. It never suspends; it runs background tasks every
 * `hookCallsPerYield` calls and raises `shouldYield()` once enough virtual
 * time has passed since the last yield.
 *
 * Background tasks must not block. An exception from a task propagates to
 * whoever triggered the run.
 */
export class YieldHook {
  private readonly tasks: BackgroundTask[] = []
  private readonly hookCallsPerYield: number
  private readonly yieldIntervalMs: number
  private readonly suspend: SuspendFn
  private hookCalls = 0
  private lastYieldMs: number
  private yieldRequested = false

  constructor(
    private readonly clock: VirtualClock,
    options: YieldHookOptions = {}
  ) {
    this.hookCallsPerYield = Math.max(1, options.hookCallsPerYield ?? 100)
    this.yieldIntervalMs = Math.max(0, options.yieldIntervalMs ?? 100)
    this.suspend = options.suspend ?? defaultSuspend
    this.lastYieldMs = clock.nowMs()
  }

  // ===========================================================================
  // Background tasks
  // ===========================================================================

  /**
   * @returns A function that removes the task again
   */
  addBackgroundTask(task: BackgroundTask): () => void {
    this.tasks.push(task)
    return () => {
      this.removeBackgroundTask(task)
    }
  }

  removeBackgroundTask(task: BackgroundTask): boolean {
    const index = this.tasks.indexOf(task)
    if (index === -1) return false
    this.tasks.splice(index, 1)
    return true
  }

  get taskCount(): number {
    return this.tasks.length
  }

  /**
   * Run each task once. Tasks added during the run wait for the next one.
   */
  runBackgroundTasks(): void {
    const snapshot = this.tasks.slice()
    let i = 0
    while (i < snapshot.length) {
      snapshot[i]()
      i = i + 1
    }
  }

  // ===========================================================================
  // Suspension
  // ===========================================================================

  async yield(): Promise<void> {
    this.runBackgroundTasks()
    this.clock.recordYield()
    this.lastYieldMs = this.clock.nowMs()
    this.yieldRequested = false
    await this.suspend()
  }

  // ===========================================================================
  // Dispatch-loop counter
  // ===========================================================================

  /**
   * Count one dispatch-loop call.
   *
   * @returns true when the interpreter should call `yield()` soon
   */
  checkYieldPoint(): boolean {
    this.hookCalls = this.hookCalls + 1
    if (this.hookCalls >= this.hookCallsPerYield) {
      this.hookCalls = 0
      this.runBackgroundTasks()
      if (this.clock.nowMs() - this.lastYieldMs >= this.yieldIntervalMs) {
        this.yieldRequested = true
      }
    }
    return this.yieldRequested
  }

  shouldYield(): boolean {
    return this.yieldRequested
  }

  resetYieldState(): void {
    this.hookCalls = 0
    this.yieldRequested = false
    this.lastYieldMs = this.clock.nowMs()
  }
}
