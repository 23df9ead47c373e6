/**
 * LLM Plumbing — Rate Governor
 *
 * Await-based gate enforcing two budgets over a trailing time window:
 * calls per window and capacity units (tokens) per window.
 * No background intervals — fully deterministic and testable.
 *
 * Admission reserves a slot (one call plus the unit estimate) that counts
 * against both budgets until recordCall turns it into a sample or release
 * drops it.
 *
 * Samples live in memory only; a restart starts with an empty window.
 * The clock is injectable for testing with fake time.
 */

import type { Logger } from 'pino'
import { createLogger } from '../logger'

export interface Clock {
  now(): number
  sleep(ms: number): Promise<void>
}

export const realClock: Clock = {
  now: () => Date.now(),
  sleep: (ms: number) => new Promise((resolve) => setTimeout(resolve, ms)),
}

export interface RateGovernorOptions {
  maxCalls: number
  maxUnits: number
  /** Trailing window length (default: 60s) */
  windowMs?: number
  /** Poll interval for awaitCapacity (default: 500ms) */
  pollIntervalMs?: number
  clock?: Clock
  logger?: Logger
}

interface UnitSample {
  at: number
  units: number
}

/** A call admitted by awaitCapacity and not yet recorded or released */
export interface Reservation {
  readonly id: number
  readonly units: number
}

const DEFAULT_WINDOW_MS = 60_000
const DEFAULT_POLL_INTERVAL_MS = 500

export class RateGovernor {
  private readonly maxCalls: number
  private readonly maxUnits: number
  private readonly windowMs: number
  private readonly pollIntervalMs: number
  private readonly clock: Clock
  private readonly logger: Logger
  private callSamples: number[] = []
  private unitSamples: UnitSample[] = []
  private readonly reserved = new Map<number, Reservation>()
  private nextReservationId = 1

  constructor(options: RateGovernorOptions) {
    this.maxCalls = options.maxCalls
    this.maxUnits = options.maxUnits
    this.windowMs = options.windowMs ?? DEFAULT_WINDOW_MS
    this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS
    this.clock = options.clock ?? realClock
    this.logger = options.logger ?? createLogger('rate-governor')
  }

  /**
   * True when one more call estimated at `estimatedUnits` fits both budgets,
   * counting outstanding reservations. Purges samples that have left the
   * window first.
   */
  canProceed(estimatedUnits: number): boolean {
    this.purge()
    const calls = this.callSamples.length + this.reserved.size
    const units = this.sumUnits() + this.reservedUnits()
    return calls < this.maxCalls && units + estimatedUnits < this.maxUnits
  }

  /**
   * Records a successful call, settling its reservation when one is given.
   * Failed calls are never recorded: nothing was billed for them.
   */
  recordCall(actualUnits: number, reservation?: Reservation): void {
    if (reservation) {
      this.reserved.delete(reservation.id)
    }
    const at = this.clock.now()
    this.callSamples.push(at)
    this.unitSamples.push({ at, units: actualUnits })
  }

  /**
   * Drops a reservation without recording a call. No-op once settled.
   */
  release(reservation: Reservation): void {
    this.reserved.delete(reservation.id)
  }

  /**
   * Suspends until canProceed(estimatedUnits) holds, polling on a fixed
   * interval, then reserves the slot. Check and reservation happen in the
   * same synchronous step.
   */
  async awaitCapacity(estimatedUnits: number): Promise<Reservation> {
    let waitedMs = 0
    while (!this.canProceed(estimatedUnits)) {
      await this.clock.sleep(this.pollIntervalMs)
      waitedMs += this.pollIntervalMs
    }
    if (waitedMs > 0) {
      this.logger.debug({ waitedMs, estimatedUnits }, 'Rate window admitted call')
    }
    const reservation: Reservation = { id: this.nextReservationId++, units: estimatedUnits }
    this.reserved.set(reservation.id, reservation)
    return reservation
  }

  get reservedCalls(): number {
    return this.reserved.size
  }

  snapshot(): { callsInWindow: number; unitsInWindow: number } {
    this.purge()
    return { callsInWindow: this.callSamples.length, unitsInWindow: this.sumUnits() }
  }

  private purge(): void {
    const cutoff = this.clock.now() - this.windowMs
    this.callSamples = this.callSamples.filter((at) => at > cutoff)
    this.unitSamples = this.unitSamples.filter((sample) => sample.at > cutoff)
  }

  private sumUnits(): number {
    return this.unitSamples.reduce((sum, sample) => sum + sample.units, 0)
  }

  private reservedUnits(): number {
    let total = 0
    for (const reservation of this.reserved.values()) {
      total += reservation.units
    }
    return total
  }
}
