/**
 * Per-run latency instrumentation
 */

import { InvariantViolationError } from '../errors'

export interface Latency {
  /** Time from the start of run() to its return */
  overall: number
  /** Time from the start of sending to the last byte of the result */
  network: number
  /** Time between the end of sending and the first reply */
  wait: number
}

export type BenchTestMark = 'init' | 'startSend' | 'endSend' | 'startRecv' | 'endRecv' | 'done'

export const BENCH_TEST_MARKS: readonly BenchTestMark[] = [
  'init',
  'startSend',
  'endSend',
  'startRecv',
  'endRecv',
  'done',
]

/**
 * Six timestamps taken during one run(), in milliseconds from performance.now()
 */
export class BenchTest {
  private readonly _marks: Partial<Record<BenchTestMark, number>> = {}
  private readonly _clock: () => number

  constructor(clock: () => number = () => performance.now()) {
    this._clock = clock
  }

  /**
   * Record the current time for a mark; each mark can be set once
   */
  mark(name: BenchTestMark): number {
    if (this._marks[name] !== undefined) {
      throw new InvariantViolationError(`Bench test mark '${name}' is already set`)
    }
    const now = this._clock()
    this._marks[name] = now
    return now
  }

  get init(): number | undefined {
    return this._marks.init
  }

  get startSend(): number | undefined {
    return this._marks.startSend
  }

  get endSend(): number | undefined {
    return this._marks.endSend
  }

  get startRecv(): number | undefined {
    return this._marks.startRecv
  }

  get endRecv(): number | undefined {
    return this._marks.endRecv
  }

  get done(): number | undefined {
    return this._marks.done
  }

  get complete(): boolean {
    return BENCH_TEST_MARKS.every((name) => this._marks[name] !== undefined)
  }

  latency(): Latency {
    const { init, startSend, endSend, startRecv, endRecv, done } = this._marks
    if (
      init === undefined ||
      startSend === undefined ||
      endSend === undefined ||
      startRecv === undefined ||
      endRecv === undefined ||
      done === undefined
    ) {
      const missing = BENCH_TEST_MARKS.filter((name) => this._marks[name] === undefined)
      throw new InvariantViolationError(`Bench test is incomplete, missing: ${missing.join(', ')}`)
    }
    return {
      overall: done - init,
      network: endRecv - startSend,
      wait: startRecv - endSend,
    }
  }
}
