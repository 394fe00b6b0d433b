/**
 * Rolling Window Buffer
 *
 * Time-pruned, index-aligned series for the pursuit engine: gaze, one trace
 * per candidate target, and the submit target. Every series always has the
 * same length as `t`.
 */

import type { Point } from '../../../types/gaze'
import { binarySearchGE } from '../math'

export interface WindowEntry {
    t: number
    gaze: Point
    targets: Record<string, Point>
    submit: Point
}

export interface Trace {
    x: number[]
    y: number[]
}

export class RollingWindow {
    private readonly _t: number[] = []
    private readonly gaze: Trace = { x: [], y: [] }
    private readonly targets = new Map<string, Trace>()
    private readonly submit: Trace = { x: [], y: [] }

    constructor(
        private readonly windowMs: number,
        readonly labels: readonly string[]
    ) {
        for (const label of labels) {
            this.targets.set(label, { x: [], y: [] })
        }
    }

    get length(): number {
        return this._t.length
    }

    get timestamps(): readonly number[] {
        return this._t
    }

    get newest(): number | null {
        return this._t.length > 0 ? this._t[this._t.length - 1] : null
    }

    /**
     * Append one aligned entry and prune. Entries older than the newest one
     * are rejected (returns false) so timestamps stay sorted.
     */
    push(entry: WindowEntry): boolean {
        const newest = this.newest
        if (newest !== null && entry.t < newest) return false

        this._t.push(entry.t)
        this.gaze.x.push(entry.gaze.x)
        this.gaze.y.push(entry.gaze.y)
        for (const [label, trace] of this.targets) {
            // Missing targets repeat their last position to keep alignment
            const p = entry.targets[label] ?? lastPoint(trace) ?? entry.gaze
            trace.x.push(p.x)
            trace.y.push(p.y)
        }
        this.submit.x.push(entry.submit.x)
        this.submit.y.push(entry.submit.y)

        this.prune()
        return true
    }

    /**
     * Drop every entry with t < newest - windowMs.
     */
    prune(): void {
        const newest = this.newest
        if (newest === null) return

        const minT = newest - this.windowMs / 1000
        const cut = binarySearchGE(this._t, minT)
        if (cut === 0) return

        this._t.splice(0, cut)
        spliceTrace(this.gaze, cut)
        for (const trace of this.targets.values()) spliceTrace(trace, cut)
        spliceTrace(this.submit, cut)
    }

    gazeTrace(): Readonly<Trace> {
        return this.gaze
    }

    targetTrace(label: string): Readonly<Trace> | undefined {
        return this.targets.get(label)
    }

    submitTrace(): Readonly<Trace> {
        return this.submit
    }

    /**
     * Lengths of every series, `t` first. All values are equal.
     */
    seriesLengths(): number[] {
        const lengths = [this._t.length, this.gaze.x.length, this.gaze.y.length]
        for (const trace of this.targets.values()) lengths.push(trace.x.length, trace.y.length)
        lengths.push(this.submit.x.length, this.submit.y.length)
        return lengths
    }

    clear(): void {
        this._t.length = 0
        clearTrace(this.gaze)
        for (const trace of this.targets.values()) clearTrace(trace)
        clearTrace(this.submit)
    }
}

function lastPoint(trace: Trace): Point | null {
    const n = trace.x.length
    return n > 0 ? { x: trace.x[n - 1], y: trace.y[n - 1] } : null
}

function spliceTrace(trace: Trace, count: number): void {
    trace.x.splice(0, count)
    trace.y.splice(0, count)
}

function clearTrace(trace: Trace): void {
    trace.x.length = 0
    trace.y.length = 0
}
