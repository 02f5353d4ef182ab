import type { AggregateBucket, AggregateCounts, ClassifiedChecks, JobSummary } from '../types/types'
import type { Tracer } from '../utils/trace'
import { buildVerdict } from './VerdictRules'

const COLOR_BUCKETS = new Map<string, AggregateBucket>([
    ['blue', 'passed'],
    ['red', 'failed'],
    ['yellow', 'unstable'],
    ['disabled', 'disabled']
])

export function bucketForColor(color: string | null | undefined): AggregateBucket {
    return COLOR_BUCKETS.get(color ?? '') ?? 'unrecognized'
}

const EMPTY_COUNTS: AggregateCounts = {
    jobs: 0,
    passed: 0,
    failed: 0,
    unstable: 0,
    disabled: 0,
    unrecognized: 0,
    running: 0
}

/**
 * Cuenta los jobs por color y decide el veredicto.
 * running = activos (no deshabilitados) que no están en passed, failed ni unstable,
 * así que los colores no reconocidos (blue_anime, notbuilt, aborted...) caen ahí.
 */
export function classifyAggregate(
    jobs: readonly JobSummary[],
    trace: Tracer = () => undefined
): ClassifiedChecks<AggregateCounts> {
    const tallied = jobs.reduce<AggregateCounts>((acc, job) => {
        const bucket = bucketForColor(job.color)
        trace(`job: ${job.name} color=${job.color ?? ''}`)
        if (bucket === 'unrecognized') {
            trace(`job: ${job.name} has an unrecognized color, counted as running`)
        }
        const next = { ...acc, jobs: acc.jobs + 1 }
        next[bucket] += 1
        return next
    }, EMPTY_COUNTS)

    const active = tallied.jobs - tallied.disabled
    const counts: AggregateCounts = {
        ...tallied,
        running: active - tallied.passed - tallied.failed - tallied.unstable
    }

    const perfData = [
        { label: 'jobs', value: counts.jobs },
        { label: 'passed', value: counts.passed },
        { label: 'unstable', value: counts.unstable },
        { label: 'failed', value: counts.failed },
        { label: 'disabled', value: counts.disabled },
        { label: 'running', value: counts.running }
    ]

    return {
        counts,
        verdict: buildVerdict(counts, 'All jobs are ok', perfData)
    }
}
