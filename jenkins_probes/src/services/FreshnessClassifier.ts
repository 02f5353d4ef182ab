import type {
    BuildBucket,
    ClassifiedChecks,
    ClassifyContext,
    FreshnessCounts,
    JobFreshness,
    JobLastBuild
} from '../types/types'
import type { Tracer } from '../utils/trace'
import { buildVerdict } from './VerdictRules'

export const DAY_MS = 86_400_000

const RESULT_BUCKETS = new Map<string, BuildBucket>([
    ['', 'running'],
    ['SUCCESS', 'passed'],
    ['FAILURE', 'failed'],
    ['UNSTABLE', 'unstable']
])

/**
 * Decide si un job entra en el reporte y en qué bucket.
 * Un build en curso llega con result null (o vacío).
 */
export function assessJob(job: JobLastBuild, windowMs: number, now: number): JobFreshness {
    const lastBuild = job.lastBuild
    if (!lastBuild) {
        return { kind: 'excluded', reason: 'never_built' }
    }
    if (now - lastBuild.timestamp > windowMs) {
        return { kind: 'excluded', reason: 'stale' }
    }
    if (job.disabled) {
        return { kind: 'excluded', reason: 'disabled' }
    }

    const result = lastBuild.result ?? ''
    return {
        kind: 'included',
        bucket: RESULT_BUCKETS.get(result) ?? 'other',
        label: result === '' ? 'RUNNING' : result
    }
}

const EMPTY_COUNTS: FreshnessCounts = {
    passed: 0,
    failed: 0,
    unstable: 0,
    running: 0,
    other: 0,
    excluded: { never_built: 0, stale: 0, disabled: 0 }
}

export function classifyFreshness(
    jobs: readonly JobLastBuild[],
    window: ClassifyContext,
    trace: Tracer = () => undefined
): ClassifiedChecks<FreshnessCounts> {
    const windowMs = window.days * DAY_MS
    const details: string[] = []

    const counts = jobs.reduce<FreshnessCounts>((acc, job) => {
        const assessment = assessJob(job, windowMs, window.now)
        trace(`job: ${job.name} disabled=${job.disabled ? 1 : 0} status=${job.lastBuild?.result ?? ''}`)

        const next = { ...acc, excluded: { ...acc.excluded } }
        if (assessment.kind === 'excluded') {
            if (assessment.reason === 'never_built') {
                trace(`job: ${job.name} has never been built, skipped`)
            }
            next.excluded[assessment.reason] += 1
            return next
        }

        details.push(`[${assessment.label}] ${job.name}`)
        next[assessment.bucket] += 1
        return next
    }, EMPTY_COUNTS)

    const perfData = [
        { label: 'passed', value: counts.passed },
        { label: 'unstable', value: counts.unstable },
        { label: 'failed', value: counts.failed },
        { label: 'running', value: counts.running }
    ]

    return {
        counts,
        verdict: buildVerdict(
            counts,
            `All builds for the last ${window.days} days are ok`,
            perfData,
            details
        )
    }
}
