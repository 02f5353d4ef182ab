import type { z } from 'zod'
import type {
    AggregateCounts,
    ClassifiedChecks,
    ClassifyContext,
    FreshnessCounts,
    JobLastBuild,
    JobSummary
} from '../types/types'
import type { Tracer } from '../utils/trace'
import { classifyAggregate } from '../services/AggregateClassifier'
import { classifyFreshness } from '../services/FreshnessClassifier'
import { JobLastBuildSchema, JobSummarySchema } from '../services/JobDecoder'

export interface ProbeDefinition<TJob, TCounts> {
    name: string
    version: string
    summary: string
    description: string
    tree: string
    jobSchema: z.ZodType<TJob>
    acceptsDays: boolean
    classify(jobs: TJob[], context: ClassifyContext, trace: Tracer): ClassifiedChecks<TCounts>
    // avisos sobre categorías que el veredicto no refleja
    notes(counts: TCounts): string[]
}

export const aggregateProbe: ProbeDefinition<JobSummary, AggregateCounts> = {
    name: 'check_jenkins',
    version: '1.7.1',
    summary: 'Monitoring plugin that counts the jobs of a Jenkins instance by status',
    description: [
        'Counts the jobs of a Jenkins instance through its JSON API and groups',
        'them by color: passed (blue), failed (red), unstable (yellow) and',
        'disabled. Active jobs in none of those groups are reported as running.',
        '',
        'Exits CRITICAL when any job failed, WARNING when any job is unstable,',
        'OK otherwise and UNKNOWN when the server cannot be queried.',
        '',
        'Performance data: jobs passed unstable failed disabled running'
    ].join('\n'),
    tree: 'jobs[color,name]',
    jobSchema: JobSummarySchema,
    acceptsDays: false,
    classify: (jobs, _context, trace) => classifyAggregate(jobs, trace),
    notes: counts => counts.unrecognized > 0
        ? [`${counts.unrecognized} jobs have an unrecognized color and were counted as running`]
        : []
}

export const freshnessProbe: ProbeDefinition<JobLastBuild, FreshnessCounts> = {
    name: 'check_jenkins_last_build',
    version: '1.7.2',
    summary: 'Monitoring plugin that checks the last build of the jobs of a Jenkins instance',
    description: [
        'Checks the result of the last build of every enabled job of a Jenkins',
        'instance whose last build started within the last --days days.',
        'Older builds, disabled jobs and jobs that were never built are left out.',
        '',
        'Exits CRITICAL when any recent build failed, WARNING when any is',
        'unstable, OK otherwise and UNKNOWN when the server cannot be queried.',
        'Every reported job is listed after the status line as [RESULT] name.',
        '',
        'Performance data: passed unstable failed running'
    ].join('\n'),
    tree: 'jobs[disabled,name,lastBuild[result,timestamp]]',
    jobSchema: JobLastBuildSchema,
    acceptsDays: true,
    classify: (jobs, context, trace) => classifyFreshness(jobs, context, trace),
    notes: counts => {
        const notes: string[] = []
        if (counts.other > 0) {
            notes.push(`${counts.other} builds have an unrecognized result and were not counted`)
        }
        if (counts.excluded.never_built > 0) {
            notes.push(`${counts.excluded.never_built} jobs have never been built and were skipped`)
        }
        return notes
    }
}
