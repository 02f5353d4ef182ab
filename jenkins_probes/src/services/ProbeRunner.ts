import type { ProbeDefinition } from '../probes/definitions'
import type { ProbeOptions } from '../types/config'
import type { Verdict } from '../types/types'
import { JenkinsRequestError, ResponseFormatError } from '../errors/ProbeErrors'
import { createTracer } from '../utils/trace'
import { JenkinsClient } from './JenkinsClient'
import { decodeJobs } from './JobDecoder'
import { unknownVerdict } from './VerdictRules'

export interface ProbeOutcome<TCounts> {
    verdict: Verdict
    // ausente cuando el veredicto es UNKNOWN
    counts?: TCounts
}

export interface ProbeDependencies {
    client?: JenkinsClient
    now?: () => number
}

/**
 * Un GET, una decodificación y una clasificación. Los fallos de transporte
 * o de formato terminan en UNKNOWN.
 */
export async function runProbe<TJob, TCounts>(
    definition: ProbeDefinition<TJob, TCounts>,
    options: ProbeOptions,
    deps: ProbeDependencies = {}
): Promise<ProbeOutcome<TCounts>> {
    const trace = createTracer(options.debug, definition.name)
    const client = deps.client ?? new JenkinsClient(options.jenkins, trace)
    const now = deps.now ?? Date.now

    try {
        const body = await client.fetchJobsTree(definition.tree)
        const jobs = decodeJobs(definition.jobSchema, body, client.jobsUrl(definition.tree))
        trace(`Found ${jobs.length} jobs`)

        return definition.classify(jobs, { days: options.days, now: now() }, trace)
    } catch (error) {
        if (error instanceof JenkinsRequestError || error instanceof ResponseFormatError) {
            return { verdict: unknownVerdict(error.message) }
        }
        throw error
    }
}
