import { z } from 'zod'
import { ResponseFormatError } from '../errors/ProbeErrors'

export const JobSummarySchema = z.object({
    name: z.string(),
    color: z.string().nullish()
})

export const JobLastBuildSchema = z.object({
    name: z.string(),
    disabled: z.boolean().optional(),
    lastBuild: z.object({
        result: z.string().nullish(),
        timestamp: z.number()
    }).nullish()
})

/**
 * Parsea el body de /api/json y valida la lista de jobs
 */
export function decodeJobs<T>(jobSchema: z.ZodType<T>, body: string, url: string): T[] {
    let raw: unknown
    try {
        raw = JSON.parse(body)
    } catch (error) {
        throw new ResponseFormatError(url, `invalid JSON: ${error instanceof Error ? error.message : String(error)}`)
    }

    const parsed = z.object({ jobs: z.array(jobSchema) }).safeParse(raw)
    if (!parsed.success) {
        const issue = parsed.error.issues[0]
        const where = issue.path.length > 0 ? issue.path.join('.') : 'body'
        throw new ResponseFormatError(url, `${where}: ${issue.message}`)
    }

    return parsed.data.jobs
}
