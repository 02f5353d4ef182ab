import { describe, expect, it } from 'vitest'
import { ResponseFormatError } from '../errors/ProbeErrors'
import { jobsBody } from '../test-utils'
import { JobLastBuildSchema, JobSummarySchema, decodeJobs } from './JobDecoder'

const URL_A = 'http://ci.example/api/json?tree=jobs[color,name]'

describe('decodeJobs', () => {
    it('decodes job summaries, with or without color', () => {
        const body = jobsBody([
            { _class: 'hudson.model.FreeStyleProject', name: 'api', color: 'blue' },
            { _class: 'com.cloudbees.hudson.plugins.folder.Folder', name: 'team' }
        ])

        expect(decodeJobs(JobSummarySchema, body, URL_A)).toEqual([
            { name: 'api', color: 'blue' },
            { name: 'team' }
        ])
    })

    it('decodes last builds, including null ones', () => {
        const body = jobsBody([
            { name: 'api', disabled: false, lastBuild: { result: null, timestamp: 1700000000000 } },
            { name: 'new', disabled: false, lastBuild: null }
        ])

        expect(decodeJobs(JobLastBuildSchema, body, URL_A)).toEqual([
            { name: 'api', disabled: false, lastBuild: { result: null, timestamp: 1700000000000 } },
            { name: 'new', disabled: false, lastBuild: null }
        ])
    })

    it('rejects a body that is not JSON', () => {
        expect(() => decodeJobs(JobSummarySchema, '<html>login</html>', URL_A)).toThrow(ResponseFormatError)
        expect(() => decodeJobs(JobSummarySchema, '<html>login</html>', URL_A))
            .toThrow(`Unexpected response from ${URL_A} (invalid JSON:`)
    })

    it('rejects a document without jobs', () => {
        expect(() => decodeJobs(JobSummarySchema, '{}', URL_A))
            .toThrow(`Unexpected response from ${URL_A} (jobs: Required)`)
    })

    it('rejects a top-level array', () => {
        expect(() => decodeJobs(JobSummarySchema, '[]', URL_A))
            .toThrow(`Unexpected response from ${URL_A} (body: Expected object, received array)`)
    })

    it('points at the offending field', () => {
        const body = jobsBody([{ name: 'ok' }, { name: 42 }])
        expect(() => decodeJobs(JobSummarySchema, body, URL_A))
            .toThrow(`Unexpected response from ${URL_A} (jobs.1.name: Expected string, received number)`)
    })

    it('rejects a last build without timestamp', () => {
        const body = jobsBody([{ name: 'api', lastBuild: { result: 'SUCCESS' } }])
        expect(() => decodeJobs(JobLastBuildSchema, body, URL_A))
            .toThrow(`Unexpected response from ${URL_A} (jobs.0.lastBuild.timestamp: Required)`)
    })
})
