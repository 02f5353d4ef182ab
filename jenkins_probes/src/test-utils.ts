import axios from 'axios'
import type { AxiosInstance, InternalAxiosRequestConfig } from 'axios'
import type { JenkinsConfig } from './types/config'

export interface FakeReply {
    status?: number
    statusText?: string
    body?: string
    error?: Error
}

export interface FakeJenkins {
    http: AxiosInstance
    requests: InternalAxiosRequestConfig[]
}

/**
 * axios con un adapter en memoria: registra cada request y responde con `reply`
 */
export function fakeJenkins(reply: FakeReply): FakeJenkins {
    const requests: InternalAxiosRequestConfig[] = []
    const http = axios.create({
        adapter: async (config) => {
            requests.push(config)
            if (reply.error) {
                throw reply.error
            }
            return {
                data: reply.body ?? '',
                status: reply.status ?? 200,
                statusText: reply.statusText ?? 'OK',
                headers: {},
                config,
                request: {}
            }
        }
    })
    return { http, requests }
}

export function jenkinsConfig(overrides: Partial<JenkinsConfig> = {}): JenkinsConfig {
    return {
        baseUrl: 'http://ci.example',
        username: '',
        password: '',
        timeoutSeconds: 10,
        proxy: { mode: 'environment' },
        insecure: false,
        ...overrides
    }
}

export function jobsBody(jobs: unknown[]): string {
    return JSON.stringify({ _class: 'hudson.model.Hudson', jobs })
}
