import axios from 'axios'
import type { AxiosInstance, AxiosProxyConfig, AxiosRequestConfig, AxiosResponse } from 'axios'
import https from 'https'
import type { JenkinsConfig } from '../types/config'
import type { Tracer } from '../utils/trace'
import { JenkinsRequestError } from '../errors/ProbeErrors'

export const API_SUFFIX = '/api/json'

export class JenkinsClient {
    private baseUrl: string

    constructor(
        private config: JenkinsConfig,
        private trace: Tracer = () => undefined,
        private http: AxiosInstance = axios.create()
    ) {
        this.baseUrl = config.baseUrl.replace(/\/$/, '')
    }

    jobsUrl(tree: string): string {
        return `${this.baseUrl}${API_SUFFIX}?tree=${tree}`
    }

    /**
     * Hace un único GET de la lista de jobs y devuelve el body sin decodificar
     */
    async fetchJobsTree(tree: string): Promise<string> {
        const url = this.jobsUrl(tree)
        const request: AxiosRequestConfig = {
            url,
            method: 'GET',
            responseType: 'text',
            timeout: this.config.timeoutSeconds * 1000,
            validateStatus: () => true
        }

        const proxy = this.proxyConfig()
        if (proxy !== undefined) {
            request.proxy = proxy
        }
        if (this.config.insecure) {
            request.httpsAgent = new https.Agent({ rejectUnauthorized: false })
        }
        if (this.config.username && this.config.password) {
            this.trace(`Attempting HTTP basic auth as user: ${this.config.username}`)
            request.auth = { username: this.config.username, password: this.config.password }
        }

        this.trace(`GET ${url} ...`)
        let response: AxiosResponse<string>
        try {
            response = await this.http.request<string>(request)
        } catch (error) {
            throw new JenkinsRequestError(url, error instanceof Error ? error.message : String(error))
        }

        if (response.status < 200 || response.status >= 300) {
            throw new JenkinsRequestError(url, `${response.status} ${response.statusText}`.trim())
        }

        return response.data
    }

    // undefined deja que axios use HTTP_PROXY / HTTPS_PROXY
    private proxyConfig(): AxiosProxyConfig | false | undefined {
        switch (this.config.proxy.mode) {
            case 'disabled':
                return false
            case 'explicit':
                // axios no abre túnel CONNECT: el proxy explícito solo aplica a http
                if (!/^http:/i.test(this.baseUrl)) {
                    this.trace(`Proxy ${this.config.proxy.url} ignored for ${this.baseUrl}`)
                    return false
                }
                return toAxiosProxy(this.config.proxy.url)
            default:
                return undefined
        }
    }
}

export function toAxiosProxy(raw: string): AxiosProxyConfig {
    const parsed = new URL(raw)
    const protocol = parsed.protocol.replace(/:$/, '')
    const proxy: AxiosProxyConfig = {
        protocol,
        host: parsed.hostname,
        port: parsed.port ? Number(parsed.port) : (protocol === 'https' ? 443 : 80)
    }
    if (parsed.username) {
        proxy.auth = {
            username: decodeURIComponent(parsed.username),
            password: decodeURIComponent(parsed.password)
        }
    }
    return proxy
}
