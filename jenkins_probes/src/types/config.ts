export type ProxySetting =
    | { mode: 'environment' }
    | { mode: 'disabled' }
    | { mode: 'explicit', url: string }

export interface JenkinsConfig {
    baseUrl: string
    username: string
    password: string
    timeoutSeconds: number
    proxy: ProxySetting
    insecure: boolean
}

export interface EnvironmentDefaults {
    username: string
    password: string
    timeoutSeconds: number
    days: number
}

export interface ProbeOptions {
    jenkins: JenkinsConfig
    debug: boolean
    perfData: boolean
    days: number
}
