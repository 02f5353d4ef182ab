// Niveles de severidad de un plugin de monitoreo (valor = exit code)
export enum Severity {
    OK = 0,
    WARNING = 1,
    CRITICAL = 2,
    UNKNOWN = 3
}

export interface PerfDatum {
    label: string
    value: number
}

export interface Verdict {
    severity: Severity
    message: string
    perfData: PerfDatum[]
    details: string[]
}

// Variante A: estado agregado por color
export interface JobSummary {
    name: string
    color?: string | null
}

export type AggregateBucket = 'passed' | 'failed' | 'unstable' | 'disabled' | 'unrecognized'

export interface AggregateCounts {
    jobs: number
    passed: number
    failed: number
    unstable: number
    disabled: number
    unrecognized: number
    running: number
}

// Variante B: último build de cada job
export interface LastBuild {
    result?: string | null
    timestamp: number
}

export interface JobLastBuild {
    name: string
    disabled?: boolean
    lastBuild?: LastBuild | null
}

export type BuildBucket = 'running' | 'passed' | 'failed' | 'unstable' | 'other'

export type ExclusionReason = 'never_built' | 'stale' | 'disabled'

export type JobFreshness =
    | { kind: 'excluded', reason: ExclusionReason }
    | { kind: 'included', bucket: BuildBucket, label: string }

export interface FreshnessCounts {
    passed: number
    failed: number
    unstable: number
    running: number
    other: number
    excluded: Record<ExclusionReason, number>
}

export interface ClassifyContext {
    days: number
    now: number
}

export interface ClassifiedChecks<TCounts> {
    counts: TCounts
    verdict: Verdict
}
