import { PerfDatum, Severity, Verdict } from '../types/types'

interface FailureCounts {
    failed: number
    unstable: number
}

/**
 * failed tiene prioridad sobre unstable
 */
export function decideSeverity(counts: FailureCounts): Severity {
    if (counts.failed > 0) return Severity.CRITICAL
    if (counts.unstable > 0) return Severity.WARNING
    return Severity.OK
}

export function buildVerdict(
    counts: FailureCounts,
    okMessage: string,
    perfData: PerfDatum[],
    details: string[] = []
): Verdict {
    const severity = decideSeverity(counts)

    let message: string
    switch (severity) {
        case Severity.CRITICAL:
            message = `CRITICAL: ${counts.failed} jobs have a error status`
            break
        case Severity.WARNING:
            message = `WARNING: ${counts.unstable} jobs have a unstable status`
            break
        default:
            message = `OK: ${okMessage}`
    }

    return { severity, message, perfData, details }
}

export function unknownVerdict(reason: string): Verdict {
    return {
        severity: Severity.UNKNOWN,
        message: `UNKNOWN: ${reason}`,
        perfData: [],
        details: []
    }
}
