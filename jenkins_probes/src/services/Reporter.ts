import type { PerfDatum, Verdict } from '../types/types'

export interface ReportOptions {
    perfData: boolean
}

export function formatPerfData(perfData: PerfDatum[]): string {
    return perfData.map(datum => `${datum.label}=${datum.value}`).join(' ')
}

/**
 * Línea de veredicto, línea de perfdata (|...) y detalle por job
 */
export function renderReport(verdict: Verdict, options: ReportOptions): string[] {
    const lines = [verdict.message]
    if (options.perfData && verdict.perfData.length > 0) {
        lines.push(`|${formatPerfData(verdict.perfData)}`)
    }
    lines.push(...verdict.details)
    return lines
}
