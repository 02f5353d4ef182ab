export type Tracer = (message: string) => void

// stdout queda reservado para la salida del plugin
export function createTracer(enabled: boolean, scope: string): Tracer {
    if (!enabled) {
        return () => undefined
    }
    return (message: string) => console.error(`[${scope}] ${message}`)
}
