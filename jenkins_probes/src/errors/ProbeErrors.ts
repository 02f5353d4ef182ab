/**
 * Línea de comandos incompleta; `usage` se imprime en stderr
 */
export class UsageError extends Error {
    constructor(message: string, public readonly usage: string = '') {
        super(message)
        this.name = 'UsageError'
    }
}

/**
 * Fallo de transporte: conexión, TLS, timeout o status fuera de 2xx
 */
export class JenkinsRequestError extends Error {
    constructor(public readonly url: string, public readonly reason: string) {
        super(`Failed retrieving ${url} (${reason})`)
        this.name = 'JenkinsRequestError'
    }
}

/**
 * El body no es JSON o no trae la lista de jobs esperada
 */
export class ResponseFormatError extends Error {
    constructor(public readonly url: string, public readonly detail: string) {
        super(`Unexpected response from ${url} (${detail})`)
        this.name = 'ResponseFormatError'
    }
}
