import { Command, CommanderError, InvalidArgumentError } from 'commander'
import { Config } from '../config/Config'
import { UsageError } from '../errors/ProbeErrors'
import type { ProbeDefinition } from '../probes/definitions'
import { renderReport } from '../services/Reporter'
import { runProbe } from '../services/ProbeRunner'
import type { ProbeDependencies } from '../services/ProbeRunner'
import type { ProbeOptions, ProxySetting } from '../types/config'
import { Severity } from '../types/types'

export interface CliIO {
    stdout: (text: string) => void
    stderr: (text: string) => void
}

export const processIO: CliIO = {
    stdout: text => { process.stdout.write(text) },
    stderr: text => { process.stderr.write(text) }
}

type CliFlags = {
    debug?: boolean
    timeout?: number
    proxy?: string
    noproxy?: boolean
    noperfdata?: boolean
    insecure?: boolean
    username?: string
    password?: string
    man?: boolean
    days?: number
}

export type ParsedCommandLine =
    | { kind: 'run', options: ProbeOptions }
    | { kind: 'exit', severity: Severity }

export const MISSING_URL_MESSAGE = 'UNKNOWN: Missing Jenkins url parameter'

function parseTimeout(value: string): number {
    const seconds = Number(value)
    if (!Number.isInteger(seconds) || seconds <= 0) {
        throw new InvalidArgumentError('Timeout must be a positive integer.')
    }
    return seconds
}

function parseDays(value: string): number {
    const days = Number(value)
    if (value.trim() === '' || !Number.isFinite(days) || days < 0) {
        throw new InvalidArgumentError('Days must be a non-negative number.')
    }
    return days
}

function parseProxyUrl(value: string): string {
    let parsed: URL
    try {
        parsed = new URL(value)
    } catch {
        throw new InvalidArgumentError('Proxy must be an absolute URL.')
    }
    if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
        throw new InvalidArgumentError('Proxy must use http or https.')
    }
    return value
}

export function buildProgram<TJob, TCounts>(
    definition: ProbeDefinition<TJob, TCounts>,
    io: CliIO
): Command {
    const defaults = Config.getInstance().defaults
    const program = new Command(definition.name)

    program
        .usage('[options] <jenkins-url>')
        .description(definition.summary)
        .argument('[jenkins-url]', 'base URL of the Jenkins server')
        .version(definition.version, '-v, --version', 'prints the version of this tool and exits')
        .option('-d, --debug', 'turns on debug traces')
        .option(
            '-t, --timeout <timeout>',
            `the timeout in seconds to wait for the request (default ${defaults.timeoutSeconds})`,
            parseTimeout
        )
        .option('--proxy <url>', 'the http proxy url (default from HTTP_PROXY env)', parseProxyUrl)
        .option('--noproxy', 'do not use HTTP_PROXY env')
        .option('--noperfdata', 'do not output perfdata')
        .option('--insecure', 'allow HTTPS insecure connection (self signed, expired, ...)')
        .option('-u, --username <username>', 'the username for authentication')
        .option('-p, --password <password>', 'the password for authentication')
        .option('--man', 'prints manual and exits')

    if (definition.acceptsDays) {
        program.option('--days <days>', `max days since lastBuild (default ${defaults.days})`, parseDays)
    }

    program
        .helpOption('-h, --help', 'prints a brief help message and exits')
        .allowExcessArguments(false)
        .exitOverride()
        .configureOutput({ writeOut: io.stdout, writeErr: io.stderr })

    return program
}

/**
 * Interpreta argv (sin node ni el script). --help, --version, --man y los
 * errores de commander terminan en UNKNOWN sin hacer ningún request; sin URL
 * lanza UsageError.
 */
export function parseCommandLine<TJob, TCounts>(
    definition: ProbeDefinition<TJob, TCounts>,
    argv: string[],
    io: CliIO
): ParsedCommandLine {
    const program = buildProgram(definition, io)

    try {
        program.parse(argv, { from: 'user' })
    } catch (error) {
        if (error instanceof CommanderError) {
            return { kind: 'exit', severity: Severity.UNKNOWN }
        }
        throw error
    }

    const flags = program.opts<CliFlags>()
    if (flags.man) {
        io.stdout(`${program.helpInformation()}\n${definition.description}\n`)
        return { kind: 'exit', severity: Severity.UNKNOWN }
    }

    if (program.args.length !== 1) {
        throw new UsageError(MISSING_URL_MESSAGE, program.helpInformation())
    }

    const defaults = Config.getInstance().defaults
    let proxy: ProxySetting = { mode: 'environment' }
    if (flags.proxy) {
        proxy = { mode: 'explicit', url: flags.proxy }
    } else if (flags.noproxy) {
        proxy = { mode: 'disabled' }
    }

    return {
        kind: 'run',
        options: {
            jenkins: {
                baseUrl: program.args[0].replace(/\/$/, ''),
                username: flags.username ?? defaults.username,
                password: flags.password ?? defaults.password,
                timeoutSeconds: flags.timeout ?? defaults.timeoutSeconds,
                proxy,
                insecure: Boolean(flags.insecure)
            },
            debug: Boolean(flags.debug),
            perfData: !flags.noperfdata,
            days: flags.days ?? defaults.days
        }
    }
}

export async function runCli<TJob, TCounts>(
    definition: ProbeDefinition<TJob, TCounts>,
    argv: string[],
    io: CliIO = processIO,
    deps: ProbeDependencies = {}
): Promise<Severity> {
    let parsed: ParsedCommandLine
    try {
        parsed = parseCommandLine(definition, argv, io)
    } catch (error) {
        if (error instanceof UsageError) {
            io.stdout(`${error.message}\n`)
            io.stderr(error.usage)
            return Severity.UNKNOWN
        }
        throw error
    }
    if (parsed.kind === 'exit') {
        return parsed.severity
    }

    const { verdict, counts } = await runProbe(definition, parsed.options, deps)
    const lines = renderReport(verdict, { perfData: parsed.options.perfData })
    io.stdout(`${lines.join('\n')}\n`)

    // fuera de stdout para no tocar la salida del plugin
    if (counts !== undefined) {
        for (const note of definition.notes(counts)) {
            io.stderr(`${note}\n`)
        }
    }
    return verdict.severity
}

/**
 * Punto de entrada de los ejecutables: fija el exit code y deja que stdout se vacíe
 */
export function main<TJob, TCounts>(definition: ProbeDefinition<TJob, TCounts>): void {
    runCli(definition, process.argv.slice(2))
        .then(severity => {
            process.exitCode = severity
        })
        .catch((error: unknown) => {
            console.log(`UNKNOWN: ${error instanceof Error ? error.message : String(error)}`)
            process.exitCode = Severity.UNKNOWN
        })
}
