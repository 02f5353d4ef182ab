import * as dotenv from 'dotenv'
import type { EnvironmentDefaults } from '../types/config'

dotenv.config()

const DEFAULT_TIMEOUT_SECONDS = 10
const DEFAULT_DAYS = 1

export class Config {
    private static instance: Config

    private constructor() { }

    public static getInstance(): Config {
        if (!Config.instance) {
            Config.instance = new Config()
        }
        return Config.instance
    }

    public get defaults(): EnvironmentDefaults {
        return {
            username: process.env.JENKINS_USER || '',
            password: process.env.JENKINS_PASSWORD || '',
            timeoutSeconds: parseNumber(process.env.CHECK_TIMEOUT, DEFAULT_TIMEOUT_SECONDS, 1, true),
            days: parseNumber(process.env.CHECK_DAYS, DEFAULT_DAYS, 0, false)
        }
    }
}

// mismas reglas que -t y --days en la línea de comandos
function parseNumber(raw: string | undefined, fallback: number, min: number, integer: boolean): number {
    if (!raw || raw.trim() === '') return fallback
    const value = Number(raw)
    if (!Number.isFinite(value) || value < min) return fallback
    if (integer && !Number.isInteger(value)) return fallback
    return value
}
