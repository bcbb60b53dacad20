/**
 * Application logging
 * Provides a global AppLog singleton that keeps recent messages for hosts to display.
 */

export type LogLevel = 'info' | 'warn' | 'error'

export interface LogEntry {
    timestamp: number
    level: LogLevel
    message: string
}

type LogListener = (entry: LogEntry) => void

export class Logger {
    private entries: LogEntry[] = []
    private listeners: Set<LogListener> = new Set()

    constructor(private maxEntries = 500) {}

    info(message: string): void {
        this.add('info', message)
        console.log(`[INFO] ${message}`)
    }

    warn(message: string): void {
        this.add('warn', message)
        console.warn(`[WARN] ${message}`)
    }

    error(message: string): void {
        this.add('error', message)
        console.error(`[ERROR] ${message}`)
    }

    getEntries(): readonly LogEntry[] {
        return this.entries
    }

    clear(): void {
        this.entries = []
    }

    onEntry(listener: LogListener): () => void {
        this.listeners.add(listener)
        return () => this.listeners.delete(listener)
    }

    private add(level: LogLevel, message: string): void {
        const entry: LogEntry = { timestamp: Date.now(), level, message }
        this.entries.push(entry)
        if (this.entries.length > this.maxEntries) {
            this.entries.shift()
        }
        for (const listener of this.listeners) {
            listener(entry)
        }
    }
}

/** Global application logger */
export const AppLog = new Logger()
