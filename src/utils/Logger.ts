/**
 * 📝 Logger - unified logging for the renderer
 *
 * Categorised console output with emoji prefixes. Tick details stay hidden
 * unless explicitly switched on, otherwise a 60 Hz host loop floods the terminal.
 */

export const LogLevel = {
    DEBUG: 0,
    INFO: 1,
    SUCCESS: 2,
    WARNING: 3,
    ERROR: 4,
    SILENT: 5
} as const;

export type LogLevel = typeof LogLevel[keyof typeof LogLevel];

export function parseLogLevel(name: string | undefined): LogLevel | null {
    if (!name) return null;
    const key = name.trim().toUpperCase();
    for (const [levelName, level] of Object.entries(LogLevel)) {
        if (levelName === key) return level;
    }
    return null;
}

export class Logger {
    private static instance: Logger;
    private logLevel: LogLevel;
    private showTickDetails: boolean = false;

    private constructor() {
        this.logLevel = parseLogLevel(process.env.RAYTRACER_LOG_LEVEL) ?? LogLevel.INFO;
    }

    public static getInstance(): Logger {
        if (!Logger.instance) {
            Logger.instance = new Logger();
        }
        return Logger.instance;
    }

    public setLogLevel(level: LogLevel): void {
        this.logLevel = level;
    }

    public setShowTickDetails(enabled: boolean): void {
        this.showTickDetails = enabled;
    }

    private log(level: LogLevel, emoji: string, category: string, message: string, ...args: unknown[]): void {
        if (level < this.logLevel) return;

        if (category.startsWith('TICK') && !this.showTickDetails) {
            return;
        }

        const line = `${emoji} [${category}] ${message}`;
        if (level >= LogLevel.ERROR) {
            console.error(line, ...args);
        } else if (level === LogLevel.WARNING) {
            console.warn(line, ...args);
        } else {
            console.log(line, ...args);
        }
    }

    // ===== CATEGORISED LOGGING =====

    public init(message: string, ...args: unknown[]): void {
        this.log(LogLevel.INFO, '🔧', 'INIT', message, ...args);
    }

    public scene(message: string, ...args: unknown[]): void {
        this.log(LogLevel.INFO, '🎬', 'SCENE', message, ...args);
    }

    public worker(stripIndex: number, message: string, ...args: unknown[]): void {
        this.log(LogLevel.DEBUG, '🧵', `WORKER ${stripIndex}`, message, ...args);
    }

    public tick(tickNumber: number, message: string, ...args: unknown[]): void {
        this.log(LogLevel.INFO, '⏱️', `TICK ${tickNumber}`, message, ...args);
    }

    public debug(message: string, ...args: unknown[]): void {
        this.log(LogLevel.DEBUG, '🔍', 'DEBUG', message, ...args);
    }

    public info(message: string, ...args: unknown[]): void {
        this.log(LogLevel.INFO, 'ℹ️', 'INFO', message, ...args);
    }

    public success(message: string, ...args: unknown[]): void {
        this.log(LogLevel.SUCCESS, '✅', 'SUCCESS', message, ...args);
    }

    public warning(message: string, ...args: unknown[]): void {
        this.log(LogLevel.WARNING, '⚠️', 'WARNING', message, ...args);
    }

    public error(message: string, ...args: unknown[]): void {
        this.log(LogLevel.ERROR, '❌', 'ERROR', message, ...args);
    }
}
