/**
 * Reporter: the logging façade the metabolism core writes to.
 *
 * The core never branches on what it logs. Console output follows the
 * `[Tag] message` convention used across the services.
 */

import { loadConfig, type LogLevel } from '../../config';

export type ReportSeverity = Exclude<LogLevel, 'silent'>;

export interface ReportRecord {
    severity: ReportSeverity;
    source: string;
    message: string;
}

export interface Reporter {
    logDebug(source: string, message: string): void;
    logEvent(source: string, message: string): void;
    logWarning(source: string, message: string): void;
    logError(source: string, message: string): void;
}

const SEVERITY_RANK: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
    silent: 100,
};

abstract class LevelledReporter implements Reporter {
    constructor(protected readonly level: LogLevel) {}

    protected abstract write(record: ReportRecord): void;

    private emit(severity: ReportSeverity, source: string, message: string): void {
        if (SEVERITY_RANK[severity] < SEVERITY_RANK[this.level]) return;
        this.write({ severity, source, message });
    }

    logDebug(source: string, message: string): void {
        this.emit('debug', source, message);
    }

    logEvent(source: string, message: string): void {
        this.emit('info', source, message);
    }

    logWarning(source: string, message: string): void {
        this.emit('warn', source, message);
    }

    logError(source: string, message: string): void {
        this.emit('error', source, message);
    }
}

export class ConsoleReporter extends LevelledReporter {
    protected write({ severity, source, message }: ReportRecord): void {
        const line = `[${source}] ${message}`;
        switch (severity) {
            case 'debug':
                console.debug(line);
                break;
            case 'info':
                console.log(line);
                break;
            case 'warn':
                console.warn(line);
                break;
            case 'error':
                console.error(line);
                break;
        }
    }
}

/** Keeps every record in memory; used by tests and by callers that render a log afterwards. */
export class MemoryReporter extends LevelledReporter {
    readonly records: ReportRecord[] = [];

    constructor(level: LogLevel = 'debug') {
        super(level);
    }

    protected write(record: ReportRecord): void {
        this.records.push(record);
    }

    messages(severity?: ReportSeverity): string[] {
        return this.records
            .filter((r) => severity === undefined || r.severity === severity)
            .map((r) => r.message);
    }

    clear(): void {
        this.records.length = 0;
    }
}

export const silentReporter: Reporter = {
    logDebug: () => {},
    logEvent: () => {},
    logWarning: () => {},
    logError: () => {},
};

let defaultReporter: Reporter | undefined;

/** Process-wide console reporter, levelled by BIOENERGETICS_LOG_LEVEL. */
export function getDefaultReporter(): Reporter {
    if (!defaultReporter) {
        defaultReporter = new ConsoleReporter(loadConfig().logLevel);
    }
    return defaultReporter;
}

export function setDefaultReporter(reporter: Reporter | undefined): void {
    defaultReporter = reporter;
}
