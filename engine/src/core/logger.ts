export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type LogThreshold = LogLevel | 'silent';
export type LogSink = (line: string) => void;

const levelPrefix: Record<LogLevel, string> = {
    debug: '[debug]',
    info: '[info]',
    warn: '[warn]',
    error: '[error]'
};

export const LOG_THRESHOLDS = ['debug', 'info', 'warn', 'error', 'silent'] as const satisfies readonly LogThreshold[];

const levelRank: Record<LogThreshold, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
    silent: 100
};

// stdout carries the structured result, so every diagnostic goes to stderr.
const defaultSink: LogSink = (line) => {
    console.error(line);
};

let sink: LogSink = defaultSink;
let threshold: LogThreshold = parseThreshold(process.env.CMDMUX_LOG_LEVEL);

function isThreshold(value: string): value is LogThreshold {
    return Object.prototype.hasOwnProperty.call(levelRank, value);
}

export function parseThreshold(raw: string | undefined): LogThreshold {
    const value = (raw ?? '').trim().toLowerCase();
    return isThreshold(value) ? value : 'warn';
}

function write(level: LogLevel, message: string, details?: unknown) {
    if (levelRank[level] < levelRank[threshold]) {
        return;
    }
    const payload = details === undefined ? message : `${message} ${stringify(details)}`;
    sink(`[cmdmux] ${levelPrefix[level]} ${payload}`);
}

function stringify(value: unknown) {
    if (value instanceof Error) {
        return `${value.name}: ${value.message}`;
    }
    try {
        return JSON.stringify(value);
    } catch {
        return String(value);
    }
}

export const logger = {
    info(message: string, details?: unknown) {
        write('info', message, details);
    },
    warn(message: string, details?: unknown) {
        write('warn', message, details);
    },
    error(message: string, details?: unknown) {
        write('error', message, details);
    },
    debug(message: string, details?: unknown) {
        write('debug', message, details);
    },
    setThreshold(level: LogThreshold) {
        threshold = level;
    },
    // testing helper; passing undefined restores the stderr sink
    _setSinkForTests(next: LogSink | undefined) {
        sink = next ?? defaultSink;
    }
};
