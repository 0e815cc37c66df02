export type ErrorCode =
    | 'interrupted'
    | 'invalid_config'
    | 'command_file'
    | 'unsupported_format'
    | 'experimental';

export class StructuredError extends Error {
    code: ErrorCode;
    constructor(code: ErrorCode, message: string) {
        super(message);
        this.name = 'StructuredError';
        this.code = code;
    }
}

/** Raised when a run is ended by an external interrupt before every task completed. */
export class InterruptedError extends StructuredError {
    readonly signal: string;
    constructor(signal: string) {
        super('interrupted', `user interrupt (${signal})`);
        this.name = 'InterruptedError';
        this.signal = signal;
    }
}

/** Single-line diagnostic for anything that was thrown. */
export function formatError(error: unknown) {
    const message = error instanceof Error ? error.message : String(error);
    return message.replace(/\s*\r?\n\s*/g, ' ').trim() || 'unknown error';
}

export function serializeError(error: unknown) {
    if (error instanceof StructuredError) {
        return { code: error.code, message: error.message };
    }
    return { message: formatError(error) };
}

/**
 * Splits a program prefix such as `/bin/sh -c` into words. Single and double
 * quotes group words; a backslash escapes the next character inside quotes.
 */
export function tokenizeCommandLine(input: string) {
    const tokens: string[] = [];
    let current = '';
    let quoted = false;
    let quote: '"' | "'" | undefined;
    let escaping = false;
    for (const char of input) {
        if (quote) {
            if (escaping) {
                current += char;
                escaping = false;
                continue;
            }
            if (char === '\\') {
                escaping = true;
                continue;
            }
            if (char === quote) {
                quote = undefined;
                continue;
            }
            current += char;
            continue;
        }
        if (char === '"' || char === "'") {
            quote = char;
            quoted = true;
            continue;
        }
        if (/\s/.test(char)) {
            if (current.length > 0 || quoted) {
                tokens.push(current);
                current = '';
                quoted = false;
            }
            continue;
        }
        current += char;
    }
    if (current.length > 0 || quoted) tokens.push(current);
    return tokens;
}

export function readIntegerEnv(name: string, fallback: number) {
    const raw = process.env[name];
    if (!raw || raw.trim().length === 0) {
        return fallback;
    }
    const parsed = Number(raw);
    if (!Number.isInteger(parsed) || parsed < 0) {
        return fallback;
    }
    return parsed;
}
