// logger
// Provides structured logging utilities for the sync engine.

// Error/exit codes
// 0 success
// 1 error/exception
// 3 skipped (nothing to do for this item)

export interface LogChannel {
    appendLine(message: string): void;
}

export interface BufferChannel extends LogChannel {
    readonly lines: string[];
    clear(): void;
}

const PROCESS_TAG = '[view-template-sync]';

let channel: LogChannel | undefined;

export function createBufferChannel(): BufferChannel {
    const lines: string[] = [];
    return {
        lines,
        appendLine: (message: string) => { lines.push(message); },
        clear: () => { lines.length = 0; }
    };
}

export function initializeLogger(target?: LogChannel): LogChannel {
    if (target) {
        channel = target;
    } else if (!channel) {
        channel = createBufferChannel();
    }
    return channel;
}

export function getLoggerChannel(): LogChannel {
    return channel ?? initializeLogger();
}

export function logProcessCompletion(context: string, errorCode: number = 0): void {
    const line = `${PROCESS_TAG} Process completed (${context}) with error code -> ${errorCode}`;
    console.log(line);
    getLoggerChannel().appendLine(line);
}

export function appendOutputLine(message: string): void {
    getLoggerChannel().appendLine(message);
}

// Console and channel get the same tagged line, e.g. "[VIEW-SYNC] Cleared 3 control(s)".
export function logLine(tag: string, message: string): void {
    const line = `[${tag}] ${message}`;
    console.log(line);
    getLoggerChannel().appendLine(line);
}

export function logWarning(tag: string, message: string, error?: unknown): void {
    const line = `[${tag}] ${message}`;
    if (error === undefined) console.warn(line);
    else console.warn(line, error);
    getLoggerChannel().appendLine(line);
}

export function disposeLogger(): void {
    channel = undefined;
}
