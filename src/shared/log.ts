"use strict";

import { Logger as DebugLogger, logger as debugLogger } from "@vscode/debugadapter";

export import LogLevel = DebugLogger.LogLevel;

/** The part of the debug adapter's logger the rest of the code uses, so tests can pass their own. */
export interface Logger {
    setup(minLevel: LogLevel): void;
    verbose(message: string): void;
    log(message: string): void;
    warn(message: string): void;
    error(message: string): void;
}

const LEVEL_NAMES = new Map<string, LogLevel>([
    ["verbose", LogLevel.Verbose],
    ["log", LogLevel.Log],
    ["warn", LogLevel.Warn],
    ["error", LogLevel.Error],
    ["stop", LogLevel.Stop],
]);

export function parseLogLevel(name: string): LogLevel | undefined {
    return LEVEL_NAMES.get(name.toLowerCase());
}

// there is no debug client to receive output events, so they go to the console
debugLogger.init((event) => {
    const stream = event.body.category === "stderr" ? process.stderr : process.stdout;
    stream.write(event.body.output);
});
debugLogger.setup(LogLevel.Log, /*logToFile=*/false, /*prependTimestamp=*/false);

export const logger: Logger = debugLogger;

export const nullLogger: Logger = {
    setup() { return; },
    verbose() { return; },
    log() { return; },
    warn() { return; },
    error() { return; },
};
