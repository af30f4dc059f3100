/**
 * @license
 * Copyright 2022-2025 Matter.js Authors
 * SPDX-License-Identifier: Apache-2.0
 */

import { ImplementationError } from "../DeviceError.js";

/**
 * Logging severity.
 */
export enum LogLevel {
    DEBUG = 0,
    INFO = 1,
    NOTICE = 2,
    WARN = 3,
    ERROR = 4,
    FATAL = 5,
}

export namespace LogLevel {
    /**
     * Parse a level from its name (case-insensitive) or numeric value.
     */
    export function from(level: string | number): LogLevel {
        if (typeof level === "number") {
            if (Number.isInteger(level) && level >= LogLevel.DEBUG && level <= LogLevel.FATAL) {
                return level;
            }
            throw new ImplementationError(`Unsupported log level ${level}`);
        }

        switch (level.trim().toLowerCase()) {
            case "debug":
                return LogLevel.DEBUG;
            case "info":
                return LogLevel.INFO;
            case "notice":
                return LogLevel.NOTICE;
            case "warn":
                return LogLevel.WARN;
            case "error":
                return LogLevel.ERROR;
            case "fatal":
                return LogLevel.FATAL;
        }

        if (/^\d+$/.test(level.trim())) {
            return from(Number.parseInt(level, 10));
        }

        throw new ImplementationError(`Unsupported log level "${level}"`);
    }
}
