/**
 * @license
 * Copyright 2022-2025 Matter.js Authors
 * SPDX-License-Identifier: Apache-2.0
 */

import { VariableService } from "../environment/VariableService.js";
import { Diagnostic } from "./Diagnostic.js";
import { LogLevel } from "./LogLevel.js";

/**
 * Output format.  "plain" renders one human-readable line per message; "json" renders one JSON object per message.
 */
export type LogFormat = "plain" | "json";

export interface LogEntry {
    readonly time: Date;
    readonly level: LogLevel;
    readonly facility: string;
    readonly message: string;
}

/**
 * Receives formatted log lines.
 */
export type LogDestination = (text: string, entry: LogEntry) => void;

function consoleDestination(text: string, entry: LogEntry) {
    if (entry.level >= LogLevel.ERROR) {
        console.error(text);
    } else if (entry.level === LogLevel.WARN) {
        console.warn(text);
    } else {
        console.log(text);
    }
}

/**
 * Facility-based logger.
 *
 * Obtain an instance per module with {@link Logger.get} and configure output globally via the static properties.
 * Messages below the effective level of a facility are discarded before any formatting takes place.
 */
export class Logger {
    static level = LogLevel.INFO;
    static format: LogFormat = "plain";
    static destination: LogDestination = consoleDestination;

    /**
     * Per-facility overrides of {@link Logger.level}.
     */
    static readonly facilityLevels = new Map<string, LogLevel>();

    static #loggers = new Map<string, Logger>();

    readonly #facility: string;

    constructor(facility: string) {
        this.#facility = facility;
    }

    /**
     * Obtain the logger for a facility.
     */
    static get(facility: string) {
        let logger = this.#loggers.get(facility);
        if (logger === undefined) {
            logger = new Logger(facility);
            this.#loggers.set(facility, logger);
        }
        return logger;
    }

    /**
     * Apply the "log.level" and "log.format" variables.
     */
    static configure(vars: VariableService) {
        const level = vars.get("log.level");
        if (level !== undefined) {
            this.level = LogLevel.from(level);
        }

        const format = vars.get("log.format");
        if (format === "plain" || format === "json") {
            this.format = format;
        }
    }

    /**
     * Apply "log.*" variables from `DEVTREE_*` environment variables.  Runs once when this module loads.
     */
    static configureFromEnvironment(env: Record<string, string | undefined> = process.env) {
        this.configure(new VariableService(env));
    }

    /**
     * Render values into a single message string.
     */
    static render(values: readonly unknown[]) {
        return values.map(renderValue).join(" ");
    }

    get facility() {
        return this.#facility;
    }

    get level() {
        return Logger.facilityLevels.get(this.#facility) ?? Logger.level;
    }

    isEnabled(level: LogLevel) {
        return level >= this.level;
    }

    debug(...values: unknown[]) {
        this.log(LogLevel.DEBUG, values);
    }

    info(...values: unknown[]) {
        this.log(LogLevel.INFO, values);
    }

    notice(...values: unknown[]) {
        this.log(LogLevel.NOTICE, values);
    }

    warn(...values: unknown[]) {
        this.log(LogLevel.WARN, values);
    }

    error(...values: unknown[]) {
        this.log(LogLevel.ERROR, values);
    }

    fatal(...values: unknown[]) {
        this.log(LogLevel.FATAL, values);
    }

    log(level: LogLevel, values: readonly unknown[]) {
        if (!this.isEnabled(level)) {
            return;
        }

        const entry: LogEntry = {
            time: new Date(),
            level,
            facility: this.#facility,
            message: Logger.render(values),
        };

        Logger.destination(formatEntry(entry, Logger.format), entry);
    }
}

Logger.configureFromEnvironment();

function formatEntry(entry: LogEntry, format: LogFormat) {
    if (format === "json") {
        return JSON.stringify({
            time: entry.time.toISOString(),
            level: LogLevel[entry.level],
            facility: entry.facility,
            message: entry.message,
        });
    }

    return `${entry.time.toISOString()} ${LogLevel[entry.level].padEnd(6)} ${entry.facility} ${entry.message}`;
}

function renderValue(value: unknown): string {
    if (Diagnostic.is(value)) {
        switch (value.kind) {
            case "strong":
                return renderValue(value.value);

            case "dict":
                return Object.entries(value.entries)
                    .filter(([, v]) => v !== undefined)
                    .map(([k, v]) => `${k}: ${renderValue(v)}`)
                    .join(" ");

            case "list":
                return value.items.map(renderValue).join(", ");
        }
    }

    if (value instanceof Error) {
        return `${value.name}: ${value.message}`;
    }

    if (Array.isArray(value)) {
        return `[${value.map(renderValue).join(", ")}]`;
    }

    switch (typeof value) {
        case "string":
            return value;

        case "object":
            if (value === null) {
                return "null";
            }
            return JSON.stringify(value);

        default:
            return String(value);
    }
}
