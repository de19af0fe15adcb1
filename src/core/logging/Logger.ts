// src/core/logging/Logger.ts

/**
 * Structured Logger Service
 *
 * Writes module-tagged lines to stderr so library output never mixes with a
 * host application's stdout:
 * 1. Structured output (timestamps, levels, modules)
 * 2. Secret redaction (error metadata often carries request details)
 * 3. Threshold taken from FAULTLINE_LOG_LEVEL, unless the caller supplies its own
 */

import { CONFIG } from '../../config/config';
import { LogLevel } from './LogLevel';

export { LogLevel } from './LogLevel';

export class Logger {
    private static currentLevel: LogLevel = CONFIG.ERRORS.LOG_LEVEL;

    /**
     * API keys (sk-...) and bearer tokens.
     */
    private static SECRET_REGEX = /sk-[a-zA-Z0-9_\-]{20,}|Bearer\s+[A-Za-z0-9._~+\/-]+=*/g;

    private static redactText(text: string): string {
        return text.replace(this.SECRET_REGEX, '[REDACTED]');
    }

    /**
     * Renders a message or context value as a redacted string.
     */
    private static render(value: unknown): string {
        if (typeof value === 'string') {
            return this.redactText(value);
        }

        let text: string | undefined;
        try {
            text = JSON.stringify(value);
        } catch (error) {
            // Circular structures and BigInt values
            text = `[unserializable: ${error instanceof Error ? error.message : String(error)}]`;
        }
        return this.redactText(text ?? String(value));
    }

    private static formatMessage(level: LogLevel, module: string, message: unknown, context?: unknown): string {
        const timestamp = new Date().toISOString();
        let log = `[${timestamp}] [${LogLevel[level]}] [${module}] ${this.render(message)}`;

        if (context !== undefined) {
            log += ` ${this.render(context)}`;
        }

        return log;
    }

    private static isEnabled(level: LogLevel): boolean {
        return this.currentLevel <= level;
    }

    /**
     * Writes one line at `level` regardless of the process-wide threshold.
     * Callers holding their own threshold (AppError.logIfEnabled) decide beforehand.
     */
    public static write(level: LogLevel, module: string, message: unknown, context?: unknown): void {
        console.error(this.formatMessage(level, module, message, context));
    }

    public static error(module: string, message: unknown, error?: unknown): void {
        if (!this.isEnabled(LogLevel.ERROR)) {
            return;
        }

        let errorDetails = '';
        if (error instanceof Error && error.stack) {
            errorDetails = ` Stack: ${this.redactText(error.stack)}`;
        } else if (error !== undefined) {
            errorDetails = ` Details: ${this.render(error)}`;
        }

        console.error(this.formatMessage(LogLevel.ERROR, module, message) + errorDetails);
    }
}
