/**
 * Defines the contract for logging services used by the document client.
 */
export interface ILogger {
    /**
     * Logs an informational message.
     * @param message - The message to log.
     * @param meta - Optional metadata to include with the log.
     */
    info(message: string, meta?: Record<string, unknown>): void;

    /**
     * Logs a warning message.
     * @param message - The message to log.
     * @param meta - Optional metadata to include with the log.
     */
    warn(message: string, meta?: Record<string, unknown>): void;

    /**
     * Logs an error message.
     * @param message - The message to log.
     * @param error - Optional error object or details.
     * @param meta - Optional metadata to include with the log.
     */
    error(message: string, error?: unknown, meta?: Record<string, unknown>): void;

    /**
     * Logs a debug message.
     * @param message - The message to log.
     * @param meta - Optional metadata to include with the log.
     */
    debug(message: string, meta?: Record<string, unknown>): void;
}
