// src/application/interfaces/IConfigService.ts

/**
 * Defines the contract for accessing configuration values.
 */
export interface IConfigService {
    /**
     * Retrieves a configuration value. Can optionally provide a default.
     * Considers undefined or empty string as "not set" when checking for default.
     * @param key - The configuration key.
     * @param defaultValue - Optional default value if the key is not found or is an empty string.
     */
    get(key: string, defaultValue?: string): string | undefined;

    /**
     * Retrieves a configuration value.
     * @throws {ConfigurationError} If the configuration value is missing or empty.
     */
    getOrThrow(key: string): string;

    /**
     * Retrieves a configuration value, ensuring it's a number.
     * @throws {ConfigurationError} If the value cannot be parsed as a number and no default is provided.
     */
    getNumber(key: string, defaultValue?: number): number | undefined;

    /**
     * Retrieves a configuration value, ensuring it's a boolean.
     * Parses 'true', '1' as true, and 'false', '0' as false (case-insensitive).
     * @throws {ConfigurationError} If the value cannot be parsed as a boolean and no default is provided.
     */
    getBoolean(key: string, defaultValue?: boolean): boolean | undefined;

    /**
     * Retrieves a comma-separated configuration value as a list of trimmed entries.
     * Returns the default (or an empty list) when the key is not set.
     */
    getList(key: string, defaultValue?: string[]): string[];

    /**
     * Verifies that every key is set to a non-empty value.
     * @throws {ConfigurationError} Listing every missing key.
     */
    requireKeys(keys: readonly string[]): void;

    isDevelopment(): boolean;
    isProduction(): boolean;
    isTest(): boolean;
    getAllConfig(): Record<string, string | undefined>; // Sensitive values masked
    has(key: string): boolean;
}
