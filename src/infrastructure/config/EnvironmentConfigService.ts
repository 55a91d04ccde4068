import { IConfigService } from '../../application/interfaces/IConfigService';
import { ConfigurationError } from '../../domain/exceptions/DocumentClientError';

export class EnvironmentConfigService implements IConfigService {
    private readonly config: Record<string, string | undefined>;

    // Keys matching these patterns are masked by getAllConfig()
    private readonly sensitiveKeyPatterns: RegExp[] = [
        /password/i,
        /secret/i,
        /(api|auth|private|cosmos)_?key/i,
        /token/i,
    ];

    constructor(env: Record<string, string | undefined> = process.env) {
        this.config = env;
        console.debug('[ConfigService] Configuration loaded from environment variables.');
    }

    get(key: string, defaultValue?: string): string | undefined {
        const value = this.config[key];
        // Return default if value is undefined OR an empty string
        if (value === undefined || value === '') {
            return defaultValue;
        }
        return value;
    }

    getOrThrow(key: string): string {
        const value = this.config[key];
        if (value === undefined || value === '') {
            throw new ConfigurationError(`Configuration error: Required environment variable "${key}" is missing or empty.`);
        }
        return value;
    }

    getNumber(key: string, defaultValue?: number): number | undefined {
        const value = this.config[key];
        if (value === undefined || value === '') {
            return defaultValue;
        }

        const num = parseFloat(value);
        if (isNaN(num)) {
            if (defaultValue !== undefined) {
                console.warn(`[ConfigService] Value for key "${key}" ("${value}") is not a valid number. Using default value: ${defaultValue}`);
                return defaultValue;
            }
            throw new ConfigurationError(`Configuration error: Environment variable "${key}" is not a valid number ("${value}").`);
        }
        return num;
    }

    getBoolean(key: string, defaultValue?: boolean): boolean | undefined {
        const value = this.config[key]?.trim().toLowerCase();
        if (value === undefined || value === '') {
            return defaultValue;
        }

        if (value === 'true' || value === '1') {
            return true;
        }
        if (value === 'false' || value === '0') {
            return false;
        }

        if (defaultValue !== undefined) {
            console.warn(`[ConfigService] Value for key "${key}" ("${this.config[key]}") is not a valid boolean. Using default value: ${defaultValue}`);
            return defaultValue;
        }
        throw new ConfigurationError(`Configuration error: Environment variable "${key}" is not a valid boolean ("${this.config[key]}"). Expected 'true', 'false', '1', or '0'.`);
    }

    getList(key: string, defaultValue: string[] = []): string[] {
        const value = this.config[key];
        if (value === undefined || value.trim() === '') {
            return defaultValue;
        }
        return value.split(',').map(entry => entry.trim()).filter(entry => entry !== '');
    }

    requireKeys(keys: readonly string[]): void {
        const missingKeys = keys.filter(key => !this.has(key) || this.config[key] === '');
        if (missingKeys.length > 0) {
            throw new ConfigurationError(
                `[ConfigService] Missing or empty required environment variables: ${missingKeys.join(', ')}`,
                { missingKeys }
            );
        }
    }

    /**
     * Retrieves all configuration values, with sensitive values masked.
     */
    getAllConfig(): Record<string, string | undefined> {
        const filteredConfig: Record<string, string | undefined> = {};
        for (const key of Object.keys(this.config)) {
            const isSensitive = this.sensitiveKeyPatterns.some(pattern => pattern.test(key));
            filteredConfig[key] = isSensitive ? '********' : this.config[key];
        }
        return filteredConfig;
    }

    has(key: string): boolean {
        // Checks for the existence of the key, regardless of value (even empty string)
        return this.config[key] !== undefined;
    }

    isDevelopment(): boolean {
        return this.get('NODE_ENV') === 'development';
    }

    isProduction(): boolean {
        return this.get('NODE_ENV') === 'production';
    }

    isTest(): boolean {
        return this.get('NODE_ENV') === 'test';
    }
}
