import { z } from 'zod';
import { IConfigService } from '../../application/interfaces/IConfigService';
import { ConfigurationError } from '../../domain/exceptions/DocumentClientError';
import { APP_CONSTANTS } from '../../shared/constants';

const emptyMessage = (name: string) => `${name} cannot be null or empty`;

const required = (name: string) => z.string({ required_error: emptyMessage(name), invalid_type_error: emptyMessage(name) })
    .trim()
    .min(1, { message: emptyMessage(name) });

export const documentClientOptionsSchema = z.object({
    serviceEndpoint: required('serviceEndpoint').url({ message: 'serviceEndpoint must be an absolute URL' }),
    authKey: required('authKey'),
    databaseId: required('databaseId'),
    collectionId: required('collectionId'),
    preferredLocations: z.array(z.string(), {
        required_error: emptyMessage('preferredLocations'),
        invalid_type_error: emptyMessage('preferredLocations'),
    }).min(1, { message: emptyMessage('preferredLocations') }),
    microserviceName: z.string().nullish().transform(name => name?.trim() ?? ''),
    enableEndpointDiscovery: z.boolean().default(true),
});

/** Construction parameters of a document client. */
export type DocumentClientOptions = z.input<typeof documentClientOptionsSchema>;

/** Validated, normalised construction parameters. */
export type DocumentClientSettings = z.output<typeof documentClientOptionsSchema>;

/**
 * Validates client options synchronously.
 * @throws {ConfigurationError} Naming every invalid option.
 */
export function parseDocumentClientOptions(options: DocumentClientOptions): DocumentClientSettings {
    const result = documentClientOptionsSchema.safeParse(options);
    if (!result.success) {
        const issues = result.error.issues.map(issue => issue.message);
        throw new ConfigurationError(issues.join('; '), { issues: result.error.flatten().fieldErrors });
    }
    return result.data;
}

/**
 * Reads client options from the environment.
 */
export function loadDocumentClientOptions(configService: IConfigService): DocumentClientOptions {
    const { ENV } = APP_CONSTANTS;
    configService.requireKeys([
        ENV.COSMOS_ENDPOINT,
        ENV.COSMOS_KEY,
        ENV.COSMOS_DATABASE_ID,
        ENV.COSMOS_COLLECTION_ID,
        ENV.COSMOS_PREFERRED_LOCATIONS,
    ]);

    return {
        serviceEndpoint: configService.getOrThrow(ENV.COSMOS_ENDPOINT),
        authKey: configService.getOrThrow(ENV.COSMOS_KEY),
        databaseId: configService.getOrThrow(ENV.COSMOS_DATABASE_ID),
        collectionId: configService.getOrThrow(ENV.COSMOS_COLLECTION_ID),
        preferredLocations: configService.getList(ENV.COSMOS_PREFERRED_LOCATIONS),
        microserviceName: configService.get(ENV.MICROSERVICE_NAME),
        enableEndpointDiscovery: configService.getBoolean(ENV.COSMOS_ENABLE_ENDPOINT_DISCOVERY, true),
    };
}
