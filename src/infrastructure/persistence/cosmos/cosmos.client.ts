import { Container, CosmosClient, CosmosClientOptions } from '@azure/cosmos';
import { DocumentClientSettings } from '../../config/DocumentClientOptions';

/**
 * Builds the SDK options for a client: endpoint, key and connection policy.
 *
 * Preferred locations drive geo-distributed reads. Endpoint discovery is turned
 * off for the local emulator, which cannot serve regional endpoints.
 */
export function buildCosmosClientOptions(settings: DocumentClientSettings): CosmosClientOptions {
    const preferredLocations = settings.preferredLocations
        .map(location => location.trim())
        .filter(location => location !== '');

    return {
        endpoint: settings.serviceEndpoint,
        key: settings.authKey,
        connectionPolicy: {
            enableEndpointDiscovery: settings.enableEndpointDiscovery,
            ...(settings.enableEndpointDiscovery && preferredLocations.length > 0 ? { preferredLocations } : {}),
        },
    };
}

/**
 * Opens the container handle shared by every operation of one client. No request
 * is sent until the first operation.
 */
export function createCosmosContainer(settings: DocumentClientSettings, client?: CosmosClient): Container {
    const cosmosClient = client ?? new CosmosClient(buildCosmosClientOptions(settings));
    return cosmosClient.database(settings.databaseId).container(settings.collectionId);
}
