export const APP_CONSTANTS = {
    DOCUMENTS: {
        ENTITY_TYPE_FIELD: 'EntityType',
        NAMESPACE_SEPARATOR: '.',
        STORE_ID_FIELD: 'id',
        // Properties Cosmos DB adds to every stored item
        SYSTEM_FIELDS: ['_rid', '_self', '_etag', '_attachments', '_ts'],
    },
    ENV: {
        COSMOS_ENDPOINT: 'COSMOS_ENDPOINT',
        COSMOS_KEY: 'COSMOS_KEY',
        COSMOS_DATABASE_ID: 'COSMOS_DATABASE_ID',
        COSMOS_COLLECTION_ID: 'COSMOS_COLLECTION_ID',
        COSMOS_PREFERRED_LOCATIONS: 'COSMOS_PREFERRED_LOCATIONS',
        COSMOS_ENABLE_ENDPOINT_DISCOVERY: 'COSMOS_ENABLE_ENDPOINT_DISCOVERY',
        MICROSERVICE_NAME: 'MICROSERVICE_NAME',
    },
} as const;
