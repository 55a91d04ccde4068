
/**
 * Defines unique symbols used as injection tokens for dependency injection (tsyringe)
 * within the document client.
 */
export const TYPES = {
    // Ambient services
    Logger: Symbol.for('Logger'),
    ConfigService: Symbol.for('ConfigService'),

    // Per-client configuration
    DocumentClientSettings: Symbol.for('DocumentClientSettings'),

    // Persistence
    CosmosContainer: Symbol.for('CosmosContainer'), // @azure/cosmos Container handle
    DocumentStore: Symbol.for('DocumentStore'),

    // Client components
    TenancyScoper: Symbol.for('TenancyScoper'),
    DocumentMapper: Symbol.for('DocumentMapper'),
    QueryTranslator: Symbol.for('QueryTranslator'),
    PaginationEngine: Symbol.for('PaginationEngine'),
    DocumentClient: Symbol.for('DocumentClient'),
};
