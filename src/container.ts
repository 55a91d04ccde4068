import 'reflect-metadata';
import { Container } from '@azure/cosmos';
import { container, DependencyContainer, instanceCachingFactory } from 'tsyringe';
import { APP_CONSTANTS } from './shared/constants';
import { TYPES } from './shared/constants/types';

// --- Import Interfaces (Ports) ---
import { IConfigService } from './application/interfaces/IConfigService';
import { IDocumentClient } from './application/interfaces/IDocumentClient';
import { IDocumentStore } from './application/interfaces/IDocumentStore';
import { ILogger } from './application/interfaces/ILogger';

// --- Import Implementations ---
import { DocumentClient } from './application/services/document.client';
import { PaginationEngine } from './application/services/pagination.engine';
import { TenancyScoper } from './application/services/tenancy.scoper';
import { QueryTranslator } from './domain/query/QueryTranslator';
import {
    DocumentClientOptions,
    DocumentClientSettings,
    loadDocumentClientOptions,
    parseDocumentClientOptions,
} from './infrastructure/config/DocumentClientOptions';
import { EnvironmentConfigService } from './infrastructure/config/EnvironmentConfigService';
import { WinstonLogger } from './infrastructure/logging/WinstonLogger';
import { createCosmosContainer } from './infrastructure/persistence/cosmos/cosmos.client';
import { CosmosDocumentStore } from './infrastructure/persistence/cosmos/CosmosDocumentStore';
import { DocumentMapper } from './infrastructure/persistence/DocumentMapper';

// --- Register Infrastructure Services (Singletons) ---
// Built by hand: the constructor's optional env argument is not a DI dependency
container.register<IConfigService>(TYPES.ConfigService, {
    useFactory: instanceCachingFactory<IConfigService>(() => new EnvironmentConfigService()),
});
container.registerSingleton<ILogger>(TYPES.Logger, WinstonLogger);

export interface DocumentClientOverrides {
    /** Replaces the Cosmos-backed store, e.g. with an in-process stand-in. */
    store?: IDocumentStore;
    /** Replaces the container handle the Cosmos store talks to. */
    cosmosContainer?: Container;
    logger?: ILogger;
    /** Parent container to resolve shared services from. Defaults to the root container. */
    parent?: DependencyContainer;
}

/**
 * Creates a client for one container and namespace.
 *
 * Options and the namespace are validated before any store object is built.
 * @throws {ConfigurationError} When an option is invalid.
 */
export function createDocumentClient(options: DocumentClientOptions, overrides: DocumentClientOverrides = {}): IDocumentClient {
    const settings = parseDocumentClientOptions(options);
    const scoper = new TenancyScoper(settings.microserviceName);

    const scope = (overrides.parent ?? container).createChildContainer();
    scope.register<DocumentClientSettings>(TYPES.DocumentClientSettings, { useValue: settings });
    scope.register<TenancyScoper>(TYPES.TenancyScoper, { useValue: scoper });
    if (overrides.logger) {
        scope.register<ILogger>(TYPES.Logger, { useValue: overrides.logger });
    }

    if (overrides.store) {
        scope.register<IDocumentStore>(TYPES.DocumentStore, { useValue: overrides.store });
    } else {
        const cosmosContainer = overrides.cosmosContainer;
        scope.register<Container>(TYPES.CosmosContainer, {
            useFactory: instanceCachingFactory<Container>(c =>
                cosmosContainer ?? createCosmosContainer(c.resolve<DocumentClientSettings>(TYPES.DocumentClientSettings))
            ),
        });
        scope.registerSingleton<IDocumentStore>(TYPES.DocumentStore, CosmosDocumentStore);
    }

    scope.registerSingleton<QueryTranslator>(TYPES.QueryTranslator, QueryTranslator);
    scope.registerSingleton<DocumentMapper>(TYPES.DocumentMapper, DocumentMapper);
    scope.registerSingleton<PaginationEngine>(TYPES.PaginationEngine, PaginationEngine);
    scope.registerSingleton<IDocumentClient>(TYPES.DocumentClient, DocumentClient);

    return scope.resolve<IDocumentClient>(TYPES.DocumentClient);
}

/**
 * Creates a client from COSMOS_* and MICROSERVICE_NAME environment variables.
 */
export function createDocumentClientFromEnvironment(overrides: DocumentClientOverrides = {}): IDocumentClient {
    const parent = overrides.parent ?? container;
    const configService = parent.resolve<IConfigService>(TYPES.ConfigService);
    const logger = overrides.logger ?? parent.resolve<ILogger>(TYPES.Logger);

    const config = configService.getAllConfig();
    const clientConfig = Object.fromEntries(Object.values(APP_CONSTANTS.ENV).map(key => [key, config[key]]));
    logger.debug('Creating document client from environment', { config: clientConfig });
    return createDocumentClient(loadDocumentClientOptions(configService), { ...overrides, parent, logger });
}

// Export the configured container
export { container };
