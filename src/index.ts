import 'reflect-metadata';

export { container, createDocumentClient, createDocumentClientFromEnvironment } from './container';
export type { DocumentClientOverrides } from './container';

export type { IConfigService } from './application/interfaces/IConfigService';
export type { IDocumentClient } from './application/interfaces/IDocumentClient';
export type { IDocumentStore } from './application/interfaces/IDocumentStore';
export type { ILogger } from './application/interfaces/ILogger';
export { DocumentClient } from './application/services/document.client';
export { PaginationEngine } from './application/services/pagination.engine';
export { TenancyScoper } from './application/services/tenancy.scoper';

export { declaredFields, defineDocumentType } from './domain/entities/DocumentType';
export type { DocumentType, DocumentTypeOptions, StoredDocument } from './domain/entities/DocumentType';
export { ConfigurationError, EntityNotFoundError } from './domain/exceptions/DocumentClientError';
export { filterFor, filterOn, mapFilterFields } from './domain/query/Filter';
export type { ComparisonOperator, FilterBuilder, FilterExpression, FilterValue } from './domain/query/Filter';
export { QueryTranslator } from './domain/query/QueryTranslator';
export type { DocumentQuery, SortDirection, SortOrder } from './domain/query/QueryTranslator';

export { documentClientOptionsSchema, loadDocumentClientOptions, parseDocumentClientOptions } from './infrastructure/config/DocumentClientOptions';
export type { DocumentClientOptions, DocumentClientSettings } from './infrastructure/config/DocumentClientOptions';
export { EnvironmentConfigService } from './infrastructure/config/EnvironmentConfigService';
export { WinstonLogger } from './infrastructure/logging/WinstonLogger';
export { buildCosmosClientOptions, createCosmosContainer } from './infrastructure/persistence/cosmos/cosmos.client';
export { CosmosDocumentStore, isNotFoundError } from './infrastructure/persistence/cosmos/CosmosDocumentStore';
export { CosmosQueryRenderer } from './infrastructure/persistence/cosmos/CosmosQueryRenderer';
export type { QueryProjection } from './infrastructure/persistence/cosmos/CosmosQueryRenderer';
export { DocumentMapper } from './infrastructure/persistence/DocumentMapper';

export { BaseError, ValidationError } from './shared/errors/BaseError';
export type { DocumentRecord, PageResult } from './shared/types/query.types';
