/**
 * Dependency Injection Tokens
 * Layer: Core
 *
 * Every injectable dependency is looked up by one of these symbols. Grouped by
 * layer so it is easy to see what exists at each level; register a new token
 * here before wiring it in container.ts.
 */
export const TOKENS = {
  // Infrastructure
  Knex: Symbol.for('Knex'),
  Logger: Symbol.for('Logger'),
  HttpTransport: Symbol.for('HttpTransport'),
  Sleep: Symbol.for('Sleep'),
  FetchSettings: Symbol.for('FetchSettings'),

  // Configuration values
  EndpointRegistry: Symbol.for('EndpointRegistry'),
  RetryPolicy: Symbol.for('RetryPolicy'),
  OrchestratorOptions: Symbol.for('OrchestratorOptions'),
  EnrichmentSettings: Symbol.for('EnrichmentSettings'),
  SourceTimezone: Symbol.for('SourceTimezone'),

  // Repositories
  DisclosureRepository: Symbol.for('DisclosureRepository'),

  // Services
  MaintenanceProbe: Symbol.for('MaintenanceProbe'),
  ChunkPlanner: Symbol.for('ChunkPlanner'),
  RetryingFetcher: Symbol.for('RetryingFetcher'),
  ResponseExtractor: Symbol.for('ResponseExtractor'),
  MetadataEnricher: Symbol.for('MetadataEnricher'),
  IngestionOrchestrator: Symbol.for('IngestionOrchestrator'),
  IngestionService: Symbol.for('IngestionService'),
} as const;
