/**
 * Composition root. Every token in `TOKENS` is bound here and nowhere else.
 *
 * Plain values (retry policy, endpoint registry, fetch and enrichment
 * settings) are built from `config` in this file, so services never import
 * config and tests construct them with other numbers. Services are registered
 * by class and resolved with their `@inject` constructor parameters.
 *
 * Integration tests import this module, re-register the edges (transport,
 * repository, sleep) and only then import the app.
 */
import 'reflect-metadata';
import { container } from 'tsyringe';

import { config } from './config';
import { logger } from './logger';
import { TOKENS } from './types';

import { ChunkPlanner } from '@application/services/ChunkPlanner';
import { IngestionOrchestrator, type OrchestratorOptions } from '@application/services/IngestionOrchestrator';
import { IngestionService } from '@application/services/IngestionService';
import { type EnrichmentSettings, MetadataEnricher } from '@application/services/MetadataEnricher';
import { MaintenanceProbe } from '@application/services/MaintenanceProbe';
import { ResponseExtractor } from '@application/services/ResponseExtractor';
import { type FetchSettings, RetryingFetcher } from '@application/services/RetryingFetcher';
import { type RetryPolicy, sleep } from '@application/services/backoff';
import { getDbConnection } from '@infrastructure/database/connection';
import { AxiosTransport, createUpstreamClient } from '@infrastructure/http/AxiosTransport';
import { PostgresDisclosureRepository } from '@infrastructure/repositories/PostgresDisclosureRepository';
import { EndpointRegistry } from '@infrastructure/upstream/EndpointRegistry';

const retryPolicy: RetryPolicy = { ...config.retry };

const fetchSettings: FetchSettings = {
  timeoutMs: config.upstream.timeoutMs,
  dateField: config.ingest.dateField,
  timezone: config.upstream.timezone,
  maintenanceSignature: config.upstream.maintenanceSignature,
};

const enrichmentSettings: EnrichmentSettings = { ...config.enrichment };

const orchestratorOptions: OrchestratorOptions = {
  pageSize: config.ingest.pageSize,
  maxPagesPerChunk: config.ingest.maxPagesPerChunk,
  concurrency: config.ingest.concurrency,
};

// Infrastructure
container.register(TOKENS.Logger, { useValue: logger });
container.register(TOKENS.Knex, { useValue: getDbConnection() });
container.register(TOKENS.HttpTransport, {
  useValue: new AxiosTransport(createUpstreamClient(config.upstream.userAgent)),
});
container.register(TOKENS.Sleep, { useValue: sleep });

// Configuration values
container.register(TOKENS.EndpointRegistry, {
  useValue: EndpointRegistry.fromSettings(config.upstream),
});
container.register(TOKENS.RetryPolicy, { useValue: retryPolicy });
container.register(TOKENS.FetchSettings, { useValue: fetchSettings });
container.register(TOKENS.OrchestratorOptions, { useValue: orchestratorOptions });
container.register(TOKENS.EnrichmentSettings, { useValue: enrichmentSettings });
container.register(TOKENS.SourceTimezone, { useValue: config.upstream.timezone });

// Repositories
container.register(TOKENS.DisclosureRepository, { useClass: PostgresDisclosureRepository });

// Services
container.register(TOKENS.MaintenanceProbe, { useClass: MaintenanceProbe });
container.register(TOKENS.ChunkPlanner, { useClass: ChunkPlanner });
container.register(TOKENS.RetryingFetcher, { useClass: RetryingFetcher });
container.register(TOKENS.ResponseExtractor, { useClass: ResponseExtractor });
container.register(TOKENS.MetadataEnricher, { useClass: MetadataEnricher });
container.register(TOKENS.IngestionOrchestrator, { useClass: IngestionOrchestrator });
container.register(TOKENS.IngestionService, { useClass: IngestionService });

export { container };
