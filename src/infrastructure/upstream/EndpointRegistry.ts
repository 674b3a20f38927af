/**
 * Endpoint Registry
 * Layer: Infrastructure
 *
 * Ordered, read-only list of upstream endpoints: primary JSON search first,
 * XML export fallback second. The orchestrator walks it in order, both when
 * probing for a healthy endpoint and when an endpoint disappears mid-run.
 */
import type { Endpoint, ResponseFormat } from '@domain/entities/Endpoint';
import { ValidationError } from '@shared/errors/AppError';
import { Duration } from 'luxon';

export interface SpanSetting {
  months: number;
  days: number;
}

export interface EndpointSetting {
  url: string;
  safeSpan: SpanSetting;
}

export interface UpstreamSettings {
  primary: EndpointSetting;
  fallback: EndpointSetting;
}

export class EndpointRegistry {
  private readonly endpoints: readonly Endpoint[];

  constructor(endpoints: Endpoint[]) {
    if (endpoints.length === 0) {
      throw new ValidationError('At least one upstream endpoint must be configured');
    }
    const ids = new Set(endpoints.map((e) => e.id));
    if (ids.size !== endpoints.length) {
      throw new ValidationError('Upstream endpoint ids must be unique');
    }
    this.endpoints = Object.freeze(endpoints.map((e) => Object.freeze({ ...e })));
  }

  static fromSettings(settings: UpstreamSettings): EndpointRegistry {
    const endpoints: Endpoint[] = [
      buildEndpoint('primary-json', 'json', true, settings.primary),
    ];
    if (settings.fallback.url) {
      endpoints.push(buildEndpoint('fallback-xml', 'xml', false, settings.fallback));
    }
    return new EndpointRegistry(endpoints);
  }

  get size(): number {
    return this.endpoints.length;
  }

  all(): readonly Endpoint[] {
    return this.endpoints;
  }

  at(index: number): Endpoint | undefined {
    return this.endpoints[index];
  }

  indexOf(id: string): number {
    return this.endpoints.findIndex((e) => e.id === id);
  }
}

function buildEndpoint(
  id: string,
  responseFormat: ResponseFormat,
  supportsFieldFilter: boolean,
  setting: EndpointSetting,
): Endpoint {
  const safeSpan = Duration.fromObject({
    months: setting.safeSpan.months,
    days: setting.safeSpan.days,
  });
  if (safeSpan.toMillis() <= 0) {
    throw new ValidationError(`Endpoint "${id}" needs a positive safe span`);
  }
  return {
    id,
    url: setting.url,
    responseFormat,
    supportsFieldFilter,
    supportsPaging: true,
    safeSpan,
  };
}
