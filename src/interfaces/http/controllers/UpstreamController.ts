/**
 * Upstream Controller — live maintenance check
 * Layer: Interfaces (HTTP)
 *
 * Runs the maintenance probe against every registered endpoint, in registry
 * order. Always 200: the verdicts are the payload, an upstream in maintenance
 * is not an error of this service.
 */
import { MaintenanceProbe } from '@application/services/MaintenanceProbe';
import { container } from '@core/container';
import { TOKENS } from '@core/types';
import type { EndpointRegistry } from '@infrastructure/upstream/EndpointRegistry';
import type { Request, Response } from 'express';

export class UpstreamController {
  private probe: MaintenanceProbe;
  private registry: EndpointRegistry;

  constructor() {
    this.probe = container.resolve<MaintenanceProbe>(TOKENS.MaintenanceProbe);
    this.registry = container.resolve<EndpointRegistry>(TOKENS.EndpointRegistry);
  }

  health = async (_req: Request, res: Response): Promise<void> => {
    const results = await this.probe.checkAll(this.registry.all());

    res.status(200).json({
      status: 'success',
      data: {
        endpoints: results.map(({ endpoint, verdict }) => ({
          id: endpoint.id,
          url: endpoint.url,
          format: endpoint.responseFormat,
          verdict,
        })),
      },
    });
  };
}
