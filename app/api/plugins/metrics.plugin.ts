import { Elysia, StatusMap } from 'elysia';
import type { IMetricsService } from '../../core/metrics';

type StatusValue = number | keyof typeof StatusMap | undefined;

function resolveStatus(status: StatusValue, fallback: number): number {
  if (typeof status === 'number') {
    return status;
  }
  return status === undefined ? fallback : StatusMap[status];
}

export class MetricsPlugin {
  constructor(private readonly metricsService: IMetricsService) {}

  createPlugin() {
    return new Elysia({ name: 'metrics' })
      .derive({ as: 'global' }, () => ({ startTime: Date.now() }))
      .onAfterResponse({ as: 'global' }, ({ request, route, set, startTime }) => {
        this.metricsService.recordHttpRequest(
          request.method,
          route || this.extractPath(request),
          resolveStatus(set.status, 200),
          Date.now() - startTime
        );
      })
      .onError({ as: 'global' }, ({ request, error, code }) => {
        const errorType = error instanceof Error ? error.name : String(code);
        this.metricsService.recordError(errorType, this.extractPath(request));
      });
  }

  private extractPath(request: Request): string {
    return URL.canParse(request.url) ? new URL(request.url).pathname : '/unknown';
  }
}
