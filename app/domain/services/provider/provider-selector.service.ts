import { injectable } from 'inversify';
import { supportsMediaType, type HealthStatus, type MediaType, type ProviderSnapshot } from '../../entities';

export interface IProviderSelectorService {
  select(candidates: readonly ProviderSnapshot[], mediaType: MediaType): ProviderSnapshot[];
}

const HEALTH_RANK: Record<HealthStatus, number> = {
  available: 0,
  unknown: 1,
  unavailable: 2
};

function compareCandidates(a: ProviderSnapshot, b: ProviderSnapshot): number {
  return HEALTH_RANK[a.health.status] - HEALTH_RANK[b.health.status]
    || a.priority - b.priority
    || a.stats.avgResponseTimeMs - b.stats.avgResponseTimeMs
    || (a.id < b.id ? -1 : a.id > b.id ? 1 : 0);
}

/**
 * Orders the providers able to serve `mediaType`: available first, then never
 * checked, each by priority, average latency and id. Unavailable providers are
 * returned only when nothing better is eligible.
 */
export function selectCandidates(candidates: readonly ProviderSnapshot[], mediaType: MediaType): ProviderSnapshot[] {
  const eligible = candidates.filter(provider => provider.isActive && supportsMediaType(provider.capabilities, mediaType));
  const reachable = eligible.filter(provider => provider.health.status !== 'unavailable');

  return (reachable.length > 0 ? reachable : eligible).sort(compareCandidates);
}

@injectable()
export class ProviderSelectorService implements IProviderSelectorService {
  select(candidates: readonly ProviderSnapshot[], mediaType: MediaType): ProviderSnapshot[] {
    return selectCandidates(candidates, mediaType);
  }
}
