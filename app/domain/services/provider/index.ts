export {
  ProviderRegistryService,
  type IProviderRegistryService,
  type CreateProviderInput,
  type UpdateProviderInput,
  type UsageRecord
} from './provider-registry.service';
export { ProviderSelectorService, selectCandidates, type IProviderSelectorService } from './provider-selector.service';
export {
  StatsTrackerService,
  type IStatsTrackerService,
  type ProviderUsageStats,
  type UsageStatsReport
} from './stats-tracker.service';
export { AdapterFactoryService, type IAdapterFactoryService } from './adapter-factory.service';
