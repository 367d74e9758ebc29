export { createProviderAdapter, getAdapterClass, type ProviderAdapterClass } from './adapter-registry';
