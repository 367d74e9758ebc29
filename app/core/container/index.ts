export { ApplicationContainer, container, type IApplicationContainer, type ContainerConfiguration, type CacheBackend } from './container';
export { TYPES } from './types';
