export { AuthPlugin, extractClientAddress } from './auth.plugin';
export { ErrorPlugin, mapErrorToResponse, type ErrorResponse, type MappedError } from './error.plugin';
export { MetricsPlugin } from './metrics.plugin';
export { SnakeCasePlugin, toSnakeCase, toCamelCase, toSnakeCaseKey, toCamelCaseKey } from './snake-case.plugin';
