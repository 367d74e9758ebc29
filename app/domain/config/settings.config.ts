import { Type, type Static } from '@sinclair/typebox';
import { TypeCompiler } from '@sinclair/typebox/compiler';

export const SettingsSchema = Type.Object({
  healthCheckIntervalSeconds: Type.Integer({ minimum: 1, maximum: 86400 }),
  autoHealthCheckEnabled: Type.Boolean(),
  pollingEnabled: Type.Boolean(),
  cacheEnabled: Type.Boolean(),
  cacheTtlSeconds: Type.Integer({ minimum: 1, maximum: 2592000 }),
  batchEnabled: Type.Boolean(),
  maxAttempts: Type.Integer({ minimum: 1, maximum: 20 }),
  requestDeadlineMs: Type.Integer({ minimum: 1, maximum: 600000 }),
  attemptTimeoutMs: Type.Integer({ minimum: 1, maximum: 300000 }),
  probeTimeoutMs: Type.Integer({ minimum: 1, maximum: 120000 })
}, { additionalProperties: false });

export const SettingsPatchSchema = Type.Partial(SettingsSchema, { additionalProperties: false });

export type Settings = Static<typeof SettingsSchema>;
export type SettingsPatch = Static<typeof SettingsPatchSchema>;

export const DEFAULT_SETTINGS: Readonly<Settings> = Object.freeze({
  healthCheckIntervalSeconds: 30,
  autoHealthCheckEnabled: true,
  pollingEnabled: true,
  cacheEnabled: true,
  cacheTtlSeconds: 3600,
  batchEnabled: false,
  maxAttempts: 4,
  requestDeadlineMs: 120000,
  attemptTimeoutMs: 60000,
  probeTimeoutMs: 10000
});

type SettingKind = 'integer' | 'boolean';

export const SETTINGS_ENVIRONMENT: Readonly<Record<keyof Settings, { readonly variable: string; readonly kind: SettingKind }>> = {
  healthCheckIntervalSeconds: { variable: 'AI_HEALTH_CHECK_INTERVAL', kind: 'integer' },
  autoHealthCheckEnabled: { variable: 'AI_AUTO_HEALTH_CHECK_ENABLED', kind: 'boolean' },
  pollingEnabled: { variable: 'AI_POLLING_ENABLED', kind: 'boolean' },
  cacheEnabled: { variable: 'AI_CACHE_ENABLED', kind: 'boolean' },
  cacheTtlSeconds: { variable: 'AI_CACHE_TTL', kind: 'integer' },
  batchEnabled: { variable: 'AI_BATCH_ENABLED', kind: 'boolean' },
  maxAttempts: { variable: 'AI_MAX_ATTEMPTS', kind: 'integer' },
  requestDeadlineMs: { variable: 'AI_REQUEST_DEADLINE_MS', kind: 'integer' },
  attemptTimeoutMs: { variable: 'AI_ATTEMPT_TIMEOUT_MS', kind: 'integer' },
  probeTimeoutMs: { variable: 'AI_PROBE_TIMEOUT_MS', kind: 'integer' }
};

const settingsPatchValidator = TypeCompiler.Compile(SettingsPatchSchema);

export interface SettingsValidationOutcome {
  readonly patch?: SettingsPatch;
  readonly issues: string[];
}

export function validateSettingsPatch(candidate: unknown): SettingsValidationOutcome {
  if (settingsPatchValidator.Check(candidate)) {
    return { patch: candidate, issues: [] };
  }

  const issues = [...settingsPatchValidator.Errors(candidate)].map(error => `${error.path || '/'}: ${error.message}`);
  return { issues };
}

function parseEnvironmentValue(raw: string, kind: SettingKind): number | boolean | undefined {
  const value = raw.trim().toLowerCase();

  if (kind === 'boolean') {
    if (['true', '1', 'yes', 'on'].includes(value)) return true;
    if (['false', '0', 'no', 'off'].includes(value)) return false;
    return undefined;
  }

  const parsed = Number(value);
  return Number.isInteger(parsed) ? parsed : undefined;
}

/**
 * Builds the initial settings from environment variables. Values that do not
 * parse, or fall outside the schema bounds, are reported and left at their default.
 */
export function loadSettingsFromEnvironment(
  env: NodeJS.ProcessEnv,
  onInvalid?: (variable: string, value: string) => void
): Settings {
  const candidate: Record<string, number | boolean> = {};

  for (const [key, source] of Object.entries(SETTINGS_ENVIRONMENT)) {
    const raw = env[source.variable];
    if (raw === undefined || raw === '') {
      continue;
    }

    const parsed = parseEnvironmentValue(raw, source.kind);
    if (parsed === undefined || validateSettingsPatch({ [key]: parsed }).issues.length > 0) {
      onInvalid?.(source.variable, raw);
      continue;
    }

    candidate[key] = parsed;
  }

  const { patch } = validateSettingsPatch(candidate);
  return { ...DEFAULT_SETTINGS, ...patch };
}
