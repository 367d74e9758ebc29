import { Type, type Static } from '@sinclair/typebox';
import { TypeCompiler } from '@sinclair/typebox/compiler';
import { ProviderCallError } from '../../../core/errors';
import type { AnalysisResult } from '../../../application/types';

export const AnalysisResponseSchema = Type.Object({
  is_relevant: Type.Union([Type.Boolean(), Type.Literal(0), Type.Literal(1), Type.String()]),
  analytical_briefing: Type.Optional(Type.String()),
  detailed_analysis: Type.Optional(Type.String()),
  confidence: Type.Optional(Type.Number({ minimum: 0, maximum: 100 })),
  reason: Type.Optional(Type.String()),
  summary: Type.Optional(Type.String()),
  keywords: Type.Optional(Type.Array(Type.String()))
});

export type AnalysisResponse = Static<typeof AnalysisResponseSchema>;

const analysisResponseValidator = TypeCompiler.Compile(AnalysisResponseSchema);

const CODE_FENCE = /^```[a-zA-Z]*\s*([\s\S]*?)\s*```$/;
const TRUE_WORDS = new Set(['true', 'yes', '1']);
const FALSE_WORDS = new Set(['false', 'no', '0']);

function parseFailure(detail: string, cause?: unknown): ProviderCallError {
  return new ProviderCallError('parse', `Malformed response: ${detail}`, { cause });
}

function extractJsonText(raw: string): string {
  const trimmed = raw.trim();
  const fenced = CODE_FENCE.exec(trimmed);
  const body = fenced ? fenced[1] : trimmed;

  if (body.startsWith('{')) {
    return body;
  }

  // Models sometimes wrap the object in prose.
  const start = body.indexOf('{');
  const end = body.lastIndexOf('}');
  return start >= 0 && end > start ? body.slice(start, end + 1) : body;
}

function coerceRelevance(value: AnalysisResponse['is_relevant']): boolean {
  if (typeof value === 'boolean') {
    return value;
  }
  if (typeof value === 'number') {
    return value === 1;
  }

  const word = value.trim().toLowerCase();
  if (TRUE_WORDS.has(word)) return true;
  if (FALSE_WORDS.has(word)) return false;
  throw parseFailure(`is_relevant is not a boolean: "${value}"`);
}

/**
 * Accepts the snake_case keys the prompt asks for, their camelCase twins, and
 * the older `should_push` name for the relevance flag. The first name present wins.
 */
function normalizeKeys(value: unknown): unknown {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return value;
  }

  const source = new Map(Object.entries(value));
  const pick = (target: string, ...names: string[]): Record<string, unknown> => {
    const found = names.map(name => source.get(name)).find(entry => entry !== undefined && entry !== null);
    return found === undefined ? {} : { [target]: found };
  };

  return {
    ...pick('is_relevant', 'is_relevant', 'isRelevant', 'should_push', 'shouldPush'),
    ...pick('analytical_briefing', 'analytical_briefing', 'analyticalBriefing'),
    ...pick('detailed_analysis', 'detailed_analysis', 'detailedAnalysis'),
    ...pick('confidence', 'confidence'),
    ...pick('reason', 'reason'),
    ...pick('summary', 'summary'),
    ...pick('keywords', 'keywords')
  };
}

/**
 * The briefing is only asked for on relevant posts; older answers carry it
 * as `summary` or `detailed_analysis`.
 */
function resolveBriefing(response: AnalysisResponse, isRelevant: boolean): string {
  const briefing = response.analytical_briefing ?? response.summary ?? response.detailed_analysis;
  if (briefing !== undefined) {
    return briefing;
  }
  if (isRelevant) {
    throw parseFailure('relevant answer has no analytical_briefing');
  }
  return response.reason ?? '';
}

/**
 * Turns raw model output into an AnalysisResult. Anything that is not a JSON
 * object with a relevance flag (and a briefing, when relevant) raises a
 * `parse` ProviderCallError.
 */
export function parseAnalysisResponse(raw: string): AnalysisResult {
  let parsed: unknown;
  try {
    parsed = JSON.parse(extractJsonText(raw));
  } catch (error) {
    throw parseFailure('response is not valid JSON', error);
  }

  const candidate = normalizeKeys(parsed);
  if (!analysisResponseValidator.Check(candidate)) {
    const issues = [...analysisResponseValidator.Errors(candidate)]
      .map(error => `${error.path || '/'} ${error.message}`)
      .slice(0, 3);
    throw parseFailure(issues.join('; '));
  }

  const isRelevant = coerceRelevance(candidate.is_relevant);

  return {
    isRelevant,
    analyticalBriefing: resolveBriefing(candidate, isRelevant),
    ...(candidate.confidence !== undefined && { confidence: candidate.confidence }),
    ...(candidate.reason !== undefined && { reason: candidate.reason }),
    ...(candidate.summary !== undefined && { summary: candidate.summary }),
    ...(candidate.keywords !== undefined && { keywords: candidate.keywords })
  };
}
