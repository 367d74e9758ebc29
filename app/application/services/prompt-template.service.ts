import { injectable, inject } from 'inversify';
import { readFileSync } from 'fs';
import { Type } from '@sinclair/typebox';
import { TypeCompiler } from '@sinclair/typebox/compiler';
import { TYPES } from '../../core/container/types';
import { PromptTemplateNotFoundError } from '../../core/errors';
import type { ILogger } from '../../core/logging';
import type { MediaType } from '../../domain/entities';
import bundledTemplates from '../../config/prompt-templates.json';

const PromptTemplatesSchema = Type.Record(Type.String({ minLength: 1 }), Type.String({ minLength: 1 }));
const promptTemplatesValidator = TypeCompiler.Compile(PromptTemplatesSchema);

export const DEFAULT_TEMPLATE_NAME = 'default';

export interface IPromptTemplateService {
  resolve(name: string | undefined, mediaType: MediaType): string;
  listTemplates(): string[];
}

function toTemplateMap(source: unknown, origin: string): Map<string, string> {
  if (!promptTemplatesValidator.Check(source)) {
    const [first] = [...promptTemplatesValidator.Errors(source)];
    throw new Error(`Invalid prompt templates in ${origin}: ${first ? `${first.path} ${first.message}` : 'unknown error'}`);
  }
  return new Map(Object.entries(source));
}

/**
 * Named prompt templates with a `{content}` placeholder. The bundled set can be
 * replaced with a file named by PROMPT_TEMPLATES_FILE.
 */
@injectable()
export class PromptTemplateService implements IPromptTemplateService {
  private readonly logger: ILogger;
  private readonly templates: Map<string, string>;

  constructor(
    @inject(TYPES.Logger) logger: ILogger
  ) {
    this.logger = logger.createChild('PromptTemplateService');

    const overridePath = process.env.PROMPT_TEMPLATES_FILE;
    this.templates = overridePath
      ? toTemplateMap(JSON.parse(readFileSync(overridePath, 'utf8')), overridePath)
      : toTemplateMap(bundledTemplates, 'bundled templates');

    if (!this.templates.has(DEFAULT_TEMPLATE_NAME)) {
      throw new Error(`Prompt templates must define "${DEFAULT_TEMPLATE_NAME}"`);
    }

    this.logger.info('Prompt templates loaded', {
      metadata: { source: overridePath ?? 'bundled', templates: this.listTemplates() }
    });
  }

  /**
   * An explicit name must exist. Without one, the template named after the
   * media type is used, falling back to the default.
   */
  resolve(name: string | undefined, mediaType: MediaType): string {
    if (name !== undefined) {
      const named = this.templates.get(name);
      if (named === undefined) {
        throw new PromptTemplateNotFoundError(name);
      }
      return named;
    }

    return this.templates.get(mediaType) ?? this.templates.get(DEFAULT_TEMPLATE_NAME) ?? '';
  }

  listTemplates(): string[] {
    return [...this.templates.keys()].sort();
  }
}
