export { ContentAnalysisService, deriveMediaType, type PostAnalysis } from './content-analysis.service';
export { PromptTemplateService, DEFAULT_TEMPLATE_NAME, type IPromptTemplateService } from './prompt-template.service';
