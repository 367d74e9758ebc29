export { ANALYSIS_SYSTEM_PROMPT, CONTENT_PLACEHOLDER, renderPrompt } from './prompt';
export { parseAnalysisResponse, AnalysisResponseSchema, type AnalysisResponse } from './response-parser';
