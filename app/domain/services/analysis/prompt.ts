export const CONTENT_PLACEHOLDER = '{content}';

export const ANALYSIS_SYSTEM_PROMPT = [
  'You review social media posts for an analyst.',
  'Reply with one JSON object and nothing else: no markdown, no code fences.',
  'Keys: "is_relevant" (boolean), "analytical_briefing" (string),',
  '"confidence" (number from 0 to 100), "reason" (string), "summary" (string),',
  '"keywords" (array of strings).'
].join(' ');

/**
 * Substitutes the post into the template. A template without a placeholder
 * gets the content appended.
 */
export function renderPrompt(template: string, content: string): string {
  if (template.includes(CONTENT_PLACEHOLDER)) {
    return template.split(CONTENT_PLACEHOLDER).join(content);
  }
  return `${template}\n\n${content}`;
}
