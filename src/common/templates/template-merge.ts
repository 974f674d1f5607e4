// src/common/templates/template-merge.ts

export type MergeData = Record<string, string | number | boolean | null | undefined>;

export interface RenderableTemplate {
  subject: string;
  body: string;
}

const MERGE_FIELD = /{{\s*([A-Za-z0-9_]+)\s*}}/g;

/**
 * Simple {{var}} renderer. Keys missing from `data` keep their placeholder
 * text; null or undefined values render as an empty string.
 */
export function renderText(text: string, data: MergeData): string {
  if (!text) return text;
  return text.replace(MERGE_FIELD, (placeholder: string, key: string) => {
    if (!Object.prototype.hasOwnProperty.call(data, key)) return placeholder;
    const value = data[key];
    return value === null || value === undefined ? '' : String(value);
  });
}

export function renderTemplate(template: RenderableTemplate, data: MergeData): RenderableTemplate {
  return {
    subject: renderText(template.subject, data),
    body: renderText(template.body, data),
  };
}

/** Distinct merge field names used in a text, in order of first appearance. */
export function extractMergeFields(text: string): string[] {
  const seen = new Set<string>();
  for (const match of text.matchAll(MERGE_FIELD)) seen.add(match[1]);
  return [...seen];
}
