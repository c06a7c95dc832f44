import { decodeHTML } from 'entities';

/**
 * Decodes entities, collapses every whitespace run (newlines included) to a
 * single space and trims the result.
 */
export function cleanText(text: string): string {
  return decodeHTML(text).replace(/\s+/g, ' ').trim();
}

// Runs of three or more newlines become one blank line
export function collapseBlankLines(text: string): string {
  return text.replace(/\n{3,}/g, '\n\n');
}

export function stripOuterNewlines(text: string): string {
  return text.replace(/^\n+/, '').replace(/\n+$/, '');
}

export function countWords(text: string): number {
  return text.match(/\S+/g)?.length ?? 0;
}
