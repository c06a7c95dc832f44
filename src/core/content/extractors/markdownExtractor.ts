import type { Element, ParentNode } from 'domhandler';
import {
  classList,
  descendantsByTag,
  findFirstDescendant,
  flattenText,
  hasAncestor,
  parentElement,
  verbatimText,
} from '../htmlDocument';
import { CODE_TAGS, HEADING_TAGS, TEXT_BLOCK_TAGS } from './selectors';
import { collapseBlankLines, stripOuterNewlines } from './textCleaner';

const VISITED_TAGS: ReadonlySet<string> = new Set([...HEADING_TAGS, ...TEXT_BLOCK_TAGS, ...CODE_TAGS]);

const LANGUAGE_PATTERNS = [/language-([a-zA-Z0-9_+-]+)/, /lang-([a-zA-Z0-9_+-]+)/];

const MAX_HEADING_LEVEL = 6;

const TEXT_PREFIXES: Record<string, string> = {
  p: '',
  li: '- ',
  blockquote: '> ',
};

function languageFromClasses(element: Element): string {
  const classes = classList(element).join(' ');
  for (const pattern of LANGUAGE_PATTERNS) {
    const match = pattern.exec(classes);
    if (match) return match[1].toLowerCase();
  }
  return '';
}

/**
 * Reads a `language-<id>` or `lang-<id>` class from the element, falling back
 * to its parent. Returns `''` when neither carries one.
 */
export function inferCodeLanguage(element: Element): string {
  const own = languageFromClasses(element);
  if (own) return own;
  const parent = parentElement(element);
  return parent ? languageFromClasses(parent) : '';
}

function fence(language: string, code: string): string[] {
  return ['```' + language, code, '```'];
}

function renderHeading(element: Element, name: string): string[] {
  const text = flattenText(element);
  if (!text) return [];
  // h1 is reserved for the page title in the output document
  const level = Math.min(Number(name.slice(1)) + 1, MAX_HEADING_LEVEL);
  return [`${'#'.repeat(level)} ${text}`];
}

function renderTextBlock(element: Element, name: string): string[] {
  const text = flattenText(element);
  return text ? [`${TEXT_PREFIXES[name]}${text}`] : [];
}

function renderPreformatted(element: Element): string[] {
  const code = stripOuterNewlines(verbatimText(element));
  if (!code) return [];
  const codeChild = findFirstDescendant(element, 'code');
  return fence(codeChild ? inferCodeLanguage(codeChild) : '', code);
}

function renderInlineCode(element: Element): string[] {
  // Already emitted as part of the enclosing <pre>
  if (hasAncestor(element, 'pre')) return [];
  const code = stripOuterNewlines(verbatimText(element));
  return code ? fence(inferCodeLanguage(element), code) : [];
}

function renderElement(element: Element): string[] {
  const name = element.name.toLowerCase();
  if (HEADING_TAGS.has(name)) return renderHeading(element, name);
  if (TEXT_BLOCK_TAGS.has(name)) return renderTextBlock(element, name);
  if (name === 'pre') return renderPreformatted(element);
  return renderInlineCode(element);
}

/**
 * Walks the container in document order and renders headings, paragraphs,
 * list items, blockquotes and code as markdown lines. Nested matches are
 * each rendered, so a list item wrapping a paragraph yields both lines.
 */
export function extractMarkdown(container: ParentNode): string {
  const lines: string[] = [];
  for (const element of descendantsByTag(container, VISITED_TAGS)) {
    lines.push(...renderElement(element));
  }
  return collapseBlankLines(lines.join('\n')).trim();
}
