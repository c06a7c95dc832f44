import type { ParentNode } from 'domhandler';
import type { ExtractionResult, ExtractorOptions } from './types/extraction';
import { HtmlDocument } from './htmlDocument';
import { BOILERPLATE_SELECTORS, CONTENT_CONTAINER_SELECTORS } from './extractors/selectors';
import { extractMarkdown } from './extractors/markdownExtractor';
import { countWords } from './extractors/textCleaner';
import { ExtractionError } from '../errors';
import { createChildLogger, generateCorrelationId } from '../../utils/logger';

export function removeBoilerplate(document: HtmlDocument): number {
  return document.remove(BOILERPLATE_SELECTORS);
}

export function selectContentContainer(document: HtmlDocument): {
  selector: string;
  container: ParentNode;
} {
  const match = document.selectFirst(CONTENT_CONTAINER_SELECTORS);
  if (match) return { selector: match.selector, container: match.element };

  const body = document.body();
  if (body) return { selector: 'body_fallback', container: body };

  return { selector: 'document_fallback', container: document.root() };
}

/**
 * Parses one page and produces its title, markdown body and outgoing links.
 * Links are read before boilerplate is stripped so navigation menus still
 * feed the crawl frontier.
 */
export function extractContent(html: string, options: ExtractorOptions): ExtractionResult {
  const logger = options.logger ?? createChildLogger(generateCorrelationId());

  let document: HtmlDocument;
  try {
    document = HtmlDocument.parse(html);
  } catch (error) {
    throw new ExtractionError(error instanceof Error ? error.message : 'unparseable HTML', options.url);
  }

  const linkHrefs = document.linkHrefs();
  const title = document.title() ?? options.url;

  const removedElements = removeBoilerplate(document);
  const { selector, container } = selectContentContainer(document);
  const markdownContent = extractMarkdown(container);
  const wordCount = countWords(markdownContent);

  logger.debug(
    {
      event: 'extraction_complete',
      url: options.url,
      removedElements,
      contentSelector: selector,
      linkCount: linkHrefs.length,
      markdownLength: markdownContent.length,
      wordCount,
    },
    'Extracted page content'
  );

  return { title, markdownContent, linkHrefs, wordCount, contentSelector: selector };
}
