import type pino from 'pino';

export interface ExtractionResult {
  title: string;
  markdownContent: string;
  // Raw hrefs from the full parse, before boilerplate removal
  linkHrefs: string[];
  wordCount: number;
  contentSelector: string;
}

export interface ExtractorOptions {
  url: string;
  logger?: pino.Logger;
}
