// CSS selectors and tag sets for locating and walking page content

// Removed from the parse before the content container is chosen
export const BOILERPLATE_SELECTORS = ['nav', 'footer', 'aside', 'script', 'style', 'noscript'] as const;

// Tried in order; the first one matching any element becomes the extraction root
export const CONTENT_CONTAINER_SELECTORS = [
  'main',
  'article',
  '[role="main"]',
  '.content',
  '.markdown',
  '.docs-content',
] as const;

export const HEADING_TAGS: ReadonlySet<string> = new Set(['h1', 'h2', 'h3', 'h4', 'h5', 'h6']);

export const TEXT_BLOCK_TAGS: ReadonlySet<string> = new Set(['p', 'li', 'blockquote']);

export const CODE_TAGS: ReadonlySet<string> = new Set(['pre', 'code']);

export const LINK_SELECTOR = 'a[href]';
