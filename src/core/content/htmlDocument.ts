import * as cheerio from 'cheerio';
import { isTag, isText, type Element, type ParentNode } from 'domhandler';
import { LINK_SELECTOR } from './extractors/selectors';
import { cleanText } from './extractors/textCleaner';

/**
 * Typed view over a parsed page. Everything the crawler needs from the DOM
 * (title, links, boilerplate removal, container lookup) goes through here so
 * the extractors only ever see domhandler nodes.
 */
export class HtmlDocument {
  private constructor(private readonly $: cheerio.CheerioAPI) {}

  static parse(html: string): HtmlDocument {
    return new HtmlDocument(cheerio.load(html));
  }

  /** Flattened text of the first `<title>`, or `null` when the page has none. */
  title(): string | null {
    const titleElement = this.$('title').get(0);
    return titleElement ? flattenText(titleElement) : null;
  }

  /** Raw `href` values of every anchor, in document order. */
  linkHrefs(): string[] {
    const hrefs: string[] = [];
    this.$(LINK_SELECTOR).each((_, anchor) => {
      const href = anchor.attribs.href;
      if (href !== undefined) hrefs.push(href);
    });
    return hrefs;
  }

  /** Removes every element matching any selector; returns how many were removed. */
  remove(selectors: readonly string[]): number {
    const matched = this.$(selectors.join(', '));
    const count = matched.length;
    matched.remove();
    return count;
  }

  /** First element matching the first selector that matches anything. */
  selectFirst(selectors: readonly string[]): { selector: string; element: Element } | null {
    for (const selector of selectors) {
      const element = this.$(selector).get(0);
      if (element && isTag(element)) return { selector, element };
    }
    return null;
  }

  body(): Element | null {
    return this.$('body').get(0) ?? null;
  }

  root(): ParentNode {
    return this.$.root()[0];
  }
}

export function classList(element: Element): string[] {
  return (element.attribs.class ?? '').split(/\s+/).filter(Boolean);
}

export function parentElement(element: Element): Element | null {
  const parent = element.parent;
  return parent && isTag(parent) ? parent : null;
}

export function hasAncestor(element: Element, name: string): boolean {
  for (let current = parentElement(element); current; current = parentElement(current)) {
    if (current.name.toLowerCase() === name) return true;
  }
  return false;
}

export function findFirstDescendant(node: ParentNode, name: string): Element | null {
  for (const child of node.children) {
    if (!isTag(child)) continue;
    if (child.name.toLowerCase() === name) return child;
    const nested = findFirstDescendant(child, name);
    if (nested) return nested;
  }
  return null;
}

/** Every descendant element whose tag is in `names`, in document order. */
export function descendantsByTag(node: ParentNode, names: ReadonlySet<string>): Element[] {
  const found: Element[] = [];
  const visit = (parent: ParentNode): void => {
    for (const child of parent.children) {
      if (!isTag(child)) continue;
      if (names.has(child.name.toLowerCase())) found.push(child);
      visit(child);
    }
  };
  visit(node);
  return found;
}

function textNodes(node: ParentNode): string[] {
  const texts: string[] = [];
  for (const child of node.children) {
    if (isText(child)) texts.push(child.data);
    else if (isTag(child)) texts.push(...textNodes(child));
  }
  return texts;
}

/** Text nodes trimmed, joined by single spaces, then cleaned. */
export function flattenText(node: ParentNode): string {
  const parts = textNodes(node)
    .map(text => text.trim())
    .filter(Boolean);
  return cleanText(parts.join(' '));
}

/** Concatenated text content with whitespace left as written. */
export function verbatimText(node: ParentNode): string {
  return textNodes(node).join('');
}
