import { describe, test, expect } from '@jest/globals';
import type { Element } from 'domhandler';
import { HtmlDocument } from '../../../../../src/core/content/htmlDocument';
import {
  extractMarkdown,
  inferCodeLanguage,
} from '../../../../../src/core/content/extractors/markdownExtractor';

function bodyOf(html: string): Element {
  const body = HtmlDocument.parse(`<html><body>${html}</body></html>`).body();
  if (!body) throw new Error('expected a body element');
  return body;
}

function firstElement(html: string, selector: string): Element {
  const match = HtmlDocument.parse(html).selectFirst([selector]);
  if (!match) throw new Error(`expected ${selector}`);
  return match.element;
}

describe('extractMarkdown', () => {
  test('demotes headings by one level and caps at six', () => {
    const markdown = extractMarkdown(
      bodyOf('<h1>Intro</h1><h2>Setup</h2><h5>Deep</h5><h6>Deeper</h6>')
    );
    expect(markdown).toBe('## Intro\n### Setup\n###### Deep\n###### Deeper');
  });

  test('renders paragraphs, list items and blockquotes with their prefixes', () => {
    const markdown = extractMarkdown(
      bodyOf('<p>Hello world</p><ul><li>one</li><li>two</li></ul><blockquote>Quoted</blockquote>')
    );
    expect(markdown).toBe('Hello world\n- one\n- two\n> Quoted');
  });

  test('collapses whitespace and decodes entities in flattened text', () => {
    const markdown = extractMarkdown(bodyOf('<p>  Fish\n\n &amp;amp;   chips\t</p>'));
    expect(markdown).toBe('Fish & chips');
  });

  test('joins text nodes of nested inline elements with a space', () => {
    expect(extractMarkdown(bodyOf('<p>Read <em>the</em> guide</p>'))).toBe('Read the guide');
  });

  test('skips elements whose flattened text is empty', () => {
    expect(extractMarkdown(bodyOf('<h2> </h2><p>\n</p><li></li><blockquote>  </blockquote>'))).toBe(
      ''
    );
  });

  test('ignores elements outside the visited set', () => {
    expect(extractMarkdown(bodyOf('<div>loose text</div><span>more</span><p>kept</p>'))).toBe(
      'kept'
    );
  });

  test('fences a code block with the language of its code element', () => {
    const markdown = extractMarkdown(
      bodyOf('<pre><code class="language-python">foo\nbar</code></pre>')
    );
    expect(markdown).toBe('```python\nfoo\nbar\n```');
  });

  test('keeps code block whitespace and strips only outer newlines', () => {
    const markdown = extractMarkdown(
      bodyOf('<pre><code>\n\n  indented\n\n    more  \n\n</code></pre>')
    );
    expect(markdown).toBe('```\n  indented\n\n    more  \n```');
  });

  test('fences a pre without a code element with no language tag', () => {
    expect(extractMarkdown(bodyOf('<pre class="language-rust">let x = 1;</pre>'))).toBe(
      '```\nlet x = 1;\n```'
    );
  });

  test('emits a code block once even though its code element is also visited', () => {
    const markdown = extractMarkdown(
      bodyOf('<pre><code class="lang-sh">npm test</code></pre><p>after</p>')
    );
    expect(markdown).toBe('```sh\nnpm test\n```\nafter');
  });

  test('fences standalone inline code and also keeps the surrounding paragraph', () => {
    const markdown = extractMarkdown(bodyOf('<p>Run <code>make all</code> first</p>'));
    expect(markdown).toBe('Run make all first\n```\nmake all\n```');
  });

  test('renders nested matches each in document order', () => {
    const markdown = extractMarkdown(bodyOf('<ul><li><p>Nested</p></li></ul>'));
    expect(markdown).toBe('- Nested\nNested');
  });

  test('collapses runs of blank lines produced by code blocks', () => {
    const markdown = extractMarkdown(bodyOf('<pre>a\n\n\n\nb</pre>'));
    expect(markdown).toBe('```\na\n\nb\n```');
  });

  test('is deterministic for the same document', () => {
    const body = bodyOf(
      '<h1>T</h1><p>x</p><pre><code class="language-js">const a = 1;</code></pre><li>y</li>'
    );
    expect(extractMarkdown(body)).toBe(extractMarkdown(body));
  });
});

describe('inferCodeLanguage', () => {
  test('reads language- and lang- classes, lowercased', () => {
    expect(inferCodeLanguage(firstElement('<code class="hljs language-TypeScript">x</code>', 'code'))).toBe(
      'typescript'
    );
    expect(inferCodeLanguage(firstElement('<code class="lang-c++">x</code>', 'code'))).toBe('c++');
  });

  test('prefers language- over lang- on the same element', () => {
    expect(
      inferCodeLanguage(firstElement('<code class="lang-ruby language-go">x</code>', 'code'))
    ).toBe('go');
  });

  test('falls back to the parent element', () => {
    expect(
      inferCodeLanguage(firstElement('<div class="language-yaml"><code>x</code></div>', 'code'))
    ).toBe('yaml');
  });

  test('returns an empty string without a language class', () => {
    expect(inferCodeLanguage(firstElement('<code class="hljs">x</code>', 'code'))).toBe('');
  });
});
