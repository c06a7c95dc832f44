import { describe, test, expect } from '@jest/globals';
import {
  cleanText,
  collapseBlankLines,
  countWords,
  stripOuterNewlines,
} from '../../../../../src/core/content/extractors/textCleaner';

describe('textCleaner', () => {
  test('cleanText decodes entities, collapses whitespace and trims', () => {
    expect(cleanText('  a&nbsp;&lt;b&gt;\n\n  c  ')).toBe('a <b> c');
  });

  test('collapseBlankLines keeps at most one blank line', () => {
    expect(collapseBlankLines('a\n\n\n\nb\n\nc\nd')).toBe('a\n\nb\n\nc\nd');
  });

  test('stripOuterNewlines leaves inner newlines and spaces alone', () => {
    expect(stripOuterNewlines('\n\n  x\n\ny \n')).toBe('  x\n\ny ');
  });

  test('countWords counts whitespace-delimited tokens', () => {
    expect(countWords('')).toBe(0);
    expect(countWords('## Intro\nHello   world')).toBe(4);
    expect(countWords('```js\nconst a = 1;\n```')).toBe(6);
  });
});
