import { describe, test, expect } from '@jest/globals';
import { Frontier } from '../../../../src/core/crawl/frontier';

describe('Frontier', () => {
  test('starts with the seed URL only', () => {
    const frontier = new Frontier('https://docs.example.com/');

    expect(frontier.size).toBe(1);
    expect(frontier.visitedCount).toBe(0);
    expect(frontier.pending()).toEqual(['https://docs.example.com/']);
  });

  test('dequeues in first-in first-out order', () => {
    const frontier = new Frontier();
    frontier.enqueue('a');
    frontier.enqueue('b');
    frontier.enqueue('c');

    expect(frontier.dequeue()).toBe('a');
    expect(frontier.dequeue()).toBe('b');
    frontier.enqueue('d');
    expect(frontier.pending()).toEqual(['c', 'd']);
    expect(frontier.dequeue()).toBe('c');
    expect(frontier.dequeue()).toBe('d');
    expect(frontier.dequeue()).toBeUndefined();
    expect(frontier.isEmpty()).toBe(true);
  });

  test('tolerates duplicate entries and leaves dedup to the visited set', () => {
    const frontier = new Frontier('x');
    frontier.enqueue('x');

    expect(frontier.size).toBe(2);
    expect(frontier.dequeue()).toBe('x');
    frontier.markVisited('x');
    expect(frontier.dequeue()).toBe('x');
    expect(frontier.hasVisited('x')).toBe(true);
    expect(frontier.visitedCount).toBe(1);
  });

  test('keeps order across compaction of a long queue', () => {
    const frontier = new Frontier();
    for (let i = 0; i < 3000; i++) frontier.enqueue(`u${i}`);

    const seen: string[] = [];
    for (let url = frontier.dequeue(); url !== undefined; url = frontier.dequeue()) {
      seen.push(url);
      if (seen.length === 2500) frontier.enqueue('tail');
    }

    expect(seen).toHaveLength(3001);
    expect(seen[0]).toBe('u0');
    expect(seen[2999]).toBe('u2999');
    expect(seen[3000]).toBe('tail');
  });
});
