/**
 * FIFO queue of discovered URLs plus the set of URLs already processed.
 *
 * Membership is checked when a URL is taken off the queue, not when it is
 * added, so the same URL may sit in the queue more than once until the first
 * copy is processed.
 */
export class Frontier {
  private readonly queue: string[] = [];
  private head = 0;
  private readonly visited = new Set<string>();

  constructor(seed?: string) {
    if (seed !== undefined) this.enqueue(seed);
  }

  enqueue(url: string): void {
    this.queue.push(url);
  }

  dequeue(): string | undefined {
    if (this.head >= this.queue.length) return undefined;
    const url = this.queue[this.head];
    this.head++;

    // Reclaim the consumed prefix once it dominates the backing array
    if (this.head > 1024 && this.head * 2 > this.queue.length) {
      this.queue.splice(0, this.head);
      this.head = 0;
    }
    return url;
  }

  hasVisited(url: string): boolean {
    return this.visited.has(url);
  }

  markVisited(url: string): void {
    this.visited.add(url);
  }

  get size(): number {
    return this.queue.length - this.head;
  }

  get visitedCount(): number {
    return this.visited.size;
  }

  isEmpty(): boolean {
    return this.size === 0;
  }

  pending(): string[] {
    return this.queue.slice(this.head);
  }
}
