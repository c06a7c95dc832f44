import { open, type FileHandle } from 'fs/promises';
import { NO_CONTENT_PLACEHOLDER, PAGE_SEPARATOR } from '../../config/constants';

export interface PageRecord {
  title: string;
  sourceUrl: string;
  body: string;
}

export function formatPageRecord(record: PageRecord): string {
  const body = record.body || NO_CONTENT_PLACEHOLDER;
  return `# ${record.title}\nSource: ${record.sourceUrl}\n\n${body}\n\n${PAGE_SEPARATOR}\n\n`;
}

/**
 * Appends page records to one output file, opened once (truncating) for the
 * whole crawl. Each record is synced to disk before `writePage` resolves so
 * an interrupted crawl keeps every page written so far.
 */
export class PageWriter {
  private handle: FileHandle | null;

  private constructor(
    readonly path: string,
    handle: FileHandle
  ) {
    this.handle = handle;
  }

  static async open(path: string): Promise<PageWriter> {
    return new PageWriter(path, await open(path, 'w'));
  }

  async writePage(record: PageRecord): Promise<void> {
    if (!this.handle) {
      throw new Error(`Output file ${this.path} is already closed`);
    }
    await this.handle.writeFile(formatPageRecord(record), 'utf8');
    await this.handle.datasync();
  }

  get isOpen(): boolean {
    return this.handle !== null;
  }

  async close(): Promise<void> {
    const handle = this.handle;
    if (!handle) return;
    this.handle = null;
    await handle.close();
  }
}
