import type { SourceDialect } from '../dialects/source';

/**
 * Source dialect over a fixed list of objects, listed in insertion order.
 */
export class InMemorySource implements SourceDialect {
  readonly name = 'memory';
  readonly location = 'memory://test-bucket';

  readonly fetched: string[] = [];
  closed = false;

  private readonly objects = new Map<string, Buffer>();

  constructor(objects: Record<string, string | Buffer> = {}) {
    for (const [key, content] of Object.entries(objects)) {
      this.put(key, content);
    }
  }

  put(key: string, content: string | Buffer): this {
    this.objects.set(key, typeof content === 'string' ? Buffer.from(content, 'utf8') : content);
    return this;
  }

  async listObjects(): Promise<string[]> {
    return Array.from(this.objects.keys());
  }

  async fetchObject(key: string): Promise<Buffer> {
    const content = this.objects.get(key);
    if (!content) {
      throw new Error(`No such object: ${key}`);
    }
    this.fetched.push(key);
    return content;
  }

  publicUrl(key: string): string {
    return `https://storage.test/test-bucket/${key}`;
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}
