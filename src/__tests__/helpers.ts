import { extractLinks, type FetchedLinks, type PageFetcher } from '../crawlers/pageFetcher';
import { FetchError } from '../errors/http-error';

export type FakePage = string | Error | { html: string; finalUrl?: string; delayMs?: number };

/** In-process stand-in for HttpPageFetcher that serves canned HTML per URL. */
export class FakePageFetcher implements PageFetcher {
  readonly calls: string[] = [];
  active = 0;
  maxActive = 0;

  private gate: Promise<void> | null = null;
  private release: (() => void) | null = null;

  constructor(private readonly pages: Record<string, FakePage> = {}) {}

  /** Blocks every fetch until `releaseAll` is called. */
  hold(): void {
    this.gate = new Promise<void>((resolve) => {
      this.release = resolve;
    });
  }

  releaseAll(): void {
    this.release?.();
    this.gate = null;
    this.release = null;
  }

  async fetchLinks(url: string): Promise<FetchedLinks> {
    this.calls.push(url);
    this.active += 1;
    this.maxActive = Math.max(this.maxActive, this.active);

    try {
      if (this.gate) {
        await this.gate;
      }

      const page: FakePage | undefined = this.pages[url];
      const delayMs = typeof page === 'object' && !(page instanceof Error) ? page.delayMs ?? 0 : 0;
      await new Promise((resolve) => setTimeout(resolve, delayMs));

      if (page === undefined) {
        throw new FetchError('HTTP 404 Not Found', url, 404);
      }
      if (page instanceof Error) {
        throw page;
      }

      const html = typeof page === 'string' ? page : page.html;
      const finalUrl = typeof page === 'string' ? url : page.finalUrl ?? url;
      return { requestedUrl: url, finalUrl, links: extractLinks(html, finalUrl) };
    } finally {
      this.active -= 1;
    }
  }
}
