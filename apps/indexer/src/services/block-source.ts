/**
 * Upstream decoded-block service, with failover across endpoints.
 *
 * Tries the primary URL first, then the fallbacks. Network errors and 5xx
 * move on to the next URL; 404 means the height is not available yet.
 */
import { FetchedBlockSchema, LatestHeightResponseSchema } from '@tidemark/shared/schemas';
import type { FetchedBlock } from '@tidemark/shared';
import { IndexerError } from '../lib/errors.js';
import { logger as rootLogger, type Logger } from '../lib/logger.js';

export interface BlockSource {
  getLatestHeight(): Promise<number>;
  /** The canonical block at `height`, or null when upstream does not have it yet */
  getBlock(height: number): Promise<FetchedBlock | null>;
}

export interface HttpBlockSourceOptions {
  chainId: number;
  /** Primary first */
  urls: string[];
  timeoutMs: number;
  logger?: Logger;
  fetchFn?: typeof fetch;
}

/** Primary URL plus comma-separated fallbacks, blanks dropped */
export function blockSourceUrls(primary: string, fallbacks: string): string[] {
  const urls = [primary];
  for (const u of fallbacks.split(',')) {
    const trimmed = u.trim();
    if (trimmed) urls.push(trimmed);
  }
  return urls.map((u) => u.replace(/\/+$/, ''));
}

export class HttpBlockSource implements BlockSource {
  private readonly log: Logger;
  private readonly fetchFn: typeof fetch;

  constructor(private readonly options: HttpBlockSourceOptions) {
    if (options.urls.length === 0) {
      throw new IndexerError('CONFIG_INVALID', 'Block source needs at least one URL', { chainId: options.chainId });
    }
    this.log = options.logger ?? rootLogger;
    this.fetchFn = options.fetchFn ?? fetch;
  }

  async getLatestHeight(): Promise<number> {
    const res = await this.request(`/chains/${this.options.chainId}/head`);
    if (!res.ok) {
      throw new IndexerError('UPSTREAM_ERROR', `Block source head request failed with ${res.status}`, {
        chainId: this.options.chainId,
        status: res.status,
      });
    }
    return LatestHeightResponseSchema.parse(await res.json()).height;
  }

  async getBlock(height: number): Promise<FetchedBlock | null> {
    const res = await this.request(`/chains/${this.options.chainId}/blocks/${height}`);
    if (res.status === 404) return null;
    if (!res.ok) {
      throw new IndexerError('UPSTREAM_ERROR', `Block source request for ${height} failed with ${res.status}`, {
        chainId: this.options.chainId,
        height,
        status: res.status,
      });
    }

    const parsed = FetchedBlockSchema.safeParse(await res.json());
    if (!parsed.success) {
      throw new IndexerError('UPSTREAM_INVALID', `Block ${height} failed validation`, {
        chainId: this.options.chainId,
        height,
        issues: parsed.error.issues,
      });
    }
    if (parsed.data.number !== height) {
      throw new IndexerError('UPSTREAM_INVALID', `Asked for block ${height}, received ${parsed.data.number}`, {
        chainId: this.options.chainId,
        height,
      });
    }
    return parsed.data;
  }

  private async request(endpoint: string): Promise<Response> {
    const { urls, timeoutMs } = this.options;
    let lastError: unknown;

    for (let i = 0; i < urls.length; i++) {
      const baseUrl = urls[i];
      try {
        const res = await this.fetchFn(`${baseUrl}${endpoint}`, { signal: AbortSignal.timeout(timeoutMs) });
        // 5xx → try next URL
        if (res.status >= 500 && i < urls.length - 1) {
          this.log.warn({ baseUrl, endpoint, status: res.status }, 'Block source 5xx, trying fallback');
          continue;
        }
        return res;
      } catch (err) {
        lastError = err;
        if (i < urls.length - 1) {
          this.log.warn({ baseUrl, endpoint, err }, 'Block source request failed, trying fallback');
        }
      }
    }

    throw lastError ?? new Error(`All block source URLs failed for: ${endpoint}`);
  }
}
