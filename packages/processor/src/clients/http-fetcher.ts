import { FetchError, errorMessage } from '@keepsake/shared';
import type { FetchedMedia, MediaFetcher } from '../ports';

export interface HttpMediaFetcherOptions {
  timeoutMs: number;
  /** Twilio serves media behind the account's basic auth when media protection is on. */
  basicAuth?: { username: string; password: string };
}

const DEFAULT_CONTENT_TYPE = 'image/jpeg';

export class HttpMediaFetcher implements MediaFetcher {
  constructor(private readonly options: HttpMediaFetcherOptions) {}

  async fetch(url: string): Promise<FetchedMedia> {
    const headers: Record<string, string> = {};
    if (this.options.basicAuth) {
      const { username, password } = this.options.basicAuth;
      headers.Authorization = `Basic ${Buffer.from(`${username}:${password}`).toString('base64')}`;
    }

    let res: Response;
    try {
      res = await fetch(url, {
        headers,
        redirect: 'follow',
        signal: AbortSignal.timeout(this.options.timeoutMs),
      });
    } catch (err) {
      throw new FetchError(url, errorMessage(err), { cause: err });
    }
    if (!res.ok) {
      throw new FetchError(url, `${res.status} ${res.statusText}`.trim());
    }

    const bytes = new Uint8Array(await res.arrayBuffer());
    return { bytes, contentType: res.headers.get('content-type') || DEFAULT_CONTENT_TYPE };
  }
}
