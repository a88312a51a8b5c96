export interface Downloader {
  /** Resolves with the response body; rejects on network errors and non-2xx statuses. */
  download(url: string): Promise<Uint8Array>;
}

export class FetchDownloader implements Downloader {
  constructor(private readonly timeoutMs = 10 * 60 * 1000) {}

  async download(url: string): Promise<Uint8Array> {
    const res = await fetch(url, { redirect: "follow", signal: AbortSignal.timeout(this.timeoutMs) });
    if (!res.ok) throw new Error(`HTTP ${res.status} for ${url}`);
    return new Uint8Array(await res.arrayBuffer());
  }
}
