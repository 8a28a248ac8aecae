import { fetch } from 'undici';
import { HttpStatusError, type HttpFetchPort } from '@linetest/domain';

const DEFAULT_TIMEOUT_MS = 120_000;

export class UndiciHttpFetcher implements HttpFetchPort {
  constructor(private readonly timeoutMs: number = DEFAULT_TIMEOUT_MS) {}

  async fetch(url: string, signal?: AbortSignal): Promise<Uint8Array> {
    const timeout = AbortSignal.timeout(this.timeoutMs);
    const res = await fetch(url, {
      signal: signal ? AbortSignal.any([signal, timeout]) : timeout,
    });
    if (!res.ok) {
      // release the connection before failing
      await res.body?.cancel();
      throw new HttpStatusError(url, res.status);
    }
    return new Uint8Array(await res.arrayBuffer());
  }
}
