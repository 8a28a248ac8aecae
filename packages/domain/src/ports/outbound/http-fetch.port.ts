export interface HttpFetchPort {
  /**
   * GET `url` and return the full response body. Rejects on network errors,
   * non-2xx statuses, and once `signal` aborts.
   */
  fetch(url: string, signal?: AbortSignal): Promise<Uint8Array>;
}
