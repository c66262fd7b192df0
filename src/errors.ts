/**
 * Raised by the request layer when an upstream provider cannot be reached
 * or answers with a non-2xx status.
 */
export class UpstreamRequestError extends Error {
  readonly url: string;
  readonly status: number | null;

  constructor(url: string, status: number | null, message: string, options?: ErrorOptions) {
    super(`Upstream request failed (${status ?? 'network'}) for ${url}: ${message}`, options);
    this.name = 'UpstreamRequestError';
    this.url = url;
    this.status = status;
  }
}
