import { type APIRequestContext, type APIResponse, request } from 'playwright';
import type { z } from 'zod';
import { KNESSET_CONFIG } from '../constants';
import { UpstreamRequestError } from '../errors';

export type QueryParams = Record<string, string | number | boolean>;

/**
 * Shared plumbing for the upstream clients: owns (or borrows) a Playwright
 * request context and turns transport failures into UpstreamRequestError.
 */
export abstract class RequestClient {
  private context: APIRequestContext | null = null;
  private ownsContext = false;

  protected abstract readonly baseUrl: string;

  constructor(protected readonly timeout: number = KNESSET_CONFIG.TIMEOUTS.REQUEST) {}

  async initialize(): Promise<void> {
    if (this.context) return; // already injected
    this.context = await request.newContext({ timeout: this.timeout });
    this.ownsContext = true;
  }

  async close(): Promise<void> {
    if (this.context && this.ownsContext) {
      await this.context.dispose();
    }
    this.context = null;
  }

  // Share external request context (owned by caller)
  public useRequestContext(context: APIRequestContext): void {
    this.context = context;
    this.ownsContext = false;
  }

  protected async getJson(path: string, params?: QueryParams): Promise<unknown> {
    const url = `${this.baseUrl}${path}`;
    const response = await this.get(url, params);
    try {
      return await response.json();
    } catch (error) {
      throw new UpstreamRequestError(url, response.status(), 'invalid JSON body', { cause: error });
    }
  }

  protected async getBytes(url: string): Promise<Buffer> {
    const response = await this.get(url);
    return response.body();
  }

  /**
   * Validates each record of an upstream collection, dropping (and logging)
   * the ones that do not fit the schema.
   */
  protected parseRecords<T>(schema: z.ZodType<T>, records: readonly unknown[], label: string): T[] {
    const valid: T[] = [];
    for (const [index, record] of records.entries()) {
      const parsed = schema.safeParse(record);
      if (parsed.success) {
        valid.push(parsed.data);
      } else {
        console.warn(`Skipping malformed ${label} record #${index}: ${parsed.error.message}`);
      }
    }
    return valid;
  }

  private async get(url: string, params?: QueryParams): Promise<APIResponse> {
    if (!this.context) {
      throw new Error(
        'Request context not initialized. Call initialize() or useRequestContext() first.'
      );
    }

    let response: APIResponse;
    try {
      response = await this.context.get(url, { params, timeout: this.timeout });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new UpstreamRequestError(url, null, message, { cause: error });
    }

    if (!response.ok()) {
      throw new UpstreamRequestError(url, response.status(), response.statusText());
    }
    return response;
  }
}
