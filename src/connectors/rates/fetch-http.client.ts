import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

import type {
  HttpRequestOptions,
  HttpResponse,
  IHttpClient,
} from '../../common/interfaces/index.js';
import { toError } from '../../common/errors/index.js';

/**
 * IHttpClient over the global fetch. The request is aborted by whichever
 * comes first: the caller's signal or the per-request timeout.
 */
@Injectable()
export class FetchHttpClient implements IHttpClient {
  private readonly defaultTimeoutMs: number;

  constructor(private readonly configService: ConfigService) {
    this.defaultTimeoutMs = Number(
      this.configService.get<string | number>('RATE_PROVIDER_TIMEOUT_MS', 10_000),
    );
  }

  async getJson(
    url: string,
    options: HttpRequestOptions = {},
  ): Promise<HttpResponse> {
    const target = new URL(url);
    for (const [key, value] of Object.entries(options.query ?? {})) {
      target.searchParams.set(key, value);
    }

    const timeout = AbortSignal.timeout(options.timeoutMs ?? this.defaultTimeoutMs);
    const signal = options.signal
      ? AbortSignal.any([options.signal, timeout])
      : timeout;

    const response = await fetch(target, {
      headers: { accept: 'application/json', ...options.headers },
      signal,
    });

    const text = await response.text();
    if (!text) {
      return { status: response.status, body: null };
    }

    try {
      return { status: response.status, body: JSON.parse(text) as unknown };
    } catch (error) {
      if (response.ok) {
        throw new Error(
          `Invalid JSON from ${target.host}: ${toError(error).message}`,
        );
      }
      return { status: response.status, body: text };
    }
  }
}
