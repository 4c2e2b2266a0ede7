/**
 * HTTP utilities for the poll transport
 */
import got from 'got';
import CircuitBreaker from 'opossum';

export interface HttpResponse {
  ok: boolean;
  status: number;
  out: string;
}

/**
 * Convert header array to plain object for got
 */
export function headersToObject(headerList: Array<string> = []) {
  const headers: Record<string, string> = {};
  for (const header of headerList) {
    const separatorIndex = header.indexOf(':');
    if (separatorIndex > 0) {
      const key = header.slice(0, separatorIndex).trim();
      const value = header.slice(separatorIndex + 1).trim();
      headers[key] = value;
    }
  }
  return headers;
}

// Polls run every second, so keep requests short and never retry inside got:
// the next tick is the retry.
const circuitBreakerOptions = {
  timeout: 2500, // If request takes longer than 2.5s, trigger a failure
  errorThresholdPercentage: 50, // Open circuit if 50% of requests fail
  resetTimeout: 10000, // Try again after 10s
};

const makeRequest = async (url: string, headers: Record<string, string>) => {
  const response = await got(url, {
    method: 'GET',
    headers,
    timeout: {
      request: 2000,
    },
    retry: {
      limit: 0,
    },
    throwHttpErrors: false,
  });

  return {
    statusCode: response.statusCode,
    body: response.body,
  };
};

/**
 * GET with a per-host circuit breaker. Never rejects: failures come back as
 * `{ ok: false, status: 0, out: <message> }`.
 */
export class GotHttpClient {
  private readonly breakers = new Map<string, CircuitBreaker<[string, Record<string, string>], { statusCode: number; body: string }>>();

  private breakerFor(url: string) {
    const host = new URL(url).host;
    let breaker = this.breakers.get(host);
    if (breaker === undefined) {
      breaker = new CircuitBreaker(makeRequest, circuitBreakerOptions);
      this.breakers.set(host, breaker);
    }
    return breaker;
  }

  async get(url: string, headers: Array<string> = []): Promise<HttpResponse> {
    try {
      const result = await this.breakerFor(url).fire(url, headersToObject(headers));
      return {
        ok: result.statusCode >= 200 && result.statusCode < 300,
        status: result.statusCode,
        out: result.body,
      };
    } catch (error) {
      return {
        ok: false,
        status: 0,
        out: error instanceof Error ? error.message : String(error),
      };
    }
  }

  shutdown() {
    for (const breaker of this.breakers.values()) {
      breaker.shutdown();
    }
    this.breakers.clear();
  }
}
