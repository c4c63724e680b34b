import { NotFoundError, TransportError } from '../errors.js';
import type { AttributeNode } from '../tree/attribute-node.js';
import { parseXml } from '../tree/xml.js';
import type { ParamValue, QueryOptions, Transport } from '../types.js';

export const TOKEN_HEADER = 'X-Plex-Token';

export interface HttpTransportOptions {
  /** Server root, e.g. `http://127.0.0.1:32400`. */
  baseUrl: string;
  token?: string;
  /** Sent with every request; per-call headers take precedence. */
  headers?: Record<string, string>;
  /** Defaults to the global fetch. */
  fetch?: typeof fetch;
}

function paramText(value: ParamValue): string {
  if (typeof value === 'boolean') return value ? '1' : '0';
  return String(value);
}

/** Transport over HTTP that parses XML response bodies into attribute trees. */
export class HttpTransport implements Transport {
  private readonly baseUrl: string;
  private readonly headers: Record<string, string>;
  private readonly fetchImpl: typeof fetch;

  constructor(options: HttpTransportOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.headers = {
      Accept: 'application/xml',
      ...options.headers,
      ...(options.token !== undefined ? { [TOKEN_HEADER]: options.token } : {}),
    };
    this.fetchImpl = options.fetch ?? fetch;
  }

  /** Absolute URL for a server path and query parameters. */
  url(path: string, params: QueryOptions['params'] = {}): URL {
    const url = new URL(`${this.baseUrl}${path.startsWith('/') ? '' : '/'}${path}`);
    for (const [name, value] of Object.entries(params)) {
      url.searchParams.set(name, paramText(value));
    }
    return url;
  }

  async query(path: string, options: QueryOptions = {}): Promise<AttributeNode | null> {
    const method = options.method ?? 'GET';
    const url = this.url(path, options.params);

    const { response, body } = await this.send(url, method, { ...this.headers, ...options.headers }).catch((err: unknown) => {
      throw new TransportError(`${method} ${path} failed`, null, err);
    });

    if (response.status === 404) {
      throw new NotFoundError(`(404) not_found; ${method} ${path}`);
    }
    if (!response.ok) {
      const detail = body.trim().replace(/\s+/g, ' ').slice(0, 200);
      throw new TransportError(`(${response.status}) ${response.statusText}; ${method} ${path} ${detail}`.trim(), response.status);
    }

    if (body.trim() === '') return null;
    try {
      return parseXml(body);
    } catch (err) {
      throw new TransportError(`${method} ${path} returned an unparsable body`, response.status, err);
    }
  }

  private async send(url: URL, method: string, headers: Record<string, string>): Promise<{ response: Response; body: string }> {
    const response = await this.fetchImpl(url, { method, headers });
    return { response, body: await response.text() };
  }
}
