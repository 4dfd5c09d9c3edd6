import type { HttpMethod, ParameterEncoding, Parameters } from "./types.js";

export interface RequestDescriptorInit {
  host: string;
  endpoint: string;
  method?: HttpMethod;
  query?: Parameters;
  body?: Parameters;
  headers?: Record<string, string>;
}

/**
 * Frozen copy of a descriptor, taken when a call is issued.
 */
export interface RequestSnapshot {
  readonly url: string;
  readonly method: HttpMethod;
  readonly parameters: Readonly<Parameters>;
  readonly encoding: ParameterEncoding;
  readonly headers: Readonly<Record<string, string>>;
}

/**
 * Describes one API call: where it goes, how, and with what.
 *
 * When a body is present it is what gets encoded (into the request body) and
 * the query is ignored; otherwise the query becomes the query string.
 *
 * @example
 * ```typescript
 * const login = new RequestDescriptor({
 *   host: "https://api.example.com",
 *   endpoint: "/login",
 *   method: "POST",
 *   body: { user: "a", pass: "b" },
 * });
 * login.mergeHeaders({ "X-Device": "cli" });
 * ```
 */
export class RequestDescriptor {
  readonly host: string;
  readonly endpoint: string;
  readonly method: HttpMethod;
  private _query: Parameters;
  private _body: Parameters | undefined;
  private _headers: Record<string, string>;

  constructor(init: RequestDescriptorInit) {
    this.host = init.host;
    this.endpoint = init.endpoint;
    this.method = init.method ?? "GET";
    this._query = { ...init.query };
    this._body = init.body === undefined ? undefined : { ...init.body };
    this._headers = { ...init.headers };
  }

  /** Host and endpoint joined as-is; duplicate slashes are left alone. */
  get url(): string {
    return `${this.host}${this.endpoint}`;
  }

  get query(): Readonly<Parameters> {
    return this._query;
  }

  get body(): Readonly<Parameters> | undefined {
    return this._body;
  }

  get headers(): Readonly<Record<string, string>> {
    return this._headers;
  }

  get encoding(): ParameterEncoding {
    return this._body === undefined ? "queryString" : "httpBody";
  }

  /** The parameters that will actually be encoded. */
  get parameters(): Readonly<Parameters> {
    return this._body ?? this._query;
  }

  mergeQuery(params: Parameters): this {
    this._query = { ...this._query, ...params };
    return this;
  }

  mergeHeaders(params: Record<string, string>): this {
    this._headers = { ...this._headers, ...params };
    return this;
  }

  mergeBody(params: Parameters): this {
    this._body = { ...(this._body ?? {}), ...params };
    return this;
  }

  snapshot(): RequestSnapshot {
    return Object.freeze({
      url: this.url,
      method: this.method,
      parameters: Object.freeze({ ...this.parameters }),
      encoding: this.encoding,
      headers: Object.freeze({ ...this._headers }),
    });
  }
}
