/**
 * Resend-ready request representation.
 *
 * Fetch consumes a request body when it sends it, so a request that may be
 * retried keeps its body as buffered bytes that can be duplicated on demand.
 * Single-use bodies are rejected when the request is built.
 */

import { UnclonableBodyError } from './errors.js';
import type { HeadersLike } from './rate-limit.js';

export type HttpVersion = 'HTTP/1.0' | 'HTTP/1.1' | 'HTTP/2' | 'HTTP/3';

const METHOD_PATTERN = /^[!#$%&'*+\-.^_`|~0-9A-Za-z]+$/;
const DEFAULT_VERSION: HttpVersion = 'HTTP/1.1';

const encoder = new TextEncoder();
const decoder = new TextDecoder();

/** Request body held in memory, duplicable any number of times. */
export class BufferedBody {
  private readonly bytes: Uint8Array;

  private constructor(bytes: Uint8Array) {
    this.bytes = bytes;
  }

  static empty(): BufferedBody {
    return new BufferedBody(new Uint8Array(0));
  }

  /** Copies `content` so later changes by the caller do not leak in. */
  static from(content: string | Uint8Array | ArrayBuffer): BufferedBody {
    if (typeof content === 'string') {
      return new BufferedBody(encoder.encode(content));
    }
    if (content instanceof ArrayBuffer) {
      return new BufferedBody(new Uint8Array(content.slice(0)));
    }
    return new BufferedBody(content.slice());
  }

  get byteLength(): number {
    return this.bytes.byteLength;
  }

  get isEmpty(): boolean {
    return this.bytes.byteLength === 0;
  }

  /** An independent copy of the same content. */
  duplicate(): BufferedBody {
    return new BufferedBody(this.bytes.slice());
  }

  toUint8Array(): Uint8Array {
    return this.bytes.slice();
  }

  /** A standalone copy of the content, suitable as a fetch body. */
  toArrayBuffer(): ArrayBuffer {
    const buffer = new ArrayBuffer(this.bytes.byteLength);
    new Uint8Array(buffer).set(this.bytes);
    return buffer;
  }

  text(): string {
    return decoder.decode(this.bytes);
  }
}

/** An HTTP request whose every part can be rebuilt for a resend. */
export interface HttpRequest {
  readonly method: string;
  readonly url: URL;
  /** Carried into clones; fetch negotiates the wire protocol itself. */
  readonly version: HttpVersion;
  readonly headers: Headers;
  readonly body: BufferedBody;
}

/** Accepted request bodies. Streams are listed so they can be refused. */
export type RequestBodyInit =
  | string
  | Uint8Array
  | ArrayBuffer
  | BufferedBody
  | ReadableStream<Uint8Array>
  | null
  | undefined;

/** Options for {@link createRequest}. */
export interface CreateRequestInit {
  /** HTTP method. Defaults to `GET`. */
  method?: string | undefined;
  /** Absolute URL, or a path resolved against `baseUrl`. */
  url: string | URL;
  /** Base URL for relative `url` values. */
  baseUrl?: string | undefined;
  /** Query parameters appended to the URL. */
  query?: Record<string, string | number | boolean> | undefined;
  headers?: HeadersLike | undefined;
  body?: RequestBodyInit;
  /**
   * Protocol version carried with the request and its clones. Defaults to
   * `HTTP/1.1`. Not sent on the wire: fetch picks the protocol.
   */
  version?: HttpVersion | undefined;
}

/** Parts of a request, taken verbatim. */
export interface RequestParts {
  method: string;
  url: string;
  version: HttpVersion;
  headers: HeadersLike;
  body: BufferedBody;
}

/**
 * Build an {@link HttpRequest} from its parts.
 *
 * @throws TypeError if the method, URL or a header is malformed.
 */
export function assembleRequest(parts: RequestParts): HttpRequest {
  if (!METHOD_PATTERN.test(parts.method)) {
    throw new TypeError(`Invalid HTTP method: '${parts.method}'`);
  }
  return {
    method: parts.method,
    url: new URL(parts.url),
    version: parts.version,
    headers: new Headers(parts.headers),
    body: parts.body,
  };
}

/**
 * Build a resend-ready request.
 *
 * @throws UnclonableBodyError if the body is a stream.
 * @throws TypeError if the method, URL or a header is malformed.
 */
export function createRequest(init: CreateRequestInit): HttpRequest {
  const url = init.baseUrl !== undefined
    ? new URL(joinPath(init.baseUrl, String(init.url)))
    : new URL(init.url);

  if (init.query) {
    for (const [key, value] of Object.entries(init.query)) {
      url.searchParams.append(key, String(value));
    }
  }

  return assembleRequest({
    method: (init.method ?? 'GET').toUpperCase(),
    url: url.href,
    version: init.version ?? DEFAULT_VERSION,
    headers: init.headers ?? {},
    body: toBufferedBody(init.body),
  });
}

function toBufferedBody(body: RequestBodyInit): BufferedBody {
  if (body === undefined || body === null) return BufferedBody.empty();
  if (body instanceof BufferedBody) return body.duplicate();
  if (body instanceof ReadableStream) {
    throw new UnclonableBodyError('ReadableStream');
  }
  return BufferedBody.from(body);
}

function joinPath(baseUrl: string, path: string): string {
  if (/^[a-z][a-z0-9+.-]*:/i.test(path)) return path;
  const base = baseUrl.replace(/\/+$/, '');
  return path.startsWith('/') ? `${base}${path}` : `${base}/${path}`;
}
