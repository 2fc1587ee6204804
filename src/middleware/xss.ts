import type { Context, MiddlewareHandler } from 'hono';
import { createLogger, generateRequestId } from '../logger.js';
import { isJsonResponse, rewriteRequest, rewriteResponseBody } from '../security/dispatcher.js';
import { XssFilterError } from '../security/errors.js';
import { DEFAULT_MAX_PARTS } from '../security/multipart-codec.js';
import { DEFAULT_SKIP_FIELDS, createFieldPolicy, type FieldPolicyOptions } from '../security/policy.js';
import type { FieldPolicy, RequestRewrite } from '../types/xss.js';

const logger = createLogger('xss-middleware');

export const RESPONSE_FILTER_FAILED = 'XSS filtering failed';

export interface XssDefenderOptions extends FieldPolicyOptions {
  /** Parts read from a multipart body before the rest is ignored (default 100) */
  maxMultipartParts?: number;
}

/**
 * Request and response filters sharing one read-only field policy.
 */
export class XssDefender {
  readonly policy: FieldPolicy;
  readonly maxMultipartParts: number;

  constructor(options: XssDefenderOptions = {}) {
    this.policy = createFieldPolicy(options);
    this.maxMultipartParts = options.maxMultipartParts ?? DEFAULT_MAX_PARTS;
  }

  /**
   * Sanitizes JSON, form and multipart bodies of POST/PUT/PATCH requests and
   * the query string of GET requests. A payload that cannot be decoded is
   * answered with 400 and never reaches the handler.
   */
  requestFilter(): MiddlewareHandler {
    return async (c, next) => {
      const requestId = generateRequestId();
      const requestLogger = logger.child({ requestId });

      let rewrite: RequestRewrite;
      try {
        rewrite = await rewriteRequest(
          {
            method: c.req.method,
            url: c.req.url,
            contentType: c.req.header('Content-Type'),
            contentLength: c.req.header('Content-Length'),
            readBody: async () => new Uint8Array(await c.req.raw.arrayBuffer()),
          },
          { policy: this.policy, maxMultipartParts: this.maxMultipartParts },
        );
      } catch (error) {
        if (!(error instanceof XssFilterError)) {
          throw error;
        }
        requestLogger.warn(
          { error: error.name, message: error.message, method: c.req.method, path: c.req.path },
          'Request rejected by XSS filter',
        );
        return c.json({ error: error.message }, 400);
      }

      applyRewrite(c, rewrite);
      requestLogger.debug({ encoding: rewrite.encoding, method: c.req.method, path: c.req.path }, 'Request filtered');

      await next();
    };
  }

  /**
   * Rewrites handler output whose content type contains `application/json`.
   * If the body cannot be rewritten the client gets a 500 instead.
   */
  responseFilter(): MiddlewareHandler {
    return async (c, next) => {
      await next();

      if (!isJsonResponse(c.res.headers.get('content-type')) || c.res.body === null) {
        return;
      }

      try {
        const body = new Uint8Array(await c.res.arrayBuffer());
        c.res = new Response(toArrayBuffer(this.buildNewBody(body)), c.res);
      } catch (error) {
        if (!(error instanceof XssFilterError)) {
          throw error;
        }
        logger.error({ error: error.name, message: error.message, path: c.req.path }, 'Response rewrite failed');
        c.res = c.json({ error: RESPONSE_FILTER_FAILED }, 500);
      }
      c.res.headers.delete('Content-Length');
    };
  }

  /**
   * Sanitize a buffered JSON response body.
   */
  buildNewBody(body: Uint8Array): Uint8Array {
    return rewriteResponseBody(body, this.policy);
  }
}

export function createXssDefender(options: XssDefenderOptions = {}): XssDefender {
  return new XssDefender(options);
}

/**
 * Defender with the strict sanitize-html policy and `password` always skipped.
 */
export function createDefaultDefender(options: Omit<XssDefenderOptions, 'sanitize'> = {}): XssDefender {
  return new XssDefender({
    ...options,
    skipFields: new Set([...DEFAULT_SKIP_FIELDS, ...(options.skipFields ?? [])]),
  });
}

function applyRewrite(c: Context, rewrite: RequestRewrite): void {
  const original = c.req.raw;

  switch (rewrite.encoding) {
    case 'none':
      return;
    case 'query':
      c.req.raw = new Request(rewrite.url, {
        method: original.method,
        headers: original.headers,
        signal: original.signal,
      });
      return;
    default: {
      const headers = new Headers(original.headers);
      headers.set('Content-Length', String(rewrite.body.byteLength));
      c.req.raw = new Request(original.url, {
        method: original.method,
        headers,
        body: toArrayBuffer(rewrite.body),
        signal: original.signal,
      });
    }
  }
}

function toArrayBuffer(bytes: Uint8Array): ArrayBuffer {
  const copy = new ArrayBuffer(bytes.byteLength);
  new Uint8Array(copy).set(bytes);
  return copy;
}
