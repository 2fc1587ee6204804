import type { BodyEncoding, FieldPolicy, RequestRewrite, RequestSnapshot } from '../types/xss.js';
import { rewriteFormBody } from './form-codec.js';
import { rewriteJsonBody } from './json-codec.js';
import { DEFAULT_MAX_PARTS, rewriteMultipartBody } from './multipart-codec.js';
import { rewriteQueryString } from './query-rewriter.js';

export interface DispatchOptions {
  policy: FieldPolicy;
  maxMultipartParts?: number;
}

const BODY_METHODS = new Set(['POST', 'PUT', 'PATCH']);

/**
 * Media type without parameters, lower-cased.
 */
export function mediaType(contentType: string | undefined): string {
  return (contentType ?? '').split(';')[0].trim().toLowerCase();
}

/**
 * Pick the codec for a request from its method and headers.
 */
export function selectRequestEncoding(
  method: string,
  contentType: string | undefined,
  contentLength: string | undefined,
): BodyEncoding {
  const verb = method.toUpperCase();

  if (verb === 'GET') {
    return 'query';
  }
  if (!BODY_METHODS.has(verb)) {
    return 'none';
  }

  const type = mediaType(contentType);

  if (type === 'application/json') {
    // Without a declared length the body itself is measured once read
    return contentLength === undefined || Number.parseInt(contentLength, 10) > 1 ? 'json' : 'none';
  }
  if (type === 'application/x-www-form-urlencoded') {
    return 'form';
  }
  if ((contentType ?? '').toLowerCase().includes('multipart/form-data')) {
    return 'multipart';
  }
  return 'none';
}

/**
 * Rewrite a request through the codec its headers select. Codec errors
 * propagate to the caller.
 */
export async function rewriteRequest(request: RequestSnapshot, options: DispatchOptions): Promise<RequestRewrite> {
  const { policy } = options;
  const encoding = selectRequestEncoding(request.method, request.contentType, request.contentLength);

  switch (encoding) {
    case 'none':
      return { encoding };
    case 'query':
      return { encoding, url: rewriteQueryString(request.url, policy) };
    case 'json': {
      const body = await request.readBody();
      return { encoding, body: body.byteLength > 1 ? rewriteJsonBody(body, policy) : body };
    }
    case 'form':
      return { encoding, body: rewriteFormBody(await request.readBody(), policy) };
    case 'multipart':
      return {
        encoding,
        body: await rewriteMultipartBody(
          await request.readBody(),
          request.contentType ?? '',
          policy,
          options.maxMultipartParts ?? DEFAULT_MAX_PARTS,
        ),
      };
  }
}

/**
 * Responses are rewritten only when they claim JSON; everything else is sent as is.
 */
export function isJsonResponse(contentType: string | null | undefined): boolean {
  return (contentType ?? '').includes('application/json');
}

/**
 * Rewrite a buffered JSON response. An empty body has nothing to filter.
 */
export function rewriteResponseBody(body: Uint8Array, policy: FieldPolicy): Uint8Array {
  if (body.byteLength === 0) {
    return body;
  }
  return rewriteJsonBody(body, policy);
}
