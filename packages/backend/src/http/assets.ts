/**
 * @description: Maps resolved static assets onto node:http responses.
 * @scope: backend
 * @module: StaticAssetHttp
 * @risk: moderate - Wrong cache headers pin stale files in browsers.
 */
import type { IncomingMessage, ServerResponse } from 'node:http';

import { AssetReadError } from '../assets/errors';
import type { StaticAssetResolver } from '../assets/staticAssetResolver';
import type { ResolvedAsset } from '../assets/types';
import { logRequest } from '../utils/requestLogger';

// --- Cache policies ---
const IMMUTABLE_CACHE_CONTROL = 'public, max-age=31536000, immutable';
const REVALIDATE_CACHE_CONTROL = 'no-cache';

type StaticResponse = {
  statusCode: number;
  headers: Record<string, string>;
  body: Buffer | null;
};

const textResponse = (statusCode: number, text: string, headers: Record<string, string> = {}): StaticResponse => ({
  statusCode,
  headers: { 'Content-Type': 'text/plain; charset=utf-8', ...headers },
  body: Buffer.from(text)
});

/**
 * Header and body mapping for a resolution outcome. HEAD keeps the headers
 * (including Content-Length) and drops the body.
 */
const buildStaticResponse = (asset: ResolvedAsset | undefined, method = 'GET'): StaticResponse => {
  if (method !== 'GET' && method !== 'HEAD') {
    return textResponse(405, 'Method Not Allowed', { Allow: 'GET, HEAD' });
  }

  if (!asset) {
    return textResponse(404, 'Not Found');
  }

  const headers: Record<string, string> = {
    'Content-Type': asset.contentType,
    'Content-Length': String(asset.body.length),
    'Cache-Control': asset.immutableCache ? IMMUTABLE_CACHE_CONTROL : REVALIDATE_CACHE_CONTROL
  };
  if (asset.encoding) {
    headers['Content-Encoding'] = asset.encoding;
    headers.Vary = 'Accept-Encoding';
  }

  return {
    statusCode: 200,
    headers,
    body: method === 'HEAD' ? null : asset.body
  };
};

const writeStaticResponse = (res: ServerResponse, response: StaticResponse): void => {
  res.statusCode = response.statusCode;
  for (const [name, value] of Object.entries(response.headers)) {
    res.setHeader(name, value);
  }
  if (response.body) {
    res.end(response.body);
  } else {
    res.end();
  }
};

// --- Handler factory ---
const createStaticRequestHandler = (resolver: StaticAssetResolver) => {
  return async (req: IncomingMessage, res: ServerResponse): Promise<void> => {
    const method = req.method ?? 'GET';

    try {
      // Skip disk work for methods that will be refused anyway.
      const asset = method === 'GET' || method === 'HEAD'
        ? await resolver.resolve(req.url ?? '/')
        : undefined;
      writeStaticResponse(res, buildStaticResponse(asset, method));
      logRequest(req, res, asset ? asset.route : '');
    } catch (error) {
      writeStaticResponse(res, textResponse(500, 'Internal Server Error'));
      const detail = error instanceof AssetReadError
        ? `${error.code} ${error.message}`
        : error instanceof Error ? error.message : 'unknown error';
      logRequest(req, res, detail);
    }
  };
};

export { IMMUTABLE_CACHE_CONTROL, REVALIDATE_CACHE_CONTROL, buildStaticResponse, createStaticRequestHandler };
export type { StaticResponse };
