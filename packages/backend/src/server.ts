/**
 * @description: Serves embedded and on-disk static assets over HTTP.
 * @scope: core
 * @module: WebServer
 * @risk: high - Server failures break UI delivery.
 */
import http from 'node:http';
import path from 'node:path';
import { describeError, logger } from '@asset-resolver/shared';

import { runtimeConfig } from './config';
import { embeddedManifest } from './embeddedManifest';
import { StaticAssetResolver } from './assets/staticAssetResolver';
import { createStaticRequestHandler } from './http/assets';

// --- Resolver ---
const webRoot = runtimeConfig.webRoot ? path.resolve(runtimeConfig.webRoot) : '';
const resolver = new StaticAssetResolver({ webRoot, manifest: embeddedManifest });

logger.info(`Embedded assets: ${resolver.manifest.size}`);
logger.info(`Web root: ${webRoot || 'disabled (embedded-only)'}`);

// --- HTTP server ---
const handleStaticRequest = createStaticRequestHandler(resolver);

const server = http.createServer((req, res) => {
  handleStaticRequest(req, res).catch((error: unknown) => {
    logger.error(`Unhandled request failure: ${describeError(error)}`);
    if (!res.headersSent) {
      res.statusCode = 500;
    }
    res.end();
  });
});

// --- Server startup ---
server.listen(runtimeConfig.port, runtimeConfig.host, () => {
  logger.info(`Static asset server available on ${runtimeConfig.host}:${runtimeConfig.port}`);
});
