/**
 * @description: Validates embedded/disk precedence, alias search order and read failures.
 * @scope: test
 * @module: StaticAssetResolverTests
 * @risk: low - Uses temporary web roots and in-memory fakes only.
 */
import test from 'node:test';
import assert from 'node:assert/strict';
import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { MAX_TOGGLE_POSITIONS } from '../src/assets/aliasExpander';
import { StaticAssetResolver } from '../src/assets/staticAssetResolver';
import { AssetNotFoundError, AssetReadError } from '../src/assets/errors';
import type { FileAccess } from '../src/assets/fileAccess';
import type { EmbeddedAsset } from '../src/assets/types';

const embedded = (route: string, text: string): EmbeddedAsset => {
  const data = new TextEncoder().encode(text);
  return { route, contentType: 'text/html', gzipEncoded: false, data, size: data.length };
};

const errnoError = (code: string, message: string): NodeJS.ErrnoException =>
  Object.assign(new Error(message), { code });

// Fake disk that records every stat call and knows a fixed set of files.
const recordingFileAccess = (files: Record<string, string>) => {
  const statCalls: string[] = [];
  const fileAccess: FileAccess = {
    stat: async (filePath) => {
      statCalls.push(filePath);
      if (filePath in files) {
        return 'file';
      }
      throw errnoError('ENOENT', `no such file: ${filePath}`);
    },
    readFile: async (filePath) => Buffer.from(files[filePath] ?? '')
  };
  return { fileAccess, statCalls };
};

const withWebRoot = async (run: (webRoot: string, tempRoot: string) => Promise<void>): Promise<void> => {
  const tempRoot = await fs.mkdtemp(path.join(os.tmpdir(), 'asset-resolver-'));
  const webRoot = path.join(tempRoot, 'public');
  await fs.mkdir(webRoot);
  try {
    await run(webRoot, tempRoot);
  } finally {
    await fs.rm(tempRoot, { recursive: true, force: true });
  }
};

test('resolves a plain file from the web root', async () => {
  await withWebRoot(async (webRoot) => {
    await fs.writeFile(path.join(webRoot, 'style.css'), 'body{}');
    const resolver = new StaticAssetResolver({ webRoot });

    const asset = await resolver.resolve('/style.css');

    assert.ok(asset);
    assert.equal(asset.route, '/style.css');
    assert.equal(asset.contentType, 'text/css');
    assert.equal(asset.encoding, '');
    assert.equal(asset.immutableCache, false);
    assert.equal(asset.body.toString('utf8'), 'body{}');
  });
});

test('falls back to a pre-compressed sibling', async () => {
  await withWebRoot(async (webRoot) => {
    await fs.writeFile(path.join(webRoot, 'script.js.gz'), 'gz-bytes');
    const resolver = new StaticAssetResolver({ webRoot });

    const asset = await resolver.resolve('/script.js');

    assert.ok(asset);
    assert.equal(asset.route, '/script.js.gz');
    assert.equal(asset.contentType, 'application/javascript');
    assert.equal(asset.encoding, 'gzip');
    assert.equal(asset.body.toString('utf8'), 'gz-bytes');
  });
});

test('prefers the uncompressed file when both exist', async () => {
  await withWebRoot(async (webRoot) => {
    await fs.writeFile(path.join(webRoot, 'script.js'), 'plain');
    await fs.writeFile(path.join(webRoot, 'script.js.gz'), 'gz-bytes');
    const resolver = new StaticAssetResolver({ webRoot });

    const asset = await resolver.resolve('/script.js');

    assert.equal(asset?.route, '/script.js');
    assert.equal(asset?.encoding, '');
  });
});

test('ignores query and fragment text', async () => {
  await withWebRoot(async (webRoot) => {
    await fs.writeFile(path.join(webRoot, 'style.css'), 'body{}');
    const resolver = new StaticAssetResolver({ webRoot });

    assert.equal((await resolver.resolve('/style.css?v=3#x'))?.route, '/style.css');
  });
});

test('finds a file spelled with different hyphens and underscores', async () => {
  await withWebRoot(async (webRoot) => {
    await fs.writeFile(path.join(webRoot, 'my_file-name.js'), 'aliased');
    const resolver = new StaticAssetResolver({ webRoot });

    const asset = await resolver.resolve('/my-file-name.js');

    assert.equal(asset?.route, '/my_file-name.js');
    assert.equal(asset?.body.toString('utf8'), 'aliased');
  });
});

test('the lexicographically smallest spelling wins when several exist', async () => {
  await withWebRoot(async (webRoot) => {
    await fs.writeFile(path.join(webRoot, 'a-b.txt'), 'hyphen');
    await fs.writeFile(path.join(webRoot, 'a_b.txt'), 'underscore');
    const resolver = new StaticAssetResolver({ webRoot });

    const asset = await resolver.resolve('/a_b.txt');

    assert.equal(asset?.route, '/a-b.txt');
    assert.equal(asset?.contentType, 'application/octet-stream');
    assert.equal(asset?.body.toString('utf8'), 'hyphen');
  });
});

test('embedded assets take precedence over disk', async () => {
  await withWebRoot(async (webRoot) => {
    await fs.writeFile(path.join(webRoot, 'app.js'), 'disk');
    const resolver = new StaticAssetResolver({
      webRoot,
      manifest: [{ ...embedded('/app.js', 'embedded'), contentType: 'application/javascript' }]
    });

    const asset = await resolver.resolve('/app.js');

    assert.ok(asset);
    assert.equal(asset.body.toString('utf8'), 'embedded');
    assert.equal(asset.immutableCache, true);
  });
});

test('embedded lookup is insensitive to hyphen/underscore spelling', async () => {
  const resolver = new StaticAssetResolver({ manifest: [embedded('/app-shell.html', '<html>')] });

  const hyphen = await resolver.resolve('/app-shell.html');
  const underscore = await resolver.resolve('/app_shell.html');

  assert.equal(hyphen?.route, '/app-shell.html');
  assert.deepEqual(underscore, hyphen);
});

test('an empty path resolves like the root path', async () => {
  const resolver = new StaticAssetResolver({ manifest: [embedded('/', '<html>root')] });

  const empty = await resolver.resolve('');
  const root = await resolver.resolve('/');

  assert.equal(root?.body.toString('utf8'), '<html>root');
  assert.deepEqual(empty, root);
});

test('directories are not served', async () => {
  await withWebRoot(async (webRoot) => {
    await fs.mkdir(path.join(webRoot, 'docs'));
    const resolver = new StaticAssetResolver({ webRoot });

    assert.equal(await resolver.resolve('/docs'), undefined);
    assert.equal(await resolver.resolve('/'), undefined);
  });
});

test('symlinks to regular files are served', async () => {
  await withWebRoot(async (webRoot) => {
    await fs.writeFile(path.join(webRoot, 'real.json'), '{}');
    await fs.symlink(path.join(webRoot, 'real.json'), path.join(webRoot, 'link.json'));
    const resolver = new StaticAssetResolver({ webRoot });

    const asset = await resolver.resolve('/link.json');

    assert.equal(asset?.route, '/link.json');
    assert.equal(asset?.contentType, 'application/json');
  });
});

test('traversal attempts never reach files outside the web root', async () => {
  await withWebRoot(async (webRoot, tempRoot) => {
    await fs.writeFile(path.join(tempRoot, 'secret.txt'), 'secret');
    const resolver = new StaticAssetResolver({ webRoot });

    assert.equal(await resolver.resolve('/../secret.txt'), undefined);
    assert.equal(await resolver.resolve('..\\secret.txt'), undefined);
    assert.equal(await resolver.resolve('/public/../secret.txt'), undefined);
  });
});

test('paths with a NUL byte are not found and never reach the disk', async () => {
  await withWebRoot(async (webRoot) => {
    await fs.writeFile(path.join(webRoot, 'a.js'), 'a');
    const resolver = new StaticAssetResolver({ webRoot });

    assert.equal(await resolver.resolve('/a\u0000b.js'), undefined);
    assert.equal(await resolver.resolve('/a.js\u0000'), undefined);

    const result = await resolver.resolveOrError('/a\u0000b.js');
    assert.ok(!result.ok);
    assert.ok(result.error instanceof AssetNotFoundError);
  });
});

test('a direct request for a gzip file reports gzip without probing a sibling', async () => {
  const { fileAccess, statCalls } = recordingFileAccess({ '/srv/www/bundle.js.gz': 'gz-bytes' });
  const resolver = new StaticAssetResolver({ webRoot: '/srv/www', fileAccess });

  const asset = await resolver.resolve('/bundle.js.gz');

  assert.ok(asset);
  assert.equal(asset.route, '/bundle.js.gz');
  assert.equal(asset.contentType, 'application/javascript');
  assert.equal(asset.encoding, 'gzip');
  assert.equal(asset.body.toString('utf8'), 'gz-bytes');
  assert.deepEqual(statCalls, ['/srv/www/bundle.js.gz']);
});

test('special files are skipped and never read', async () => {
  const statCalls: string[] = [];
  const readCalls: string[] = [];
  const fileAccess: FileAccess = {
    stat: async (filePath) => {
      statCalls.push(filePath);
      return 'other';
    },
    readFile: async (filePath) => {
      readCalls.push(filePath);
      return Buffer.alloc(0);
    }
  };
  const resolver = new StaticAssetResolver({ webRoot: '/srv/www', fileAccess });

  assert.equal(await resolver.resolve('/dev-null'), undefined);
  assert.deepEqual(statCalls, ['/srv/www/dev-null', '/srv/www/dev-null.gz', '/srv/www/dev_null', '/srv/www/dev_null.gz']);
  assert.deepEqual(readCalls, []);
});

test('embedded-only mode never touches the disk', async () => {
  const { fileAccess, statCalls } = recordingFileAccess({});
  const resolver = new StaticAssetResolver({ fileAccess });

  assert.equal(resolver.embeddedOnly, true);
  assert.equal(await resolver.resolve('/style.css'), undefined);
  assert.deepEqual(statCalls, []);
});

test('disk candidates are probed in sorted alias order with gzip siblings', async () => {
  const { fileAccess, statCalls } = recordingFileAccess({});
  const resolver = new StaticAssetResolver({ webRoot: '/srv/www', fileAccess });

  assert.equal(await resolver.resolve('/a_b'), undefined);
  assert.deepEqual(statCalls, ['/srv/www/a-b', '/srv/www/a-b.gz', '/srv/www/a_b', '/srv/www/a_b.gz']);
});

test('probing stops at the first match', async () => {
  const { fileAccess, statCalls } = recordingFileAccess({ '/srv/www/a-b': 'first' });
  const resolver = new StaticAssetResolver({ webRoot: '/srv/www', fileAccess });

  const asset = await resolver.resolve('/a_b');

  assert.equal(asset?.body.toString('utf8'), 'first');
  assert.deepEqual(statCalls, ['/srv/www/a-b']);
});

test('paths past the alias limit are not found and skip the disk', async () => {
  const { fileAccess, statCalls } = recordingFileAccess({});
  const resolver = new StaticAssetResolver({ webRoot: '/srv/www', fileAccess });

  assert.equal(await resolver.resolve(`/${'a-'.repeat(MAX_TOGGLE_POSITIONS + 1)}`), undefined);
  assert.deepEqual(statCalls, []);
});

test('a read failure after a successful stat is an AssetReadError', async () => {
  const fileAccess: FileAccess = {
    stat: async () => 'file',
    readFile: async () => {
      throw errnoError('EIO', 'EIO simulated');
    }
  };
  const resolver = new StaticAssetResolver({ webRoot: '/srv/www', fileAccess });

  await assert.rejects(resolver.resolve('/x.js'), (error: unknown) => {
    assert.ok(error instanceof AssetReadError);
    assert.equal(error.code, 'ASSET_READ_FAILED');
    assert.equal(error.message, 'Failed to read asset /srv/www/x.js: EIO simulated');
    assert.deepEqual(error.context, { filePath: '/srv/www/x.js' });
    return true;
  });
});

test('stat failures other than absence are AssetReadErrors', async () => {
  const fileAccess: FileAccess = {
    stat: async () => {
      throw errnoError('EACCES', 'permission denied');
    },
    readFile: async () => Buffer.alloc(0)
  };
  const resolver = new StaticAssetResolver({ webRoot: '/srv/www', fileAccess });

  await assert.rejects(resolver.resolve('/x.js'), AssetReadError);
});

test('resolveOrError returns the asset on success', async () => {
  const resolver = new StaticAssetResolver({ manifest: [embedded('/index.html', '<html>')] });

  const result = await resolver.resolveOrError('/index.html');

  assert.equal(result.ok, true);
  assert.ok(result.ok);
  assert.equal(result.asset.route, '/index.html');
});

test('resolveOrError returns AssetNotFoundError for missing and rejected paths', async () => {
  const resolver = new StaticAssetResolver({ manifest: [embedded('/index.html', '<html>')] });

  for (const requestPath of ['/missing.js', '/../index.html']) {
    const result = await resolver.resolveOrError(requestPath);
    assert.equal(result.ok, false);
    assert.ok(!result.ok);
    assert.ok(result.error instanceof AssetNotFoundError);
    assert.equal(result.error.code, 'ASSET_NOT_FOUND');
    assert.equal(result.error.message, `Static asset not found: ${requestPath}`);
  }
});
