import express from 'express';
import type { ErrorRequestHandler, Express, RequestHandler } from 'express';
import { promises as fs } from 'fs';
import { resolve, sep } from 'path';
import { errorCode, errorMessage } from '../errors';
import { requestLogger } from './request-logger';
import type { PreviewAppOptions } from './types';

const MISSING_PATH_CODES = new Set(['ENOENT', 'ENOTDIR']);

export function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

export function renderDirectoryListing(requestPath: string, entries: { name: string; isDirectory: boolean }[]): string {
  const title = `Directory listing for ${escapeHtml(requestPath)}`;
  const items = [...entries]
    .sort((a, b) => a.name.localeCompare(b.name))
    .map((entry) => {
      const suffix = entry.isDirectory ? '/' : '';
      return `<li><a href="${encodeURIComponent(entry.name)}${suffix}">${escapeHtml(entry.name)}${suffix}</a></li>`;
    });

  return [
    '<!DOCTYPE html>',
    '<html lang="en">',
    '<head>',
    '<meta charset="utf-8">',
    `<title>${title}</title>`,
    '</head>',
    '<body>',
    `<h1>${title}</h1>`,
    '<hr>',
    '<ul>',
    ...items,
    '</ul>',
    '<hr>',
    '</body>',
    '</html>',
    '',
  ].join('\n');
}

function isInside(rootDirectory: string, target: string): boolean {
  return target === rootDirectory || target.startsWith(rootDirectory.endsWith(sep) ? rootDirectory : rootDirectory + sep);
}

function directoryListing(rootDirectory: string): RequestHandler {
  return (req, res, next) => {
    if ((req.method !== 'GET' && req.method !== 'HEAD') || !req.path.endsWith('/')) {
      next();
      return;
    }

    let requestPath: string;
    try {
      requestPath = decodeURIComponent(req.path);
    } catch {
      // Malformed escapes are left to the not-found handler
      next();
      return;
    }
    // fs rejects paths containing NUL before it looks at the disk
    if (requestPath.includes('\0')) {
      next();
      return;
    }

    const target = resolve(rootDirectory, `.${requestPath}`);
    if (!isInside(rootDirectory, target)) {
      next();
      return;
    }

    fs.readdir(target, { withFileTypes: true })
      .then((dirents) => {
        const entries = dirents.map((dirent) => ({ name: dirent.name, isDirectory: dirent.isDirectory() }));
        res.status(200).type('html').send(renderDirectoryListing(requestPath, entries));
      })
      .catch((error: unknown) => {
        const code = errorCode(error);
        next(code && MISSING_PATH_CODES.has(code) ? undefined : error);
      });
  };
}

const notFound: RequestHandler = (_req, res) => {
  res.status(404).type('text/plain').send('File not found');
};

const errorHandler: ErrorRequestHandler = (error, req, res, _next) => {
  console.error(`[HTTP] ${req.method} ${req.originalUrl} failed:`, errorMessage(error));
  if (res.headersSent) {
    res.destroy();
    return;
  }
  res.status(500).type('text/plain').send('Internal server error');
};

/**
 * Static file app for the content root: files (with `index.html` for
 * directories), then a listing for directories without one, then 404.
 */
export function createPreviewApp(options: PreviewAppOptions): Express {
  const rootDirectory = resolve(options.rootDirectory);
  const app = express();

  app.disable('x-powered-by');

  if (options.logRequests ?? true) {
    app.use(requestLogger());
  }

  app.use(express.static(rootDirectory, { dotfiles: 'allow' }));
  app.use(directoryListing(rootDirectory));
  app.use(notFound);
  app.use(errorHandler);

  return app;
}
