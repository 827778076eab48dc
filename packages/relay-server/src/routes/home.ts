import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import { Router } from 'express';

// src/routes/ and dist/routes/ both sit two levels below the package root
const PAGE_PATH = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '..', '..', 'public', 'index.html');

let cachedPage: string | undefined;

function loadPage(): string {
  cachedPage ??= fs.readFileSync(PAGE_PATH, 'utf-8');
  return cachedPage;
}

export function renderPage(template: string, mcpPath: string): string {
  return template.replaceAll('{{MCP_PATH}}', mcpPath);
}

export function homeRouter(mcpPath: string): Router {
  const router = Router();

  router.get('/', (_req, res) => {
    res.type('html').send(renderPage(loadPage(), mcpPath));
  });

  return router;
}
