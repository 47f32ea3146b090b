import fs from 'fs';
import path from 'path';
import express, { Router } from 'express';
import type { ClientConfig } from '../../types';
import type { AppConfig } from '../config';
import type { Logger } from '../logger';

export interface PageRouterDeps {
  config: AppConfig;
  webRoot: string;
  log: Logger;
}

const NOT_BUILT_MESSAGE = 'The web client has not been built yet. Run `npm run build`, or `npm run dev` for the Vite dev server.';

export const toClientConfig = (config: AppConfig): ClientConfig => ({
  logoName: config.logoName,
  liveDraft: config.liveDraft,
  language: config.language
});

/** Inserts the runtime settings as `window.__APP_CONFIG__` right before `</head>`. */
export const injectClientConfig = (html: string, clientConfig: ClientConfig): string => {
  // "<" is escaped so that a value can never close the script tag.
  const json = JSON.stringify(clientConfig).replace(/</g, '\\u003c');
  const script = `<script>window.__APP_CONFIG__ = ${json};</script>`;
  return html.includes('</head>') ? html.replace('</head>', `${script}</head>`) : `${script}${html}`;
};

export const createPageRouter = ({ config, webRoot, log }: PageRouterDeps): Router => {
  const router = Router();
  const indexPath = path.join(webRoot, 'index.html');

  router.get('/', async (_req, res) => {
    let template: string;
    try {
      template = await fs.promises.readFile(indexPath, 'utf-8');
    } catch {
      log.warn(`Client page missing at ${indexPath}`);
      res.status(503).type('text/plain').send(NOT_BUILT_MESSAGE);
      return;
    }

    res.type('html').send(injectClientConfig(template, toClientConfig(config)));
  });

  router.use(express.static(webRoot, { index: false }));

  return router;
};
