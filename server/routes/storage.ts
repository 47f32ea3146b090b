import { Router } from 'express';
import type { Multer } from 'multer';
import { DEFAULT_FULL_TITLE, EMPTY_DOCUMENT_TEXT } from '../../constants';
import type { SaveResponse } from '../../types';
import type { AppConfig } from '../config';
import { HttpError, errorMessage } from '../errors';
import type { Logger } from '../logger';
import { buildHtmlDocument } from '../services/htmlDocument';
import { type SessionStore, extensionOf, fullFileName } from '../services/sessionStore';
import { formatParagraphs, sanitizeText } from '../services/textCleanup';
import { saveAudioFieldsSchema, saveTextBodySchema } from './schemas';
import { requireFile } from './transcription';

export interface StorageRouterDeps {
  config: AppConfig;
  store: SessionStore;
  upload: Multer;
  now: () => Date;
  log: Logger;
}

export const createStorageRouter = ({ config, store, upload, now, log }: StorageRouterDeps): Router => {
  const router = Router();

  // Full recording of a session, saved as-is when recording stops.
  router.post('/save_audio', upload.single('file'), async (req, res) => {
    const file = requireFile(req);
    if (file.size === 0) {
      throw new HttpError(400, 'Empty file');
    }

    const { sid } = saveAudioFieldsSchema.parse(req.body ?? {});
    const filename = fullFileName({ sid, ext: extensionOf(file.originalname), date: now() });
    const filePath = await store.save(file.buffer, sid, filename);

    const body: SaveResponse = { saved: true, path: filePath };
    res.json(body);
  });

  router.post('/save_text', async (req, res) => {
    const payload = saveTextBodySchema.parse(req.body ?? {});
    const text = payload.text || '';
    const sid = payload.sid || undefined;
    const title = (payload.title || DEFAULT_FULL_TITLE).trim() || DEFAULT_FULL_TITLE;

    log.info(`[/save_text] sid=${JSON.stringify(sid ?? null)} title=${JSON.stringify(title)} chars=${text.length}`);

    // An empty text still gets a document, so every full audio file has its HTML twin.
    const clean = sanitizeText(text);
    const formatted = formatParagraphs(clean) || EMPTY_DOCUMENT_TEXT;
    const date = now();

    try {
      const html = buildHtmlDocument({
        title,
        logoName: config.logoName,
        formattedText: formatted,
        language: config.language,
        date
      });
      const filePath = await store.save(html, sid, fullFileName({ sid, ext: '.html', date }));
      log.success(`[/save_text] saved: ${filePath}`);
      const body: SaveResponse = { saved: true, path: filePath };
      res.json(body);
    } catch (error) {
      log.error('[/save_text] error', error);
      const body: SaveResponse = { saved: false, error: errorMessage(error) };
      res.status(500).json(body);
    }
  });

  return router;
};
