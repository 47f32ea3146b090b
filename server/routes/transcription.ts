import { Router, type Request } from 'express';
import type { Multer } from 'multer';
import { DEFAULT_TITLE, MIN_AUDIO_BYTES, PREVIEW_MAX_CHARS } from '../../constants';
import type { PreviewResponse, UploadResponse } from '../../types';
import type { AppConfig } from '../config';
import { HttpError, ProviderError, errorMessage } from '../errors';
import type { Logger } from '../logger';
import { buildHtmlDocument } from '../services/htmlDocument';
import { type SessionStore, extensionOf, partFileName, withExtension } from '../services/sessionStore';
import { formatParagraphs, sanitizeText } from '../services/textCleanup';
import type { AudioInput, Transcriber } from '../services/transcriptionService';
import { uploadFieldsSchema } from './schemas';

export interface TranscriptionRouterDeps {
  config: AppConfig;
  transcriber: Transcriber;
  store: SessionStore;
  upload: Multer;
  now: () => Date;
  log: Logger;
}

const EMPTY_UPLOAD: UploadResponse = { text: '', formatted: '' };

export const requireFile = (req: Request): Express.Multer.File => {
  if (!req.file) {
    throw new HttpError(400, 'Missing file');
  }
  return req.file;
};

const toAudioInput = (file: Express.Multer.File, fallbackName: string): AudioInput => ({
  content: file.buffer,
  filename: file.originalname || fallbackName,
  contentType: file.mimetype || 'audio/wav'
});

export const createTranscriptionRouter = ({ config, transcriber, store, upload, now, log }: TranscriptionRouterDeps): Router => {
  const router = Router();

  router.post('/upload', upload.single('file'), async (req, res) => {
    const file = requireFile(req);
    if (file.size === 0) {
      throw new HttpError(400, 'Empty file');
    }
    if (file.size < MIN_AUDIO_BYTES) {
      res.json(EMPTY_UPLOAD);
      return;
    }

    const { title, sid, part } = uploadFieldsSchema.parse(req.body ?? {});
    const date = now();

    // The audio is kept even when transcription fails afterwards.
    const audioName = partFileName({ sid, part, ext: extensionOf(file.originalname), date });
    await store.save(file.buffer, sid, audioName);

    let rawText: string;
    try {
      rawText = await transcriber.transcribe(toAudioInput(file, 'audio.wav'), { model: config.transcribeModel });
    } catch (error) {
      if (error instanceof ProviderError) {
        log.error(`Transcription failed for ${audioName}`, error);
        res.status(500).json({ error: 'Transcription provider error', detail: error.detail ?? error.message });
        return;
      }
      throw error;
    }

    const text = sanitizeText(rawText);
    if (!text) {
      res.json(EMPTY_UPLOAD);
      return;
    }

    const formatted = formatParagraphs(text);

    try {
      const html = buildHtmlDocument({
        title: title?.trim() || DEFAULT_TITLE,
        logoName: config.logoName,
        formattedText: formatted,
        language: config.language,
        date
      });
      await store.save(html, sid, withExtension(audioName, '.html'));
    } catch (error) {
      log.warn(`Saving HTML for ${audioName} failed: ${errorMessage(error)}`);
    }

    const body: UploadResponse = { text, formatted };
    res.json(body);
  });

  router.post('/upload_preview', upload.single('file'), async (req, res) => {
    const file = requireFile(req);
    log.debug(`[/upload_preview] recv name=${file.originalname} ct=${file.mimetype} size=${file.size}`);

    const empty: PreviewResponse = { text: '' };
    if (!config.liveDraft || file.size < MIN_AUDIO_BYTES) {
      res.json(empty);
      return;
    }

    let rawText: string;
    try {
      rawText = await transcriber.transcribe(toAudioInput(file, 'preview.wav'), { model: config.previewModel, preview: true });
    } catch (error) {
      if (error instanceof ProviderError) {
        log.warn(`Live draft skipped: ${error.message}`);
        res.json(empty);
        return;
      }
      throw error;
    }

    // Cut by code point so a surrogate pair is never split.
    const draft = Array.from(sanitizeText(rawText)).slice(0, PREVIEW_MAX_CHARS).join('');
    const body: PreviewResponse = { text: draft };
    res.json(body);
  });

  return router;
};
