export const DEFAULT_TITLE = 'Transcription';
export const DEFAULT_FULL_TITLE = 'Full transcription';
export const EMPTY_DOCUMENT_TEXT = '(empty document)';

// Below this size an upload is treated as silence and never reaches the provider.
export const MIN_AUDIO_BYTES = 2048;
export const PREVIEW_MAX_CHARS = 200;

export const TARGET_SAMPLE_RATE = 16000;
export const BLOCK_SECONDS = 30;
export const PREVIEW_SECONDS = 5;

export const SUPPORTED_AUDIO_EXTENSIONS = ['.wav', '.mp3', '.m4a', '.ogg', '.webm'];
