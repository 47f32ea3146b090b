// Credits that speech models hallucinate on silent or noisy audio.
const WATERMARK_PATTERNS: RegExp[] = [
  /\bsottotitoli\s+(?:creati|a\s*cura|realizzati|forniti)\s+(?:da(?:lla|l)?\s*)?.*/gi,
  /\bsottotitoli\s+(?:a\s*cura\s+di)\s*.*/gi,
  /\bsottotitoli\s+.*/gi,
  /\bsubtitles?\s+(?:by|created|provided)\b.*/gi,
  /\bcaptions?\s+(?:by|created|provided)\b.*/gi,
  /(?:comunit[àa].{0,20})?amara\.org/gi
];

// Stock sign-offs that show up alone when a block holds no real speech.
const SIGN_OFF_PATTERNS: RegExp[] = [
  /al prossimo episodio\.?$/i,
  /alla prossima\.?$/i,
  /grazie per l'attenzione\.?$/i,
  /fine\.?$/i,
  /the end\.?$/i
];

const SIGN_OFF_MAX_WORDS = 5;
const SENTENCE_SPLIT = /(?<=[.!?])\s+/;
const WORD_TOKEN = /[A-Za-zÀ-ÖØ-öø-ÿ0-9']+/g;

export const sanitizeText = (input: string | null | undefined): string => {
  if (!input) return '';

  let text = input;
  for (const pattern of WATERMARK_PATTERNS) {
    text = text.replace(pattern, ' ');
  }

  text = text
    .split(/[\r\n]+/)
    .filter(line => !/^\s*(?:-|\(|\[)?\s*sottotitoli\b/i.test(line))
    .join('\n');

  text = text
    .replace(/\s{2,}/g, ' ')
    .replace(/\s+([,.!?;:])/g, '$1')
    .trim();

  if (text) {
    const normalized = text.toLowerCase();
    if (normalized.split(/\s+/).length <= SIGN_OFF_MAX_WORDS && SIGN_OFF_PATTERNS.some(rx => rx.test(normalized))) {
      return '';
    }
  }

  return text;
};

/**
 * Splits text into sentences after `.`, `!` and `?`. Tiny fragments
 * (two words or fewer, under 10 characters) are glued onto the previous
 * sentence so that "Ok. Sure." style noise does not become its own line.
 */
export const toSentences = (input: string | null | undefined): string[] => {
  const text = (input || '').replace(/\s+/g, ' ').trim();
  if (!text) return [];

  const sentences: string[] = [];
  for (const raw of text.split(SENTENCE_SPLIT)) {
    const part = raw.trim();
    if (!part) continue;

    const tokens = part.match(WORD_TOKEN) || [];
    if (tokens.length <= 2 && part.length < 10 && sentences.length > 0) {
      sentences[sentences.length - 1] = `${sentences[sentences.length - 1]} ${part}`.trim();
    } else {
      sentences.push(part);
    }
  }

  return sentences.filter(Boolean);
};

export const paragraphsFromSentences = (sentences: string[], maxSentencesPerParagraph = 3): string[] => {
  const paragraphs: string[] = [];
  let buffer: string[] = [];

  for (const sentence of sentences) {
    buffer.push(sentence);
    if (buffer.length >= maxSentencesPerParagraph || sentence.endsWith('?!') || sentence.endsWith('!?')) {
      paragraphs.push(buffer.join(' '));
      buffer = [];
    }
  }

  if (buffer.length > 0) {
    paragraphs.push(buffer.join(' '));
  }

  return paragraphs;
};

/** Already-sanitized text to paragraphs separated by a blank line. */
export const formatParagraphs = (cleanText: string): string =>
  paragraphsFromSentences(toSentences(cleanText)).join('\n\n');
