import { z } from 'zod';

// Multipart fields arrive as strings; a blank one counts as not sent.
const blankToUndefined = (value: unknown) =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

const optionalField = z.preprocess(blankToUndefined, z.string().optional());

export const uploadFieldsSchema = z.object({
  title: optionalField,
  sid: optionalField,
  part: z.preprocess(blankToUndefined, z.coerce.number().int().min(0).optional())
});

export const saveAudioFieldsSchema = z.object({
  sid: optionalField
});

export const summarizeBodySchema = z.object({
  text: z.string().nullish()
});

export const saveTextBodySchema = z.object({
  text: z.string().nullish(),
  sid: z.preprocess(blankToUndefined, z.string().nullish()),
  title: z.string().nullish()
});
