import { z } from 'zod';

const label = z.union([z.string(), z.number()]).transform((value) => String(value));

export const attachmentSchema = z.object({
  name: z.string(),
  filename: z.string(),
  url: z.string(),
});

export const chapterSchema = z.object({
  id: label,
  volume: label,
  chapter: label,
  name: z.string().nullish().transform((value) => value ?? ''),
  attachments: z.array(attachmentSchema).default([]),
  content: z.string().nullish().transform((value) => value ?? ''),
});

export const bookSchema = z.object({
  id: label,
  title: z.string().nullish().transform((value) => value ?? ''),
  original_title: z.string().nullish().transform((value) => value ?? ''),
  description: z.string().nullish().transform((value) => value ?? ''),
  cover_image: z.string().nullish().transform((value) => value ?? null),
  chapters: z.array(chapterSchema),
});

export type Attachment = z.infer<typeof attachmentSchema>;
export type Chapter = z.infer<typeof chapterSchema>;
export type Book = z.infer<typeof bookSchema>;
