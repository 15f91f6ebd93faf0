import { z } from "zod";

const field = z.string().default("");
const names = z.array(z.string()).default([]);

export const referenceFieldsSchema = z.object({
  author: field,
  year: field,
  title: field,
  publisher: field,
  place: field,
});

const bookSchema = z.object({
  type: z.literal("book"),
  authors: names,
  year: field,
  title: field,
  edition: z.string().optional(),
  place: field,
  publisher: field,
});

const chapterSchema = z.object({
  type: z.literal("chapter"),
  authors: names,
  year: field,
  title: field,
  editors: names,
  bookTitle: field,
  place: field,
  publisher: field,
  pages: z.string().optional(),
});

const journalSchema = z.object({
  type: z.literal("journal"),
  authors: names,
  year: field,
  title: field,
  journal: field,
  volume: field,
  issue: z.string().optional(),
  pages: z.string().optional(),
});

const websiteSchema = z.object({
  type: z.literal("website"),
  authors: names,
  year: field,
  title: field,
  url: field,
  accessed: z.string().optional(),
});

const reportSchema = z.object({
  type: z.literal("report"),
  organisation: field,
  year: field,
  title: field,
  place: field,
  publisher: field,
});

const thesisSchema = z.object({
  type: z.literal("thesis"),
  authors: names,
  year: field,
  title: field,
  degree: field,
  university: field,
});

export const referenceSchema = z.discriminatedUnion("type", [
  bookSchema,
  chapterSchema,
  journalSchema,
  websiteSchema,
  reportSchema,
  thesisSchema,
]);

export const citeRequestSchema = z.object({
  reference: referenceSchema,
});

export const bibliographyRequestSchema = z.object({
  references: z.array(referenceSchema).default([]),
});

export const checkRequestSchema = z.object({
  text: z.string(),
  references: z.array(referenceSchema).default([]),
});
