import { z } from "zod";
import type {
  AnnotationFile,
  ContentCache,
  IndexEntry,
  IndexTable,
} from "./types.js";

const PageSchema = z.object({
  pageNumber: z.number().int().positive(),
  content: z.string(),
  summary: z.string(),
  wordCount: z.number().int().nonnegative(),
});

export const IndexEntrySchema: z.ZodType<IndexEntry> = z.object({
  filename: z.string(),
  filePath: z.string(),
  contentHash: z.string(),
  totalPages: z.number().int().nonnegative(),
  totalWords: z.number().int().nonnegative(),
  documentSummary: z.string(),
  lastUpdated: z.string(),
  contentCachePath: z.string(),
});

export const IndexTableSchema: z.ZodType<IndexTable> = z.record(IndexEntrySchema);

export const ContentCacheSchema: z.ZodType<ContentCache> = z.object({
  filename: z.string(),
  pages: z.array(PageSchema),
  fullContent: z.string(),
  cachedAt: z.string(),
});

export const AnnotationFileSchema: z.ZodType<AnnotationFile> = z.object({
  filename: z.string(),
  summaries: z.array(
    z.object({
      pageNumber: z.number().int().positive(),
      summary: z.string(),
      keywords: z.array(z.string()),
      relations: z.array(z.string()),
    }),
  ),
});

/** OpenRouter chat completion, reduced to the fields we read. */
export const ChatCompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullable().optional(),
        }),
      }),
    )
    .min(1),
});
