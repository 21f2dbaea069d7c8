import { z } from 'zod';

export const ARTICLE_TITLE_MAX_LENGTH = 255;

export const ArticleRequestSchema = z.object({
  title: z
    .string()
    .trim()
    .min(1, 'Title is required')
    .max(ARTICLE_TITLE_MAX_LENGTH, `Title must be at most ${ARTICLE_TITLE_MAX_LENGTH} characters`),
  slug: z.string().trim().min(1, 'Article URL is required').max(255),
  content: z.string().min(1, 'Content is required'),
  visible: z.boolean().optional(),
});

export const MAX_ARTICLE_PAGE = 100_000;

export const ListArticlesQuerySchema = z.object({
  page: z.coerce.number().int().min(1).max(MAX_ARTICLE_PAGE).default(1),
});

export const ArticleResponseSchema = z.object({
  id: z.number().int(),
  title: z.string(),
  authorId: z.string(),
  slug: z.string(),
  content: z.string(),
  createdAt: z.string().datetime(),
  visible: z.boolean(),
});

export const ArticleDetailResponseSchema = ArticleResponseSchema.extend({
  html: z.string(),
  canEdit: z.boolean(),
  canDelete: z.boolean(),
});

export type ArticleRequest = z.infer<typeof ArticleRequestSchema>;
export type ListArticlesQuery = z.infer<typeof ListArticlesQuerySchema>;
export type ArticleResponse = z.infer<typeof ArticleResponseSchema>;
export type ArticleDetailResponse = z.infer<typeof ArticleDetailResponseSchema>;
