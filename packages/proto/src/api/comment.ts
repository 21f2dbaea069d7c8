import { z } from 'zod';
import { RecordIdSchema } from './params';

export const COMMENT_CONTENT_MAX_LENGTH = 10000;
export const MAX_CONTEXT_DEPTH = 10;

const CommentContentSchema = z
  .string()
  .trim()
  .min(1, 'Comment content is required')
  .max(COMMENT_CONTENT_MAX_LENGTH, `Comment must be at most ${COMMENT_CONTENT_MAX_LENGTH} characters`);

export const SubmitCommentRequestSchema = z.object({
  articleId: RecordIdSchema,
  parentId: RecordIdSchema.nullable().default(null),
  name: z.string().trim().min(1, 'Name is required').max(255).optional(),
  content: CommentContentSchema,
});

export const EditCommentRequestSchema = z.object({
  content: CommentContentSchema,
});

export const ViewCommentQuerySchema = z.object({
  context: z.coerce.number().int().min(0).max(MAX_CONTEXT_DEPTH).default(0),
});

const CommentOwnerResponseSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('user'), userId: z.string() }),
  z.object({ kind: z.literal('guest'), name: z.string() }),
]);

export const CommentResponseSchema = z.object({
  id: z.number().int(),
  parentId: z.number().int().nullable(),
  articleId: z.number().int(),
  owner: CommentOwnerResponseSchema,
  content: z.string(),
  createdAt: z.string().datetime(),
  visible: z.boolean(),
  redacted: z.boolean(),
  canEdit: z.boolean(),
  canDelete: z.boolean(),
});

export interface CommentNodeResponse {
  comment: CommentResponse;
  children: CommentNodeResponse[];
}

export const CommentNodeResponseSchema: z.ZodType<CommentNodeResponse> = z.lazy(() =>
  z.object({
    comment: CommentResponseSchema,
    children: z.array(CommentNodeResponseSchema),
  }),
);

export const CommentThreadResponseSchema = z.object({
  articleId: z.number().int(),
  roots: z.array(CommentNodeResponseSchema),
});

export type SubmitCommentRequest = z.infer<typeof SubmitCommentRequestSchema>;
export type EditCommentRequest = z.infer<typeof EditCommentRequestSchema>;
export type ViewCommentQuery = z.infer<typeof ViewCommentQuerySchema>;
export type CommentResponse = z.infer<typeof CommentResponseSchema>;
export type CommentThreadResponse = z.infer<typeof CommentThreadResponseSchema>;
