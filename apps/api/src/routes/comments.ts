import { type FastifyInstance } from 'fastify';
import { AppError, ErrorCode, createLogger } from '@inkwell/shared';
import { CommentError, type CommentService } from '@inkwell/domain';
import {
  SubmitCommentRequestSchema,
  EditCommentRequestSchema,
  ViewCommentQuerySchema,
  NumericIdParamSchema,
  RefParamSchema,
} from '@inkwell/proto';
import { authContextOf } from '../plugins/session';
import { parseOrThrow } from './validation';
import { toCommentNodeResponse, toCommentResponse } from './serializers';
import { FORBIDDEN_MESSAGE } from './errors';

const logger = createLogger({ name: 'api:comments' });

const HTML_CONTENT_TYPE = 'text/html; charset=utf-8';

interface CommentRouteDeps {
  commentService: CommentService;
}

function mapCommentError(err: unknown): never {
  if (err instanceof CommentError) {
    const codeMap: Record<CommentError['kind'], ErrorCode> = {
      VALIDATION: ErrorCode.VALIDATION,
      NOT_FOUND: ErrorCode.NOT_FOUND,
      FORBIDDEN: ErrorCode.FORBIDDEN,
      CONFLICT: ErrorCode.CONFLICT,
      RATE_LIMITED: ErrorCode.RATE_LIMITED,
    };
    const code = codeMap[err.kind];
    throw new AppError(code, code === ErrorCode.FORBIDDEN ? FORBIDDEN_MESSAGE : err.message);
  }
  throw err;
}

export function registerCommentRoutes(app: FastifyInstance, deps: CommentRouteDeps): void {
  const { commentService } = deps;

  app.get('/api/comments/list/:ref', async (request, reply) => {
    const { ref } = parseOrThrow(RefParamSchema, request.params, 'Invalid article reference');

    try {
      const thread = await commentService.listTree(authContextOf(request), ref);
      if (thread.orphans.length > 0) {
        logger.warn(
          { articleId: thread.articleId, orphans: thread.orphans, requestId: request.id },
          'Comments with broken parent links shown at top level',
        );
      }
      return reply.status(200).send({
        articleId: thread.articleId,
        roots: thread.roots.map(toCommentNodeResponse),
      });
    } catch (err) {
      return mapCommentError(err);
    }
  });

  app.get('/api/comments/view/:id', async (request, reply) => {
    const { id } = parseOrThrow(NumericIdParamSchema, request.params, 'Invalid comment id');
    const { context } = parseOrThrow(ViewCommentQuerySchema, request.query, 'Invalid query parameters');

    try {
      const node = await commentService.viewSubtree(authContextOf(request), id, context);
      return reply.status(200).send(toCommentNodeResponse(node));
    } catch (err) {
      return mapCommentError(err);
    }
  });

  app.get('/api/comments/single/:id', async (request, reply) => {
    const { id } = parseOrThrow(NumericIdParamSchema, request.params, 'Invalid comment id');

    try {
      const comment = await commentService.getSource(authContextOf(request), id);
      return reply.status(200).send({ id: comment.id, content: comment.content });
    } catch (err) {
      return mapCommentError(err);
    }
  });

  app.get('/api/comments/render/:id', async (request, reply) => {
    const { id } = parseOrThrow(NumericIdParamSchema, request.params, 'Invalid comment id');
    const { context } = parseOrThrow(ViewCommentQuerySchema, request.query, 'Invalid query parameters');

    try {
      const html = await commentService.renderSubtree(authContextOf(request), id, context);
      return reply.status(200).type(HTML_CONTENT_TYPE).send(html);
    } catch (err) {
      return mapCommentError(err);
    }
  });

  app.get('/api/comments/render-content/:id', async (request, reply) => {
    const { id } = parseOrThrow(NumericIdParamSchema, request.params, 'Invalid comment id');

    try {
      const html = await commentService.renderContent(authContextOf(request), id);
      return reply.status(200).type(HTML_CONTENT_TYPE).send(html);
    } catch (err) {
      return mapCommentError(err);
    }
  });

  app.post('/api/comments/submit', async (request, reply) => {
    const body = parseOrThrow(SubmitCommentRequestSchema, request.body, 'Invalid comment data');

    try {
      const comment = await commentService.submit(
        authContextOf(request),
        {
          articleId: body.articleId,
          parentId: body.parentId,
          name: body.name ?? null,
          content: body.content,
        },
        request.ip,
      );
      return reply.status(201).send(toCommentResponse(comment));
    } catch (err) {
      return mapCommentError(err);
    }
  });

  app.post('/api/comments/:id/edit', async (request, reply) => {
    const { id } = parseOrThrow(NumericIdParamSchema, request.params, 'Invalid comment id');
    const body = parseOrThrow(EditCommentRequestSchema, request.body, 'Invalid comment data');

    try {
      const comment = await commentService.edit(authContextOf(request), id, body.content);
      return reply.status(200).send(toCommentResponse(comment));
    } catch (err) {
      return mapCommentError(err);
    }
  });

  app.post('/api/comments/:id/remove', async (request, reply) => {
    const { id } = parseOrThrow(NumericIdParamSchema, request.params, 'Invalid comment id');

    try {
      const comment = await commentService.remove(authContextOf(request), id);
      return reply.status(200).send(toCommentResponse(comment));
    } catch (err) {
      return mapCommentError(err);
    }
  });

  app.post('/api/comments/:id/restore', async (request, reply) => {
    const { id } = parseOrThrow(NumericIdParamSchema, request.params, 'Invalid comment id');

    try {
      const comment = await commentService.restore(authContextOf(request), id);
      return reply.status(200).send(toCommentResponse(comment));
    } catch (err) {
      return mapCommentError(err);
    }
  });

  app.post('/api/comments/:id/purge', async (request, reply) => {
    const { id } = parseOrThrow(NumericIdParamSchema, request.params, 'Invalid comment id');

    try {
      await commentService.purge(authContextOf(request), id);
      return reply.status(204).send();
    } catch (err) {
      return mapCommentError(err);
    }
  });
}
