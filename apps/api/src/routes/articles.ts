import { type FastifyInstance } from 'fastify';
import { AppError, ErrorCode } from '@inkwell/shared';
import { ArticleError, type ArticleService } from '@inkwell/domain';
import {
  ArticleRequestSchema,
  ListArticlesQuerySchema,
  NumericIdParamSchema,
  RefParamSchema,
} from '@inkwell/proto';
import { authContextOf, requireSession } from '../plugins/session';
import { parseOrThrow } from './validation';
import { toArticleDetailResponse, toArticleResponse } from './serializers';
import { FORBIDDEN_MESSAGE } from './errors';

interface ArticleRouteDeps {
  articleService: ArticleService;
}

function mapArticleError(err: unknown): never {
  if (err instanceof ArticleError) {
    const codeMap: Record<ArticleError['kind'], ErrorCode> = {
      VALIDATION: ErrorCode.VALIDATION,
      NOT_FOUND: ErrorCode.NOT_FOUND,
      FORBIDDEN: ErrorCode.FORBIDDEN,
      CONFLICT: ErrorCode.CONFLICT,
    };
    const code = codeMap[err.kind];
    throw new AppError(code, code === ErrorCode.FORBIDDEN ? FORBIDDEN_MESSAGE : err.message);
  }
  throw err;
}

export function registerArticleRoutes(app: FastifyInstance, deps: ArticleRouteDeps): void {
  const { articleService } = deps;

  app.get('/api/articles', async (request, reply) => {
    const { page } = parseOrThrow(ListArticlesQuerySchema, request.query, 'Invalid query parameters');

    const articles = await articleService.list(page);
    return reply.status(200).send({ page, articles: articles.map(toArticleResponse) });
  });

  app.get('/api/articles/:ref', async (request, reply) => {
    const { ref } = parseOrThrow(RefParamSchema, request.params, 'Invalid article reference');

    try {
      const article = await articleService.get(authContextOf(request), ref);
      return reply.status(200).send(toArticleDetailResponse(article));
    } catch (err) {
      return mapArticleError(err);
    }
  });

  app.post('/api/articles', { preHandler: [requireSession] }, async (request, reply) => {
    const body = parseOrThrow(ArticleRequestSchema, request.body, 'Invalid article data');

    try {
      const article = await articleService.create(authContextOf(request), body);
      return reply.status(201).send(toArticleDetailResponse(article));
    } catch (err) {
      return mapArticleError(err);
    }
  });

  app.post('/api/articles/:id/edit', { preHandler: [requireSession] }, async (request, reply) => {
    const { id } = parseOrThrow(NumericIdParamSchema, request.params, 'Invalid article id');
    const body = parseOrThrow(ArticleRequestSchema, request.body, 'Invalid article data');

    try {
      const article = await articleService.edit(authContextOf(request), id, body);
      return reply.status(200).send(toArticleDetailResponse(article));
    } catch (err) {
      return mapArticleError(err);
    }
  });

  app.post('/api/articles/:id/remove', { preHandler: [requireSession] }, async (request, reply) => {
    const { id } = parseOrThrow(NumericIdParamSchema, request.params, 'Invalid article id');

    try {
      const article = await articleService.remove(authContextOf(request), id);
      return reply.status(200).send(toArticleDetailResponse(article));
    } catch (err) {
      return mapArticleError(err);
    }
  });

  app.post('/api/articles/:id/restore', { preHandler: [requireSession] }, async (request, reply) => {
    const { id } = parseOrThrow(NumericIdParamSchema, request.params, 'Invalid article id');

    try {
      const article = await articleService.restore(authContextOf(request), id);
      return reply.status(200).send(toArticleDetailResponse(article));
    } catch (err) {
      return mapArticleError(err);
    }
  });

  app.post('/api/articles/:id/purge', { preHandler: [requireSession] }, async (request, reply) => {
    const { id } = parseOrThrow(NumericIdParamSchema, request.params, 'Invalid article id');

    try {
      await articleService.purge(authContextOf(request), id);
      return reply.status(204).send();
    } catch (err) {
      return mapArticleError(err);
    }
  });
}
