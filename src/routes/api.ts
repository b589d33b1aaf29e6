import { Router, Request, Response } from 'express';
import { EntityLinkError, FeedError } from '../errors.js';
import { extractEntityLinks, parseEntityLink, renderEntityLink } from '../codec.js';
import { createEntityLink } from '../link.js';
import { FeedStore, MentionQuery } from '../feed.js';
import { EntityLinkParts } from '../types.js';

/**
 * Options for the API routes
 */
export interface ApiOptions {
  /** Page size for feed listings when no limit is given */
  defaultListLimit?: number;
}

/**
 * Send a domain error as JSON, or rethrow anything else to express
 */
function sendError(res: Response, error: unknown): void {
  if (error instanceof EntityLinkError || error instanceof FeedError) {
    res.status(error.statusCode).json({ error: error.message, type: error.name });
    return;
  }
  throw error;
}

function stringField(body: unknown, name: string): string | undefined {
  if (typeof body !== 'object' || body === null || !(name in body)) {
    return undefined;
  }
  const value: unknown = Reflect.get(body, name);
  return typeof value === 'string' ? value : undefined;
}

function queryString(value: unknown): string | undefined {
  return typeof value === 'string' && value !== '' ? value : undefined;
}

function readLinkParts(body: unknown): EntityLinkParts | null {
  const link: unknown = typeof body === 'object' && body !== null ? Reflect.get(body, 'link') : undefined;
  const entityType = stringField(link, 'entityType');
  const entityFQN = stringField(link, 'entityFQN');
  if (entityType === undefined || entityFQN === undefined) {
    return null;
  }
  return {
    entityType,
    entityFQN,
    fieldName: stringField(link, 'fieldName'),
    arrayFieldName: stringField(link, 'arrayFieldName'),
    arrayFieldValue: stringField(link, 'arrayFieldValue')
  };
}

/**
 * Create API routes for entity links and the feed
 */
export function createApiRoutes(store: FeedStore, options: ApiOptions = {}): Router {
  const router = Router();
  const defaultListLimit = options.defaultListLimit ?? 50;

  /**
   * POST /api/links/parse
   * Parse text holding exactly one entity link
   * Body: { text }
   */
  router.post('/links/parse', (req: Request, res: Response) => {
    const text = stringField(req.body, 'text');
    if (text === undefined) {
      res.status(400).json({ error: 'Body field "text" is required' });
      return;
    }
    try {
      res.json(parseEntityLink(text));
    } catch (error) {
      sendError(res, error);
    }
  });

  /**
   * POST /api/links/extract
   * Find every entity link in free-form text
   * Body: { text }
   */
  router.post('/links/extract', (req: Request, res: Response) => {
    const text = stringField(req.body, 'text');
    if (text === undefined) {
      res.status(400).json({ error: 'Body field "text" is required' });
      return;
    }
    try {
      res.json(extractEntityLinks(text));
    } catch (error) {
      sendError(res, error);
    }
  });

  /**
   * POST /api/links/render
   * Build a link from its segments and render it
   * Body: { link: { entityType, entityFQN, fieldName?, arrayFieldName?, arrayFieldValue? }, fallbackText? }
   */
  router.post('/links/render', (req: Request, res: Response) => {
    const parts = readLinkParts(req.body);
    if (!parts) {
      res.status(400).json({ error: 'Body field "link" needs "entityType" and "entityFQN"' });
      return;
    }
    try {
      const link = createEntityLink(parts);
      const fallbackText = stringField(req.body, 'fallbackText');
      res.json({ link: renderEntityLink(link, { fallbackText }), value: link });
    } catch (error) {
      sendError(res, error);
    }
  });

  /**
   * GET /api/feed
   * List threads, newest first
   * Query params: ?entityLink=<#E/table/db.orders>&limit=10
   */
  router.get('/feed', (req: Request, res: Response) => {
    const entityLink = queryString(req.query.entityLink);
    let limit = defaultListLimit;
    const limitParam = queryString(req.query.limit);
    if (limitParam) {
      const n = parseInt(limitParam, 10);
      if (!isNaN(n) && n > 0) {
        limit = n;
      }
    }
    try {
      res.json(store.listThreads({ entityLink, limit }));
    } catch (error) {
      sendError(res, error);
    }
  });

  /**
   * GET /api/feed/count
   * Count threads about an entity
   * Query params: ?entityLink=<#E/table/db.orders>
   */
  router.get('/feed/count', (req: Request, res: Response) => {
    const entityLink = queryString(req.query.entityLink);
    if (!entityLink) {
      res.status(400).json({ error: 'Query parameter "entityLink" is required' });
      return;
    }
    try {
      res.json(store.threadCounts(entityLink));
    } catch (error) {
      sendError(res, error);
    }
  });

  /**
   * GET /api/feed/:id
   */
  router.get('/feed/:id', (req: Request, res: Response) => {
    const { id } = req.params;
    const thread = store.getThread(id);

    if (!thread) {
      res.status(404).json({ error: `Thread not found: ${id}` });
      return;
    }

    res.json(thread);
  });

  /**
   * POST /api/feed
   * Open a thread about an entity link
   * Body: { about, message, from }
   */
  router.post('/feed', (req: Request, res: Response) => {
    const about = stringField(req.body, 'about');
    const message = stringField(req.body, 'message');
    const from = stringField(req.body, 'from');
    if (about === undefined || message === undefined || from === undefined) {
      res.status(400).json({ error: 'Body fields "about", "message" and "from" are required' });
      return;
    }
    try {
      res.status(201).json(store.createThread({ about, message, from }));
    } catch (error) {
      sendError(res, error);
    }
  });

  /**
   * POST /api/feed/:id/posts
   * Reply to a thread
   * Body: { message, from }
   */
  router.post('/feed/:id/posts', (req: Request, res: Response) => {
    const message = stringField(req.body, 'message');
    const from = stringField(req.body, 'from');
    if (message === undefined || from === undefined) {
      res.status(400).json({ error: 'Body fields "message" and "from" are required' });
      return;
    }
    try {
      res.status(201).json(store.addPost(req.params.id, { message, from }));
    } catch (error) {
      sendError(res, error);
    }
  });

  /**
   * GET /api/mentions
   * Posts mentioning a qualified value or type
   * Query params: ?qualifiedValue=db.orders.description or ?qualifiedType=table.columns.member
   */
  router.get('/mentions', (req: Request, res: Response) => {
    const query: MentionQuery = {
      qualifiedValue: queryString(req.query.qualifiedValue),
      qualifiedType: queryString(req.query.qualifiedType)
    };
    try {
      const results = store.findMentions(query);
      res.json(results.map(r => ({
        threadId: r.threadId,
        postId: r.post.id,
        from: r.post.from,
        message: r.post.message,
        link: renderEntityLink(r.link)
      })));
    } catch (error) {
      sendError(res, error);
    }
  });

  return router;
}
