/**
 * Notion API Routes
 *
 * Read Notion pages by URL and return their content as markdown.
 */
import express, { type Router, type Request, type Response } from 'express';
import { z } from 'zod';
import { validate, commonSchemas } from '../middleware/validation.js';
import { asyncHandler } from '../utils/errorHandling.js';
import { ServiceUnavailableError } from '../types/errors.js';
import { extractPageId } from '../services/notion/pageIdExtractor.js';
import type { NotionPageService } from '../services/notion/NotionPageService.js';
import type { BookIngestionService, IngestedDatabase } from '../services/notion/BookIngestionService.js';

const CONTENT_PREVIEW_LENGTH = 200;

// Validation schemas
const pageUrlBodySchema = z.object({
  page_url: commonSchemas.pageUrl,
});

const pageUrlQuerySchema = z.object({
  page_url: commonSchemas.pageUrl,
});

export interface NotionRouterDeps {
  pageService: NotionPageService;
  bookIngestionService: BookIngestionService;
  /** Whether an integration token is configured */
  isConfigured: () => boolean;
}

function contentPreview(content: string): string {
  return content.length > CONTENT_PREVIEW_LENGTH
    ? `${content.slice(0, CONTENT_PREVIEW_LENGTH)}...`
    : content;
}

function chaptersResponse(database: IngestedDatabase) {
  return {
    database_id: database.id,
    database_title: database.title,
    chapters: database.pages.map((page) => ({
      id: page.pageId,
      title: page.title,
      url: page.url,
      properties: page.properties,
      content_preview: contentPreview(page.content),
    })),
  };
}

export function createNotionRouter(deps: NotionRouterDeps): Router {
  const router: Router = express.Router();

  /**
   * POST /api/v1/notion/read-page
   * Extract the page ID from the URL, fetch the page and return it as markdown with its properties
   */
  router.post('/read-page', validate({ body: pageUrlBodySchema }), asyncHandler(async (req: Request, res: Response) => {
    const { page_url: pageUrl } = pageUrlBodySchema.parse(req.body);
    const page = await deps.pageService.getPage(pageUrl);

    res.json({
      page_id: page.pageId,
      title: page.title,
      content: page.content,
      url: page.url,
      properties: page.properties,
    });
  }));

  /**
   * GET /api/v1/notion/extract-page-id?page_url=...
   * Validate a URL and return its page ID without calling Notion
   */
  router.get('/extract-page-id', validate({ query: pageUrlQuerySchema }), asyncHandler(async (req: Request, res: Response) => {
    const { page_url: pageUrl } = pageUrlQuerySchema.parse(req.query);
    const { pageId, url } = extractPageId(pageUrl);

    res.json({ page_id: pageId, url });
  }));

  /**
   * POST /api/v1/notion/ingest-book
   * Ingest a book page with all chapters from its child databases
   */
  router.post('/ingest-book', validate({ body: pageUrlBodySchema }), asyncHandler(async (req: Request, res: Response) => {
    const { page_url: pageUrl } = pageUrlBodySchema.parse(req.body);
    const result = await deps.bookIngestionService.ingestBook(pageUrl);

    const databasesFound = result.otherDatabases.length + (result.chaptersDatabase ? 1 : 0);

    res.json({
      status: 'success',
      message: 'Book ingestion completed successfully',
      book: {
        id: result.bookId,
        title: result.bookTitle,
        url: result.bookUrl,
        properties: result.bookProperties,
      },
      summary: {
        total_chapters: result.totalChapters,
        total_pages: result.totalPages,
        databases_found: databasesFound,
      },
      ...(result.chaptersDatabase ? { chapters: chaptersResponse(result.chaptersDatabase) } : {}),
      ...(result.otherDatabases.length > 0
        ? {
            other_databases: result.otherDatabases.map((database) => ({
              id: database.id,
              title: database.title,
              page_count: database.pages.length,
            })),
          }
        : {}),
    });
  }));

  /**
   * GET /api/v1/notion/health
   * Report whether the Notion integration token is configured
   */
  router.get('/health', (_req: Request, res: Response) => {
    if (!deps.isConfigured()) {
      throw new ServiceUnavailableError(
        'Notion API key not configured. Please set NOTION_API_KEY in your environment.',
        { reason: 'notion_api_key_not_configured' }
      );
    }

    res.json({
      status: 'healthy',
      message: 'Notion service is properly configured',
    });
  });

  return router;
}
