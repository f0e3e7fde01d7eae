/**
 * Book ingestion
 *
 * A "book" is a Notion page whose child databases hold its chapters. The first
 * child database found is taken as the chapters database; any others are
 * reported alongside it. Pages or databases that fail to load are logged and
 * left out so one broken chapter does not sink the whole book.
 */

import { createChildLogger } from '../../utils/logger.js';
import { getErrorMessage } from '../../utils/errorHandling.js';
import { mapWithConcurrency } from '../../utils/concurrency.js';
import type { NotionPageSource } from '../external/NotionApiClient.js';
import { NotionBlockPayloadSchema, richTextToPlainText } from '../external/notionSchemas.js';
import { compactPageId, extractPageId, formatPageId, type PageId } from './pageIdExtractor.js';
import { buildDocument, type NotionDocument } from './NotionPageService.js';
import type { PropertyValue } from './pageProperties.js';

export interface IngestedDatabase {
  id: string;
  title: string;
  pages: NotionDocument[];
}

export interface BookIngestionResult {
  bookId: PageId;
  bookTitle: string;
  bookUrl: string;
  bookProperties: Readonly<Record<string, PropertyValue>>;
  chaptersDatabase: IngestedDatabase | null;
  otherDatabases: IngestedDatabase[];
  totalChapters: number;
  totalPages: number;
}

export interface BookIngestionOptions {
  /** Pages parsed in parallel within one database */
  concurrency: number;
}

interface ChildDatabaseRef {
  id: string;
  title: string;
}

/**
 * URL Notion serves a page under when only its ID is known
 */
export function pageUrlFromId(pageId: string): string {
  return `https://www.notion.so/${compactPageId(pageId)}`;
}

export class BookIngestionService {
  constructor(
    private readonly source: NotionPageSource,
    private readonly options: BookIngestionOptions
  ) {}

  /**
   * Ingest a book with all of its chapter databases and their pages
   *
   * @throws {ExtractionError} If the URL holds no page ID
   * @throws {NotionFetchError} If the book page itself cannot be read
   */
  async ingestBook(bookUrl: string): Promise<BookIngestionResult> {
    const { pageId: bookId } = extractPageId(bookUrl);
    const log = createChildLogger({ bookId });
    log.info({ bookUrl }, 'Starting book ingestion');

    const { page, blocks } = await this.source.fetchPage(bookId);
    const book = buildDocument(bookId, bookUrl, page, blocks);

    const databaseRefs = blocks
      .filter((block) => block.type === 'child_database')
      .map((block): ChildDatabaseRef => {
        const payload = NotionBlockPayloadSchema.safeParse(block.child_database);
        return { id: block.id, title: (payload.success && payload.data.title) || 'Untitled' };
      });

    const databases: IngestedDatabase[] = [];
    for (const ref of databaseRefs) {
      log.info({ databaseId: ref.id, databaseTitle: ref.title }, 'Found database');
      try {
        databases.push(await this.ingestDatabase(ref.id));
      } catch (error) {
        log.error({ databaseId: ref.id, error: getErrorMessage(error) }, 'Failed to parse database');
      }
    }

    const [chaptersDatabase = null, ...otherDatabases] = databases;
    const totalChapters = chaptersDatabase ? chaptersDatabase.pages.length : 0;
    const totalPages = databases.reduce((sum, database) => sum + database.pages.length, 0);

    log.info(
      {
        bookTitle: book.title,
        totalChapters,
        totalPages,
        databasesFound: databases.length,
      },
      'Book ingestion completed'
    );

    return {
      bookId,
      bookTitle: book.title,
      bookUrl,
      bookProperties: book.properties,
      chaptersDatabase,
      otherDatabases,
      totalChapters,
      totalPages,
    };
  }

  /**
   * Load a database's title and every page in it
   */
  async ingestDatabase(databaseId: string): Promise<IngestedDatabase> {
    const database = await this.source.retrieveDatabase(databaseId);
    const title = richTextToPlainText(database.title) || 'Untitled Database';
    const rows = await this.source.queryDatabase(databaseId);
    const log = createChildLogger({ databaseId });

    const parsed = await mapWithConcurrency(rows, this.options.concurrency, async (row) => {
      const url = pageUrlFromId(row.id);
      try {
        const { page, blocks } = await this.source.fetchPage(row.id);
        const document = buildDocument(formatPageId(row.id), url, page, blocks);
        log.debug({ pageId: row.id, title: document.title }, 'Parsed page');
        return document;
      } catch (error) {
        log.error({ pageId: row.id, error: getErrorMessage(error) }, 'Failed to parse page');
        return null;
      }
    });

    return {
      id: databaseId,
      title,
      pages: parsed.filter((document): document is NotionDocument => document !== null),
    };
  }
}
