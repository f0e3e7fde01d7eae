/**
 * Fetch-and-assemble workflow for a single Notion page
 */

import { createChildLogger } from '../../utils/logger.js';
import type { NotionPageSource } from '../external/NotionApiClient.js';
import type { NotionBlock, NotionPage } from '../external/notionSchemas.js';
import { extractPageId, formatPageId, type PageId } from './pageIdExtractor.js';
import { blocksToMarkdown, toBlockRecord, type BlockRecord } from './blockToMarkdown.js';
import { extractProperties, extractTitle, type PropertyValue } from './pageProperties.js';

/**
 * One fetched page. Built fresh per fetch; never mutated afterwards.
 */
export interface NotionDocument {
  readonly pageId: PageId;
  readonly url: string;
  readonly title: string;
  readonly properties: Readonly<Record<string, PropertyValue>>;
  readonly blocks: readonly BlockRecord[];
  /** Markdown rendering of `blocks` */
  readonly content: string;
}

/**
 * Assemble a document from an already fetched page and its blocks
 */
export function buildDocument(pageId: PageId, url: string, page: NotionPage, rawBlocks: readonly NotionBlock[]): NotionDocument {
  const blocks = rawBlocks.map(toBlockRecord);
  return Object.freeze({
    pageId,
    url,
    title: extractTitle(page),
    properties: Object.freeze(extractProperties(page)),
    blocks: Object.freeze(blocks),
    content: blocksToMarkdown(blocks),
  });
}

export class NotionPageService {
  constructor(private readonly source: NotionPageSource) {}

  /**
   * Read a page by URL
   *
   * @throws {ExtractionError} If the URL holds no page ID
   * @throws {NotionFetchError} If Notion cannot deliver the page
   */
  async getPage(pageUrl: string): Promise<NotionDocument> {
    const { pageId } = extractPageId(pageUrl);
    return this.getPageById(pageId, pageUrl);
  }

  /**
   * Read a page whose ID is already known, e.g. a database row
   */
  async getPageById(pageId: string, pageUrl: string): Promise<NotionDocument> {
    const canonicalId = formatPageId(pageId);
    const { page, blocks } = await this.source.fetchPage(canonicalId);
    const document = buildDocument(canonicalId, pageUrl, page, blocks);
    createChildLogger({ pageId: canonicalId }).info(
      { title: document.title, blockCount: blocks.length },
      'Read Notion page'
    );
    return document;
  }
}
