/**
 * Client for the Notion REST API
 *
 * Reads pages, block children and databases on behalf of a single integration
 * token. Transient failures (429, 5xx, network) are retried by the shared HTTP
 * client; everything that still fails surfaces as a NotionFetchError.
 *
 * API Documentation: https://developers.notion.com/reference/intro
 */

import axios, { type AxiosInstance, type CreateAxiosDefaults } from 'axios';
import { ZodError, type z } from 'zod';
import { createHttpClient } from '../../config/httpClient.js';
import { isNotionConfigured, type Env } from '../../config/env.js';
import { logger } from '../../utils/logger.js';
import { getErrorMessage } from '../../utils/errorHandling.js';
import { parseRetryAfter, type RetryConfig } from '../../utils/retry.js';
import { NotionFetchError, ServiceUnavailableError, type NotionFetchReason } from '../../types/errors.js';
import {
    NotionBlockListSchema,
    NotionDatabaseSchema,
    NotionErrorBodySchema,
    NotionPageListSchema,
    NotionPageSchema,
    type NotionBlock,
    type NotionDatabase,
    type NotionPage,
} from './notionSchemas.js';

const PAGE_SIZE = 100;

export interface FetchedPage {
    page: NotionPage;
    blocks: NotionBlock[];
}

/**
 * What the page and ingestion services need from Notion.
 * Tests substitute an in-memory implementation.
 */
export interface NotionPageSource {
    /** Page object plus all of its top-level blocks */
    fetchPage(pageId: string): Promise<FetchedPage>;
    listBlockChildren(blockId: string): Promise<NotionBlock[]>;
    retrieveDatabase(databaseId: string): Promise<NotionDatabase>;
    queryDatabase(databaseId: string): Promise<NotionPage[]>;
}

export interface NotionApiClientOptions {
    apiKey?: string;
    baseUrl: string;
    notionVersion: string;
    timeoutMs: number;
    maxRetries: number;
    /** Backoff tuning on top of maxRetries */
    retry?: Partial<Omit<RetryConfig, 'maxAttempts'>>;
    /** Extra axios defaults, e.g. a custom adapter */
    http?: CreateAxiosDefaults;
}

export class NotionApiClient implements NotionPageSource {
    private readonly client: AxiosInstance;
    private readonly configured: boolean;

    constructor(options: NotionApiClientOptions) {
        this.configured = Boolean(options.apiKey);
        this.client = createHttpClient(
            {
                ...options.http,
                baseURL: options.baseUrl,
                timeout: options.timeoutMs,
                headers: {
                    ...(options.apiKey ? { Authorization: `Bearer ${options.apiKey}` } : {}),
                    'Notion-Version': options.notionVersion,
                    'Content-Type': 'application/json',
                    Accept: 'application/json',
                },
            },
            {
                serviceName: 'notion',
                retry: { ...options.retry, maxAttempts: options.maxRetries },
            }
        );
    }

    async fetchPage(pageId: string): Promise<FetchedPage> {
        const page = await this.get(`/pages/${pageId}`, NotionPageSchema, 'retrievePage', { pageId });
        const blocks = await this.listBlockChildren(pageId);
        logger.debug({ pageId, blockCount: blocks.length }, 'Fetched Notion page');
        return { page, blocks };
    }

    async listBlockChildren(blockId: string): Promise<NotionBlock[]> {
        const blocks: NotionBlock[] = [];
        let cursor: string | null = null;
        do {
            const params: Record<string, string | number> = { page_size: PAGE_SIZE };
            if (cursor) {
                params.start_cursor = cursor;
            }
            const list = await this.get(`/blocks/${blockId}/children`, NotionBlockListSchema, 'listBlockChildren', {
                blockId,
            }, params);
            blocks.push(...list.results);
            cursor = list.has_more ? list.next_cursor : null;
        } while (cursor);
        return blocks;
    }

    async retrieveDatabase(databaseId: string): Promise<NotionDatabase> {
        return this.get(`/databases/${databaseId}`, NotionDatabaseSchema, 'retrieveDatabase', { databaseId });
    }

    async queryDatabase(databaseId: string): Promise<NotionPage[]> {
        const pages: NotionPage[] = [];
        let cursor: string | null = null;
        do {
            const body: Record<string, string | number> = { page_size: PAGE_SIZE };
            if (cursor) {
                body.start_cursor = cursor;
            }
            const list = await this.request(
                () => this.client.post(`/databases/${databaseId}/query`, body),
                NotionPageListSchema,
                'queryDatabase',
                { databaseId }
            );
            pages.push(...list.results);
            cursor = list.has_more ? list.next_cursor : null;
        } while (cursor);
        return pages;
    }

    private get<S extends z.ZodTypeAny>(
        path: string,
        schema: S,
        operation: string,
        context: Record<string, unknown>,
        params?: Record<string, string | number>
    ): Promise<z.output<S>> {
        return this.request(() => this.client.get(path, { params }), schema, operation, context);
    }

    private async request<S extends z.ZodTypeAny>(
        send: () => Promise<{ data: unknown }>,
        schema: S,
        operation: string,
        context: Record<string, unknown>
    ): Promise<z.output<S>> {
        if (!this.configured) {
            throw new ServiceUnavailableError(
                'Notion API key not configured. Please set NOTION_API_KEY in your environment.',
                { reason: 'notion_api_key_not_configured', operation }
            );
        }

        try {
            const response = await send();
            return schema.parse(response.data);
        } catch (error) {
            const fetchError = toNotionFetchError(error, operation, context);
            logger.error(
                {
                    operation,
                    ...context,
                    reason: fetchError.reason,
                    upstreamStatus: fetchError.upstreamStatus,
                    error: getErrorMessage(error),
                },
                'Notion API request failed'
            );
            throw fetchError;
        }
    }
}

function reasonForStatus(status: number): NotionFetchReason {
    if (status === 401 || status === 403) return 'unauthorized';
    if (status === 404) return 'not_found';
    if (status === 429) return 'rate_limited';
    return 'unavailable';
}

/**
 * Map any failure of a Notion call onto a NotionFetchError
 */
export function toNotionFetchError(
    error: unknown,
    operation: string,
    context: Record<string, unknown> = {}
): NotionFetchError {
    if (error instanceof NotionFetchError) {
        return error;
    }

    if (error instanceof ZodError) {
        return new NotionFetchError('invalid_response', `unexpected response shape from ${operation}`, {
            operation,
            ...context,
            issues: error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
        });
    }

    if (axios.isAxiosError(error) && error.response) {
        const status = error.response.status;
        const body = NotionErrorBodySchema.safeParse(error.response.data);
        const detail = body.success ? `${body.data.code}: ${body.data.message}` : `HTTP ${status}`;
        const retryAfterMs = status === 429 ? parseRetryAfter(error.response.headers['retry-after']) : undefined;

        return new NotionFetchError(reasonForStatus(status), `${operation} returned ${detail}`, {
            operation,
            ...context,
            upstreamStatus: status,
            ...(body.success ? { notionCode: body.data.code } : {}),
            ...(retryAfterMs !== undefined ? { retryAfter: retryAfterMs / 1000 } : {}),
        });
    }

    return new NotionFetchError('unavailable', `${operation} failed: ${getErrorMessage(error)}`, {
        operation,
        ...context,
    });
}

/**
 * Client configured from environment variables
 */
export function createNotionApiClient(env: Env): NotionApiClient {
    return new NotionApiClient({
        apiKey: isNotionConfigured(env) ? env.NOTION_API_KEY : undefined,
        baseUrl: env.NOTION_API_BASE_URL,
        notionVersion: env.NOTION_API_VERSION,
        timeoutMs: env.NOTION_TIMEOUT_MS,
        maxRetries: env.NOTION_MAX_RETRIES,
    });
}
