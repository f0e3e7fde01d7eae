/**
 * Zod validation schemas for Notion REST API responses
 *
 * Only the fields this service reads are declared; everything else passes
 * through untouched so new API fields never break parsing.
 *
 * API reference: https://developers.notion.com/reference/intro
 */

import { z } from 'zod';

/**
 * Rich text fragment. `plain_text` is the rendered text; older payloads and
 * hand-built fixtures sometimes only carry `text.content`.
 */
export const NotionRichTextSchema = z
    .object({
        type: z.string().optional(),
        plain_text: z.string().optional(),
        text: z.object({ content: z.string() }).passthrough().optional(),
    })
    .passthrough();

/**
 * Block object. The kind-specific payload lives under a key named after `type`,
 * e.g. `{ type: 'to_do', to_do: { rich_text, checked } }`.
 */
export const NotionBlockSchema = z
    .object({
        object: z.literal('block').optional(),
        id: z.string(),
        type: z.string(),
        has_children: z.boolean().optional(),
    })
    .passthrough();

/**
 * Kind-specific block payload fields that the markdown converter reads
 */
export const NotionBlockPayloadSchema = z
    .object({
        rich_text: z.array(NotionRichTextSchema).optional(),
        /** code blocks */
        language: z.string().optional(),
        /** to_do blocks */
        checked: z.boolean().optional(),
        /** child_database and child_page blocks */
        title: z.string().optional(),
    })
    .passthrough();

/**
 * Page property. The value lives under a key named after `type`.
 */
export const NotionPropertySchema = z
    .object({
        id: z.string().optional(),
        type: z.string(),
    })
    .passthrough();

export const NotionPageSchema = z
    .object({
        object: z.literal('page').optional(),
        id: z.string(),
        url: z.string().optional(),
        archived: z.boolean().optional(),
        properties: z.record(NotionPropertySchema).default({}),
    })
    .passthrough();

export const NotionDatabaseSchema = z
    .object({
        object: z.literal('database').optional(),
        id: z.string(),
        title: z.array(NotionRichTextSchema).default([]),
    })
    .passthrough();

/**
 * Paginated list envelope shared by block children and database queries
 */
export function notionListSchema<T extends z.ZodTypeAny>(item: T) {
    return z.object({
        object: z.literal('list').optional(),
        results: z.array(item),
        has_more: z.boolean().default(false),
        next_cursor: z.string().nullable().default(null),
    });
}

export const NotionBlockListSchema = notionListSchema(NotionBlockSchema);
export const NotionPageListSchema = notionListSchema(NotionPageSchema);

/**
 * Error body returned with non-2xx responses
 */
export const NotionErrorBodySchema = z.object({
    object: z.literal('error'),
    status: z.number().optional(),
    code: z.string(),
    message: z.string(),
});

export type NotionRichText = z.infer<typeof NotionRichTextSchema>;
export type NotionBlock = z.infer<typeof NotionBlockSchema>;
export type NotionBlockPayload = z.infer<typeof NotionBlockPayloadSchema>;
export type NotionProperty = z.infer<typeof NotionPropertySchema>;
export type NotionPage = z.infer<typeof NotionPageSchema>;
export type NotionDatabase = z.infer<typeof NotionDatabaseSchema>;
export type NotionErrorBody = z.infer<typeof NotionErrorBodySchema>;

/**
 * Concatenate the text of rich text fragments
 */
export function richTextToPlainText(fragments: readonly NotionRichText[] | undefined): string {
    if (!fragments) {
        return '';
    }
    return fragments.map((fragment) => fragment.plain_text ?? fragment.text?.content ?? '').join('');
}
