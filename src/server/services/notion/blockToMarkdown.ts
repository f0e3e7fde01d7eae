/**
 * Block-to-markdown conversion
 *
 * Renders an ordered sequence of content blocks as one markdown string, one
 * line group per block, groups separated by a blank line. Kinds this renderer
 * does not know are left out of the output.
 */

import {
  NotionBlockPayloadSchema,
  richTextToPlainText,
  type NotionBlock,
} from '../external/notionSchemas.js';

export const BLOCK_KINDS = [
  'heading_1',
  'heading_2',
  'heading_3',
  'paragraph',
  'bulleted_list_item',
  'numbered_list_item',
  'code',
  'quote',
  'divider',
  'to_do',
] as const;

export type BlockKind = (typeof BLOCK_KINDS)[number];

const KNOWN_KINDS: ReadonlySet<string> = new Set(BLOCK_KINDS);

/**
 * One content block as handed to the converter. `kind` stays a plain string:
 * the API adds block types over time and unknown ones must flow through.
 */
export interface BlockRecord {
  kind: string;
  text?: string;
  /** code blocks */
  language?: string;
  /** to_do blocks */
  checked?: boolean;
}

const HEADING_PREFIX: Record<'heading_1' | 'heading_2' | 'heading_3', string> = {
  heading_1: '#',
  heading_2: '##',
  heading_3: '###',
};

export function isBlockKind(kind: string): kind is BlockKind {
  return KNOWN_KINDS.has(kind);
}

/**
 * Render a single block, or null when the block produces no output
 * (unknown kind, or a text block without text)
 */
export function renderBlock(block: BlockRecord): string | null {
  const kind = block.kind;
  if (!isBlockKind(kind)) {
    return null;
  }

  if (kind === 'divider') {
    return '---';
  }

  const text = block.text ?? '';
  if (text === '') {
    return null;
  }

  switch (kind) {
    case 'heading_1':
    case 'heading_2':
    case 'heading_3':
      return `${HEADING_PREFIX[kind]} ${text}`;
    case 'paragraph':
      return text;
    case 'bulleted_list_item':
      return `- ${text}`;
    case 'numbered_list_item':
      // Markdown renderers renumber consecutive items, so every item is "1."
      return `1. ${text}`;
    case 'code':
      return ['```' + (block.language ?? ''), text, '```'].join('\n');
    case 'quote':
      return `> ${text}`;
    case 'to_do':
      return `${block.checked ? '- [x]' : '- [ ]'} ${text}`;
  }
}

/**
 * Convert blocks to markdown. The iterable is consumed once.
 */
export function blocksToMarkdown(blocks: Iterable<BlockRecord>): string {
  const rendered: string[] = [];
  for (const block of blocks) {
    const markdown = renderBlock(block);
    if (markdown !== null) {
      rendered.push(markdown);
    }
  }
  return rendered.join('\n\n');
}

/**
 * Map a raw API block to the record the converter takes
 */
export function toBlockRecord(block: NotionBlock): BlockRecord {
  const payload = NotionBlockPayloadSchema.safeParse(block[block.type]);
  if (!payload.success) {
    return { kind: block.type };
  }

  const record: BlockRecord = {
    kind: block.type,
    text: richTextToPlainText(payload.data.rich_text),
  };
  if (block.type === 'code') {
    record.language = payload.data.language ?? '';
  }
  if (block.type === 'to_do') {
    record.checked = payload.data.checked ?? false;
  }
  return record;
}
