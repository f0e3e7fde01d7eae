/**
 * Flatten Notion page properties into plain values
 */

import { z } from 'zod';
import {
  NotionRichTextSchema,
  richTextToPlainText,
  type NotionPage,
  type NotionProperty,
} from '../external/notionSchemas.js';

export type PropertyValue = string | number | boolean | string[] | null;

const RichTextArraySchema = z.array(NotionRichTextSchema);
const SelectOptionSchema = z.object({ name: z.string() }).passthrough().nullable();
const MultiSelectSchema = z.array(z.object({ name: z.string() }).passthrough());
const DateSchema = z.object({ start: z.string() }).passthrough().nullable();
const NullableNumberSchema = z.number().nullable();
const NullableStringSchema = z.string().nullable();

/**
 * Plain value of one property, or undefined for property types we do not flatten
 * (formulas, relations, rollups, people, files...)
 */
export function extractPropertyValue(property: NotionProperty): PropertyValue | undefined {
  const raw = property[property.type];

  switch (property.type) {
    case 'title':
    case 'rich_text': {
      const parsed = RichTextArraySchema.safeParse(raw);
      return parsed.success ? richTextToPlainText(parsed.data) : '';
    }
    case 'select':
    case 'status': {
      const parsed = SelectOptionSchema.safeParse(raw);
      return parsed.success ? parsed.data?.name ?? null : null;
    }
    case 'multi_select': {
      const parsed = MultiSelectSchema.safeParse(raw);
      return parsed.success ? parsed.data.map((option) => option.name) : [];
    }
    case 'date': {
      const parsed = DateSchema.safeParse(raw);
      return parsed.success ? parsed.data?.start ?? null : null;
    }
    case 'number': {
      const parsed = NullableNumberSchema.safeParse(raw);
      return parsed.success ? parsed.data : null;
    }
    case 'checkbox':
      return raw === true;
    case 'url':
    case 'email':
    case 'phone_number': {
      const parsed = NullableStringSchema.safeParse(raw);
      return parsed.success ? parsed.data : null;
    }
    default:
      return undefined;
  }
}

/**
 * All flattenable properties of a page, keyed by property name
 */
export function extractProperties(page: NotionPage): Record<string, PropertyValue> {
  const properties: Record<string, PropertyValue> = {};
  for (const [name, property] of Object.entries(page.properties)) {
    const value = extractPropertyValue(property);
    if (value !== undefined) {
      properties[name] = value;
    }
  }
  return properties;
}

/**
 * Page title from its `title` property, falling back to a label built from the page ID
 */
export function extractTitle(page: NotionPage): string {
  for (const property of Object.values(page.properties)) {
    if (property.type !== 'title') {
      continue;
    }
    const value = extractPropertyValue(property);
    if (typeof value === 'string' && value !== '') {
      return value;
    }
  }
  return `Untitled Page (${page.id.slice(0, 8)})`;
}
