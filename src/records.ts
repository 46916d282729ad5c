import type { CrawlEntity } from "./types.js";

export function toCrawlEntity(value: unknown): CrawlEntity | null {
  if (!value || typeof value !== "object" || Array.isArray(value)) return null;
  const fields: Record<string, unknown> = Object.fromEntries(Object.entries(value));
  const id = toNullableId(fields.id);
  if (!id) return null;
  const entity: CrawlEntity = { ...fields, id };
  if ("owner_id" in fields) entity.owner_id = toNullableId(fields.owner_id);
  if ("group_id" in fields) entity.group_id = toNullableId(fields.group_id);
  if ("comments_count" in fields) entity.comments_count = toNullableNumber(fields.comments_count);
  return entity;
}

export function toCrawlEntities(value: unknown): CrawlEntity[] {
  if (!Array.isArray(value)) return [];
  const items: CrawlEntity[] = [];
  for (const entry of value) {
    const item = toCrawlEntity(entry);
    if (item) items.push(item);
  }
  return items;
}

export function toNullableId(value: unknown): string | null {
  if (typeof value === "number" && Number.isFinite(value)) return String(value);
  if (typeof value === "string") {
    const trimmed = value.trim();
    return trimmed.length > 0 ? trimmed : null;
  }
  return null;
}

function toNullableNumber(value: unknown): number | null {
  if (typeof value === "number" && Number.isFinite(value)) return value;
  if (typeof value === "string" && value.length > 0) {
    const parsed = Number(value);
    if (Number.isFinite(parsed)) return parsed;
  }
  return null;
}

export function readField(value: unknown, key: string): unknown {
  if (!value || typeof value !== "object") return undefined;
  const fields: Record<string, unknown> = Object.fromEntries(Object.entries(value));
  return fields[key];
}
