/** Wire shapes of the monitored-entities API, as loosely as the API sends them. */

/** One entity record before decoding; every field is untrusted. */
export type RawEntity = Record<string, unknown>;

export interface EntityPage {
  entities: unknown[];
  nextPageKey?: string;
  totalCount?: number;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Narrows a decoded response body to a page. A missing or non-array
 * `entities` field is treated as an empty page.
 */
export function toEntityPage(body: unknown): EntityPage {
  if (!isRecord(body)) return { entities: [] };

  const page: EntityPage = {
    entities: Array.isArray(body.entities) ? body.entities : [],
  };
  if (typeof body.nextPageKey === "string" && body.nextPageKey.length > 0) {
    page.nextPageKey = body.nextPageKey;
  }
  if (typeof body.totalCount === "number") {
    page.totalCount = body.totalCount;
  }
  return page;
}
