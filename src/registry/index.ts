/**
 * Source registry adapter.
 * Flattens the source catalog and the tenant/activation catalog into
 * identity lists. Both documents arrive in more than one upstream shape;
 * anything unusable yields an empty list and a warning, never an exception.
 */

import { z } from "zod";
import { logger } from "../logger";
import type {
  ActiveSourceCount,
  CatalogSource,
  TenantSource,
} from "../types";

const DEFAULT_TENANT = "default";

const looseString = z
  .union([z.string(), z.number()])
  .transform((value) => String(value).trim());

const looseBoolean = z.union([
  z.boolean(),
  z
    .string()
    .transform((value) => !["false", "no", "0", "off"].includes(value.trim().toLowerCase())),
]);

const catalogAttributesSchema = z.object({
  name: looseString.optional(),
  url: looseString.optional(),
  description: looseString.optional(),
  propername: looseString.optional(),
  active: looseBoolean.optional(),
  type: looseString.optional(),
  sourcetype: looseString.optional(),
});

type CatalogAttributes = z.infer<typeof catalogAttributesSchema>;

const recordMapSchema = z.record(z.unknown());

const tenantSourceEntrySchema = z.union([
  looseString,
  z.object({ name: looseString }).transform((entry) => entry.name),
]);

const tenantBlockSchema = z.object({
  community: looseString.optional(),
  tenant: looseString.optional(),
  name: looseString.optional(),
  sources: z.array(z.unknown()).optional(),
});

// Catalog

export function extractCatalogSources(document: unknown): CatalogSource[] {
  if (document === null || document === undefined) {
    logger.warn("Source catalog missing — no catalog sources extracted");
    return [];
  }

  let container: unknown = document;
  if (!Array.isArray(document)) {
    const root = recordMapSchema.safeParse(document);
    container = root.success ? root.data.sources : undefined;
  }

  if (Array.isArray(container)) {
    return collectCatalogList(container);
  }

  const mapping = recordMapSchema.safeParse(container);
  if (mapping.success) {
    return collectCatalogMapping(mapping.data);
  }

  logger.warn(
    "Source catalog malformed — expected a 'sources' list or mapping",
  );
  return [];
}

function collectCatalogList(entries: unknown[]): CatalogSource[] {
  const sources: CatalogSource[] = [];

  entries.forEach((entry, index) => {
    const parsed = catalogAttributesSchema.safeParse(entry);
    if (!parsed.success || !parsed.data.name) {
      logger.debug(`Skipping catalog entry #${index}: no usable name`);
      return;
    }
    sources.push(toCatalogSource(parsed.data.name, parsed.data));
  });

  return sources;
}

function collectCatalogMapping(
  mapping: Record<string, unknown>,
): CatalogSource[] {
  const sources: CatalogSource[] = [];

  for (const [key, value] of Object.entries(mapping)) {
    const parsed = catalogAttributesSchema.safeParse(value ?? {});
    if (!parsed.success) {
      logger.debug(`Skipping catalog entry '${key}': malformed attributes`);
      continue;
    }
    const name = parsed.data.name || key.trim();
    if (!name) continue;
    sources.push(toCatalogSource(name, parsed.data));
  }

  return sources;
}

function toCatalogSource(name: string, attrs: CatalogAttributes): CatalogSource {
  return {
    name,
    url: attrs.url ?? "",
    description: attrs.description ?? attrs.propername ?? "",
    active: attrs.active ?? true,
    type: attrs.type ?? attrs.sourcetype ?? "",
  };
}

// Tenants

export function extractTenantSources(document: unknown): TenantSource[] {
  const root = recordMapSchema.safeParse(document);
  if (!root.success) {
    logger.warn("Tenant document missing or malformed — no tenant sources");
    return [];
  }

  const container = root.data.tenant ?? root.data.tenants;

  if (Array.isArray(container)) {
    return container.flatMap((block, index) =>
      collectTenantBlock(block, null, index),
    );
  }

  const mapping = recordMapSchema.safeParse(container);
  if (mapping.success) {
    return Object.entries(mapping.data).flatMap(([tenant, block], index) =>
      collectTenantBlock(block, tenant, index),
    );
  }

  logger.warn(
    "Tenant document malformed — expected a 'tenant' or 'tenants' list or mapping",
  );
  return [];
}

function collectTenantBlock(
  block: unknown,
  tenantKey: string | null,
  index: number,
): TenantSource[] {
  // A mapping value may be the source list itself
  const normalized = Array.isArray(block) ? { sources: block } : block;
  const parsed = tenantBlockSchema.safeParse(normalized);

  if (!parsed.success) {
    logger.debug(`Skipping tenant block #${index}: malformed`);
    return [];
  }

  const tenant =
    tenantKey?.trim() ||
    parsed.data.community ||
    parsed.data.tenant ||
    parsed.data.name ||
    DEFAULT_TENANT;

  const sources: TenantSource[] = [];
  for (const entry of parsed.data.sources ?? []) {
    const name = tenantSourceEntrySchema.safeParse(entry);
    if (!name.success || !name.data) {
      logger.debug(`Skipping unnamed source in tenant '${tenant}'`);
      continue;
    }
    sources.push({ name: name.data, tenant, active: true });
  }

  return sources;
}

// Known sources

export function normalizeSourceName(name: string): string {
  return name.trim().toLowerCase();
}

/**
 * Case-normalized, deduplicated union of both document families, sorted so
 * that fuzzy matching iterates in a stable order.
 */
export function buildKnownSources(
  catalog: readonly CatalogSource[],
  tenants: readonly TenantSource[],
): string[] {
  const names = new Set<string>();

  for (const source of [...catalog, ...tenants]) {
    const normalized = normalizeSourceName(source.name);
    if (normalized) names.add(normalized);
  }

  return [...names].sort();
}

export function countActiveSources(
  catalog: readonly CatalogSource[],
  tenants: readonly TenantSource[],
): ActiveSourceCount {
  if (tenants.length > 0) {
    const distinct = new Set(tenants.map((s) => normalizeSourceName(s.name)));
    return { count: distinct.size, origin: "tenant" };
  }

  const active = catalog.filter((s) => s.active);
  if (active.length > 0) {
    const distinct = new Set(active.map((s) => normalizeSourceName(s.name)));
    return { count: distinct.size, origin: "catalog" };
  }

  return { count: 0, origin: "none" };
}
