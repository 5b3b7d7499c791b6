import fs from 'node:fs';
import { z } from 'zod';

// Canonical name -> one or more synonymous extensions
export type ExtensionCatalog = Map<string, Set<string>>;

const entriesSchema = z.record(z.string(), z.union([z.string().min(1), z.array(z.string().min(1)).min(1)]));

const catalogFileSchema = z.object({
  fileTypes: entriesSchema,
  threats: entriesSchema
});

const CATALOG_FILE = new URL('../data/extensions.json', import.meta.url);

export function toCatalog(entries: Record<string, string | string[]>): ExtensionCatalog {
  const catalog: ExtensionCatalog = new Map();
  for (const [name, value] of Object.entries(entries)) {
    catalog.set(name, new Set(typeof value === 'string' ? [value] : value));
  }
  return catalog;
}

export function loadCatalogs(file: URL | string = CATALOG_FILE): { fileTypes: ExtensionCatalog; threats: ExtensionCatalog } {
  const raw: unknown = JSON.parse(fs.readFileSync(file, 'utf-8'));
  const parsed = catalogFileSchema.parse(raw);
  return { fileTypes: toCatalog(parsed.fileTypes), threats: toCatalog(parsed.threats) };
}

let cached: ReturnType<typeof loadCatalogs> | undefined;

export function catalogs(): ReturnType<typeof loadCatalogs> {
  cached ??= loadCatalogs();
  return cached;
}

export function isHighThreat(fileType: string, threats: ExtensionCatalog = catalogs().threats): boolean {
  for (const extensions of threats.values()) {
    if (extensions.has(fileType)) return true;
  }
  return false;
}

// One line per entry: extensions padded to width 4, then the name ("pdf : Adobe Portable Document Format")
export function formatCatalog(catalog: ExtensionCatalog): string[] {
  return [...catalog].map(([name, extensions]) => `${[...extensions].join(', ').padEnd(4)}: ${name}`);
}
