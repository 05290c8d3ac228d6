/**
 * Knowledge Base Index
 *
 * Loads the authoritative AI system and organization collections once and
 * serves slug and @id lookups for report resolution and serialization.
 *
 * Internal bookkeeping (the `_aifr_internal` record and any other field whose
 * name starts with `_`) is split off each entry at load time, so published
 * linked data is always built from `publicFields` alone.
 */

import { readFileSync, existsSync } from 'fs';
import { join, resolve } from 'path';
import type { ValidateFunction } from 'ajv';
import { createAjv, formatSchemaError } from '../schemas/ajv.js';
import {
  collectionSchema,
  INTERNAL_FIELD_MARKER,
  INTERNAL_RECORD_KEY
} from '../schemas/knowledge-base.schema.js';
import type {
  CollectionDocument,
  EntryKind,
  InternalMetadata,
  JsonObject,
  JsonValue,
  KnowledgeBaseEntry,
  SystemListing
} from '../types/reports.js';

export const SYSTEMS_FILE = 'ai-systems.jsonld';
export const ORGANIZATIONS_FILE = 'organizations.jsonld';

export class KnowledgeBaseLoadError extends Error {
  public readonly path: string;
  public readonly cause?: Error;

  constructor(message: string, path: string, cause?: Error) {
    super(message);
    this.name = 'KnowledgeBaseLoadError';
    this.path = path;
    this.cause = cause;
  }
}

// ============ JSON HELPERS ============

export function isJsonObject(value: JsonValue | undefined): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function cloneValue(value: JsonValue): JsonValue {
  if (Array.isArray(value)) return value.map(cloneValue);
  if (isJsonObject(value)) return cloneObject(value);
  return value;
}

// fromEntries keeps a "__proto__" key as an own field
export function cloneObject(source: Readonly<JsonObject>): JsonObject {
  return Object.fromEntries(
    Object.entries(source).map(([key, value]): [string, JsonValue] => [key, cloneValue(value)])
  );
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null) {
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
    Object.freeze(value);
  }
  return value;
}

// ============ LOADING ============

let validateCollection: ValidateFunction<CollectionDocument> | null = null;

function getCollectionValidator(): ValidateFunction<CollectionDocument> {
  if (!validateCollection) {
    validateCollection = createAjv().compile<CollectionDocument>(collectionSchema);
  }
  return validateCollection;
}

function readCollectionFile(filePath: string): unknown {
  if (!existsSync(filePath)) {
    throw new KnowledgeBaseLoadError(`Knowledge base file not found: ${filePath}`, filePath);
  }

  try {
    return JSON.parse(readFileSync(filePath, 'utf-8'));
  } catch (err) {
    const cause = err instanceof Error ? err : new Error(String(err));
    throw new KnowledgeBaseLoadError(
      `Knowledge base file is not valid JSON: ${filePath} (${cause.message})`,
      filePath,
      cause
    );
  }
}

function readInternal(value: JsonValue): InternalMetadata {
  const internal: InternalMetadata = {};
  if (isJsonObject(value)) {
    if (typeof value.slug === 'string') internal.slug = value.slug;
    if (typeof value.displayName === 'string') internal.displayName = value.displayName;
  }
  return internal;
}

function toEntry(raw: JsonObject, kind: EntryKind, source: string): KnowledgeBaseEntry {
  const id = raw['@id'];
  if (typeof id !== 'string') {
    throw new KnowledgeBaseLoadError(`Entry without @id in ${source}`, source);
  }

  const publicEntries: Array<[string, JsonValue]> = [];
  let internal: InternalMetadata = {};
  for (const [key, value] of Object.entries(raw)) {
    if (key === INTERNAL_RECORD_KEY) {
      internal = readInternal(value);
    } else if (!key.startsWith(INTERNAL_FIELD_MARKER)) {
      publicEntries.push([key, cloneValue(value)]);
    }
  }
  const publicFields: JsonObject = Object.fromEntries(publicEntries);

  return deepFreeze({ id, kind, publicFields, internal });
}

function parseCollection(document: unknown, kind: EntryKind, source: string): KnowledgeBaseEntry[] {
  const validate = getCollectionValidator();
  if (!validate(document)) {
    const problems = (validate.errors ?? []).map(err => formatSchemaError(err, 'collection'));
    throw new KnowledgeBaseLoadError(
      `Malformed knowledge base collection ${source}: ${problems.join('; ')}`,
      source
    );
  }

  const entries = document['@graph'].map(raw => toEntry(raw, kind, source));

  const seen = new Set<string>();
  for (const entry of entries) {
    const slug = entry.internal.slug;
    if (slug === undefined) continue;
    if (seen.has(slug)) {
      throw new KnowledgeBaseLoadError(`Duplicate slug "${slug}" in ${source}`, source);
    }
    seen.add(slug);
  }

  return entries;
}

// ============ INDEX ============

export class KnowledgeBaseIndex {
  private readonly systems: readonly KnowledgeBaseEntry[];
  private readonly organizations: readonly KnowledgeBaseEntry[];
  private readonly slugMap: ReadonlyMap<string, KnowledgeBaseEntry>;

  private constructor(systems: KnowledgeBaseEntry[], organizations: KnowledgeBaseEntry[]) {
    this.systems = Object.freeze(systems);
    this.organizations = Object.freeze(organizations);

    const slugMap = new Map<string, KnowledgeBaseEntry>();
    for (const entry of [...systems, ...organizations]) {
      const slug = entry.internal.slug;
      if (slug === undefined) continue;
      const existing = slugMap.get(slug);
      if (existing && existing.kind !== entry.kind) {
        console.warn(`[KnowledgeBase] Slug "${slug}" is shared by ${existing.id} and ${entry.id}; ${entry.id} wins`);
      }
      slugMap.set(slug, entry);
    }
    this.slugMap = slugMap;
  }

  // Load ai-systems.jsonld and organizations.jsonld from a directory
  static load(dir: string): KnowledgeBaseIndex {
    const basePath = resolve(dir);
    const systemsPath = join(basePath, SYSTEMS_FILE);
    const organizationsPath = join(basePath, ORGANIZATIONS_FILE);

    return new KnowledgeBaseIndex(
      parseCollection(readCollectionFile(systemsPath), 'system', systemsPath),
      parseCollection(readCollectionFile(organizationsPath), 'organization', organizationsPath)
    );
  }

  static fromDocuments(systemsDocument: unknown, organizationsDocument: unknown): KnowledgeBaseIndex {
    return new KnowledgeBaseIndex(
      parseCollection(systemsDocument, 'system', SYSTEMS_FILE),
      parseCollection(organizationsDocument, 'organization', ORGANIZATIONS_FILE)
    );
  }

  findBySlug(slug: string): KnowledgeBaseEntry | undefined {
    return this.slugMap.get(slug);
  }

  // Scoped to systems; independent of the combined slug map
  findSystemBySlug(slug: string): KnowledgeBaseEntry | undefined {
    return this.systems.find(system => system.internal.slug === slug);
  }

  findOrganizationById(id: string): KnowledgeBaseEntry | undefined {
    return this.organizations.find(org => org.id === id);
  }

  /**
   * Clean linked data for a system, with its publisher reference replaced by
   * the full organization record. Returns a fresh copy on every call.
   */
  getSystemLinkedData(slug: string): JsonObject | undefined {
    const system = this.findSystemBySlug(slug);
    if (!system) return undefined;

    const document = cloneObject(system.publicFields);
    const publisher = system.publicFields.publisher;
    const publisherId = isJsonObject(publisher) ? publisher['@id'] : undefined;
    if (typeof publisherId === 'string') {
      const organization = this.findOrganizationById(publisherId);
      if (organization) {
        document.publisher = cloneObject(organization.publicFields);
      }
    }
    return document;
  }

  // For form dropdowns; sorted case-insensitively by display name
  listAllSystemSlugs(): SystemListing[] {
    const listings: SystemListing[] = [];
    for (const system of this.systems) {
      const { slug, displayName } = system.internal;
      if (slug && displayName) {
        listings.push({ slug, displayName });
      }
    }
    return listings.sort((a, b) => {
      const left = a.displayName.toLowerCase();
      const right = b.displayName.toLowerCase();
      if (left < right) return -1;
      if (left > right) return 1;
      return 0;
    });
  }

  counts(): { systems: number; organizations: number } {
    return { systems: this.systems.length, organizations: this.organizations.length };
  }
}
