import { readFileSync, statSync } from 'fs';
import { CatalogError } from './CatalogError.js';
import { CatalogField, CatalogStats, FieldType } from './types.js';
import { debugLog, errorMessage, logger } from '../utils/logger.js';

/**
 * CatalogLoader
 * Reads the field catalog (a JSON array of field records) into frozen
 * CatalogField descriptors. The parsed result is cached until the file's
 * modification time changes or a reload is forced.
 */
export class CatalogLoader {
  private readonly catalogPath: string;
  private entryCount = 0;
  private fields: CatalogField[] | null = null;
  private lastLoaded: Date | null = null;
  private fileMtimeMs: number | null = null;

  constructor(catalogPath: string) {
    this.catalogPath = catalogPath;
  }

  getCatalogPath(): string {
    return this.catalogPath;
  }

  /**
   * Load and parse the catalog file.
   * Malformed individual records are skipped with a warning; a missing file,
   * invalid JSON or a non-array document raises CatalogError and leaves any
   * previously loaded fields in place.
   */
  loadCatalog(forceReload = false): CatalogField[] {
    if (!forceReload && this.fields !== null && !this.hasChanged()) {
      debugLog('index', 'Using cached catalog fields', { path: this.catalogPath });
      return this.fields;
    }

    const mtimeMs = this.readMtime();
    const raw = this.readDocument();

    const fields: CatalogField[] = [];
    const seenPaths = new Set<string>();
    raw.forEach((entry, position) => {
      const field = this.parseEntry(entry, position);
      if (!field) {
        return;
      }
      if (seenPaths.has(field.path)) {
        logger.warn('Skipping duplicate catalog path', { path: field.path, position });
        return;
      }
      seenPaths.add(field.path);
      fields.push(field);
    });

    this.fields = fields;
    this.entryCount = raw.length;
    this.fileMtimeMs = mtimeMs;
    this.lastLoaded = new Date();

    logger.info('Loaded field catalog', {
      path: this.catalogPath,
      entries: raw.length,
      validFields: fields.length,
    });

    return fields;
  }

  getFields(): CatalogField[] {
    return this.loadCatalog(false);
  }

  /**
   * True when nothing has been loaded yet or the file's mtime moved since the last load.
   */
  hasChanged(): boolean {
    if (this.fields === null || this.fileMtimeMs === null) {
      return true;
    }

    try {
      return statSync(this.catalogPath).mtimeMs !== this.fileMtimeMs;
    } catch {
      // A file that vanished after loading counts as changed; the next load reports it
      return true;
    }
  }

  getStats(): CatalogStats {
    const fields = this.getFields();
    const fieldTypes: Partial<Record<FieldType, number>> = {};
    for (const field of fields) {
      fieldTypes[field.fieldType] = (fieldTypes[field.fieldType] ?? 0) + 1;
    }

    return {
      totalEntries: this.entryCount,
      validFields: fields.length,
      fieldTypes,
      lastLoaded: this.lastLoaded ? this.lastLoaded.toISOString() : null,
      filePath: this.catalogPath,
    };
  }

  private readMtime(): number {
    try {
      return statSync(this.catalogPath).mtimeMs;
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        throw new CatalogError(
          `Catalog file not found: ${this.catalogPath}`,
          this.catalogPath,
          error
        );
      }
      throw new CatalogError(
        `Cannot access catalog file "${this.catalogPath}": ${errorMessage(error)}`,
        this.catalogPath,
        error
      );
    }
  }

  private readDocument(): unknown[] {
    let content: string;
    try {
      content = readFileSync(this.catalogPath, 'utf-8');
    } catch (error) {
      throw new CatalogError(
        `Failed to read catalog file "${this.catalogPath}": ${errorMessage(error)}`,
        this.catalogPath,
        error
      );
    }

    let document: unknown;
    try {
      document = JSON.parse(content);
    } catch (error) {
      throw new CatalogError(
        `Invalid JSON in catalog file "${this.catalogPath}": ${errorMessage(error)}`,
        this.catalogPath,
        error
      );
    }

    if (!Array.isArray(document)) {
      throw new CatalogError('Catalog file must contain a JSON array', this.catalogPath);
    }

    return document;
  }

  private parseEntry(entry: unknown, position: number): CatalogField | null {
    if (!isRecord(entry)) {
      logger.warn('Skipping catalog entry that is not an object', { position });
      return null;
    }

    const record = entry;
    const path = typeof record.field_path === 'string' ? record.field_path.trim() : '';
    if (!path) {
      logger.warn('Skipping catalog entry without field_path', { position });
      return null;
    }

    const fieldType = determineFieldType(record);
    const enumValues = fieldType === 'enum' ? readEnumValues(record.enum_values) : undefined;
    const description =
      typeof record.description === 'string' && record.description.trim()
        ? record.description.trim()
        : undefined;

    const rawTerms: unknown[] = [];
    if (Array.isArray(record.searchable_terms)) {
      rawTerms.push(...record.searchable_terms);
    }
    rawTerms.push(record.field_name, description);
    if (enumValues) {
      rawTerms.push(...enumValues);
    }

    const searchableTerms = [
      ...new Set(
        rawTerms
          .filter((term): term is string => typeof term === 'string')
          .map((term) => term.toLowerCase().trim())
          .filter((term) => term.length > 0)
      ),
    ];

    return Object.freeze({
      path,
      fieldType,
      ...(enumValues !== undefined && { enumValues: Object.freeze(enumValues) }),
      ...(description !== undefined && { description }),
      searchableTerms: Object.freeze(searchableTerms),
    });
  }
}

const TYPE_ALIASES = new Map<string, FieldType>([
  ['enumeration', 'enum'],
  ['enum', 'enum'],
  ['string', 'string'],
  ['text', 'string'],
  ['number', 'number'],
  ['int', 'number'],
  ['integer', 'number'],
  ['float', 'number'],
  ['boolean', 'boolean'],
  ['bool', 'boolean'],
  ['date', 'date'],
  ['datetime', 'date'],
]);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function determineFieldType(record: Record<string, unknown>): FieldType {
  if (typeof record.type === 'string') {
    const aliased = TYPE_ALIASES.get(record.type.trim().toLowerCase());
    if (aliased) {
      return aliased;
    }
  }

  const enumValues = readEnumValues(record.enum_values);
  return enumValues.length > 0 ? 'enum' : 'string';
}

function readEnumValues(value: unknown): string[] {
  if (typeof value === 'string') {
    return value.trim() ? [value] : [];
  }
  if (!Array.isArray(value)) {
    return [];
  }
  return value.filter((item): item is string => typeof item === 'string' && item.trim() !== '');
}
