// ═══════════════════════════════════════════════════════════════════════════════
// MAPPING SOURCE — Knowledge-Base Records per Entity Type
// ═══════════════════════════════════════════════════════════════════════════════
//
// An application keeps the records for entity type <type> in
// <appPath>/entities/<type>/mapping.json, either as a JSON array of records or
// as an object with an `entities` array.
//
// ═══════════════════════════════════════════════════════════════════════════════

import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { z } from 'zod';
import { getLogger } from '../observability/logging/index.js';
import { ok, err, type Result } from '../types/result.js';
import type { CanonicalItem } from '../types/entities.js';

const logger = getLogger({ component: 'mapping' });

// ─────────────────────────────────────────────────────────────────────────────────
// ERRORS
// ─────────────────────────────────────────────────────────────────────────────────

export class MappingNotFoundError extends Error {
  readonly name = 'MappingNotFoundError';
  readonly entityType: string;
  readonly location: string;

  constructor(entityType: string, location: string) {
    super(`No mapping for entity type '${entityType}' at ${location}`);
    this.entityType = entityType;
    this.location = location;
  }
}

export class MappingValidationError extends Error {
  readonly name = 'MappingValidationError';
  readonly entityType: string;
  readonly issues: readonly string[];

  constructor(entityType: string, issues: readonly string[]) {
    super(`Invalid mapping for entity type '${entityType}':\n  ${issues.join('\n  ')}`);
    this.entityType = entityType;
    this.issues = issues;
  }
}

// ─────────────────────────────────────────────────────────────────────────────────
// SCHEMA
// ─────────────────────────────────────────────────────────────────────────────────

export const CanonicalItemSchema = z
  .object({
    id: z.string().min(1).optional(),
    cname: z.string().min(1, 'cname must be a non-empty string'),
    whitelist: z.array(z.string()).optional(),
  })
  .passthrough();

export const MappingRecordsSchema = z.array(CanonicalItemSchema);

export const MappingDocumentSchema = z.object({
  entities: MappingRecordsSchema,
});

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map(issue => {
    const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${path}: ${issue.message}`;
  });
}

/**
 * Validate parsed mapping content: a list of records, or an object holding
 * one under `entities`.
 */
export function parseMappingRecords(content: unknown): Result<CanonicalItem[], string[]> {
  if (Array.isArray(content)) {
    const result = MappingRecordsSchema.safeParse(content);
    return result.success ? ok(result.data) : err(formatIssues(result.error));
  }

  const result = MappingDocumentSchema.safeParse(content);
  return result.success ? ok(result.data.entities) : err(formatIssues(result.error));
}

// ─────────────────────────────────────────────────────────────────────────────────
// SOURCES
// ─────────────────────────────────────────────────────────────────────────────────

export interface MappingSource {
  getEntityMap(entityType: string): Promise<readonly CanonicalItem[]>;
}

/**
 * Reads `entities/<type>/mapping.json` under an application directory.
 */
export class FileMappingSource implements MappingSource {
  private readonly appPath: string;

  constructor(appPath: string) {
    this.appPath = appPath;
  }

  mappingPath(entityType: string): string {
    return join(this.appPath, 'entities', entityType, 'mapping.json');
  }

  async getEntityMap(entityType: string): Promise<readonly CanonicalItem[]> {
    const path = this.mappingPath(entityType);

    let raw: string;
    try {
      raw = await readFile(path, 'utf8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        throw new MappingNotFoundError(entityType, path);
      }
      throw error;
    }

    let content: unknown;
    try {
      content = JSON.parse(raw);
    } catch (error) {
      throw new MappingValidationError(entityType, [
        `(root): invalid JSON: ${error instanceof Error ? error.message : String(error)}`,
      ]);
    }

    const parsed = parseMappingRecords(content);
    if (!parsed.ok) {
      throw new MappingValidationError(entityType, parsed.error);
    }

    logger.debug('Loaded entity mapping', { entityType, path, records: parsed.value.length });
    return parsed.value;
  }
}

/**
 * Serves records held in memory.
 */
export class StaticMappingSource implements MappingSource {
  private readonly maps = new Map<string, readonly CanonicalItem[]>();

  constructor(maps: Readonly<Record<string, readonly CanonicalItem[]>> = {}) {
    for (const [entityType, records] of Object.entries(maps)) {
      this.maps.set(entityType, records);
    }
  }

  set(entityType: string, records: readonly CanonicalItem[]): void {
    this.maps.set(entityType, records);
  }

  async getEntityMap(entityType: string): Promise<readonly CanonicalItem[]> {
    const records = this.maps.get(entityType);
    if (!records) {
      throw new MappingNotFoundError(entityType, 'static mapping');
    }
    return records;
  }
}
