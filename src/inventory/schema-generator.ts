/**
 * Field-schema generator for log-source families.
 *
 * Writes one YAML schema per family under <schemas>/<platform>/<family>.yaml
 * listing the sourcetypes it covers and the fields analysts can expect.
 * Defaults come from data/default-schema-fields.json; an operator template
 * with the same file name replaces them verbatim.
 */

import { copyFileSync, existsSync, mkdirSync, readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import YAML from 'yaml';
import { z } from 'zod';

import type { LogSource } from '../types/inventory.js';
import { FAMILY_PLATFORMS, resolveFamilyPlatforms, type FamilyPlatform } from '../mapping/platforms.js';
import { ValidationError } from '../utils/errors.js';
import { writeFileAtomic } from '../utils/fs.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('schemas');

// ---------------------------------------------------------------------------
// Default fields
// ---------------------------------------------------------------------------

const SchemaFieldSchema = z.object({
  name: z.string().min(1),
  type: z.string().min(1),
  description: z.string(),
});

export type SchemaField = z.infer<typeof SchemaFieldSchema>;

const DefaultFieldsSchema = z.record(z.enum(FAMILY_PLATFORMS), z.array(SchemaFieldSchema));

export const DEFAULT_FIELDS_PATH = fileURLToPath(
  new URL('../../data/default-schema-fields.json', import.meta.url),
);

let defaultFieldsCache: Partial<Record<FamilyPlatform, SchemaField[]>> | null = null;

export function loadDefaultFields(path = DEFAULT_FIELDS_PATH): Partial<Record<FamilyPlatform, SchemaField[]>> {
  if (path === DEFAULT_FIELDS_PATH && defaultFieldsCache) {
    return defaultFieldsCache;
  }
  const fields = DefaultFieldsSchema.parse(JSON.parse(readFileSync(path, 'utf-8')));
  if (path === DEFAULT_FIELDS_PATH) {
    defaultFieldsCache = fields;
  }
  return fields;
}

// ---------------------------------------------------------------------------
// Naming
// ---------------------------------------------------------------------------

/**
 * Convert a family name to a schema file name.
 *
 * @example schemaFileName('windows-security') => 'windows-security.yaml'
 * @example schemaFileName('XmlWinEventLog:Sysmon/Operational') => 'xmlwineventlog_sysmon_operational.yaml'
 */
export function schemaFileName(family: string): string {
  const name = family
    .replace(/[:/\\]/g, '_')
    .replace(/[^A-Za-z0-9._-]+/g, '_')
    .replace(/^_+|_+$/g, '')
    .toLowerCase();
  return `${name || 'family'}.yaml`;
}

// ---------------------------------------------------------------------------
// Generation
// ---------------------------------------------------------------------------

export interface FamilySchema {
  family: string;
  platform: FamilyPlatform;
  sourcetypes: string[];
  fields: SchemaField[];
}

export function buildFamilySchemas(
  sources: readonly LogSource[],
  defaults = loadDefaultFields(),
): FamilySchema[] {
  const platforms = resolveFamilyPlatforms(sources);

  return [...platforms.entries()]
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([family, platform]) => ({
      family,
      platform,
      sourcetypes: [
        ...new Set(sources.filter((s) => s.family === family && s.sourcetype).map((s) => s.sourcetype)),
      ].sort(),
      fields: defaults[platform] ?? defaults.other ?? [],
    }));
}

export function formatSchemaYaml(schema: FamilySchema): string {
  return YAML.stringify(schema);
}

export interface WriteSchemasOptions {
  templatesDir?: string;
}

export interface WrittenSchema {
  family: string;
  path: string;
  fromTemplate: boolean;
}

/**
 * Write every family schema under `outDir`, preferring templates.
 *
 * @throws ValidationError when two families map to the same schema file;
 *         nothing is written in that case.
 */
export function writeFamilySchemas(
  schemas: readonly FamilySchema[],
  outDir: string,
  options: WriteSchemasOptions = {},
): WrittenSchema[] {
  const planned = schemas.map((schema) => {
    const fileName = schemaFileName(schema.family);
    return { schema, fileName, outPath: join(outDir, schema.platform, fileName) };
  });

  const owners = new Map<string, string>();
  const collisions: string[] = [];
  for (const { schema, outPath } of planned) {
    const owner = owners.get(outPath);
    if (owner === undefined) {
      owners.set(outPath, schema.family);
    } else {
      collisions.push(`families '${owner}' and '${schema.family}' both map to ${outPath}`);
    }
  }
  if (collisions.length > 0) {
    throw new ValidationError(`${collisions.length} family schema file name collision(s)`, collisions);
  }

  const written: WrittenSchema[] = [];

  for (const { schema, fileName, outPath } of planned) {
    const template = options.templatesDir
      ? [join(options.templatesDir, schema.platform, fileName), join(options.templatesDir, fileName)].find(
          (candidate) => existsSync(candidate),
        )
      : undefined;

    if (template) {
      mkdirSync(dirname(outPath), { recursive: true });
      copyFileSync(template, outPath);
      logger.debug(`Copied template ${template} -> ${outPath}`);
    } else {
      writeFileAtomic(outPath, formatSchemaYaml(schema));
    }

    written.push({ family: schema.family, path: outPath, fromTemplate: template !== undefined });
  }

  return written;
}
