import fs from 'node:fs';
import path from 'node:path';

import { Ajv2020 } from 'ajv/dist/2020.js';

import { DeclarationLoadError, DeclarationValidationError } from './errors.js';
import { ACCESS_DECLARATIONS_SCHEMA_2020_12 } from './schema.js';
import type { AccessDeclarations, CompiledDeclarations, DeclarationFile } from './types.js';

const ajv = new Ajv2020({ allErrors: true });
const validateFile = ajv.compile<DeclarationFile>(ACCESS_DECLARATIONS_SCHEMA_2020_12);

function readJsonFile(filePath: string): unknown {
  try {
    const raw = fs.readFileSync(filePath, 'utf8');
    return JSON.parse(raw);
  } catch (e) {
    throw new DeclarationLoadError(`Failed to read JSON: ${filePath}`, { filePath, cause: e });
  }
}

function listJsonFiles(dir: string): string[] {
  if (!fs.existsSync(dir)) return [];
  return fs
    .readdirSync(dir, { withFileTypes: true })
    .filter((d) => d.isFile() && d.name.toLowerCase().endsWith('.json'))
    .map((d) => d.name)
    .sort((a, b) => a.localeCompare(b))
    .map((name) => path.join(dir, name));
}

export function validateDeclarationsOrThrow(raw: unknown, source = '<inline>'): DeclarationFile {
  if (!validateFile(raw)) {
    throw new DeclarationValidationError(`Invalid access declarations: ${source}`, validateFile.errors ?? []);
  }
  return raw;
}

export function mergeDeclarations(target: AccessDeclarations, file: DeclarationFile): string[] {
  const resources: string[] = [];
  for (const [resource, rules] of Object.entries(file)) {
    if (resource === '$schema' || typeof rules === 'string') continue;
    target[resource] = [...(target[resource] ?? []), ...rules.map((r) => ({ ...r, actions: [...r.actions] }))];
    resources.push(resource);
  }
  return resources;
}

/**
 * Reads every `*.json` file of `dir` in lexical order. Rules for a resource declared in
 * several files are appended in file order, so later files override earlier ones per action.
 */
export function compileDeclarationsFromFs(dir: string): CompiledDeclarations {
  const root = path.resolve(dir);
  if (!fs.existsSync(root)) throw new DeclarationLoadError(`Declarations directory not found: ${root}`, { dir: root });

  const declarations: AccessDeclarations = {};
  const sources: CompiledDeclarations['sources'] = [];
  for (const filePath of listJsonFiles(root)) {
    const file = validateDeclarationsOrThrow(readJsonFile(filePath), filePath);
    for (const resource of mergeDeclarations(declarations, file)) sources.push({ resource, filePath });
  }
  return { declarations, sources };
}
