// I/O functions for loading and validating star schema YAML files
import fs from "node:fs/promises";
import path from "node:path";
import yaml from "js-yaml";
import { getConfig } from "@/config/index";
import { describeError } from "@/lib/helpers";
import { parseStarSchemaDefinition, type SchemaRegistry } from "./registry";
import type { StarSchema } from "./types";

export interface LoadedStarSchema {
  name: string;
  schema: StarSchema;
}

// Cache for parsed definitions, keyed by file path
const schemaCache = new Map<string, LoadedStarSchema>();

function defaultSchemaDir(): string {
  return path.resolve(process.cwd(), getConfig().STAR_SCHEMA_DIR);
}

function isYamlFile(file: string): boolean {
  return file.endsWith(".yml") || file.endsWith(".yaml");
}

async function resolveSchemaFile(name: string, dir: string): Promise<string> {
  for (const ext of [".yml", ".yaml"]) {
    const fp = path.join(dir, `${name}${ext}`);
    try {
      await fs.access(fp);
      return fp;
    } catch {
      continue;
    }
  }
  throw new Error(`Missing star schema file for "${name}" in ${dir}`);
}

// Clear cache functions (useful for development/hot-reload)
export function clearStarSchemaCache(name?: string) {
  if (name) {
    for (const [fp, entry] of schemaCache) {
      if (entry.name === name || path.parse(fp).name === name) {
        schemaCache.delete(fp);
      }
    }
    console.log(`[Cache] Cleared cache for star schema "${name}"`);
  } else {
    schemaCache.clear();
    console.log("[Cache] Cleared all star schema caches");
  }
}

export async function listStarSchemas(dir = defaultSchemaDir()): Promise<string[]> {
  try {
    const files = await fs.readdir(dir);
    return files
      .filter(isYamlFile)
      .map((f) => f.replace(/\.(yml|yaml)$/, ""))
      .sort();
  } catch (error) {
    throw new Error(
      `Failed to list star schemas in ${dir}: ${describeError(error)}`
    );
  }
}

export async function readStarSchemaYaml(
  name: string,
  dir = defaultSchemaDir()
): Promise<string> {
  const fp = await resolveSchemaFile(name, dir);
  try {
    return await fs.readFile(fp, "utf8");
  } catch (error) {
    throw new Error(`Failed to read star schema file at ${fp}: ${describeError(error)}`);
  }
}

export async function loadStarSchemaYaml(
  name: string,
  dir = defaultSchemaDir()
): Promise<LoadedStarSchema> {
  const fp = await resolveSchemaFile(name, dir);

  const cached = schemaCache.get(fp);
  if (cached) {
    console.log(`[Cache] Returning star schema "${cached.name}" from cache`);
    return cached;
  }

  const raw = await readStarSchemaYaml(name, dir);

  let doc: unknown;
  try {
    doc = yaml.load(raw);
  } catch (e) {
    throw new Error(`YAML parse error for ${path.basename(fp)}: ${describeError(e)}`);
  }

  const parsed = parseStarSchemaDefinition(doc, path.basename(fp));
  const loaded: LoadedStarSchema = {
    name: parsed.name ?? name,
    schema: parsed.schema,
  };

  schemaCache.set(fp, loaded);
  console.log(`[Cache] Star schema "${loaded.name}" loaded and cached`);

  return loaded;
}

/**
 * Register every definition found in `dir`. Returns the logical table names
 * that were registered.
 */
export async function loadStarSchemas(
  registry: SchemaRegistry,
  dir = defaultSchemaDir()
): Promise<string[]> {
  const registered: string[] = [];
  for (const file of await listStarSchemas(dir)) {
    const { name, schema } = await loadStarSchemaYaml(file, dir);
    registry.register(name, schema);
    registered.push(name);
  }
  return registered;
}
