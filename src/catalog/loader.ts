import { existsSync } from 'fs';
import { mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { basename, join, resolve } from 'path';
import { fileURLToPath } from 'url';
import { createJiti } from 'jiti';
import { extractTools } from '../extractor/index.js';
import { RUNTIME_MODULE } from '../model/conventions.js';
import { CatalogLoadError, errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import type { LiveTool, LoadedCatalog } from './types.js';

/**
 * Runtime module catalogs resolve `tool-conformance/runtime` to: the
 * TypeScript source when running from source, the build output otherwise
 */
function runtimeEntry(): string {
  const source = fileURLToPath(new URL('../runtime/index.ts', import.meta.url));
  return existsSync(source) ? source : fileURLToPath(new URL('../runtime/index.js', import.meta.url));
}

/**
 * jiti instance for catalog modules, so catalogs are plain TypeScript
 * without pre-compilation. Caches are off: a catalog edited between two
 * loads is evaluated again.
 */
const jiti = createJiti(import.meta.url, {
  interopDefault: true,
  moduleCache: false,
  fsCache: false,
  alias: { [RUNTIME_MODULE]: runtimeEntry() },
});

/**
 * Load a catalog module and pair each exported tool with its definition
 *
 * @throws CatalogLoadError when the file cannot be read or evaluated
 */
export async function loadCatalog(filePath: string): Promise<LoadedCatalog> {
  const absolutePath = resolve(filePath);

  let source: string;
  try {
    source = await readFile(absolutePath, 'utf-8');
  } catch (error) {
    throw new CatalogLoadError(filePath, errorMessage(error));
  }

  const outcomes = extractTools(source, basename(absolutePath));

  let module: unknown;
  try {
    module = await jiti.import(absolutePath);
  } catch (error) {
    logger.error('Failed to evaluate catalog', { file: absolutePath, error: errorMessage(error) });
    throw new CatalogLoadError(filePath, errorMessage(error));
  }

  if (typeof module !== 'object' || module === null) {
    throw new CatalogLoadError(filePath, 'Module did not evaluate to an object');
  }

  const tools: LiveTool[] = [];
  const extractionErrors: { unitId: string; message: string }[] = [];
  const missing: string[] = [];

  for (const outcome of outcomes) {
    if (!outcome.ok) {
      extractionErrors.push({ unitId: outcome.error.unitId, message: outcome.error.detail });
      continue;
    }

    const { definition } = outcome;
    const exported: unknown = Reflect.get(module, definition.name);
    if (exported === undefined) {
      missing.push(definition.name);
      continue;
    }
    tools.push({ name: definition.name, exported, definition });
  }

  if (missing.length > 0) {
    logger.warn('Catalog declares tools its module does not export', { file: absolutePath, missing });
  }

  logger.debug('Loaded catalog', {
    file: absolutePath,
    tools: tools.map((tool) => tool.name),
    extractionErrors: extractionErrors.length,
  });

  return { filePath: absolutePath, tools, extractionErrors, missing };
}

/**
 * Load a single tool from source text, for generated code that has not been
 * written anywhere yet
 *
 * @throws CatalogLoadError when the source does not export the named tool
 */
export async function loadToolSource(source: string, name: string): Promise<LiveTool> {
  const directory = await mkdtemp(join(tmpdir(), 'tool-conformance-'));
  const filePath = join(directory, `${name}.tools.ts`);

  try {
    await writeFile(filePath, source, 'utf-8');
    const catalog = await loadCatalog(filePath);
    const tool = catalog.tools.find((candidate) => candidate.name === name);
    if (!tool) {
      const reason = catalog.extractionErrors[0]?.message ?? `no tool named "${name}"`;
      throw new CatalogLoadError(filePath, reason);
    }
    return tool;
  } finally {
    await rm(directory, { recursive: true, force: true });
  }
}
