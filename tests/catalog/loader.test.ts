import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { dirname, join, resolve } from 'path';
import { fileURLToPath } from 'url';
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { loadCatalog, loadToolSource } from '../../src/catalog/loader.js';
import { invokeTool } from '../../src/catalog/invoke.js';
import { generateTool } from '../../src/generator/template.js';
import { EXAMPLE_SPECS } from '../../src/generator/examples.js';
import { createMockRegistry } from '../../src/harness/mock-registry.js';
import { isRegisteredTool } from '../../src/runtime/index.js';
import { CatalogLoadError } from '../../src/utils/errors.js';

vi.mock('../../src/utils/logger.js', () => ({
  logger: {
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

const FIXTURES = resolve(dirname(fileURLToPath(import.meta.url)), '../fixtures');

describe('catalog loader', () => {
  it('should pair every exported tool with its definition', async () => {
    const catalog = await loadCatalog(join(FIXTURES, 'transport.tools.ts'));

    expect(catalog.filePath).toBe(join(FIXTURES, 'transport.tools.ts'));
    expect(catalog.tools.map((tool) => tool.name)).toEqual(['set_tempo', 'record']);
    expect(catalog.extractionErrors).toEqual([]);
    expect(catalog.missing).toEqual([]);
    expect(catalog.tools.every((tool) => isRegisteredTool(tool.exported))).toBe(true);
    expect(catalog.tools[0]?.definition.sourceUnit).toBe('transport.tools.ts');
  });

  it('should load tools that can be invoked against a mock registry', async () => {
    const catalog = await loadCatalog(join(FIXTURES, 'transport.tools.ts'));
    const [setTempo] = catalog.tools;
    if (!setTempo) {
      expect.unreachable('set_tempo not loaded');
    }

    const registry = createMockRegistry({ available: true, defaultBehavior: { kind: 'return', value: 'Tempo set' } });
    await expect(invokeTool(setTempo, registry.context(), { bpm: 132 })).resolves.toBe('Tempo set');
    expect(registry.invocations).toEqual([{ target: 'transport', method: 'set_tempo', args: [132] }]);
  });

  it('should raise a CatalogLoadError for a missing file', async () => {
    await expect(loadCatalog(join(FIXTURES, 'missing.tools.ts'))).rejects.toBeInstanceOf(CatalogLoadError);
  });

  it('should raise a CatalogLoadError when the module throws', async () => {
    const loading = loadCatalog(join(FIXTURES, 'broken.tools.ts'));
    await expect(loading).rejects.toBeInstanceOf(CatalogLoadError);
    await expect(loading).rejects.toThrow('Catalog failed to initialize');
  });

  describe('with temporary catalogs', () => {
    let directory: string;

    beforeEach(async () => {
      directory = await mkdtemp(join(tmpdir(), 'catalog-'));
    });

    afterEach(async () => {
      await rm(directory, { recursive: true, force: true });
    });

    it('should evaluate a catalog again after it changes', async () => {
      const filePath = join(directory, 'session.tools.ts');
      await writeFile(filePath, generateTool(EXAMPLE_SPECS.simple_direct));
      expect((await loadCatalog(filePath)).tools.map((tool) => tool.name)).toEqual(['record']);

      await writeFile(filePath, generateTool(EXAMPLE_SPECS.handler_with_validation));
      expect((await loadCatalog(filePath)).tools.map((tool) => tool.name)).toEqual(['create_audio_track']);
    });

    it('should load unmarked function exports alongside registered tools', async () => {
      const filePath = join(directory, 'playback.tools.ts');
      await writeFile(
        filePath,
        `import { defineTool } from 'tool-conformance/runtime';

/** Start playback */
export const play = defineTool('play', async (): Promise<string> => 'playing');

/** Stop playback */
export async function stop(): Promise<string> {
  return 'stopped';
}
`
      );

      const catalog = await loadCatalog(filePath);
      expect(catalog.tools.map((tool) => tool.name)).toEqual(['play', 'stop']);
      expect(catalog.missing).toEqual([]);
      expect(isRegisteredTool(catalog.tools[1]?.exported)).toBe(false);
    });
  });

  describe('loadToolSource', () => {
    it('should load generated source without a catalog file', async () => {
      const tool = await loadToolSource(generateTool(EXAMPLE_SPECS.simple_direct), 'record');
      const registry = createMockRegistry({ available: true, defaultBehavior: { kind: 'return', value: 'Recording' } });

      await expect(invokeTool(tool, registry.context())).resolves.toBe('Recording');
      expect(registry.invocations).toEqual([{ target: 'backend', method: 'record', args: [] }]);
    });

    it('should reject source without the named tool', async () => {
      await expect(loadToolSource(generateTool(EXAMPLE_SPECS.simple_direct), 'play')).rejects.toThrow(
        'no tool named "play"'
      );
    });
  });
});
