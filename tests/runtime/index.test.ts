import { describe, it, expect } from 'vitest';
import { defineTool, isRegisteredTool, resultText, TOOL_MARKER, type ToolContext } from '../../src/runtime/index.js';

describe('runtime', () => {
  describe('defineTool', () => {
    it('should brand and freeze the registration', async () => {
      const play = defineTool('play', async (_ctx: ToolContext): Promise<string> => 'playing');

      expect(play.name).toBe('play');
      expect(play[TOOL_MARKER]).toBe(true);
      expect(Object.isFrozen(play)).toBe(true);
      await expect(play.handler({})).resolves.toBe('playing');
    });

    it('should reject an empty name', () => {
      expect(() => defineTool('  ', async (): Promise<string> => 'x')).toThrow('Tool name must be a non-empty string');
    });
  });

  describe('isRegisteredTool', () => {
    it('should recognize registrations', () => {
      expect(isRegisteredTool(defineTool('play', async (): Promise<string> => 'playing'))).toBe(true);
    });

    it('should recognize the brand from another module instance', () => {
      const foreign = { [Symbol.for('tool-conformance.tool')]: true, name: 'play', handler: async () => 'playing' };
      expect(isRegisteredTool(foreign)).toBe(true);
    });

    it('should reject everything else', () => {
      expect(isRegisteredTool(null)).toBe(false);
      expect(isRegisteredTool(async () => 'playing')).toBe(false);
      expect(isRegisteredTool({ name: 'play', handler: async () => 'playing' })).toBe(false);
      expect(isRegisteredTool({ [TOOL_MARKER]: true, name: 'play' })).toBe(false);
    });
  });

  describe('resultText', () => {
    it('should pass strings through', () => {
      expect(resultText('Tempo set', 'fallback')).toBe('Tempo set');
    });

    it('should take the text of the first structured entry', () => {
      expect(resultText([{ type: 'text', text: 'Clip fired' }, { type: 'text', text: 'ignored' }], 'fallback')).toBe(
        'Clip fired'
      );
    });

    it('should take a message field', () => {
      expect(resultText({ message: 'Track created' }, 'fallback')).toBe('Track created');
    });

    it('should fall back for anything else', () => {
      expect(resultText([], 'Done')).toBe('Done');
      expect(resultText([{ type: 'image' }], 'Done')).toBe('Done');
      expect(resultText({ status: 'ok' }, 'Done')).toBe('Done');
      expect(resultText(undefined, 'Done')).toBe('Done');
    });
  });
});
