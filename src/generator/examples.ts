import type { ToolSpecInput } from './schema.js';

type ParameterSpecInput = ToolSpecInput['parameters'][number];

/**
 * Parameters that recur across the catalog
 */
export const COMMON_PARAMETERS = {
  track_id: { name: 'track_id', type: 'integer', description: 'Target track index' },
  clip_slot: { name: 'clip_slot', type: 'integer', description: 'Clip slot index' },
  bpm: { name: 'bpm', type: 'number', description: 'Tempo in beats per minute (60-200)' },
  track_type: { name: 'track_type', type: 'string', description: 'Type of track to create (audio, midi, return)' },
  name: { name: 'name', type: 'string', description: 'Optional name', optional: true, default: null },
  key: { name: 'key', type: 'string', description: "Musical key (e.g., 'C', 'Am', 'F#')" },
  genre: { name: 'genre', type: 'string', description: 'Genre style (techno, industrial, house, minimal)' },
  length: { name: 'length', type: 'integer', description: 'Length in bars (4-64)', optional: true, default: 4 },
} satisfies Record<string, ParameterSpecInput>;

/**
 * Reference tools, one per shape
 */
export const EXAMPLE_SPECS = {
  simple_direct: {
    name: 'record',
    description: 'Start recording in the live set',
    mode: 'direct',
    parameters: [],
  },
  handler_with_validation: {
    name: 'create_audio_track',
    description: 'Create a new audio track',
    delegationTarget: 'track',
    delegationMethod: 'create_track',
    parameters: [
      { name: 'track_type', type: 'string', description: 'Type of track (audio)', optional: true, default: 'audio' },
      COMMON_PARAMETERS.name,
    ],
  },
  complex_tool: {
    name: 'generate_bass_line',
    description: 'Generate a bass line with specific characteristics',
    delegationTarget: 'composition',
    parameters: [
      COMMON_PARAMETERS.key,
      COMMON_PARAMETERS.genre,
      COMMON_PARAMETERS.length,
      {
        name: 'note_density',
        type: 'string',
        description: 'Note density (sparse, medium, dense)',
        optional: true,
        default: 'medium',
      },
    ],
  },
} satisfies Record<string, ToolSpecInput>;
