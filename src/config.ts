/**
 * Application Configuration
 *
 * Centralized configuration with typed defaults.
 */

export interface ConverterConfig {
  collection: {
    id: number;
    name: string;
  };
  defaults: {
    userId: number;
    collectionColor: string | null;
  };
  output: {
    indent: number;
    asciiOnly: boolean;
    fileMode: number;
  };
  // Used when no bookmark in the export carries a timestamp
  epochFallback: string;
}

export const config: ConverterConfig = {
  collection: {
    id: 1,
    name: 'Hoarder Import',
  },

  defaults: {
    userId: 1,
    collectionColor: null,
  },

  // Escape non-ASCII so the file survives any importer encoding
  output: {
    indent: 2,
    asciiOnly: true,
    fileMode: 0o644,
  },

  epochFallback: '1970-01-01T00:00:00.000Z',
};

// Freeze config to prevent accidental mutation
Object.freeze(config);
Object.freeze(config.collection);
Object.freeze(config.defaults);
Object.freeze(config.output);
