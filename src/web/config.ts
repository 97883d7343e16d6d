import type { TileSetName } from './utils/boardGeneration';

export const BOARD_SIZE = 4;

// Boggle rule: shorter words never count
export const MIN_WORD_LENGTH = 3;

// Entries kept per trie query cache before the least recently used one is dropped
export const QUERY_CACHE_LIMIT = 50_000;

export const DEFAULT_TILE_SET: TileSetName = 'classic';

export const DICTIONARY_URL: string = import.meta.env.VITE_DICTIONARY_URL ?? '/words.txt';
