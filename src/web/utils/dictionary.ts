import { Trie } from './trie';

export class DictionaryLoadError extends Error {
  constructor(readonly source: string, cause?: unknown) {
    super(`Failed to load dictionary from ${source}`, { cause });
    this.name = 'DictionaryLoadError';
  }
}

export type WordListLoader = (source: string) => Promise<string[]>;

export function splitWordList(text: string): string[] {
  return text
    .split(/\r?\n/)
    .map(line => line.trim())
    .filter(line => line.length > 0);
}

// One word per line; blank lines are dropped
export async function fetchWordList(url: string): Promise<string[]> {
  let response: Response;
  try {
    response = await fetch(url);
  } catch (error) {
    throw new DictionaryLoadError(url, error);
  }

  if (!response.ok) {
    throw new DictionaryLoadError(url, new Error(`${response.status} ${response.statusText}`));
  }
  return splitWordList(await response.text());
}

/**
 * Holds one trie per word-list source. A trie is built the first time its
 * source is requested and shared, read-only, by every later request.
 * Failed loads are forgotten so the next request tries again.
 */
export class DictionaryRegistry {
  private tries = new Map<string, Promise<Trie>>();

  constructor(private readonly loadWords: WordListLoader = fetchWordList) {}

  load(source: string): Promise<Trie> {
    const existing = this.tries.get(source);
    if (existing) return existing;

    const pending = this.build(source).catch(error => {
      this.tries.delete(source);
      throw error;
    });
    this.tries.set(source, pending);
    return pending;
  }

  has(source: string): boolean {
    return this.tries.has(source);
  }

  private async build(source: string): Promise<Trie> {
    let words: string[];
    try {
      words = await this.loadWords(source);
    } catch (error) {
      throw error instanceof DictionaryLoadError ? error : new DictionaryLoadError(source, error);
    }

    const trie = new Trie(words);
    console.info(`Loaded ${trie.size} words from ${source}`);
    return trie;
  }
}

export const dictionaries = new DictionaryRegistry();
