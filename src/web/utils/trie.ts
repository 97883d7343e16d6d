import { MIN_WORD_LENGTH, QUERY_CACHE_LIMIT } from '../config';
import { QueryCache } from './queryCache';

/** A word, or the faces of a path in order. */
export type LetterSequence = string | readonly string[];

class TrieNode {
  children: Map<string, TrieNode> = new Map();
  isTerminal: boolean = false;
}

export function joinLetters(sequence: LetterSequence): string {
  const letters = typeof sequence === 'string' ? sequence : sequence.join('');
  return letters.toUpperCase();
}

/**
 * Prefix tree over upper-case letters. A face with several letters ("Qu")
 * walks one edge per letter, so queries accept whole faces or plain words.
 */
export class Trie {
  private readonly root = new TrieNode();
  private wordCount = 0;
  private readonly prefixCache: QueryCache<boolean>;
  private readonly wordCache: QueryCache<boolean>;

  constructor(lines: Iterable<string>, cacheLimit: number = QUERY_CACHE_LIMIT) {
    this.prefixCache = new QueryCache(cacheLimit);
    this.wordCache = new QueryCache(cacheLimit);
    for (const line of lines) {
      const word = line.trim();
      if (word) {
        this.insert(word.toUpperCase());
      }
    }
  }

  /** Number of distinct words stored. */
  get size(): number {
    return this.wordCount;
  }

  isValidPrefix(sequence: LetterSequence): boolean {
    const letters = joinLetters(sequence);
    return this.prefixCache.getOrCompute(letters, () => this.walk(letters) !== null);
  }

  isWord(sequence: LetterSequence): boolean {
    const letters = joinLetters(sequence);
    if (letters.length < MIN_WORD_LENGTH) {
      return false;
    }
    return this.wordCache.getOrCompute(letters, () => this.walk(letters)?.isTerminal ?? false);
  }

  private insert(word: string): void {
    let node = this.root;
    for (const letter of word) {
      let child = node.children.get(letter);
      if (!child) {
        child = new TrieNode();
        node.children.set(letter, child);
      }
      node = child;
    }
    if (!node.isTerminal) {
      node.isTerminal = true;
      this.wordCount++;
    }
  }

  private walk(letters: string): TrieNode | null {
    let node = this.root;
    for (const letter of letters) {
      const child = node.children.get(letter);
      if (!child) return null;
      node = child;
    }
    return node;
  }
}
