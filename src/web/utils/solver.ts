import { AdjacencyGraph } from './adjacency';
import type { Board, FoundWord, Path } from './models';
import { findPath, PathEnumerator } from './pathfinding';
import { scoreWord, scoreWords } from './scoring';
import { joinLetters, type Trie } from './trie';

export class BoggleSolver {
  readonly graph: AdjacencyGraph;

  constructor(readonly board: Board, readonly trie: Trie) {
    this.graph = new AdjacencyGraph(board);
  }

  /** Every dictionary word on the board, with the first path found for it. */
  solveWithPaths(signal?: AbortSignal): Map<string, Path> {
    const found = new Map<string, Path>();
    const cells = this.graph.cells;

    for (let i = 0; i < cells.length; i++) {
      for (let j = i + 1; j < cells.length; j++) {
        const forward = new PathEnumerator(this.graph, this.trie, cells[i], cells[j], { signal });
        const backward = new PathEnumerator(this.graph, this.trie, cells[j], cells[i], { signal });

        for (const enumerator of [forward, backward]) {
          for (const path of enumerator) {
            const word = joinLetters(path.map(cell => cell.face));
            if (!found.has(word) && this.trie.isWord(word)) {
              found.set(word, path);
            }
          }
        }
      }
    }

    return found;
  }

  solve(signal?: AbortSignal): Set<string> {
    return new Set(this.solveWithPaths(signal).keys());
  }

  findPath(word: string): Path | null {
    return findPath(this.graph, word);
  }

  /** An accepted guess with its path and points, or null when it is rejected. */
  findWord(word: string): FoundWord | null {
    const letters = word.trim().toUpperCase();
    if (!this.trie.isWord(letters)) {
      return null;
    }

    const path = this.findPath(letters);
    const points = scoreWord(letters);
    if (path === null || points === null) {
      return null;
    }
    return { word: letters, path, points };
  }

  /** Points for a guess, or null when it is not on the board or not a word. */
  attempt(word: string): number | null {
    return this.findWord(word)?.points ?? null;
  }

  score(words: Iterable<string>): number {
    return scoreWords(words);
  }
}
