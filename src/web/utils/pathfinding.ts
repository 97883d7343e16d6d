import type { AdjacencyGraph } from './adjacency';
import type { Cell, Path } from './models';
import type { Trie } from './trie';

export interface PathEnumeratorOptions {
  signal?: AbortSignal;
}

interface NeighbourCursor {
  neighbours: readonly Cell[];
  next: number;
}

/**
 * Depth-first enumeration of the simple paths from `source` to `target` whose
 * words are in the dictionary. A partial path is abandoned as soon as its
 * letters stop being a dictionary prefix, which is what keeps the search small.
 *
 * The search state is explicit: one neighbour cursor per cell on the current
 * path, the path itself, and the word spelled so far at each depth. Each call
 * to `next()` resumes from that state and runs until it finds the next path.
 */
export class PathEnumerator implements IterableIterator<Path> {
  private readonly stack: NeighbourCursor[] = [];
  private readonly visited: Cell[] = [];
  private readonly prefixes: string[] = [];
  private readonly onPath = new Set<number>();
  private readonly cutoff: number;
  private readonly signal?: AbortSignal;

  constructor(
    private readonly graph: AdjacencyGraph,
    private readonly trie: Trie,
    source: Cell,
    private readonly target: Cell,
    options: PathEnumeratorOptions = {}
  ) {
    this.cutoff = graph.size - 1;
    this.signal = options.signal;

    if (source.index !== target.index && trie.isValidPrefix(source.face)) {
      this.push(source, source.face);
    }
  }

  /** Cells on the partial path currently being explored. */
  get depth(): number {
    return this.visited.length;
  }

  get path(): Path {
    return [...this.visited];
  }

  [Symbol.iterator](): IterableIterator<Path> {
    return this;
  }

  next(): IteratorResult<Path> {
    if (this.signal?.aborted) {
      throw this.signal.reason;
    }

    while (this.stack.length > 0) {
      const cursor = this.stack[this.stack.length - 1];
      const prefix = this.prefixes[this.prefixes.length - 1];

      if (this.visited.length >= this.cutoff) {
        // Path is as long as it can get: only the target can still close it
        const remaining = cursor.neighbours.slice(cursor.next);
        const closed = remaining.some(cell => cell.index === this.target.index)
          && this.trie.isWord(prefix + this.target.face)
          ? [...this.visited, this.target]
          : null;
        this.pop();
        if (closed) {
          return { done: false, value: closed };
        }
        continue;
      }

      if (cursor.next >= cursor.neighbours.length) {
        this.pop();
        continue;
      }

      const child = cursor.neighbours[cursor.next++];
      if (this.onPath.has(child.index)) {
        continue;
      }

      const word = prefix + child.face;
      if (child.index === this.target.index) {
        // Paths end at the target; it is never descended through
        if (this.trie.isWord(word)) {
          return { done: false, value: [...this.visited, child] };
        }
        continue;
      }

      if (this.trie.isValidPrefix(word)) {
        this.push(child, word);
      }
    }

    return { done: true, value: undefined };
  }

  private push(cell: Cell, word: string): void {
    this.visited.push(cell);
    this.prefixes.push(word.toUpperCase());
    this.onPath.add(cell.index);
    this.stack.push({ neighbours: this.graph.neighbours(cell), next: 0 });
  }

  private pop(): void {
    this.stack.pop();
    this.prefixes.pop();
    const cell = this.visited.pop();
    if (cell) {
      this.onPath.delete(cell.index);
    }
  }
}

/**
 * Every way of assigning distinct cells to the word's letters, one face at a
 * time, without regard to adjacency.
 */
export function* cellAssignments(
  cells: readonly Cell[],
  word: string,
  offset: number = 0,
  used: Cell[] = []
): Generator<Cell[]> {
  if (offset === word.length) {
    yield [...used];
    return;
  }

  for (const cell of cells) {
    const face = cell.face.toUpperCase();
    if (used.includes(cell) || !word.startsWith(face, offset)) continue;

    used.push(cell);
    yield* cellAssignments(cells, word, offset + face.length, used);
    used.pop();
  }
}

export function findPath(graph: AdjacencyGraph, word: string): Path | null {
  const letters = word.toUpperCase();
  if (letters.length === 0) return null;

  for (const assignment of cellAssignments(graph.cells, letters)) {
    if (graph.isSimplePath(assignment)) {
      return assignment;
    }
  }
  return null;
}
