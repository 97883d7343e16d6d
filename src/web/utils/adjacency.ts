import { BOARD_SIZE } from '../config';
import type { Board, Cell } from './models';

const directions = [
  [-1, -1], [-1, 0], [-1, 1],
  [0, -1], [0, 1],
  [1, -1], [1, 0], [1, 1]
];

/**
 * Undirected graph joining each cell to its (up to) 8 grid neighbours.
 * Built once per board and read-only afterwards.
 */
export class AdjacencyGraph {
  readonly cells: readonly Cell[];
  private readonly neighbourLists: Cell[][];

  constructor(board: Board) {
    this.cells = board.cells;
    this.neighbourLists = board.cells.map(cell => {
      const neighbours: Cell[] = [];
      for (const [deltaRow, deltaCol] of directions) {
        const nextRow = cell.row + deltaRow;
        const nextCol = cell.col + deltaCol;
        if (nextRow >= 0 && nextRow < BOARD_SIZE && nextCol >= 0 && nextCol < BOARD_SIZE) {
          neighbours.push(board.rows[nextRow][nextCol]);
        }
      }
      return neighbours;
    });
  }

  get size(): number {
    return this.cells.length;
  }

  neighbours(cell: Cell): readonly Cell[] {
    return this.neighbourLists[cell.index];
  }

  areAdjacent(a: Cell, b: Cell): boolean {
    return this.neighbourLists[a.index].some(neighbour => neighbour.index === b.index);
  }

  isSimplePath(path: readonly Cell[]): boolean {
    if (path.length === 0) return false;

    const seen = new Set<number>();
    for (let i = 0; i < path.length; i++) {
      const cell = path[i];
      if (seen.has(cell.index)) return false;
      seen.add(cell.index);
      if (i > 0 && !this.areAdjacent(path[i - 1], cell)) return false;
    }
    return true;
  }
}
