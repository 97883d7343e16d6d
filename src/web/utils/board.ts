import { BOARD_SIZE } from '../config';
import type { Board, Cell } from './models';

export class BoardShapeError extends Error {
  constructor(detail: string) {
    super(`Invalid board: ${detail}`);
    this.name = 'BoardShapeError';
  }
}

export function createBoard(faces: readonly (readonly string[])[]): Board {
  if (faces.length !== BOARD_SIZE) {
    throw new BoardShapeError(`expected ${BOARD_SIZE} rows, got ${faces.length}`);
  }

  const rows: Cell[][] = faces.map((faceRow, row) => {
    if (faceRow.length !== BOARD_SIZE) {
      throw new BoardShapeError(`row ${row} has ${faceRow.length} tiles, expected ${BOARD_SIZE}`);
    }
    return faceRow.map((face, col) => {
      if (!/^[a-z]+$/i.test(face)) {
        throw new BoardShapeError(`tile ${row}-${col} has no letter face`);
      }
      return { row, col, index: row * BOARD_SIZE + col, face };
    });
  });

  return { rows, cells: rows.flat() };
}

// Board codes spell one letter per tile; the Q die always shows "Qu"
export function encodeBoard(board: Board): string {
  return board.cells
    .map(cell => cell.face.toUpperCase() === 'QU' ? 'Q' : cell.face.toUpperCase())
    .join('');
}

export function decodeBoard(code: string): Board {
  const letters = code.trim().toUpperCase();
  if (!/^[A-Z]+$/.test(letters) || letters.length !== BOARD_SIZE * BOARD_SIZE) {
    throw new BoardShapeError(`board code "${code}" must be ${BOARD_SIZE * BOARD_SIZE} letters`);
  }

  const faces: string[][] = [];
  for (let row = 0; row < BOARD_SIZE; row++) {
    faces.push(
      letters
        .slice(row * BOARD_SIZE, (row + 1) * BOARD_SIZE)
        .split('')
        .map(letter => letter === 'Q' ? 'Qu' : letter)
    );
  }
  return createBoard(faces);
}

export function formatBoard(board: Board): string {
  return board.rows
    .map(row => row.map(cell => cell.face.padEnd(2)).join(' '))
    .join('\n');
}
