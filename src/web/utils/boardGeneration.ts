import { BOARD_SIZE } from '../config';
import tileSets from '../data/tileSets.json';
import { BoardShapeError, createBoard } from './board';
import type { Board, Die } from './models';

export type TileSetName = 'classic' | 'new';

/** Returns a float in [0, 1), like Math.random. */
export type RandomSource = () => number;

export function getTileSet(name: string): readonly Die[] {
  if (name === 'classic' || name === 'new') {
    return tileSets[name];
  }
  throw new BoardShapeError(`unknown tile set "${name}"`);
}

function pick<T>(items: readonly T[], random: RandomSource): T {
  return items[Math.floor(random() * items.length)];
}

// Fisher-Yates over a copy; the tile set itself is shared
function shuffle<T>(items: readonly T[], random: RandomSource): T[] {
  const shuffled = [...items];
  for (let i = shuffled.length - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1));
    [shuffled[i], shuffled[j]] = [shuffled[j], shuffled[i]];
  }
  return shuffled;
}

export function generateBoard(tileSet: TileSetName = 'classic', random: RandomSource = Math.random): Board {
  const dice = shuffle(getTileSet(tileSet), random);

  const faces: string[][] = [];
  for (let row = 0; row < BOARD_SIZE; row++) {
    const faceRow: string[] = [];
    for (let col = 0; col < BOARD_SIZE; col++) {
      // Each die settles on one face here and keeps it for the life of the board
      faceRow.push(pick(dice[row * BOARD_SIZE + col], random));
    }
    faces.push(faceRow);
  }

  return createBoard(faces);
}
