export interface Position {
  row: number;
  col: number;
}

/** A board position together with the face its tile landed on. */
export interface Cell extends Position {
  index: number;
  face: string;
}

export interface Board {
  cells: Cell[];
  rows: Cell[][];
}

/** The faces one physical die can land on. */
export type Die = readonly string[];

export type Path = Cell[];

export interface FoundWord {
  word: string;
  path: Path;
  points: number;
}
