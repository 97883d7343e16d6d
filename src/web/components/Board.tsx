import type { Board as BoardType, Cell, Position } from '../utils/models';
import Tile from './Tile';

interface BoardProps {
  board: BoardType | null;
  highlightedPath: Position[];
}

function Board({ board, highlightedPath }: BoardProps) {

  // Show empty tiles while the board is loading or invalid
  const rowsToRender: (Cell | null)[][] = board === null
    ? Array.from({ length: 4 }, () => Array.from({ length: 4 }, () => null))
    : board.rows;

  const lastPos = highlightedPath.length > 0 ? highlightedPath[highlightedPath.length - 1] : null;

  return (
    <div
      className="board"
      style={{
        display: 'grid',
        gridTemplateColumns: 'repeat(4, 1fr)',
        gap: '4px',
        padding: '20px',
        backgroundColor: '#f5f5f5',
        borderRadius: '12px',
        maxWidth: '300px',
        margin: '0 auto'
      }}
    >
      {rowsToRender.map((row, rowIndex) =>
        row.map((cell, colIndex) => {
          const isHighlighted = highlightedPath.some(pos => pos.row === rowIndex && pos.col === colIndex);
          const isLastLetter = lastPos !== null && lastPos.row === rowIndex && lastPos.col === colIndex;

          return (
            <Tile
              key={`${rowIndex}-${colIndex}`}
              cell={cell}
              isHighlighted={isHighlighted}
              isLastLetter={isLastLetter}
            />
          );
        })
      )}
    </div>
  );
}

export default Board;
