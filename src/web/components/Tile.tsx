import type { Cell } from '../utils/models';

interface TileProps {
  cell: Cell | null;
  isHighlighted: boolean;
  isLastLetter: boolean;
}

function Tile({ cell, isHighlighted, isLastLetter }: TileProps) {
  // Multi-letter faces ("Qu") get a smaller font so they fit the tile
  const fontSize = cell && cell.face.length > 1 ? '17px' : '20px';

  return (
    <div
      className={`tile ${isHighlighted ? 'highlighted' : ''}`}
      data-position={cell ? `${cell.row}-${cell.col}` : undefined}
      style={{
        width: '60px',
        height: '60px',
        border: '2px solid #333',
        borderRadius: '8px',
        display: 'flex',
        alignItems: 'center',
        justifyContent: 'center',
        fontSize,
        fontWeight: 'bold',
        backgroundColor: isLastLetter ? '#ffeb3b' : (isHighlighted ? '#f7d452' : '#fff'),
        cursor: 'default',
      }}
    >
      {cell?.face}
    </div>
  );
}

export default Tile;
