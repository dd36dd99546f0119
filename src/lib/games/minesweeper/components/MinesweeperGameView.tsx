'use client';

import type { CSSProperties, MouseEvent, ReactNode } from 'react';
import type { Cell, MinesweeperBoard } from '../types';
import { CELL_SIZE, NUMBER_COLORS } from '../constants';

interface MinesweeperGameViewProps {
  board: MinesweeperBoard;
  minesRemaining: number;
  onCellClick: (x: number, y: number) => void;
  onRightClick: (x: number, y: number, e: MouseEvent) => void;
  onPlayAgain: () => void;
}

export default function MinesweeperGameView({
  board,
  minesRemaining,
  onCellClick,
  onRightClick,
  onPlayAgain,
}: MinesweeperGameViewProps) {
  const isGameOver = board.phase === 'win' || board.phase === 'lose';

  // Exact pixel width for the grid to prevent overflow
  const gridWidth = board.width * CELL_SIZE + (board.width - 1);

  return (
    <div style={{ display: 'flex', flexDirection: 'column', alignItems: 'center', gap: 12 }}>
      {/* Header — mine counter */}
      <div style={{ fontWeight: 'bold', color: '#f5e6ca' }}>
        💣 {minesRemaining}
      </div>

      <div style={{ position: 'relative' }}>
        <div
          style={{
            display: 'grid',
            gridTemplateColumns: `repeat(${board.width}, ${CELL_SIZE}px)`,
            gap: '1px',
            width: `${gridWidth}px`,
            background: 'rgba(8,12,26,.6)',
            borderRadius: '8px',
            overflow: 'hidden',
            userSelect: 'none',
          }}
          onContextMenu={(e) => e.preventDefault()}
        >
          {board.cells.map((cell) => (
            <MinesweeperCell
              key={cell.index}
              cell={cell}
              isGameOver={isGameOver}
              onCellClick={onCellClick}
              onRightClick={onRightClick}
            />
          ))}
        </div>

        {/* Game Over Overlay */}
        {isGameOver && (
          <div
            style={{
              position: 'absolute',
              inset: 0,
              display: 'flex',
              flexDirection: 'column',
              alignItems: 'center',
              justifyContent: 'center',
              background: 'rgba(8,12,26,.8)',
              borderRadius: '8px',
            }}
          >
            <h2 style={{ color: '#f5e6ca', fontSize: 28, margin: 0 }}>
              {board.phase === 'win' ? 'Cleared! ✨' : 'Boom! 💥'}
            </h2>
            <p style={{ color: '#9aa3b5', fontSize: 14 }}>
              {board.width}&times;{board.height} &middot; {board.mineCount} 💣
            </p>
            <button
              onClick={onPlayAgain}
              style={{
                background: '#10b981',
                color: 'white',
                fontWeight: 600,
                border: 'none',
                borderRadius: 9999,
                padding: '8px 24px',
                minHeight: 44,
                cursor: 'pointer',
              }}
            >
              Play Again
            </button>
          </div>
        )}
      </div>
    </div>
  );
}

// --- Cell Component ---

interface MinesweeperCellProps {
  cell: Cell;
  isGameOver: boolean;
  onCellClick: (x: number, y: number) => void;
  onRightClick: (x: number, y: number, e: MouseEvent) => void;
}

const RAISED_BORDERS: CSSProperties = {
  borderTop: '1px solid rgba(255,255,255,.1)',
  borderLeft: '1px solid rgba(255,255,255,.1)',
  borderBottom: '1px solid rgba(0,0,0,.2)',
  borderRight: '1px solid rgba(0,0,0,.2)',
};

function MinesweeperCell({ cell, isGameOver, onCellClick, onRightClick }: MinesweeperCellProps) {
  let bg = 'rgba(8,12,26,.5)';
  let borders: CSSProperties = {};
  let content: ReactNode = null;
  let color: string | undefined;

  switch (cell.state) {
    case 'revealed':
      if (cell.adjacentMines > 0) {
        content = cell.adjacentMines;
        color = NUMBER_COLORS[cell.adjacentMines] || '#f5e6ca';
      }
      break;
    case 'exploded':
      bg = 'rgba(201,101,138,.3)';
      content = '💣';
      break;
    case 'mine':
      content = '💣';
      break;
    case 'mismarked':
      content = (
        <span style={{ position: 'relative', display: 'inline-flex', alignItems: 'center', justifyContent: 'center' }}>
          🚩
          <span style={{ position: 'absolute', inset: 0, display: 'flex', alignItems: 'center', justifyContent: 'center' }}>
            ❌
          </span>
        </span>
      );
      break;
    case 'flagged':
      bg = 'rgba(26,82,118,.4)';
      borders = RAISED_BORDERS;
      content = '🚩';
      break;
    case 'questioned':
      bg = 'rgba(26,82,118,.4)';
      borders = RAISED_BORDERS;
      content = '?';
      color = '#f5e6ca';
      break;
    case 'hidden':
      bg = 'rgba(26,82,118,.4)';
      borders = RAISED_BORDERS;
      break;
  }

  const clickable = !isGameOver && (cell.state === 'hidden' || cell.state === 'questioned');

  return (
    <div
      onClick={!isGameOver ? () => onCellClick(cell.x, cell.y) : undefined}
      onContextMenu={!isGameOver ? (e) => onRightClick(cell.x, cell.y, e) : undefined}
      style={{
        width: CELL_SIZE,
        height: CELL_SIZE,
        background: bg,
        color,
        fontSize: `${Math.floor(CELL_SIZE * 0.5)}px`,
        ...borders,
        cursor: clickable ? 'pointer' : 'default',
        display: 'flex',
        alignItems: 'center',
        justifyContent: 'center',
        fontWeight: 'bold',
        lineHeight: 1,
      }}
    >
      {content}
    </div>
  );
}
