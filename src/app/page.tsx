'use client';

import MinesweeperGameView from '@/lib/games/minesweeper/components/MinesweeperGameView';
import { DEFAULT_HEIGHT, DEFAULT_MINE_COUNT, DEFAULT_WIDTH } from '@/lib/games/minesweeper';
import { useMinesweeper } from './hooks/useMinesweeper';

export default function Home() {
  const { board, minesRemaining, handleCellClick, handleRightClick, resetGame } = useMinesweeper({
    width: DEFAULT_WIDTH,
    height: DEFAULT_HEIGHT,
    mineCount: DEFAULT_MINE_COUNT,
  });

  return (
    <main
      style={{
        minHeight: '100vh',
        display: 'flex',
        flexDirection: 'column',
        alignItems: 'center',
        justifyContent: 'center',
        gap: 16,
      }}
    >
      <h1 style={{ color: '#f5e6ca', margin: 0 }}>Minefield</h1>
      <MinesweeperGameView
        board={board}
        minesRemaining={minesRemaining}
        onCellClick={handleCellClick}
        onRightClick={handleRightClick}
        onPlayAgain={resetGame}
      />
    </main>
  );
}
