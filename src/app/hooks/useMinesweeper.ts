'use client';

import { useCallback, useRef, useState } from 'react';
import type { MouseEvent } from 'react';
import {
  flagCount,
  isGameOver,
  newRandomBoard,
  sweep,
  toggleMark,
} from '@/lib/games/minesweeper';
import type { MinesweeperBoard } from '@/lib/games/minesweeper';

interface BoardSize {
  width: number;
  height: number;
  mineCount: number;
}

export function useMinesweeper({ width, height, mineCount }: BoardSize) {
  // The engine mutates the board in place; `version` forces a re-render.
  const boardRef = useRef<MinesweeperBoard | null>(null);
  if (boardRef.current === null) {
    boardRef.current = newRandomBoard(width, height, mineCount);
  }
  const board = boardRef.current;
  const [version, setVersion] = useState(0);

  const handleCellClick = useCallback((x: number, y: number) => {
    const current = boardRef.current;
    if (!current || isGameOver(current)) return;
    sweep(current, x, y);
    setVersion((v) => v + 1);
  }, []);

  const handleRightClick = useCallback((x: number, y: number, e: MouseEvent) => {
    e.preventDefault();
    const current = boardRef.current;
    if (!current || isGameOver(current)) return;
    toggleMark(current, x, y);
    setVersion((v) => v + 1);
  }, []);

  const resetGame = useCallback(() => {
    boardRef.current = newRandomBoard(width, height, mineCount);
    setVersion((v) => v + 1);
  }, [width, height, mineCount]);

  return {
    board,
    version,
    minesRemaining: board.mineCount - flagCount(board),
    handleCellClick,
    handleRightClick,
    resetGame,
  };
}
