import { create } from 'zustand';
import { createLogger } from '../../lib/logger';
import { boardConfigFor, type MinesweeperSettings } from './config';
import { MinesweeperEngine } from './engine';
import type { RandomSource } from './random';
import type { BoardSizeKey, EngineSnapshot, MoveResult, RejectReason } from './types';

export type MinesweeperState = {
  size: BoardSizeKey;
  snapshot: EngineSnapshot;
  lastRejection?: RejectReason;
  newGame: () => void;
  resize: (size: BoardSizeKey) => void;
  reveal: (row: number, col: number) => void;
  toggleFlag: (row: number, col: number) => void;
  chord: (row: number, col: number) => void;
  solve: () => void;
};

export function createMinesweeperStore(settings: MinesweeperSettings, random?: RandomSource) {
  const engine = new MinesweeperEngine(boardConfigFor(settings.size, settings.mineRatio), {
    random,
    firstClickSafe: settings.firstClickSafe,
    logger: createLogger('Minesweeper', settings.logLevel)
  });

  return create<MinesweeperState>((set, get) => {
    const start = (size: BoardSizeKey) => {
      const { rows, cols, mineCount } = boardConfigFor(size, settings.mineRatio);
      engine.newGame(rows, cols, mineCount);
      set({ size, snapshot: engine.snapshot(), lastRejection: undefined });
    };

    const apply = (result: MoveResult) => {
      if (!result.ok) {
        set({ lastRejection: result.reason });
        return;
      }
      set({ snapshot: engine.snapshot(), lastRejection: undefined });
    };

    return {
      size: settings.size,
      snapshot: engine.snapshot(),
      lastRejection: undefined,
      newGame: () => start(get().size),
      resize: (size) => {
        if (size === get().size) return;
        start(size);
      },
      reveal: (row, col) => apply(engine.reveal(row, col)),
      toggleFlag: (row, col) => apply(engine.toggleFlag(row, col)),
      chord: (row, col) => apply(engine.chord(row, col)),
      solve: () => apply(engine.solve())
    };
  });
}

export type MinesweeperStore = ReturnType<typeof createMinesweeperStore>;
