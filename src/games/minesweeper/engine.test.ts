import { describe, expect, test, vi } from 'vitest';
import type { Logger } from '../../lib/logger';
import { MinesweeperEngine } from './engine';
import { BoardConfigError } from './errors';
import { countMines, getNeighbors } from './logic';
import { createSeededRandom } from './random';
import type { Point } from './types';

const layoutEngine = (rows: number, cols: number, mines: Point[], firstClickSafe = false) => {
  const engine = new MinesweeperEngine({ rows: 1, cols: 2, mineCount: 0 }, { firstClickSafe });
  engine.loadLayout(rows, cols, mines);
  return engine;
};

const revealedPoints = (engine: MinesweeperEngine) =>
  engine
    .getBoard()
    .flat()
    .filter((cell) => cell.isRevealed)
    .map((cell) => `${cell.row},${cell.col}`)
    .sort();

describe('newGame', () => {
  test('places the configured number of mines', () => {
    const engine = new MinesweeperEngine({ rows: 5, cols: 5, mineCount: 3 }, { random: createSeededRandom(7) });
    for (const [rows, cols, mineCount] of [
      [10, 10, 10],
      [15, 15, 23],
      [20, 20, 40],
      [2, 3, 5]
    ]) {
      engine.newGame(rows, cols, mineCount);
      expect(countMines(engine.getBoard())).toBe(mineCount);
      expect(engine.getStatus()).toBe('in-progress');
    }
  });

  test('gives every safe cell the count of its neighbouring mines', () => {
    const engine = new MinesweeperEngine({ rows: 12, cols: 9, mineCount: 25 }, { random: createSeededRandom(21) });
    const board = engine.getBoard();
    for (const cell of board.flat().filter((c) => !c.isMine)) {
      const expected = getNeighbors(12, 9, cell).filter((n) => board[n.row][n.col].isMine).length;
      expect(cell.adjacent).toBe(expected);
    }
  });

  test('resets a finished game', () => {
    const engine = layoutEngine(2, 2, [{ row: 0, col: 0 }]);
    engine.reveal(0, 0);
    expect(engine.getStatus()).toBe('lost');
    engine.newGame(3, 3, 1);
    const snapshot = engine.snapshot();
    expect(snapshot.status).toBe('in-progress');
    expect(snapshot.revealedCount).toBe(0);
    expect(snapshot.flagsPlaced).toBe(0);
    expect(snapshot.moves).toBe(0);
  });

  test('rejects impossible boards and keeps the current game', () => {
    const engine = layoutEngine(2, 2, [{ row: 0, col: 0 }]);
    const before = engine.snapshot();
    expect(() => engine.newGame(0, 5, 1)).toThrow(BoardConfigError);
    expect(() => engine.newGame(3, 3, 9)).toThrow(BoardConfigError);
    expect(() => engine.newGame(3, 3, -1)).toThrow(BoardConfigError);
    expect(() => engine.newGame(2.5, 3, 1)).toThrow(BoardConfigError);
    expect(engine.snapshot()).toEqual(before);
  });

  test('counts games', () => {
    const engine = new MinesweeperEngine({ rows: 3, cols: 3, mineCount: 1 });
    expect(engine.snapshot().gameId).toBe(1);
    engine.newGame(3, 3, 1);
    engine.newGame(3, 3, 1);
    expect(engine.snapshot().gameId).toBe(3);
  });
});

describe('loadLayout', () => {
  test('collapses duplicate mines', () => {
    const engine = layoutEngine(3, 3, [
      { row: 1, col: 1 },
      { row: 1, col: 1 }
    ]);
    expect(engine.getConfig()).toEqual({ rows: 3, cols: 3, mineCount: 1 });
  });

  test('rejects mines outside the board', () => {
    const engine = new MinesweeperEngine({ rows: 2, cols: 2, mineCount: 1 });
    expect(() => engine.loadLayout(2, 2, [{ row: 2, col: 0 }])).toThrow(BoardConfigError);
    expect(() =>
      engine.loadLayout(1, 2, [
        { row: 0, col: 0 },
        { row: 0, col: 1 }
      ])
    ).toThrow('2 mines leave no safe cell on a 1 x 2 board');
  });
});

describe('reveal', () => {
  test('a numbered cell reveals only itself', () => {
    const engine = layoutEngine(3, 3, [{ row: 0, col: 0 }]);
    const result = engine.reveal(1, 1);
    expect(result).toEqual({ ok: true, status: 'in-progress', changed: [{ row: 1, col: 1 }] });
    expect(engine.getCell(1, 1)?.adjacent).toBe(1);
    expect(revealedPoints(engine)).toEqual(['1,1']);
  });

  test('a zero cell in the far corner floods the whole safe field', () => {
    const engine = layoutEngine(3, 3, [{ row: 0, col: 0 }]);
    const result = engine.reveal(2, 2);
    expect(engine.getCell(2, 2)?.adjacent).toBe(0);
    expect(result.ok && result.changed).toHaveLength(8);
    expect(engine.getStatus()).toBe('won');
    expect(engine.getCell(0, 0)?.isRevealed).toBe(false);
  });

  test('hitting a mine loses and uncovers every mine', () => {
    const engine = layoutEngine(3, 3, [
      { row: 0, col: 0 },
      { row: 2, col: 2 }
    ]);
    const result = engine.reveal(0, 0);
    expect(result).toEqual({
      ok: true,
      status: 'lost',
      changed: [
        { row: 0, col: 0 },
        { row: 2, col: 2 }
      ]
    });
    expect(engine.getStatus()).toBe('lost');
    expect(engine.getCell(0, 0)?.isRevealed).toBe(true);
    expect(revealedPoints(engine)).toEqual(['0,0', '2,2']);
  });

  test('revealing every safe cell wins', () => {
    const engine = layoutEngine(2, 3, [{ row: 0, col: 1 }]);
    for (const [row, col] of [
      [0, 0],
      [0, 2],
      [1, 0],
      [1, 1]
    ]) {
      expect(engine.reveal(row, col)).toMatchObject({ ok: true, status: 'in-progress' });
    }
    expect(engine.reveal(1, 2)).toMatchObject({ ok: true, status: 'won' });
  });

  test('flood fill stops at the numbered border of its region', () => {
    const wall = [0, 1, 2, 3, 4].map((row) => ({ row, col: 2 }));
    const engine = layoutEngine(5, 5, wall);
    engine.reveal(0, 0);
    expect(revealedPoints(engine)).toEqual(
      ['0,0', '0,1', '1,0', '1,1', '2,0', '2,1', '3,0', '3,1', '4,0', '4,1'].sort()
    );
    expect(engine.getCell(0, 1)?.adjacent).toBe(2);
    expect(engine.getCell(2, 1)?.adjacent).toBe(3);
    expect(engine.getStatus()).toBe('in-progress');
  });

  test('rejects coordinates outside the board', () => {
    const engine = layoutEngine(3, 3, [{ row: 0, col: 0 }]);
    const before = engine.getBoard();
    expect(engine.reveal(-1, 0)).toEqual({ ok: false, reason: 'out-of-bounds' });
    expect(engine.reveal(0, 3)).toEqual({ ok: false, reason: 'out-of-bounds' });
    expect(engine.reveal(0.5, 1)).toEqual({ ok: false, reason: 'out-of-bounds' });
    expect(engine.getBoard()).toBe(before);
    expect(engine.snapshot().moves).toBe(0);
  });

  test('rejects revealed and flagged cells', () => {
    const engine = layoutEngine(3, 3, [{ row: 0, col: 0 }]);
    engine.reveal(1, 1);
    engine.toggleFlag(0, 0);
    expect(engine.reveal(1, 1)).toEqual({ ok: false, reason: 'already-revealed' });
    expect(engine.reveal(0, 0)).toEqual({ ok: false, reason: 'flagged' });
    expect(engine.getStatus()).toBe('in-progress');
  });

  test('rejects every move once the game is over', () => {
    const engine = layoutEngine(3, 3, [{ row: 0, col: 0 }]);
    engine.reveal(0, 0);
    const before = engine.snapshot();
    expect(engine.reveal(2, 2)).toEqual({ ok: false, reason: 'game-over' });
    expect(engine.toggleFlag(2, 2)).toEqual({ ok: false, reason: 'game-over' });
    expect(engine.chord(1, 1)).toEqual({ ok: false, reason: 'game-over' });
    expect(engine.solve()).toEqual({ ok: false, reason: 'game-over' });
    expect(engine.snapshot()).toEqual(before);
  });
});

describe('first-click safety', () => {
  test('moves the mine away from the first reveal', () => {
    const engine = layoutEngine(
      1,
      3,
      [
        { row: 0, col: 0 },
        { row: 0, col: 2 }
      ],
      true
    );
    const result = engine.reveal(0, 0);
    expect(result).toEqual({ ok: true, status: 'won', changed: [{ row: 0, col: 0 }] });
    expect(engine.getCell(0, 0)?.isMine).toBe(false);
    expect(engine.getCell(0, 1)?.isMine).toBe(true);
    expect(engine.getCell(0, 0)?.adjacent).toBe(1);
    expect(countMines(engine.getBoard())).toBe(2);
  });

  test('applies to the first reveal only', () => {
    const engine = layoutEngine(
      1,
      4,
      [
        { row: 0, col: 0 },
        { row: 0, col: 3 }
      ],
      true
    );
    expect(engine.reveal(0, 1)).toMatchObject({ ok: true, status: 'in-progress' });
    expect(engine.reveal(0, 3)).toMatchObject({ ok: true, status: 'lost' });
  });

  test('is off unless requested', () => {
    const engine = layoutEngine(1, 3, [{ row: 0, col: 0 }]);
    expect(engine.reveal(0, 0)).toMatchObject({ ok: true, status: 'lost' });
  });
});

describe('toggleFlag', () => {
  test('flagging twice restores the cell and nothing else changes', () => {
    const engine = layoutEngine(3, 3, [{ row: 0, col: 0 }]);
    const board = engine.getBoard();
    expect(engine.toggleFlag(2, 2)).toEqual({ ok: true, status: 'in-progress', changed: [{ row: 2, col: 2 }] });
    expect(engine.getCell(2, 2)?.isFlagged).toBe(true);
    expect(engine.snapshot().minesRemaining).toBe(0);
    engine.toggleFlag(2, 2);
    expect(engine.getBoard()).toEqual(board);
    expect(engine.getStatus()).toBe('in-progress');
    expect(engine.snapshot().minesRemaining).toBe(1);
  });

  test('refuses revealed cells', () => {
    const engine = layoutEngine(3, 3, [{ row: 0, col: 0 }]);
    engine.reveal(1, 1);
    expect(engine.toggleFlag(1, 1)).toEqual({ ok: false, reason: 'already-revealed' });
    expect(engine.toggleFlag(3, 3)).toEqual({ ok: false, reason: 'out-of-bounds' });
  });

  test('flags do not decide the outcome', () => {
    const engine = layoutEngine(1, 2, [{ row: 0, col: 1 }]);
    engine.toggleFlag(0, 1);
    expect(engine.getStatus()).toBe('in-progress');
    expect(engine.reveal(0, 0)).toMatchObject({ ok: true, status: 'won' });
  });
});

describe('chord', () => {
  test('opens the neighbours of a satisfied number', () => {
    const engine = layoutEngine(3, 3, [{ row: 0, col: 0 }]);
    engine.reveal(1, 1);
    expect(engine.chord(1, 1)).toEqual({ ok: false, reason: 'not-chordable' });
    engine.toggleFlag(0, 0);
    const result = engine.chord(1, 1);
    expect(result.ok && result.changed).toHaveLength(7);
    expect(engine.getStatus()).toBe('won');
  });

  test('loses when a flag was misplaced', () => {
    const engine = layoutEngine(3, 3, [{ row: 0, col: 0 }]);
    engine.reveal(1, 1);
    engine.toggleFlag(0, 1);
    expect(engine.chord(1, 1)).toMatchObject({ ok: true, status: 'lost' });
    expect(engine.getCell(0, 0)?.isRevealed).toBe(true);
  });

  test('refuses unrevealed cells', () => {
    const engine = layoutEngine(3, 3, [{ row: 0, col: 0 }]);
    expect(engine.chord(1, 1)).toEqual({ ok: false, reason: 'not-chordable' });
  });
});

describe('solve', () => {
  test('uncovers the board and forfeits the game', () => {
    const engine = layoutEngine(3, 3, [{ row: 0, col: 0 }]);
    engine.reveal(1, 1);
    const result = engine.solve();
    expect(result.ok && result.changed).toHaveLength(8);
    expect(engine.snapshot()).toMatchObject({ status: 'lost', revealedCount: 9, moves: 2 });
  });
});

describe('solve flags', () => {
  test('takes every flag off the board', () => {
    const engine = layoutEngine(3, 3, [{ row: 0, col: 0 }]);
    engine.toggleFlag(1, 1);
    engine.toggleFlag(0, 0);
    engine.solve();
    expect(engine.snapshot()).toMatchObject({ flagsPlaced: 0, minesRemaining: 1, status: 'lost', solved: true });
    expect(engine.getBoard().flat().some((cell) => cell.isFlagged)).toBe(false);
  });

  test('is only set when the game ended through solve', () => {
    const engine = layoutEngine(3, 3, [{ row: 0, col: 0 }]);
    engine.reveal(0, 0);
    expect(engine.snapshot()).toMatchObject({ status: 'lost', solved: false });
    engine.newGame(3, 3, 1);
    engine.solve();
    expect(engine.snapshot().solved).toBe(true);
    engine.newGame(3, 3, 1);
    expect(engine.snapshot().solved).toBe(false);
  });
});

describe('board access', () => {
  test('cells handed out cannot change the minefield', () => {
    const engine = layoutEngine(3, 3, [{ row: 0, col: 0 }]);
    const cell = engine.getCell(2, 2);
    expect(cell && Reflect.set(cell, 'isMine', true)).toBe(false);
    expect(Reflect.set(engine.getBoard()[1][1], 'isRevealed', true)).toBe(false);
    expect(Reflect.set(engine.snapshot().board[0], 0, { ...engine.getBoard()[2][2] })).toBe(false);
    expect(countMines(engine.getBoard())).toBe(1);
    expect(engine.getConfig().mineCount).toBe(1);
    expect(engine.getCell(0, 0)?.isMine).toBe(true);
  });

  test('a snapshot keeps its board after later moves', () => {
    const engine = layoutEngine(3, 3, [{ row: 0, col: 0 }]);
    const before = engine.snapshot();
    engine.reveal(1, 1);
    engine.toggleFlag(0, 0);
    expect(before.board[1][1].isRevealed).toBe(false);
    expect(before.board[0][0].isFlagged).toBe(false);
    expect(engine.getBoard()[1][1].isRevealed).toBe(true);
  });
});

describe('logging', () => {
  const recordingLogger = () => {
    const logger: Logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    return logger;
  };

  test('the first game is announced like every later one', () => {
    const logger = recordingLogger();
    const engine = new MinesweeperEngine({ rows: 3, cols: 3, mineCount: 1 }, { logger });
    expect(logger.info).toHaveBeenCalledWith('game 1 started', { rows: 3, cols: 3, mineCount: 1 });
    engine.newGame(4, 4, 2);
    expect(logger.info).toHaveBeenLastCalledWith('game 2 started', { rows: 4, cols: 4, mineCount: 2 });
  });

  test('rejections are logged at debug', () => {
    const logger = recordingLogger();
    const engine = new MinesweeperEngine({ rows: 3, cols: 3, mineCount: 1 }, { logger });
    engine.reveal(5, 5);
    expect(logger.debug).toHaveBeenCalledWith('reveal rejected: out-of-bounds', { row: 5, col: 5 });
  });
});
