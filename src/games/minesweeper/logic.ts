import type { Board, Cell, Point, ReadonlyBoard } from './types';
import { type RandomSource, randomIndex, shuffle } from './random';

type RevealResult = {
  board: Board;
  hitMine: boolean;
  revealed: Point[];
};

const directions = [
  [-1, -1],
  [-1, 0],
  [-1, 1],
  [0, -1],
  [0, 1],
  [1, -1],
  [1, 0],
  [1, 1]
];

const keyOf = (point: Point) => `${point.row},${point.col}`;

export const createEmptyBoard = (rows: number, cols: number): Board =>
  Array.from({ length: rows }, (_, row) =>
    Array.from({ length: cols }, (_, col) => ({
      row,
      col,
      isMine: false,
      isRevealed: false,
      isFlagged: false,
      adjacent: 0
    }))
  );

export const cloneBoard = (board: ReadonlyBoard): Board => board.map((row) => row.map((cell) => ({ ...cell })));

export const boardSize = (board: ReadonlyBoard) => ({ rows: board.length, cols: board[0]?.length ?? 0 });

export const cellAt = (board: ReadonlyBoard, point: Point): Readonly<Cell> | undefined => board[point.row]?.[point.col];

export const isInBounds = (board: ReadonlyBoard, point: Point): boolean => {
  const { rows, cols } = boardSize(board);
  return (
    Number.isInteger(point.row) &&
    Number.isInteger(point.col) &&
    point.row >= 0 &&
    point.col >= 0 &&
    point.row < rows &&
    point.col < cols
  );
};

export const getNeighbors = (rows: number, cols: number, point: Point): Point[] => {
  const neighbors: Point[] = [];
  for (const [dr, dc] of directions) {
    const nr = point.row + dr;
    const nc = point.col + dc;
    if (nr < 0 || nc < 0 || nr >= rows || nc >= cols) continue;
    neighbors.push({ row: nr, col: nc });
  }
  return neighbors;
};

export const computeAdjacents = (board: ReadonlyBoard): Board => {
  const { rows, cols } = boardSize(board);
  const next = cloneBoard(board);
  for (let r = 0; r < rows; r++) {
    for (let c = 0; c < cols; c++) {
      if (next[r][c].isMine) {
        next[r][c].adjacent = -1;
        continue;
      }
      next[r][c].adjacent = getNeighbors(rows, cols, { row: r, col: c }).reduce(
        (acc, n) => acc + (next[n.row][n.col].isMine ? 1 : 0),
        0
      );
    }
  }
  return next;
};

/**
 * Places `mines` mines on cells that are not excluded, chosen by shuffling every
 * candidate coordinate and taking the first `mines` of them.
 */
export const placeMines = (board: ReadonlyBoard, mines: number, random: RandomSource, exclude: Point[] = []): Board => {
  const { rows, cols } = boardSize(board);
  const excluded = new Set(exclude.map(keyOf));
  const candidates: Point[] = [];
  for (let r = 0; r < rows; r++) {
    for (let c = 0; c < cols; c++) {
      const point = { row: r, col: c };
      if (!excluded.has(keyOf(point)) && !board[r][c].isMine) candidates.push(point);
    }
  }

  const placed = shuffle(candidates, random).slice(0, Math.min(mines, candidates.length));
  const next = cloneBoard(board);
  for (const p of placed) {
    next[p.row][p.col].isMine = true;
  }
  return computeAdjacents(next);
};

export const setMines = (board: ReadonlyBoard, mines: Point[]): Board => {
  const next = cloneBoard(board);
  for (const p of mines) {
    next[p.row][p.col].isMine = true;
  }
  return computeAdjacents(next);
};

/** Moves the mine at `from` onto a random safe cell other than `from`. */
export const relocateMine = (board: ReadonlyBoard, from: Point, random: RandomSource): ReadonlyBoard => {
  const source = cellAt(board, from);
  if (!source?.isMine) return board;
  const targets = board.flat().filter((cell) => !cell.isMine && !(cell.row === from.row && cell.col === from.col));
  if (targets.length === 0) return board;
  const target = targets[randomIndex(random, targets.length)];
  const next = cloneBoard(board);
  next[from.row][from.col].isMine = false;
  next[target.row][target.col].isMine = true;
  return computeAdjacents(next);
};

export const revealCell = (board: ReadonlyBoard, point: Point): RevealResult => {
  const { rows, cols } = boardSize(board);
  const next = cloneBoard(board);
  const target = next[point.row]?.[point.col];
  if (!target || target.isRevealed || target.isFlagged) return { board: next, hitMine: false, revealed: [] };

  if (target.isMine) {
    target.isRevealed = true;
    return { board: next, hitMine: true, revealed: [{ row: point.row, col: point.col }] };
  }

  const revealed: Point[] = [];
  const stack: Point[] = [{ row: point.row, col: point.col }];
  while (stack.length > 0) {
    const current = stack.pop();
    if (!current) continue;
    const cell = next[current.row][current.col];
    if (cell.isRevealed || cell.isFlagged) continue;
    cell.isRevealed = true;
    revealed.push(current);
    if (cell.adjacent === 0) {
      for (const n of getNeighbors(rows, cols, current)) {
        const neighbor = next[n.row][n.col];
        if (!neighbor.isRevealed && !neighbor.isFlagged && !neighbor.isMine) {
          stack.push(n);
        }
      }
    }
  }

  return { board: next, hitMine: false, revealed };
};

export const toggleFlag = (board: ReadonlyBoard, point: Point): Board => {
  const next = cloneBoard(board);
  const cell = next[point.row]?.[point.col];
  if (!cell || cell.isRevealed) return next;
  cell.isFlagged = !cell.isFlagged;
  return next;
};

export const canChord = (board: ReadonlyBoard, point: Point): boolean => {
  const { rows, cols } = boardSize(board);
  const cell = cellAt(board, point);
  if (!cell || !cell.isRevealed || cell.adjacent <= 0) return false;
  const flaggedCount = getNeighbors(rows, cols, point).reduce(
    (acc, n) => (board[n.row][n.col].isFlagged ? acc + 1 : acc),
    0
  );
  return flaggedCount === cell.adjacent;
};

export const chordReveal = (board: ReadonlyBoard, point: Point): RevealResult => {
  const { rows, cols } = boardSize(board);
  if (!canChord(board, point)) return { board: cloneBoard(board), hitMine: false, revealed: [] };

  let currentBoard = cloneBoard(board);
  let hitMine = false;
  const revealed: Point[] = [];
  for (const n of getNeighbors(rows, cols, point)) {
    const neighbor = currentBoard[n.row][n.col];
    if (neighbor.isRevealed || neighbor.isFlagged) continue;
    if (neighbor.isMine) {
      neighbor.isRevealed = true;
      revealed.push(n);
      hitMine = true;
      continue;
    }
    const result = revealCell(currentBoard, n);
    currentBoard = result.board;
    revealed.push(...result.revealed);
  }

  return { board: currentBoard, hitMine, revealed };
};

const revealMatching = (board: ReadonlyBoard, predicate: (cell: Readonly<Cell>) => boolean) => {
  const revealed: Point[] = [];
  const next = board.map((row) =>
    row.map((cell) => {
      if (cell.isRevealed || !predicate(cell)) return { ...cell };
      revealed.push({ row: cell.row, col: cell.col });
      return { ...cell, isRevealed: true };
    })
  );
  return { board: next, revealed };
};

export const revealAllMines = (board: ReadonlyBoard) => revealMatching(board, (cell) => cell.isMine);

/** Uncovers every cell and takes the flags off, as there is nothing left to mark. */
export const revealAll = (board: ReadonlyBoard) => {
  const revealed: Point[] = [];
  const next = board.map((row) =>
    row.map((cell) => {
      if (!cell.isRevealed) revealed.push({ row: cell.row, col: cell.col });
      return { ...cell, isRevealed: true, isFlagged: false };
    })
  );
  return { board: next, revealed };
};

export const freezeBoard = (board: ReadonlyBoard): ReadonlyBoard => {
  for (const row of board) {
    for (const cell of row) Object.freeze(cell);
    Object.freeze(row);
  }
  return Object.freeze(board);
};

export const countFlags = (board: ReadonlyBoard): number =>
  board.reduce((acc, row) => acc + row.filter((cell) => cell.isFlagged).length, 0);

export const countMines = (board: ReadonlyBoard): number =>
  board.reduce((acc, row) => acc + row.filter((cell) => cell.isMine).length, 0);

export const countRevealed = (board: ReadonlyBoard): number =>
  board.reduce((acc, row) => acc + row.filter((cell) => cell.isRevealed).length, 0);

export const hasWon = (board: ReadonlyBoard): boolean =>
  board.every((row) => row.every((cell) => cell.isMine || cell.isRevealed));
