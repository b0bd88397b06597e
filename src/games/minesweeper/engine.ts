import { type Logger, silentLogger } from '../../lib/logger';
import { BoardConfigError } from './errors';
import {
  cellAt,
  chordReveal,
  canChord,
  countFlags,
  countRevealed,
  createEmptyBoard,
  freezeBoard,
  hasWon,
  isInBounds,
  placeMines,
  relocateMine,
  revealAll,
  revealAllMines,
  revealCell,
  setMines,
  toggleFlag
} from './logic';
import { defaultRandom, type RandomSource } from './random';
import type {
  BoardConfig,
  Cell,
  EngineSnapshot,
  GameStatus,
  MoveResult,
  Point,
  ReadonlyBoard,
  RejectReason
} from './types';

export type EngineOptions = {
  random?: RandomSource;
  /** Move a mine away from the first revealed cell instead of losing on it. */
  firstClickSafe?: boolean;
  logger?: Logger;
};

export const validateBoardConfig = ({ rows, cols, mineCount }: BoardConfig) => {
  if (!Number.isInteger(rows) || rows <= 0 || !Number.isInteger(cols) || cols <= 0) {
    throw new BoardConfigError(`Board must be at least 1 x 1, got ${rows} x ${cols}`);
  }
  if (!Number.isInteger(mineCount) || mineCount < 0) {
    throw new BoardConfigError(`Mine count must be a non-negative integer, got ${mineCount}`);
  }
  if (mineCount >= rows * cols) {
    throw new BoardConfigError(`${mineCount} mines leave no safe cell on a ${rows} x ${cols} board`);
  }
};

/**
 * Owns one minefield and its game state. Moves never throw: a move that breaks a
 * precondition comes back as `{ ok: false, reason }` and leaves the game untouched.
 * The board it hands out is frozen; every move swaps in a new one.
 */
export class MinesweeperEngine {
  private readonly random: RandomSource;
  private readonly firstClickSafe: boolean;
  private readonly logger: Logger;

  private config: BoardConfig;
  private board: ReadonlyBoard;
  private status: GameStatus = 'in-progress';
  private gameId = 1;
  private moves = 0;
  private revealsMade = 0;
  private solved = false;

  constructor(config: BoardConfig, options: EngineOptions = {}) {
    this.random = options.random ?? defaultRandom;
    this.firstClickSafe = options.firstClickSafe ?? false;
    this.logger = options.logger ?? silentLogger;
    validateBoardConfig(config);
    this.config = { ...config };
    this.board = this.seed(config);
    this.logStart();
  }

  newGame(rows: number, cols: number, mineCount: number): void {
    const config = { rows, cols, mineCount };
    validateBoardConfig(config);
    this.start(config, this.seed(config));
  }

  /** Starts a game with mines at exactly the given cells. */
  loadLayout(rows: number, cols: number, mines: Point[]): void {
    validateBoardConfig({ rows, cols, mineCount: 0 });
    const empty = createEmptyBoard(rows, cols);
    const unique = new Map<string, Point>();
    for (const mine of mines) {
      if (!isInBounds(empty, mine)) {
        throw new BoardConfigError(`Mine at (${mine.row}, ${mine.col}) is outside the ${rows} x ${cols} board`);
      }
      unique.set(`${mine.row},${mine.col}`, mine);
    }
    const config = { rows, cols, mineCount: unique.size };
    validateBoardConfig(config);
    this.start(config, setMines(empty, [...unique.values()]));
  }

  reveal(row: number, col: number): MoveResult {
    const point = { row, col };
    const rejected = this.checkMove(point);
    if (rejected) return this.reject('reveal', point, rejected);
    const cell = this.cell(point);
    if (cell.isRevealed) return this.reject('reveal', point, 'already-revealed');
    if (cell.isFlagged) return this.reject('reveal', point, 'flagged');

    if (this.firstClickSafe && this.revealsMade === 0 && cell.isMine) {
      this.logger.debug('first reveal hit a mine, relocating', point);
      this.board = freezeBoard(relocateMine(this.board, point, this.random));
    }
    this.revealsMade += 1;

    const result = revealCell(this.board, point);
    this.board = freezeBoard(result.board);
    return this.settle(result.hitMine, result.revealed);
  }

  toggleFlag(row: number, col: number): MoveResult {
    const point = { row, col };
    const rejected = this.checkMove(point);
    if (rejected) return this.reject('flag', point, rejected);
    if (this.cell(point).isRevealed) return this.reject('flag', point, 'already-revealed');

    this.board = freezeBoard(toggleFlag(this.board, point));
    this.moves += 1;
    return { ok: true, status: this.status, changed: [point] };
  }

  /** Reveals the unflagged neighbours of a number whose flags are all placed. */
  chord(row: number, col: number): MoveResult {
    const point = { row, col };
    const rejected = this.checkMove(point);
    if (rejected) return this.reject('chord', point, rejected);
    if (!canChord(this.board, point)) return this.reject('chord', point, 'not-chordable');

    const result = chordReveal(this.board, point);
    this.board = freezeBoard(result.board);
    return this.settle(result.hitMine, result.revealed);
  }

  /** Uncovers the whole field and drops the flags; since mines are uncovered too, the game is lost. */
  solve(): MoveResult {
    if (this.status !== 'in-progress') return this.reject('solve', undefined, 'game-over');
    const result = revealAll(this.board);
    this.board = freezeBoard(result.board);
    this.moves += 1;
    this.solved = true;
    this.status = this.config.mineCount > 0 ? 'lost' : 'won';
    this.logger.info(`game ${this.gameId} solved by request`);
    return { ok: true, status: this.status, changed: result.revealed };
  }

  getStatus(): GameStatus {
    return this.status;
  }

  getConfig(): BoardConfig {
    return { ...this.config };
  }

  getBoard(): ReadonlyBoard {
    return this.board;
  }

  getCell(row: number, col: number): Readonly<Cell> | undefined {
    return cellAt(this.board, { row, col });
  }

  snapshot(): EngineSnapshot {
    const flagsPlaced = countFlags(this.board);
    return {
      gameId: this.gameId,
      rows: this.config.rows,
      cols: this.config.cols,
      mineCount: this.config.mineCount,
      status: this.status,
      board: this.board,
      flagsPlaced,
      minesRemaining: Math.max(this.config.mineCount - flagsPlaced, 0),
      revealedCount: countRevealed(this.board),
      moves: this.moves,
      solved: this.solved
    };
  }

  private seed(config: BoardConfig): ReadonlyBoard {
    return freezeBoard(placeMines(createEmptyBoard(config.rows, config.cols), config.mineCount, this.random));
  }

  private start(config: BoardConfig, board: ReadonlyBoard) {
    this.config = config;
    this.board = freezeBoard(board);
    this.status = 'in-progress';
    this.gameId += 1;
    this.moves = 0;
    this.revealsMade = 0;
    this.solved = false;
    this.logStart();
  }

  private logStart() {
    this.logger.info(`game ${this.gameId} started`, this.getConfig());
  }

  private cell(point: Point): Readonly<Cell> {
    return this.board[point.row][point.col];
  }

  private checkMove(point: Point): RejectReason | undefined {
    if (!isInBounds(this.board, point)) return 'out-of-bounds';
    if (this.status !== 'in-progress') return 'game-over';
    return undefined;
  }

  private reject(move: string, point: Point | undefined, reason: RejectReason): MoveResult {
    this.logger.debug(`${move} rejected: ${reason}`, point);
    return { ok: false, reason };
  }

  private settle(hitMine: boolean, revealed: Point[]): MoveResult {
    this.moves += 1;
    if (hitMine) {
      const mines = revealAllMines(this.board);
      this.board = freezeBoard(mines.board);
      this.status = 'lost';
      this.logger.info(`game ${this.gameId} lost after ${this.moves} moves`);
      return { ok: true, status: this.status, changed: [...revealed, ...mines.revealed] };
    }
    if (hasWon(this.board)) {
      this.status = 'won';
      this.logger.info(`game ${this.gameId} won after ${this.moves} moves`);
    }
    return { ok: true, status: this.status, changed: revealed };
  }
}
