export type Cell = {
  row: number;
  col: number;
  isMine: boolean;
  isRevealed: boolean;
  isFlagged: boolean;
  /** Mines among the up-to-8 neighbours; -1 on a mine cell. */
  adjacent: number;
};

export type Board = Cell[][];

export type ReadonlyBoard = ReadonlyArray<ReadonlyArray<Readonly<Cell>>>;

export type Point = { row: number; col: number };

export type GameStatus = 'in-progress' | 'won' | 'lost';

export type BoardConfig = {
  rows: number;
  cols: number;
  mineCount: number;
};

export type BoardSizeKey = 'small' | 'medium' | 'large';

export type BoardSize = {
  key: BoardSizeKey;
  label: string;
  rows: number;
  cols: number;
};

export type RejectReason = 'out-of-bounds' | 'game-over' | 'already-revealed' | 'flagged' | 'not-chordable';

export type MoveResult =
  | { ok: true; status: GameStatus; changed: Point[] }
  | { ok: false; reason: RejectReason };

export type EngineSnapshot = {
  gameId: number;
  rows: number;
  cols: number;
  mineCount: number;
  status: GameStatus;
  board: ReadonlyBoard;
  flagsPlaced: number;
  minesRemaining: number;
  revealedCount: number;
  moves: number;
  /** The game ended through Solve rather than a reveal. */
  solved: boolean;
};
