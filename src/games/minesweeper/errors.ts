export class MinesweeperError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Thrown when a board cannot be built from the requested dimensions or layout. */
export class BoardConfigError extends MinesweeperError {}

export class SettingsError extends MinesweeperError {
  constructor(readonly issues: string[]) {
    super(`Invalid minesweeper settings: ${issues.join('; ')}`);
  }
}
