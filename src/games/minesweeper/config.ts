import { z } from 'zod';
import { logLevels, type LogLevel } from '../../lib/logger';
import { SettingsError } from './errors';
import type { BoardConfig, BoardSize, BoardSizeKey } from './types';

export const boardSizes: BoardSize[] = [
  { key: 'small', label: 'Small (10 x 10)', rows: 10, cols: 10 },
  { key: 'medium', label: 'Medium (15 x 15)', rows: 15, cols: 15 },
  { key: 'large', label: 'Large (20 x 20)', rows: 20, cols: 20 }
];

export const DEFAULT_MINE_RATIO = 0.1;

export type MinesweeperSettings = {
  size: BoardSizeKey;
  mineRatio: number;
  firstClickSafe: boolean;
  logLevel: LogLevel;
};

const settingsSchema = z.object({
  VITE_BOARD_SIZE: z.enum(['small', 'medium', 'large']).default('small'),
  VITE_MINE_RATIO: z.coerce.number().gt(0).max(0.9).default(DEFAULT_MINE_RATIO),
  VITE_FIRST_CLICK_SAFE: z
    .enum(['true', 'false'])
    .default('true')
    .transform((value) => value === 'true'),
  VITE_LOG_LEVEL: z.enum(logLevels).default('warn')
});

export type SettingsSource = Record<string, string | boolean | undefined>;

/** Reads the `VITE_*` settings, falling back to defaults for unset variables. */
export function loadSettings(env: SettingsSource): MinesweeperSettings {
  const parsed = settingsSchema.safeParse(env);
  if (!parsed.success) {
    throw new SettingsError(parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`));
  }
  const { VITE_BOARD_SIZE, VITE_MINE_RATIO, VITE_FIRST_CLICK_SAFE, VITE_LOG_LEVEL } = parsed.data;
  return {
    size: VITE_BOARD_SIZE,
    mineRatio: VITE_MINE_RATIO,
    firstClickSafe: VITE_FIRST_CLICK_SAFE,
    logLevel: VITE_LOG_LEVEL
  };
}

export const getBoardSize = (key: BoardSizeKey): BoardSize =>
  boardSizes.find((size) => size.key === key) ?? boardSizes[0];

export const boardConfigFor = (key: BoardSizeKey, mineRatio = DEFAULT_MINE_RATIO): BoardConfig => {
  const { rows, cols } = getBoardSize(key);
  const cells = rows * cols;
  // toFixed drops float noise (30 * 0.1 is 3.0000000000000004) before rounding up.
  const mineCount = Math.min(Math.ceil(Number((cells * mineRatio).toFixed(6))), cells - 1);
  return { rows, cols, mineCount };
};
