import { loadSettings } from './config';
import { createMinesweeperStore } from './store';

const minesweeperSettings = loadSettings(import.meta.env);

export const useMinesweeperStore = createMinesweeperStore(minesweeperSettings);
