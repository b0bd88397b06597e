/// <reference types="vite/client" />

interface ImportMetaEnv {
  readonly VITE_BOARD_SIZE?: string;
  readonly VITE_MINE_RATIO?: string;
  readonly VITE_FIRST_CLICK_SAFE?: string;
  readonly VITE_LOG_LEVEL?: string;
}
