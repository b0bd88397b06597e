import { LandscapeGuard } from './components/LandscapeGuard';
import { MinesweeperPage } from './games/minesweeper/MinesweeperPage';

export default function App() {
  return (
    <LandscapeGuard>
      <MinesweeperPage />
    </LandscapeGuard>
  );
}
