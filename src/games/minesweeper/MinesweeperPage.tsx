import { useEffect, useRef, useState } from 'react';
import { Bomb, Flag, Grid3x3, LogOut, RotateCcw, Sparkles, Timer } from 'lucide-react';
import { useDeviceProfile } from '../../hooks/useDeviceProfile';
import { boardSizes, getBoardSize } from './config';
import type { Cell } from './types';
import { useMinesweeperStore } from './useMinesweeperStore';

const numberColors = [
  '#2f2f2f',
  '#0c4f80',
  '#1f6b40',
  '#8a6f00',
  '#8c5600',
  '#8d1f2f',
  '#4c3f72',
  '#2a6e77',
  '#111111'
];

const LONG_PRESS_MS = 450;

const cellKey = (cell: Readonly<Cell>) => `${cell.row}-${cell.col}`;

export function MinesweeperPage() {
  const { size, snapshot, newGame, resize, reveal, toggleFlag, chord, solve } = useMinesweeperStore();
  const { board, status, rows, cols, mineCount, minesRemaining, moves, gameId, solved } = snapshot;

  const [view, setView] = useState<'intro' | 'game'>('intro');
  const [menuOpen, setMenuOpen] = useState(false);
  const [showResult, setShowResult] = useState(true);
  const [seconds, setSeconds] = useState(0);
  const [mobileFlagMode, setMobileFlagMode] = useState(false);
  const longPressTimers = useRef<Map<string, number>>(new Map());
  const longPressTriggered = useRef<Set<string>>(new Set());
  const { isTouchDevice } = useDeviceProfile();

  useEffect(() => {
    setSeconds(0);
    setShowResult(true);
    setMobileFlagMode(false);
  }, [gameId]);

  const clockRunning = status === 'in-progress' && moves > 0;
  useEffect(() => {
    if (!clockRunning) return;
    const id = window.setInterval(() => setSeconds((prev) => prev + 1), 1000);
    return () => window.clearInterval(id);
  }, [clockRunning]);

  const runMenu = (action: () => void) => {
    setMenuOpen(false);
    action();
  };

  const handleToggleFlag = (cell: Readonly<Cell>) => toggleFlag(cell.row, cell.col);

  const startLongPress = (cell: Readonly<Cell>) => {
    const key = cellKey(cell);
    if (longPressTimers.current.has(key)) return;
    const timer = window.setTimeout(() => {
      longPressTimers.current.delete(key);
      longPressTriggered.current.add(key);
      handleToggleFlag(cell);
    }, LONG_PRESS_MS);
    longPressTimers.current.set(key, timer);
  };

  const clearLongPress = (cell: Readonly<Cell>) => {
    const key = cellKey(cell);
    const timer = longPressTimers.current.get(key);
    if (timer) {
      window.clearTimeout(timer);
      longPressTimers.current.delete(key);
    }
  };

  return (
    <div
      className="min-h-screen font-sans text-[#121212]"
      style={{
        backgroundColor: '#0062ad',
        backgroundImage: 'radial-gradient(rgba(255,255,255,0.2) 0.8px, transparent 0.8px)',
        backgroundSize: '12px 12px'
      }}
    >
      {view === 'intro' ? (
        <main className="max-w-5xl mx-auto px-6 py-10 flex flex-col gap-8 relative">
          <header className="text-center space-y-4">
            <h1 className="text-4xl md:text-6xl font-black text-[#f4ecd8] leading-[1.05]">minesweeper</h1>
          </header>

          <section className="grid gap-6 md:grid-cols-2">
            <div className="rounded-none border-[6px] border-[#121212] bg-[#f2ead7] p-8 shadow-[8px_8px_0_#121212]">
              <div className="text-xs uppercase tracking-[0.2em] text-[#4b4b4b]">How to play</div>
              <div className="mt-6 space-y-3 text-sm text-[#222]">
                <div>Left-click: reveal a cell</div>
                <div>Right-click: flag a suspected mine</div>
                <div>Double-click a number: reveal its neighbours once every flag is placed</div>
                <div>Touch: long-press to flag, or turn on flag mode</div>
                <div>Reveal every cell without a mine to win</div>
              </div>
            </div>
            <div className="rounded-none border-[6px] border-[#121212] bg-[#f2ead7] p-8 shadow-[8px_8px_0_#121212]">
              <div className="text-xs uppercase tracking-[0.2em] text-[#4b4b4b]">Board size</div>
              <div className="mt-6 grid gap-3">
                {boardSizes.map((option) => (
                  <button
                    key={option.key}
                    type="button"
                    onClick={() => resize(option.key)}
                    className={`w-full px-4 py-3 border-[3px] text-left transition ${
                      option.key === size
                        ? 'border-[#121212] bg-[#0062ad] text-[#f4ecd8] shadow-[4px_4px_0_#121212]'
                        : 'border-[#121212] bg-[#f6efdd] text-[#222] hover:bg-[#efe4ca]'
                    }`}
                  >
                    <div className="text-sm font-semibold">{option.label}</div>
                  </button>
                ))}
              </div>
              <button
                type="button"
                onClick={() => {
                  newGame();
                  setView('game');
                }}
                className="mt-6 w-full border-[4px] border-[#121212] bg-[#121212] py-3 text-[#f4ecd8] text-lg font-black shadow-[6px_6px_0_#0d477a]"
              >
                START GAME
              </button>
            </div>
          </section>
        </main>
      ) : (
        <main className="max-w-6xl mx-auto px-6 py-6 flex flex-col gap-4 relative">
          <div className="flex items-center justify-between">
            <div className="relative">
              <button
                type="button"
                onClick={() => setMenuOpen((prev) => !prev)}
                className="px-4 py-2 border-[3px] border-[#121212] bg-[#f2ead7] text-sm font-semibold text-[#222] shadow-[4px_4px_0_#121212]"
              >
                Game
              </button>
              {menuOpen && (
                <div className="absolute left-0 top-full z-40 mt-2 w-56 border-[3px] border-[#121212] bg-[#f2ead7] shadow-[6px_6px_0_#121212]">
                  <button type="button" className="menu-item" onClick={() => runMenu(newGame)}>
                    <RotateCcw size={14} /> New Game
                  </button>
                  <div className="px-3 pt-2 text-[10px] uppercase tracking-[0.2em] text-[#4b4b4b]">Resize</div>
                  {boardSizes.map((option) => (
                    <button
                      key={option.key}
                      type="button"
                      className={`menu-item ${option.key === size ? 'font-black' : ''}`}
                      onClick={() => runMenu(() => resize(option.key))}
                    >
                      <Grid3x3 size={14} /> {option.label}
                    </button>
                  ))}
                  <button type="button" className="menu-item" onClick={() => runMenu(solve)}>
                    <Sparkles size={14} /> Solve
                  </button>
                  <button type="button" className="menu-item" onClick={() => runMenu(() => setView('intro'))}>
                    <LogOut size={14} /> Quit
                  </button>
                </div>
              )}
            </div>
            <div className="flex items-center gap-3 text-sm font-semibold text-[#f2ead7]">
              <span className="flex items-center gap-1">
                <Bomb size={16} /> {String(minesRemaining).padStart(3, '0')}
              </span>
              <span className="flex items-center gap-1">
                <Timer size={16} /> {String(seconds).padStart(3, '0')}
              </span>
              {isTouchDevice && (
                <button
                  type="button"
                  onClick={() => setMobileFlagMode((prev) => !prev)}
                  className={`px-4 py-2 border-[3px] text-sm font-semibold shadow-[4px_4px_0_#121212] ${
                    mobileFlagMode
                      ? 'border-[#121212] bg-[#121212] text-[#f2ead7]'
                      : 'border-[#121212] bg-[#f2ead7] text-[#222]'
                  }`}
                >
                  <Flag size={14} className="inline" /> {mobileFlagMode ? 'Flag mode: on' : 'Flag mode: off'}
                </button>
              )}
            </div>
          </div>

          <div className="border-[6px] border-[#121212] bg-[#f2ead7] p-4 shadow-[8px_8px_0_#121212] flex flex-col h-[80vh]">
            <div className="flex-1 overflow-hidden">
              <div
                className="grid w-full h-full border-[4px] border-[#121212] bg-[#dbe8f4] p-2"
                style={{
                  gridTemplateColumns: `repeat(${cols}, 1fr)`,
                  gridTemplateRows: `repeat(${rows}, 1fr)`
                }}
              >
                {board.flat().map((cell) => {
                  const key = cellKey(cell);
                  const showWrongFlag = status === 'lost' && cell.isFlagged && !cell.isMine;
                  const baseClass = cell.isRevealed
                    ? 'bg-[#f6efdd] border-[#121212]'
                    : 'bg-[#0062ad] border-[#121212] hover:bg-[#0d6bb6]';
                  const mineClass = cell.isMine && cell.isRevealed ? 'bg-[#eb6a5b] border-[#121212]' : '';
                  return (
                    <button
                      key={key}
                      type="button"
                      aria-label={`row ${cell.row + 1}, column ${cell.col + 1}`}
                      onClick={() => {
                        if (isTouchDevice) return;
                        reveal(cell.row, cell.col);
                      }}
                      onContextMenu={(e) => {
                        e.preventDefault();
                        handleToggleFlag(cell);
                      }}
                      onDoubleClick={() => chord(cell.row, cell.col)}
                      onTouchStart={() => startLongPress(cell)}
                      onTouchEnd={() => {
                        clearLongPress(cell);
                        if (longPressTriggered.current.has(key)) {
                          longPressTriggered.current.delete(key);
                          return;
                        }
                        if (mobileFlagMode) {
                          handleToggleFlag(cell);
                          return;
                        }
                        reveal(cell.row, cell.col);
                      }}
                      onTouchCancel={() => {
                        clearLongPress(cell);
                        longPressTriggered.current.delete(key);
                      }}
                      onTouchMove={() => clearLongPress(cell)}
                      className={`relative flex items-center justify-center border-2 text-[clamp(10px,1.6vw,18px)] font-bold transition ${baseClass} ${mineClass}`}
                    >
                      {cell.isMine && cell.isRevealed && <span className="text-[#121212]">●</span>}
                      {cell.isRevealed && !cell.isMine && cell.adjacent > 0 && (
                        <span style={{ color: numberColors[cell.adjacent] }}>{cell.adjacent}</span>
                      )}
                      {!cell.isRevealed && cell.isFlagged && <span className="text-[#f2ead7]">⚑</span>}
                      {showWrongFlag && (
                        <span className="absolute -top-1 -right-1 text-[#121212] text-[10px]">✕</span>
                      )}
                    </button>
                  );
                })}
              </div>
            </div>
          </div>
        </main>
      )}

      {view === 'game' && status !== 'in-progress' && showResult && (
        <div className="fixed inset-0 bg-[#0a2540]/35 backdrop-blur-[2px] flex items-center justify-center z-50">
          <div className="w-full max-w-md border-[6px] border-[#121212] bg-[#f2ead7] p-6 shadow-[8px_8px_0_#121212]">
            <div className="text-xs uppercase tracking-[0.2em] text-[#4d4d4d]">
              {status === 'won' ? 'Victory!' : solved ? 'Solved' : 'Game over!'}
            </div>
            <div className={`mt-3 text-2xl font-black ${status === 'won' ? 'text-[#1f6b40]' : 'text-[#8d1f2f]'}`}>
              {status === 'won'
                ? 'Congratulations, you won!'
                : solved
                  ? 'Here is where the mines were. Try again!'
                  : 'Sorry, you landed on a mine. Try again!'}
            </div>
            <div className="mt-4 grid grid-cols-2 gap-3 text-sm text-[#2d2d2d]">
              <div>Board: {getBoardSize(size).label}</div>
              <div>Time: {String(seconds).padStart(3, '0')}</div>
              <div>Mines: {mineCount}</div>
              <div>Left: {String(minesRemaining).padStart(3, '0')}</div>
            </div>
            <div className="mt-6 flex gap-3">
              <button
                type="button"
                onClick={newGame}
                className="flex-1 border-[3px] border-[#121212] bg-[#121212] py-2 text-[#f2ead7] font-semibold"
              >
                Play again
              </button>
              <button
                type="button"
                onClick={() => setShowResult(false)}
                className="flex-1 border-[3px] border-[#121212] bg-[#f8f0de] py-2 text-sm text-[#222] transition hover:bg-[#eee2ca]"
              >
                View board
              </button>
            </div>
          </div>
        </div>
      )}
    </div>
  );
}
