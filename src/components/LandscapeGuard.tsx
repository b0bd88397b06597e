import type { ReactNode } from 'react';
import { RotateCw } from 'lucide-react';
import { useDeviceProfile } from '../hooks/useDeviceProfile';

type LandscapeGuardProps = {
  children: ReactNode;
};

export function LandscapeGuard({ children }: LandscapeGuardProps) {
  const { isTouchDevice, isPortrait } = useDeviceProfile();

  return (
    <div className="relative min-h-screen">
      {children}
      {isTouchDevice && isPortrait && (
        <div className="fixed inset-0 z-[120] grid place-items-center bg-[#0a2540]/95 px-6">
          <div className="w-full max-w-sm border-[6px] border-[#121212] bg-[#f2ead7] p-6 text-center shadow-[8px_8px_0_#121212]">
            <RotateCw size={40} className="mx-auto mb-4 text-[#0062ad]" />
            <div className="text-lg font-black text-[#121212]">Rotate your device</div>
            <p className="mt-2 text-sm text-[#2d2d2d]">The minefield is laid out for landscape screens.</p>
          </div>
        </div>
      )}
    </div>
  );
}
