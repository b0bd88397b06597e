import { useEffect, useState } from 'react';

export type DeviceProfile = {
  isTouchDevice: boolean;
  isPortrait: boolean;
};

const detectProfile = (): DeviceProfile => {
  if (typeof window === 'undefined') return { isTouchDevice: false, isPortrait: false };
  const coarse = window.matchMedia?.('(pointer: coarse)').matches ?? false;
  const uaMobile = /Mobi|Android|iPhone|iPad|iPod/i.test(window.navigator.userAgent);
  const touchPoints = (window.navigator.maxTouchPoints ?? 0) > 0;
  return {
    isTouchDevice: coarse || uaMobile || touchPoints,
    isPortrait: window.innerHeight > window.innerWidth
  };
};

/** Tracks pointer type and orientation across resizes and rotations. */
export function useDeviceProfile(): DeviceProfile {
  const [profile, setProfile] = useState<DeviceProfile>(detectProfile);

  useEffect(() => {
    const detect = () => {
      const next = detectProfile();
      setProfile((prev) =>
        prev.isTouchDevice === next.isTouchDevice && prev.isPortrait === next.isPortrait ? prev : next
      );
    };
    detect();
    window.addEventListener('resize', detect);
    window.addEventListener('orientationchange', detect);
    return () => {
      window.removeEventListener('resize', detect);
      window.removeEventListener('orientationchange', detect);
    };
  }, []);

  return profile;
}
