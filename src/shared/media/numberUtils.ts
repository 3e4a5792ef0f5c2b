export function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

export const clampChannel = (value: number): number => clamp(Math.round(value), 0, 255);
