export const r2d = (r: number) => r * 180 / Math.PI;
export const clamp = (v: number, min: number, max: number) => Math.max(min, Math.min(max, v));
export const clamp01 = (v: number) => clamp(v, 0, 1);

// Shortest decimal form that survives a round-trip into a driver expression.
export const formatFactor = (v: number): string => {
  const rounded = Math.round(v * 1e6) / 1e6;
  return Object.is(rounded, -0) ? '0' : String(rounded);
};
