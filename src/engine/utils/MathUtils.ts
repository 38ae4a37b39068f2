export const MathUtils = {
  /** Clamp a value between min and max */
  clamp(v: number, min: number, max: number): number {
    return Math.max(min, Math.min(max, v));
  },
};
