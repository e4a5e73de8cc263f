export const clamp = (value: number, lower: number, upper: number): number =>
  Math.min(upper, Math.max(lower, value));

export const round4 = (value: number): number => Number(value.toFixed(4));

export const average = (values: readonly number[]): number => {
  if (values.length === 0) {
    return 0;
  }

  const total = values.reduce((sum, current) => sum + current, 0);
  return total / values.length;
};

export const sumPoints = (entries: readonly { points: number }[]): number =>
  entries.reduce((sum, entry) => sum + entry.points, 0);
