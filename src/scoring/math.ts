/** Round to one decimal place; exact ties go to the even digit (96.25 → 96.2). */
export function roundOneDecimal(value: number): number {
  const scaled = value * 10;
  const floor = Math.floor(scaled);
  if (scaled - floor === 0.5) {
    return (floor % 2 === 0 ? floor : floor + 1) / 10;
  }
  return Math.round(scaled) / 10;
}

export function clampScore(score: number): number {
  return Math.max(0, Math.min(100, score));
}
