/**
 * Rounds to `digits` decimal places. A value that sits exactly halfway between two
 * candidates goes to the even one (0.125 → 0.12, 2.5 → 2); everything else rounds to
 * the nearest candidate.
 */
export const roundTo = (value: number, digits = 0) => {
  const factor = 10 ** digits;
  const scaled = value * factor;
  const floor = Math.floor(scaled);
  const isExactHalf = scaled - floor === 0.5 && (floor + 0.5) / factor === value;
  if (isExactHalf) {
    return (floor % 2 === 0 ? floor : floor + 1) / factor;
  }
  return Math.round(scaled) / factor;
};
