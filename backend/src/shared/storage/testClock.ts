/** Deterministic clock and id sources shared by the storage tests. */
export const createSequenceClock = (...isoTimes: string[]) => {
  let index = 0;
  return () => {
    const value = isoTimes[Math.min(index, isoTimes.length - 1)];
    index += 1;
    return new Date(value);
  };
};

export const createSequenceIds = (prefix = 'rec') => {
  let counter = 0;
  return () => {
    counter += 1;
    return `${prefix}-${counter}`;
  };
};
