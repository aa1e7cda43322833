import { CapacityError } from "./errors.js";

export type ColumnGroup = {
  index: number;
  left: number;
  width: number;
};

/**
 * Splits `fullWidth` columns into stripes of at most
 * `floor(signalCount / height)` columns, left to right. The last stripe takes
 * the remainder.
 */
export function partitionColumns(fullWidth: number, height: number, signalCount: number): ColumnGroup[] {
  if (fullWidth < 1 || height < 1) {
    throw new RangeError(`cannot partition a ${fullWidth}x${height} frame`);
  }
  const perGroup = Math.floor(signalCount / height);
  if (perGroup < 1) {
    throw new CapacityError("not enough signals for even one column of lamps", height, signalCount);
  }
  const count = Math.ceil(fullWidth / perGroup);
  const groups: ColumnGroup[] = [];
  for (let index = 0; index < count; index += 1) {
    const left = index * perGroup;
    groups.push({ index, left, width: Math.min(perGroup, fullWidth - left) });
  }
  return groups;
}
