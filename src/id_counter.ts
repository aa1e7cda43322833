/**
 * Hands out component ids. Ids start at 1, only ever grow, and are never
 * handed out twice, so a builder can capture an id and wire to it later.
 */
export class IdCounter {
  private nextId: number;

  constructor(start = 1) {
    if (!Number.isInteger(start) || start < 1) {
      throw new Error(`id counter must start at a positive integer, got ${start}`);
    }
    this.nextId = start;
  }

  next(): number {
    const id = this.nextId;
    this.nextId += 1;
    return id;
  }

  peek(): number {
    return this.nextId;
  }
}
