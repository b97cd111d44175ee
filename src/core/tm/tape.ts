// src/core/tm/tape.ts
// Unbounded two-symbol tape.
//
// Cells are addressed absolutely: the head starts on cell 0 and every cell that
// has never been written reads as 0. Internally the tape is two stacks around
// the current cell, so a head move is O(1).

import type { Bit, Move } from "./state";

export class Tape {
  private left: Bit[] = [];
  private right: Bit[] = [];
  private current: Bit = 0;
  private pos = 0;

  get position(): number {
    return this.pos;
  }

  read(): Bit {
    return this.current;
  }

  write(b: Bit): void {
    this.current = b;
  }

  move(m: Move): void {
    if (m === "R") {
      this.left.push(this.current);
      this.current = this.right.pop() ?? 0;
      this.pos++;
    } else {
      this.right.push(this.current);
      this.current = this.left.pop() ?? 0;
      this.pos--;
    }
  }

  /** Read the cell at an absolute index without moving the head. */
  get(index: number): Bit {
    if (index === this.pos) return this.current;
    if (index < this.pos) {
      const d = this.pos - index;
      return d <= this.left.length ? this.left[this.left.length - d] : 0;
    }
    const d = index - this.pos;
    return d <= this.right.length ? this.right[this.right.length - d] : 0;
  }

  /** Write the cell at an absolute index without moving the head. */
  set(index: number, b: Bit): void {
    if (index === this.pos) {
      this.current = b;
      return;
    }
    const stack = index < this.pos ? this.left : this.right;
    const d = Math.abs(index - this.pos);
    while (stack.length < d) stack.unshift(0);
    stack[stack.length - d] = b;
  }

  /** Lowest and one past the highest cell index the head has ever visited. */
  bounds(): [number, number] {
    return [this.pos - this.left.length, this.pos + this.right.length + 1];
  }

  /** Cells `from` (inclusive) to `to` (exclusive) as a 0/1 string. */
  render(from: number, to: number): string {
    let out = "";
    for (let i = from; i < to; i++) out += this.get(i);
    return out;
  }
}
