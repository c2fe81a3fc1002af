import { EndOfInputError } from "./exceptions";

const NO_BOUNDARIES: ReadonlySet<number> = new Set();

/**
 * An immutable cursor over a sequence of items (usually the tokens of an
 * address). Advancing returns a new view that shares the same underlying
 * items, so views are cheap to create and safe to keep around for
 * backtracking.
 *
 * `boundaries` holds the indexes where a new input cell begins. It is empty
 * for plain strings; rows of cells use it so that greedy steps don't run from
 * one cell into the next.
 */
export class TokenView<T = string> {
  readonly items: readonly T[];
  readonly position: number;
  readonly boundaries: ReadonlySet<number>;

  constructor(
    items: readonly T[],
    position = 0,
    boundaries: ReadonlySet<number> = NO_BOUNDARIES
  ) {
    this.items = items;
    this.position = position;
    this.boundaries = boundaries;
  }

  static fromString(text: string): TokenView<string> {
    return new TokenView(text.toUpperCase().split(/\s+/).filter(Boolean));
  }

  /**
   * Flatten several cells of tokens into one view, remembering where each
   * non-empty cell after the first one starts.
   */
  static fromCells(cells: readonly (readonly string[])[]): TokenView<string> {
    const items: string[] = [];
    const boundaries = new Set<number>();
    for (const cell of cells) {
      if (!cell.length) continue;
      if (items.length) boundaries.add(items.length);
      items.push(...cell);
    }
    return new TokenView(items, 0, boundaries);
  }

  /** Get the current item. */
  item(): T {
    if (this.position >= this.items.length) {
      throw new EndOfInputError(this.toString());
    }
    return this.items[this.position];
  }

  /**
   * Get a view `step` items further along. Advancing to exactly the end of
   * the input is allowed and produces an empty view.
   */
  advance(step: number): TokenView<T> {
    if (step < 0) {
      throw new RangeError(`Cannot advance by a negative amount (${step})`);
    }
    const position = this.position + step;
    if (position > this.items.length) {
      throw new EndOfInputError(this.toString());
    }
    return new TokenView(this.items, position, this.boundaries);
  }

  rest(): TokenView<T> {
    return this.advance(1);
  }

  empty(): boolean {
    return this.position >= this.items.length;
  }

  /** Whether the current item starts a new cell of input. */
  atBoundary(): boolean {
    return this.boundaries.has(this.position);
  }

  /** The next `count` items, or fewer if the input ends first. */
  slice(count: number): T[] {
    return this.items.slice(this.position, this.position + count);
  }

  /** Items that have not been consumed yet. */
  remaining(): T[] {
    return this.items.slice(this.position);
  }

  toString(): string {
    return this.remaining().map(String).join(" ");
  }
}
