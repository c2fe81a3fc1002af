import { TokenView } from "./tokens";

/** A rule matched, producing zero or more results. */
export interface Match<O> {
  readonly matched: true;
  readonly results: readonly O[];
}

/** A rule did not match. This is an expected outcome, not an error. */
export interface NoMatch {
  readonly matched: false;
}

export type RuleResult<O> = Match<O> | NoMatch;

/** Turns one input item into results (or declines to). */
export type Rule<I, O> = (item: I) => RuleResult<O>;

export const NO_MATCH: NoMatch = Object.freeze({ matched: false });

export function match<O>(...results: O[]): Match<O> {
  return { matched: true, results };
}

/** Any error class, used to list errors that a step should treat as no match. */
export type ErrorClass = abstract new (...args: never[]) => Error;

export interface StepOptions {
  /**
   * Errors that a rule might throw which should be treated the same as
   * `NO_MATCH`. Any other error propagates and aborts the whole pipeline.
   */
  ignore?: readonly ErrorClass[];
}

export interface TakeWhileOptions extends StepOptions {
  /** Stop after a single item. */
  single?: boolean;
}

function isIgnored(error: unknown, ignore: readonly ErrorClass[] = []) {
  return ignore.some((errorClass) => error instanceof errorClass);
}

/**
 * Persistent, append-only list of results. Appending and concatenating never
 * modify an existing list, and share structure with it instead of copying.
 */
export class ResultList<O> {
  static empty<O>(): ResultList<O> {
    return new ResultList<O>(null, [], 0);
  }

  static of<O>(items: readonly O[]): ResultList<O> {
    return ResultList.empty<O>().append(items);
  }

  private constructor(
    private readonly previous: ResultList<O> | null,
    private readonly chunk: readonly O[],
    readonly size: number
  ) {}

  append(items: readonly O[]): ResultList<O> {
    if (!items.length) return this;
    return new ResultList(this, items, this.size + items.length);
  }

  concat(other: ResultList<O>): ResultList<O> {
    if (!other.size) return this;
    if (!this.size) return other;
    return other.chunks().reduce<ResultList<O>>(
      (list, chunk) => list.append(chunk),
      this
    );
  }

  toArray(): O[] {
    const items: O[] = [];
    for (const chunk of this.chunks()) items.push(...chunk);
    return items;
  }

  private chunks(): (readonly O[])[] {
    const chunks: (readonly O[])[] = [];
    for (
      let node: ResultList<O> | null = this;
      node;
      node = node.previous
    ) {
      if (node.chunk.length) chunks.push(node.chunk);
    }
    return chunks.reverse();
  }
}

/**
 * A stateless, streaming transformation from many `I`s to many `O`s.
 *
 * A zipper pairs the input that is left to consume with the results produced
 * so far. Every operation returns a new zipper, which means backtracking is
 * free: hold on to an old zipper and it is still exactly where it was.
 *
 * Operations take rules, `(item: I) => RuleResult<O>`, and take care of
 * tracking how much input was consumed:
 *
 * @example
 * const digits: Rule<string, number> = (s) =>
 *   /^\d+$/.test(s) ? match(Number(s)) : NO_MATCH;
 * new Zipper(new TokenView(["1", "2", "x"])).takeWhile(digits).toArray();
 * // => [1, 2]
 */
export class Zipper<I, O> {
  readonly leftover: TokenView<I>;
  readonly results: ResultList<O>;

  constructor(
    leftover: TokenView<I>,
    results: ResultList<O> = ResultList.empty()
  ) {
    this.leftover = leftover;
    this.results = results;
  }

  /**
   * Returns a new zipper with the leftover input of `other` and the results
   * of this zipper followed by the results of `other`.
   */
  merge(other: Zipper<I, O>): Zipper<I, O> {
    return new Zipper(other.leftover, this.results.concat(other.results));
  }

  /** Did the zipper produce any results? */
  get successful(): boolean {
    return this.results.size > 0;
  }

  toArray(): O[] {
    return this.results.toArray();
  }

  /**
   * Consume one item if `rule` matches it. If it doesn't, no input is consumed
   * and no results are added.
   */
  consumeWith(rule: Rule<I, O>, options: StepOptions = {}): Zipper<I, O> {
    return this.takeWhile(rule, { ...options, single: true });
  }

  /**
   * Consume items for as long as `rule` matches them, accumulating results.
   * Stops at the first item that doesn't match, at the end of the input, or
   * at the start of a new cell of input.
   */
  takeWhile(rule: Rule<I, O>, options: TakeWhileOptions = {}): Zipper<I, O> {
    const { single = false, ignore } = options;
    let cursor = this.leftover;
    const results: O[] = [];

    // A single step must have an item to look at.
    if (single && cursor.empty()) {
      try {
        cursor.item();
      } catch (error) {
        if (isIgnored(error, ignore)) return this;
        throw error;
      }
    }

    while (!cursor.empty()) {
      if (cursor !== this.leftover && cursor.atBoundary()) break;

      let result: RuleResult<O>;
      try {
        result = rule(cursor.item());
      } catch (error) {
        if (isIgnored(error, ignore)) break;
        throw error;
      }
      if (!result.matched) break;

      results.push(...result.results);
      cursor = cursor.rest();
      if (single) break;
    }

    if (cursor === this.leftover) return this;
    return this.merge(new Zipper(cursor, ResultList.of(results)));
  }

  /**
   * Give the next `count` items to `rule` as a single block. If it matches,
   * all of them are consumed, even if it produced no results.
   */
  consumeN(
    count: number,
    rule: Rule<readonly I[], O>,
    options: StepOptions = {}
  ): Zipper<I, O> {
    try {
      const leftover = this.leftover.advance(count);
      const result = rule(this.leftover.slice(count));
      if (!result.matched) return this;
      return this.merge(new Zipper(leftover, ResultList.of(result.results)));
    } catch (error) {
      if (isIgnored(error, options.ignore)) return this;
      throw error;
    }
  }

  /**
   * Try each rule on the next item, in order, and consume it with the first
   * one that produces results. If none do, no input is consumed.
   */
  firstMatchOf(
    rules: readonly Rule<I, O>[],
    options: StepOptions = {}
  ): Zipper<I, O> {
    if (this.leftover.empty()) return this;

    const item = this.leftover.item();
    for (const rule of rules) {
      try {
        const result = rule(item);
        if (result.matched && result.results.length) {
          return this.merge(
            new Zipper(this.leftover.rest(), ResultList.of(result.results))
          );
        }
      } catch (error) {
        if (!isIgnored(error, options.ignore)) throw error;
      }
    }
    return this;
  }
}

/** One step in a pipeline of zipper operations. */
export type Step<I, O> = (zipper: Zipper<I, O>) => Zipper<I, O>;

/** Combine steps into a single step that runs them left to right. */
export function pipeline<I, O>(steps: readonly Step<I, O>[]): Step<I, O> {
  return (zipper) => steps.reduce((current, step) => step(current), zipper);
}

/** A step that does nothing, for optional parts of a pipeline. */
export function skip<I, O>(zipper: Zipper<I, O>): Zipper<I, O> {
  return zipper;
}

/** Step constructors for each zipper operation. */
export const Steps = {
  consumeWith<I, O>(rule: Rule<I, O>, options?: StepOptions): Step<I, O> {
    return (zipper) => zipper.consumeWith(rule, options);
  },

  takeWhile<I, O>(rule: Rule<I, O>, options?: TakeWhileOptions): Step<I, O> {
    return (zipper) => zipper.takeWhile(rule, options);
  },

  consumeN<I, O>(
    count: number,
    rule: Rule<readonly I[], O>,
    options?: StepOptions
  ): Step<I, O> {
    return (zipper) => zipper.consumeN(count, rule, options);
  },

  firstMatchOf<I, O>(
    rules: readonly Rule<I, O>[],
    options?: StepOptions
  ): Step<I, O> {
    return (zipper) => zipper.firstMatchOf(rules, options);
  },
};
