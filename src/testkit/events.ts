/**
 * Queryable view over a recorded event log.
 *
 * All queries derive from the log alone. Assertions throw
 * EventAssertionError with the full actual sequence and the expected
 * conditions that were never satisfied or were satisfied out of order.
 */

import { EventKind, ExecutionEvent, formatEvent } from '../domain/events';
import { ResultStatus } from '../domain/result';
import { Condition } from './conditions';

/** Aggregate counts over a selection of events. */
export interface EventCounts {
  started: number;
  skipped: number;
  finished: number;
  succeeded: number;
  aborted: number;
  failed: number;
}

export class EventAssertionError extends Error {
  constructor(
    message: string,
    /** Rendered actual events, in order. */
    public actual: string[],
    /** Descriptions of expected conditions that were not satisfied as required. */
    public unmatched: string[],
  ) {
    super(message);
    this.name = 'EventAssertionError';
  }
}

type Predicate = Condition<ExecutionEvent> | ((event: ExecutionEvent) => boolean);

export class Events {
  private readonly events: readonly ExecutionEvent[];

  constructor(events: readonly ExecutionEvent[], readonly category = 'All') {
    this.events = [...events];
  }

  list(): ExecutionEvent[] {
    return [...this.events];
  }

  count(): number {
    return this.events.length;
  }

  filter(predicate: Predicate, category = this.category): Events {
    const test = (e: ExecutionEvent): boolean =>
      typeof predicate === 'function' ? predicate(e) : predicate.matches(e);
    return new Events(this.events.filter(test), category);
  }

  started(): Events {
    return this.filter((e) => e.kind === EventKind.Started);
  }

  skipped(): Events {
    return this.filter((e) => e.kind === EventKind.Skipped);
  }

  finished(): Events {
    return this.filter((e) => e.kind === EventKind.Finished);
  }

  succeeded(): Events {
    return this.finishedWith(ResultStatus.Successful);
  }

  aborted(): Events {
    return this.finishedWith(ResultStatus.Aborted);
  }

  failed(): Events {
    return this.finishedWith(ResultStatus.Failed);
  }

  statistics(): EventCounts {
    return {
      started: this.started().count(),
      skipped: this.skipped().count(),
      finished: this.finished().count(),
      succeeded: this.succeeded().count(),
      aborted: this.aborted().count(),
      failed: this.failed().count(),
    };
  }

  /** Check expected counts; every mismatch is reported at once. */
  assertStatistics(expectations: (stats: EventStatistics) => void): this {
    const stats = new EventStatistics(this);
    expectations(stats);
    stats.assertAll();
    return this;
  }

  /** The selection must equal the expected list, element for element. */
  assertEventsMatchExactly(...conditions: Condition<ExecutionEvent>[]): this {
    const problems: string[] = [];
    const length = Math.max(conditions.length, this.events.length);
    for (let i = 0; i < length; i++) {
      const expected = conditions[i];
      const actual = this.events[i];
      if (expected === undefined) {
        problems.push(`position ${i + 1}: unexpected extra event ${formatEvent(actual)}`);
      } else if (actual === undefined) {
        problems.push(`position ${i + 1}: missing event, expected ${expected.description}`);
      } else if (!expected.matches(actual)) {
        problems.push(`position ${i + 1}: expected ${expected.description} but was ${formatEvent(actual)}`);
      }
    }
    if (problems.length === 0) return this;

    const unmatched = conditions
      .map((c, i) => ({ c, i }))
      .filter(({ c, i }) => this.events[i] === undefined || !c.matches(this.events[i]))
      .map(({ c, i }) => `[${i + 1}] ${c.description} -- ${this.placement(c, i)}`);

    throw this.failure(
      `${this.category} events did not match exactly (expected ${conditions.length}, actual ${this.events.length})`,
      [...problems, ...(unmatched.length ? ['Unsatisfied expectations:', ...unmatched] : [])],
      unmatched,
    );
  }

  /**
   * Each condition must match some event, in increasing position order;
   * other events may appear before, between and after them.
   */
  assertEventsMatchLoosely(...conditions: Condition<ExecutionEvent>[]): this {
    const unmatched: string[] = [];
    let position = 0;
    conditions.forEach((c, i) => {
      const found = this.indexOf(c, position);
      if (found >= 0) {
        position = found + 1;
        return;
      }
      const earlier = this.indexOf(c, 0);
      const where =
        earlier >= 0
          ? `satisfied out of order by ${formatEvent(this.events[earlier])}`
          : 'never satisfied';
      unmatched.push(`[${i + 1}] ${c.description} -- ${where}`);
    });
    if (unmatched.length === 0) return this;

    throw this.failure(
      `${this.category} events did not contain the expected subsequence`,
      ['Unsatisfied expectations:', ...unmatched],
      unmatched,
    );
  }

  /** Each condition must be matched by a distinct event, in any order. */
  assertEventsMatchUnordered(...conditions: Condition<ExecutionEvent>[]): this {
    const assignment = this.matchDistinct(conditions);
    const unmatched = conditions
      .map((c, i) => ({ c, i }))
      .filter(({ i }) => assignment[i] < 0)
      .map(({ c, i }) =>
        this.indexOf(c, 0) >= 0
          ? `[${i + 1}] ${c.description} -- only matches events claimed by other expectations`
          : `[${i + 1}] ${c.description} -- never satisfied`,
      );
    if (unmatched.length === 0) return this;

    throw this.failure(
      `${this.category} events did not contain the expected events`,
      ['Unsatisfied expectations:', ...unmatched],
      unmatched,
    );
  }

  /** Multi-line listing of the selection, one event per line. */
  describe(): string {
    return this.events.map(formatEvent).join('\n');
  }

  private finishedWith(status: ResultStatus): Events {
    return this.filter((e) => e.kind === EventKind.Finished && e.result.status === status);
  }

  private indexOf(c: Condition<ExecutionEvent>, from: number): number {
    for (let i = from; i < this.events.length; i++) {
      if (c.matches(this.events[i])) return i;
    }
    return -1;
  }

  private placement(c: Condition<ExecutionEvent>, expectedIndex: number): string {
    const at = this.indexOf(c, 0);
    if (at < 0) return 'never satisfied';
    return at === expectedIndex ? 'satisfied' : `satisfied out of order at position ${at + 1}`;
  }

  /** Maximum bipartite matching of conditions to events (Kuhn's augmenting paths). */
  private matchDistinct(conditions: Condition<ExecutionEvent>[]): number[] {
    const eventOwner = new Array<number>(this.events.length).fill(-1);
    const assignment = new Array<number>(conditions.length).fill(-1);

    const tryAssign = (ci: number, visited: boolean[]): boolean => {
      for (let ei = 0; ei < this.events.length; ei++) {
        if (visited[ei] || !conditions[ci].matches(this.events[ei])) continue;
        visited[ei] = true;
        if (eventOwner[ei] < 0 || tryAssign(eventOwner[ei], visited)) {
          eventOwner[ei] = ci;
          assignment[ci] = ei;
          return true;
        }
      }
      return false;
    };

    for (let ci = 0; ci < conditions.length; ci++) {
      tryAssign(ci, new Array<boolean>(this.events.length).fill(false));
    }
    return assignment;
  }

  private failure(headline: string, details: string[], unmatched: string[]): EventAssertionError {
    const actual = this.events.map(formatEvent);
    const message = [
      headline,
      ...details.map((line) => `  ${line}`),
      `Actual ${this.category.toLowerCase()} events (${actual.length}):`,
      ...actual.map((line) => `  ${line}`),
    ].join('\n');
    return new EventAssertionError(message, actual, unmatched);
  }
}

/** Fluent expected counts, checked together by assertAll(). */
export class EventStatistics {
  private mismatches: string[] = [];

  constructor(private events: Events) {}

  started(expected: number): this {
    return this.check('started', expected, this.events.started().count());
  }

  skipped(expected: number): this {
    return this.check('skipped', expected, this.events.skipped().count());
  }

  finished(expected: number): this {
    return this.check('finished', expected, this.events.finished().count());
  }

  succeeded(expected: number): this {
    return this.check('succeeded', expected, this.events.succeeded().count());
  }

  aborted(expected: number): this {
    return this.check('aborted', expected, this.events.aborted().count());
  }

  failed(expected: number): this {
    return this.check('failed', expected, this.events.failed().count());
  }

  assertAll(): void {
    if (this.mismatches.length === 0) return;
    const actual = this.events.list().map(formatEvent);
    throw new EventAssertionError(
      [
        `${this.events.category} event statistics did not match:`,
        ...this.mismatches.map((line) => `  ${line}`),
        `Actual ${this.events.category.toLowerCase()} events (${actual.length}):`,
        ...actual.map((line) => `  ${line}`),
      ].join('\n'),
      actual,
      [...this.mismatches],
    );
  }

  private check(label: string, expected: number, actual: number): this {
    if (expected !== actual) {
      this.mismatches.push(`${label}: expected ${expected} but was ${actual}`);
    }
    return this;
  }
}
