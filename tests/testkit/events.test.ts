import { EventAssertionError, Events } from '../../src/testkit/events';
import {
  abortedWithReason,
  containerNode,
  displayName,
  event,
  finished,
  finishedSuccessfully,
  finishedWithFailure,
  instanceOf,
  lastSegment,
  message,
  skippedWithReason,
  started,
  testNode,
  uniqueId,
} from '../../src/testkit/conditions';
import { ExecutionResults, executeTree } from '../../src/testkit/test-kit';
import { AssertionFailedError, TestAbortedError } from '../../src/engine/outcomes';
import { ids, scenarioTree } from '../fixtures/scenario';

function assertionError(fn: () => unknown): EventAssertionError {
  try {
    fn();
  } catch (err) {
    if (err instanceof EventAssertionError) return err;
    throw err;
  }
  throw new Error('Expected an EventAssertionError');
}

describe('Events', () => {
  let results: ExecutionResults;

  beforeEach(async () => {
    results = await executeTree(scenarioTree());
  });

  describe('statistics', () => {
    it('counts test events', () => {
      expect(results.testEvents().statistics()).toEqual({
        started: 7,
        skipped: 1,
        finished: 7,
        succeeded: 5,
        aborted: 1,
        failed: 1,
      });
    });

    it('counts container events', () => {
      expect(results.containerEvents().statistics()).toEqual({
        started: 4,
        skipped: 0,
        finished: 4,
        succeeded: 4,
        aborted: 0,
        failed: 0,
      });
    });

    it('partitions every event into tests and containers', () => {
      expect(results.allEvents().count()).toBe(23);
      expect(results.testEvents().count() + results.containerEvents().count()).toBe(23);
    });

    it('balances started against terminal results', () => {
      const stats = results.allEvents().statistics();
      expect(stats.finished).toBe(stats.started);
      expect(stats.succeeded + stats.aborted + stats.failed).toBe(stats.finished);
    });

    it('passes fluent expectations and returns the selection', () => {
      const tests = results.testEvents();
      expect(
        tests.assertStatistics((stats) => stats.started(7).skipped(1).finished(7).succeeded(5).aborted(1).failed(1)),
      ).toBe(tests);
    });

    it('reports every mismatched count at once', () => {
      const error = assertionError(() =>
        results.testEvents().assertStatistics((stats) => stats.started(7).skipped(2).failed(0)),
      );

      expect(error.unmatched).toEqual(['skipped: expected 2 but was 1', 'failed: expected 0 but was 1']);
      expect(error.message.split('\n').slice(0, 4)).toEqual([
        'Test event statistics did not match:',
        '  skipped: expected 2 but was 1',
        '  failed: expected 0 but was 1',
        'Actual test events (15):',
      ]);
      expect(error.actual[0]).toBe('#3 started test [engine:unit]/[class:TestCase1]/[method:passingTest()]');
    });
  });

  describe('queries', () => {
    it('filters by event kind and result', () => {
      const tests = results.testEvents();
      expect(tests.skipped().describe()).toBe(
        '#5 skipped test [engine:unit]/[class:TestCase1]/[method:disabledTest()] (reason: testing)',
      );
      expect(tests.failed().describe()).toBe(
        '#9 finished test [engine:unit]/[class:TestCase1]/[method:failingTest()] -> failed [AssertionFailedError: Assertion failed]',
      );
      expect(tests.aborted().describe()).toBe(
        '#7 finished test [engine:unit]/[class:TestCase1]/[method:abortedTest()] -> aborted [TestAbortedError: Assumption failed: condition was false]',
      );
      expect(tests.succeeded().list().map((e) => e.testIdentifier.uniqueId.toString())).toEqual([
        ids.passingTest,
        ids.dynamicTest1,
        ids.dynamicTest2,
        ids.test1,
        ids.test2,
      ]);
    });

    it('keeps the category through filters unless overridden', () => {
      const tests = results.testEvents();
      expect(tests.started().category).toBe('Test');
      expect(tests.filter(lastSegment('dynamic-test'), 'Dynamic').category).toBe('Dynamic');
      expect(tests.filter((e) => e.sequence > 20).count()).toBe(1);
    });

    it('returns copies of the log', () => {
      const tests = results.testEvents();
      tests.list().pop();
      expect(tests.count()).toBe(15);
    });

    it('describes an empty selection as an empty string', () => {
      expect(new Events([]).describe()).toBe('');
    });
  });

  describe('assertEventsMatchLoosely', () => {
    it('matches an ordered subsequence', () => {
      results
        .testEvents()
        .assertEventsMatchLoosely(
          event(testNode(uniqueId(ids.passingTest)), finishedSuccessfully()),
          event(testNode(uniqueId(ids.disabledTest)), skippedWithReason('testing')),
          event(testNode(uniqueId(ids.abortedTest)), abortedWithReason(instanceOf(TestAbortedError))),
          event(testNode(uniqueId(ids.failingTest)), finishedWithFailure(instanceOf(AssertionFailedError))),
          event(testNode(lastSegment('dynamic-test', '#2')), displayName('dog'), finishedSuccessfully()),
          event(testNode(uniqueId(ids.test2)), finishedSuccessfully()),
        );
    });

    it('matches on cause messages', () => {
      results
        .testEvents()
        .assertEventsMatchLoosely(
          event(abortedWithReason(message(/condition was false/))),
          event(finishedWithFailure(message('Assertion failed'))),
        );
    });

    it('reports a condition satisfied out of order', () => {
      const error = assertionError(() =>
        results
          .testEvents()
          .assertEventsMatchLoosely(
            event(testNode(uniqueId(ids.test2)), finishedSuccessfully()),
            event(testNode(uniqueId(ids.passingTest)), finishedSuccessfully()),
          ),
      );

      expect(error.unmatched).toEqual([
        `[2] event matching (test node and unique id '${ids.passingTest}' and finished with status successful)` +
          ` -- satisfied out of order by #4 finished test ${ids.passingTest} -> successful`,
      ]);
      expect(error.message.split('\n')[0]).toBe('Test events did not contain the expected subsequence');
      expect(error.actual).toHaveLength(15);
    });

    it('reports a condition that no event satisfies', () => {
      const missing = '[engine:unit]/[class:TestCase1]/[method:missing()]';
      const error = assertionError(() =>
        results.testEvents().assertEventsMatchLoosely(event(testNode(uniqueId(missing)), started())),
      );

      expect(error.unmatched).toEqual([
        `[1] event matching (test node and unique id '${missing}' and started) -- never satisfied`,
      ]);
    });
  });

  describe('assertEventsMatchExactly', () => {
    const factory = lastSegment('test-factory');
    const containerSequence = [
      event(containerNode(uniqueId(ids.engine)), started()),
      event(containerNode(uniqueId(ids.testCase1)), started()),
      event(containerNode(factory), started()),
      event(containerNode(factory), finishedSuccessfully()),
      event(containerNode(uniqueId(ids.testCase1)), finishedSuccessfully()),
      event(containerNode(uniqueId(ids.testCase2)), started()),
      event(containerNode(uniqueId(ids.testCase2)), finishedSuccessfully()),
      event(containerNode(uniqueId(ids.engine)), finishedSuccessfully()),
    ];

    it('matches the full container sequence', () => {
      results.containerEvents().assertEventsMatchExactly(...containerSequence);
    });

    it('reports an unexpected extra event', () => {
      const error = assertionError(() =>
        results.containerEvents().assertEventsMatchExactly(...containerSequence.slice(0, 7)),
      );

      expect(error.message.split('\n').slice(0, 2)).toEqual([
        'Container events did not match exactly (expected 7, actual 8)',
        '  position 8: unexpected extra event #23 finished container [engine:unit] -> successful',
      ]);
      expect(error.unmatched).toEqual([]);
    });

    it('reports a missing event', () => {
      const error = assertionError(() =>
        results
          .containerEvents()
          .assertEventsMatchExactly(...containerSequence, event(containerNode(uniqueId(ids.engine)), finished())),
      );

      expect(error.message).toContain(
        `  position 9: missing event, expected event matching (container node and unique id '${ids.engine}' and finished)`,
      );
      expect(error.unmatched).toEqual([
        `[9] event matching (container node and unique id '${ids.engine}' and finished) -- satisfied out of order at position 8`,
      ]);
    });

    it('reports a mismatch with where the expectation was actually satisfied', () => {
      const expected = event(containerNode(uniqueId(ids.testCase2)), started());
      const error = assertionError(() =>
        results.containerEvents().assertEventsMatchExactly(containerSequence[0], expected),
      );

      const lines = error.message.split('\n');
      expect(lines[1]).toBe(
        `  position 2: expected ${expected.description} but was #2 started container ${ids.testCase1}`,
      );
      expect(error.unmatched).toEqual([`[2] ${expected.description} -- satisfied out of order at position 6`]);
    });
  });

  describe('assertEventsMatchUnordered', () => {
    it('matches distinct events in any order', () => {
      results
        .testEvents()
        .finished()
        .assertEventsMatchUnordered(
          event(uniqueId(ids.test2)),
          event(uniqueId(ids.test1)),
          event(lastSegment('dynamic-test'), finishedSuccessfully()),
          event(lastSegment('dynamic-test'), finishedSuccessfully()),
          event(finishedWithFailure()),
          event(abortedWithReason()),
          event(uniqueId(ids.passingTest)),
        );
    });

    it('does not let one event satisfy two expectations', () => {
      const dynamicFinished = event(testNode(lastSegment('dynamic-test')), finished());
      const error = assertionError(() =>
        results.testEvents().assertEventsMatchUnordered(dynamicFinished, dynamicFinished, dynamicFinished),
      );

      expect(error.unmatched).toEqual([
        '[3] event matching (test node and unique id ending in [dynamic-test:*] and finished)' +
          ' -- only matches events claimed by other expectations',
      ]);
      expect(error.message.split('\n')[0]).toBe('Test events did not contain the expected events');
    });

    it('reports expectations nothing satisfies', () => {
      const error = assertionError(() =>
        results.containerEvents().assertEventsMatchUnordered(event(skippedWithReason())),
      );

      expect(error.unmatched).toEqual(['[1] event matching (skipped) -- never satisfied']);
    });
  });
});
