import { describe, test, expect } from 'vitest';
import {
  emptyStats,
  countPassed,
  countDiscarded,
  countShrinks,
  countLabels,
} from './result.js';

describe('TestStats counters', () => {
  test('count each kind of event separately', () => {
    const stats = countShrinks(countDiscarded(countPassed(emptyStats())), 4);

    expect(stats.testsRun).toBe(1);
    expect(stats.testsDiscarded).toBe(1);
    expect(stats.shrinkSteps).toBe(4);
  });

  test('labels accumulate without touching earlier stats', () => {
    const first = countLabels(emptyStats(), ['short', 'trivial']);
    const second = countLabels(first, ['short']);

    expect(first.labels.get('short')).toBe(1);
    expect(second.labels.get('short')).toBe(2);
    expect(second.labels.get('trivial')).toBe(1);
  });

  test('no labels leaves the stats as they are', () => {
    const stats = emptyStats();
    expect(countLabels(stats, [])).toBe(stats);
  });
});
