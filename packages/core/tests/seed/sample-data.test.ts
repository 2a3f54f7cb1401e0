import { describe, it, expect } from 'vitest';
import { createTestDb } from '../../src/db.js';
import { loadSampleTasks, seedSampleTasks } from '../../src/seed/sample-data.js';
import { countTasks, getStats, getTasksWithoutDeadline } from '../../src/queries/task-queries.js';
import { ConstraintViolationError } from '../../src/errors.js';
import { formatDate, addDays } from '../../src/parsers/date-parser.js';

describe('sample data', () => {
  it('loads ten sample tasks', () => {
    const samples = loadSampleTasks();
    expect(samples).toHaveLength(10);
    expect(samples[0]?.taskName).toBe('Complete project documentation');
  });

  it('seeds through the validated create path', () => {
    const db = createTestDb();
    const now = new Date();
    const created = seedSampleTasks(db, now);

    expect(created.map(t => t.id)).toEqual([1, 2, 3, 4, 5, 6, 7, 8, 9, 10]);
    expect(getStats(db)).toEqual({
      total: 10,
      withDeadline: 7,
      byPriority: { HIGH: 3, MEDIUM: 4, LOW: 3 },
      byType: { WORK: 5, HOME: 5 },
    });
    expect(getTasksWithoutDeadline(db).map(t => t.taskName))
      .toEqual(['Code review', 'Exercise routine', 'Garden maintenance']);
  });

  it('places dates and deadlines relative to now', () => {
    const db = createTestDb();
    const now = new Date();
    const [first, second] = seedSampleTasks(db, now);

    expect(first?.date).toBe(formatDate(now));
    expect(second?.date).toBe(formatDate(addDays(now, -1)));
    expect(first?.deadline).toBe(new Date(now.getTime() + 3 * 86_400_000).toISOString());
  });

  it('inserts all samples or none', () => {
    const db = createTestDb();
    // One-day deadlines land in the past when "now" is two days back
    const twoDaysAgo = new Date(Date.now() - 2 * 86_400_000);

    expect(() => seedSampleTasks(db, twoDaysAgo)).toThrow(ConstraintViolationError);
    expect(countTasks(db)).toBe(0);
  });
});
