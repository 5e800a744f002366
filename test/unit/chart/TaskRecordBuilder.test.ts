import { buildTaskRecords, cellText, extractPhases } from '../../../src/chart/TaskRecordBuilder';
import { EmptyDatasetError, InvalidDateRangeError } from '../../../src/chart/errors';
import type { RawTable, RoleMapping } from '../../../src/chart/types';

const mapping: RoleMapping = { task: 'Task', start_date: 'Start', end_date: 'End', phase: 'Phase', duration: 'Weeks' };

function table(rows: RawTable['rows']): RawTable {
  return { columns: ['Task', 'Start', 'End', 'Phase', 'Weeks'], rows };
}

describe('buildTaskRecords', () => {
  it('builds one record per row in input order', () => {
    const records = buildTaskRecords(table([
      { Task: 'Design', Start: '2025-03-01', End: '3/10/2025', Phase: 'Plan', Weeks: 2 },
      { Task: 'Build', Start: 45717, End: '2025-04-01', Phase: null, Weeks: null },
    ]), mapping);

    expect(records).toEqual([
      { row: 0, name: 'Design', start: '2025-03-01', end: '2025-03-10', phase: 'Plan', durationLabel: '2' },
      { row: 1, name: 'Build', start: '2025-03-01', end: '2025-04-01' },
    ]);
    expect(Object.isFrozen(records[0])).toBe(true);
  });

  it('skips rows whose mapped cells are all blank', () => {
    const records = buildTaskRecords(table([
      { Task: null, Start: null, End: '  ', Phase: null, Weeks: null },
      { Task: 'Only', Start: '2025-01-01', End: '2025-01-02', Phase: null, Weeks: null },
    ]), mapping);
    expect(records.map(r => r.row)).toEqual([1]);
  });

  it('keeps tasks whose end is before their start', () => {
    const [record] = buildTaskRecords(table([
      { Task: 'Backwards', Start: '2025-01-10', End: '2025-01-05', Phase: null, Weeks: null },
    ]), mapping);
    expect(record.start).toBe('2025-01-10');
    expect(record.end).toBe('2025-01-05');
  });

  it('names the row and column of an unreadable date', () => {
    try {
      buildTaskRecords(table([
        { Task: 'A', Start: '2025-01-01', End: '2025-01-02', Phase: null, Weeks: null },
        { Task: 'B', Start: 'tomorrow', End: '2025-01-02', Phase: null, Weeks: null },
      ]), mapping);
      throw new Error('expected InvalidDateRangeError');
    } catch (err) {
      expect(err).toBeInstanceOf(InvalidDateRangeError);
      if (!(err instanceof InvalidDateRangeError)) return;
      expect(err.row).toBe(1);
      expect(err.column).toBe('Start');
      expect(err.message).toBe('Row 2: cannot interpret "tomorrow" in column "Start" as a date');
    }
  });

  it('rejects a table without usable rows', () => {
    expect(() => buildTaskRecords(table([]), mapping)).toThrow(EmptyDatasetError);
  });
});

describe('cellText', () => {
  it('renders cells as text and blanks as null', () => {
    expect(cellText(3)).toBe('3');
    expect(cellText(false)).toBe('false');
    expect(cellText('   ')).toBeNull();
    expect(cellText(null)).toBeNull();
    expect(cellText(new Date(Date.UTC(2025, 4, 19)))).toBe('2025-05-19');
  });
});

describe('extractPhases', () => {
  it('returns distinct phases in ascending order', () => {
    const phases = extractPhases([
      { row: 0, name: 'a', start: '2025-01-01', end: '2025-01-02', phase: 'Phase 2' },
      { row: 1, name: 'b', start: '2025-01-01', end: '2025-01-02' },
      { row: 2, name: 'c', start: '2025-01-01', end: '2025-01-02', phase: 'Phase 1' },
      { row: 3, name: 'd', start: '2025-01-01', end: '2025-01-02', phase: 'Phase 2' },
    ]);
    expect(phases).toEqual(['Phase 1', 'Phase 2']);
  });
});
