import { resolveSchema, validateMapping, ROLE_PATTERNS } from '../../../src/chart/SchemaResolver';
import { SchemaError } from '../../../src/chart/errors';

describe('resolveSchema', () => {
  it('maps Task Name / Begin / Finish to the mandatory roles', () => {
    expect(resolveSchema(['Task Name', 'Begin', 'Finish'])).toEqual({
      task: 'Task Name',
      start_date: 'Begin',
      end_date: 'Finish',
    });
  });

  it('falls back to a description column for the task role', () => {
    const mapping = resolveSchema(['phase', 'start', 'end', 'description']);
    expect(mapping).toEqual({ task: 'description', start_date: 'start', end_date: 'end', phase: 'phase' });
  });

  it('reports task as missing when no column matches it', () => {
    try {
      resolveSchema(['phase', 'start', 'end']);
      throw new Error('expected SchemaError');
    } catch (err) {
      expect(err).toBeInstanceOf(SchemaError);
      if (!(err instanceof SchemaError)) return;
      expect(err.missingRoles).toEqual(['task']);
      expect(err.code).toBe('SCHEMA_UNRESOLVED');
      expect(err.message).toBe('Required columns not found: task');
    }
  });

  it('lists every mandatory role for an empty column list', () => {
    expect(() => resolveSchema([])).toThrow('Required columns not found: task, start_date, end_date');
  });

  it('matches case-insensitively and keeps the original column name', () => {
    const mapping = resolveSchema(['TASK', 'START DATE', 'END DATE', 'Category', 'Weeks']);
    expect(mapping).toEqual({
      task: 'TASK',
      start_date: 'START DATE',
      end_date: 'END DATE',
      phase: 'Category',
      duration: 'Weeks',
    });
  });

  it('prefers an earlier pattern over an earlier column', () => {
    // "name" は "task" より優先度が低いので、列順が先でも採用されない
    const mapping = resolveSchema(['Name', 'Task', 'Start', 'End']);
    expect(mapping.task).toBe('Task');
  });

  it('takes the first matching column for the same pattern', () => {
    const mapping = resolveSchema(['Task', 'Start A', 'Start B', 'End']);
    expect(mapping.start_date).toBe('Start A');
  });

  it('never assigns one column to two roles', () => {
    // "Task Duration" は task に確保されるので duration は "Days" になる
    const mapping = resolveSchema(['Task Duration', 'Start', 'End', 'Days']);
    expect(mapping.task).toBe('Task Duration');
    expect(mapping.duration).toBe('Days');
  });

  it('omits optional roles that have no column', () => {
    const mapping = resolveSchema(['Task', 'Start', 'End']);
    expect(Object.keys(mapping)).toEqual(['task', 'start_date', 'end_date']);
  });

  it('is deterministic for the same input', () => {
    const columns = ['Group', 'Description', 'Begin Date', 'Finish Date', 'Duration'];
    expect(resolveSchema(columns)).toEqual(resolveSchema(columns));
  });

  it('accepts a custom pattern table', () => {
    const mapping = resolveSchema(['Vorgang', 'Anfang', 'Ende'], [
      ['task', ['vorgang']],
      ['start_date', ['anfang']],
      ['end_date', ['ende']],
    ]);
    expect(mapping).toEqual({ task: 'Vorgang', start_date: 'Anfang', end_date: 'Ende' });
  });

  it('processes roles in table order', () => {
    expect(ROLE_PATTERNS.map(([role]) => role)).toEqual(['task', 'start_date', 'end_date', 'phase', 'duration']);
  });
});

describe('validateMapping', () => {
  const columns = ['Item', 'From', 'To', 'Stage'];

  it('accepts a mapping whose columns exist', () => {
    expect(validateMapping(columns, { task: 'Item', start_date: 'From', end_date: 'To', phase: 'Stage' })).toEqual({
      task: 'Item',
      start_date: 'From',
      end_date: 'To',
      phase: 'Stage',
    });
  });

  it('rejects missing mandatory roles and unknown columns together', () => {
    expect(() => validateMapping(columns, { task: 'Item', start_date: 'Begin', phase: 'Nope' }))
      .toThrow('Required columns not found: start_date, end_date, phase');
  });
});
