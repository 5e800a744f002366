import { CHART_TITLE, GRID_OPACITY, colorForPhase, layout } from '../../../src/chart/LayoutEngine';
import { FALLBACK_COLOR, completeColorAssignment, resolveTheme } from '../../../src/chart/color';
import { EmptyDatasetError, InvalidDateRangeError } from '../../../src/chart/errors';
import type { ChartTheme, TaskRecord } from '../../../src/chart/types';

function task(row: number, name: string, start: string, end: string, extra: Partial<TaskRecord> = {}): TaskRecord {
  return { row, name, start, end, ...extra };
}

const theme: ChartTheme = resolveTheme({ phaseColors: { Plan: '#111111', Build: '#222222' } });

describe('layout', () => {
  it('draws a single zero-length task as a one day bar on slot 0', () => {
    const plan = layout([task(0, 'Kickoff', '2025-01-01', '2025-01-01')], theme);

    expect(plan.title).toBe(CHART_TITLE);
    expect(plan.bars).toEqual([
      {
        slot: 0,
        task: 'Kickoff',
        phase: null,
        start: '2025-01-01',
        end: '2025-01-01',
        x: 20089,
        width: 1,
        color: FALLBACK_COLOR,
        label: { text: '1d', x: 20089.5 },
      },
    ]);
    expect(plan.range).toEqual({ start: '2025-01-01', end: '2025-01-01', startDay: 20089, endDay: 20089 });
    // 2025-01-01 は水曜日で月初
    expect(plan.gridlines).toEqual([
      { date: '2025-01-01', x: 20089, weight: 'month', color: '#ffffff', opacity: 0.6, style: 'solid' },
    ]);
    expect(plan.legend).toEqual([]);
  });

  it('puts the earliest task on the highest slot', () => {
    const plan = layout([
      task(0, 'A', '2025-03-01', '2025-03-10'),
      task(1, 'B', '2025-02-01', '2025-02-05'),
    ], theme);

    expect(plan.bars.map(b => [b.task, b.slot, b.width, b.label.text])).toEqual([
      ['B', 1, 4, '4d'],
      ['A', 0, 9, '9d'],
    ]);
    expect(plan.axisLabels).toEqual([
      { slot: 0, text: 'A' },
      { slot: 1, text: 'B' },
    ]);
    expect(plan.range.start).toBe('2025-02-01');
    expect(plan.range.end).toBe('2025-03-10');
  });

  it('draws weekly lines on Sundays and monthly lines on the first', () => {
    const plan = layout([
      task(0, 'A', '2025-03-01', '2025-03-10'),
      task(1, 'B', '2025-02-01', '2025-02-05'),
    ], theme);

    const weekly = plan.gridlines.filter(g => g.weight === 'week');
    const monthly = plan.gridlines.filter(g => g.weight === 'month');
    expect(weekly.map(g => g.date)).toEqual(['2025-02-02', '2025-02-09', '2025-02-16', '2025-02-23', '2025-03-02', '2025-03-09']);
    expect(monthly.map(g => g.date)).toEqual(['2025-02-01', '2025-03-01']);
    expect(weekly.every(g => g.style === 'dashed' && g.opacity === GRID_OPACITY.week)).toBe(true);
    expect(monthly.every(g => g.style === 'solid' && g.opacity === GRID_OPACITY.month)).toBe(true);
  });

  it('keeps input order for equal starts', () => {
    const plan = layout([
      task(0, 'first', '2025-05-19', '2025-06-02'),
      task(1, 'second', '2025-05-19', '2025-06-02'),
      task(2, 'third', '2025-05-19', '2025-06-02'),
    ], theme);
    expect(plan.bars.map(b => [b.task, b.slot])).toEqual([['first', 2], ['second', 1], ['third', 0]]);
  });

  it('clamps inverted ranges to one day without changing the dates', () => {
    const [bar] = layout([task(0, 'Backwards', '2025-01-10', '2025-01-05')], theme).bars;
    expect(bar.width).toBe(1);
    expect(bar.start).toBe('2025-01-10');
    expect(bar.end).toBe('2025-01-05');
  });

  it('labels bars with the duration cell when present', () => {
    const [bar] = layout([task(0, 'Build', '2025-01-01', '2025-01-15', { durationLabel: '2' })], theme).bars;
    expect(bar.label).toEqual({ text: '2', x: 20096 });
  });

  it('colors bars by phase and builds one legend entry per phase', () => {
    const plan = layout([
      task(0, 'a', '2025-01-01', '2025-01-02', { phase: 'Plan' }),
      task(1, 'b', '2025-01-02', '2025-01-03', { phase: 'Build' }),
      task(2, 'c', '2025-01-03', '2025-01-04', { phase: 'Plan' }),
      task(3, 'd', '2025-01-04', '2025-01-05', { phase: 'Ship' }),
    ], theme);

    expect(plan.bars.map(b => b.color)).toEqual(['#111111', '#222222', '#111111', FALLBACK_COLOR]);
    expect(plan.legend).toEqual([
      { phase: 'Build', color: '#222222' },
      { phase: 'Plan', color: '#111111' },
      { phase: 'Ship', color: FALLBACK_COLOR },
    ]);
  });

  it('uses the theme background and grid colors', () => {
    const light = resolveTheme({ background: '#f8f9fa', grid: '#333333' });
    const plan = layout([task(0, 'x', '2025-01-01', '2025-01-08')], light);
    expect(plan.background).toBe('#f8f9fa');
    expect(plan.gridColor).toBe('#333333');
    expect(plan.gridlines.every(g => g.color === '#333333')).toBe(true);
  });

  it('rejects an empty task list', () => {
    expect(() => layout([], theme)).toThrow(EmptyDatasetError);
  });

  it('rejects a task whose date is not a calendar date', () => {
    expect(() => layout([task(4, 'x', '2025-13-01', '2025-01-01')], theme)).toThrow(InvalidDateRangeError);
  });
});

describe('layout with phase names shared with Object members', () => {
  it('gives every phase its palette color in bars and legend', () => {
    const tasks = [
      task(0, 'Setup', '2025-01-01', '2025-01-03', { phase: 'constructor' }),
      task(1, 'Check', '2025-01-02', '2025-01-04', { phase: 'valueOf' }),
    ];
    const phaseTheme = resolveTheme({ phaseColors: completeColorAssignment(['constructor', 'valueOf']) });
    const plan = layout(tasks, phaseTheme);

    expect(plan.legend).toEqual([
      { phase: 'constructor', color: '#1b9e77' },
      { phase: 'valueOf', color: '#d95f02' },
    ]);
    expect(plan.bars.map(bar => bar.color)).toEqual(['#1b9e77', '#d95f02']);
  });
});

describe('colorForPhase', () => {
  it('falls back when the phase is missing or unassigned', () => {
    expect(colorForPhase(undefined, theme)).toBe(FALLBACK_COLOR);
    expect(colorForPhase('toString', theme)).toBe(FALLBACK_COLOR);
    expect(colorForPhase('Plan', theme)).toBe('#111111');
  });
});
