import fs from 'fs';
import os from 'os';
import path from 'path';
import { ChartService } from '../../../src/mcpServer/services/ChartService';
import { writeSampleWorkbook } from '../../../src/mcpServer/workbook/WorkbookReader';
import { SchemaError, UnknownColormapError } from '../../../src/chart/errors';
import Logger from '../../../src/mcpServer/logger';
import type { RawTable } from '../../../src/chart/types';

const table: RawTable = {
  columns: ['Item Name', 'Begin', 'Finish', 'Group'],
  rows: [
    { 'Item Name': 'Write', Begin: '2025-03-01', Finish: '2025-03-10', Group: 'Docs' },
    { 'Item Name': 'Code', Begin: '2025-02-01', Finish: '2025-02-05', Group: 'Dev' },
    { 'Item Name': null, Begin: null, Finish: null, Group: null },
  ],
};

describe('ChartService', () => {
  const svc = new ChartService();

  afterEach(() => {
    Logger.disableMemoryHook();
    Logger.setLevel('info');
  });

  it('summarizes a table', () => {
    expect(svc.inspectTable(table)).toEqual({
      columns: ['Item Name', 'Begin', 'Finish', 'Group'],
      mapping: { task: 'Item Name', start_date: 'Begin', end_date: 'Finish', phase: 'Group' },
      phases: ['Dev', 'Docs'],
      rowCount: 2,
    });
  });

  it('plans a chart and fills phase colors from the colormap', () => {
    const { mapping, theme, plan } = svc.planChart(table, { colormap: 'Set2' });
    expect(mapping.phase).toBe('Group');
    expect(theme.phaseColors).toEqual({ Dev: '#66c2a5', Docs: '#fc8d62' });
    expect(plan.bars.map(b => [b.task, b.slot, b.color])).toEqual([
      ['Code', 1, '#66c2a5'],
      ['Write', 0, '#fc8d62'],
    ]);
  });

  it('keeps phase colors given by the theme', () => {
    const { theme } = svc.planChart(table, { theme: { background: 'white', phaseColors: { Dev: '#000' } } });
    expect(theme).toEqual({
      background: '#ffffff',
      grid: '#ffffff',
      phaseColors: { Dev: '#000000', Docs: '#d95f02' },
    });
  });

  it('uses an explicit mapping instead of detection', () => {
    const { plan } = svc.planChart(table, { mapping: { task: 'Group', start_date: 'Begin', end_date: 'Finish' } });
    expect(plan.axisLabels.map(l => l.text)).toEqual(['Docs', 'Dev']);
    expect(plan.legend).toEqual([]);
  });

  it('rejects an explicit mapping that names a missing column', () => {
    expect(() => svc.planChart(table, { mapping: { task: 'Title', start_date: 'Begin', end_date: 'Finish' } }))
      .toThrow(SchemaError);
  });

  it('rejects an unknown colormap', () => {
    expect(() => svc.planChart(table, { colormap: 'Rainbow' })).toThrow(UnknownColormapError);
  });

  it('logs each stage at debug level', () => {
    Logger.setLevel('debug');
    Logger.enableMemoryHook();
    svc.planChart(table);
    expect(Logger.getMemory().map(r => r.msg)).toEqual(['[ChartService] mapping resolved', '[ChartService] plan computed']);
  });

  describe('from a workbook file', () => {
    let tmpDir: string;

    beforeEach(() => {
      tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'gantt-service-'));
    });

    afterEach(() => {
      fs.rmSync(tmpDir, { recursive: true, force: true });
    });

    it('plans the sample workbook', async () => {
      const file = await writeSampleWorkbook(path.join(tmpDir, 'sample.xlsx'));
      const { mapping, plan } = await svc.planChartFromFile(file);

      expect(mapping).toEqual({
        task: 'Task',
        start_date: 'Start Date',
        end_date: 'End Date',
        phase: 'Phase',
        duration: 'Duration (weeks)',
      });
      expect(plan.bars).toHaveLength(14);
      expect(plan.range.start).toBe('2025-05-19');
      expect(plan.range.end).toBe('2026-08-10');
      expect(plan.bars[0]).toMatchObject({ task: 'Task 1', slot: 13, phase: 'Phase 1', color: '#1b9e77', label: { text: '2' } });
      expect(plan.legend).toEqual([
        { phase: 'Phase 1', color: '#1b9e77' },
        { phase: 'Phase 2', color: '#d95f02' },
      ]);
    });

    it('summarizes the sample workbook', async () => {
      const file = await writeSampleWorkbook(path.join(tmpDir, 'sample.xlsx'));
      const summary = await svc.inspectFile(file);
      expect(summary.phases).toEqual(['Phase 1', 'Phase 2']);
      expect(summary.rowCount).toBe(14);
    });
  });
});
