import { Tool, argsObject, chartErrorResult, stringArg, textResult } from './Tool';
import type { ToolResult } from './Tool';
import { writeSampleWorkbook } from '../workbook/WorkbookReader';

/**
 * サンプルのタスク表を書き出す MCP ツール。
 */
export default class GanttCreateSampleTool extends Tool {
    constructor() {
        super({
            name: 'gantt.workbook.createSample',
            title: 'Create Sample Workbook',
            description: 'Write a two-phase sample task list with Task, Duration (weeks), Phase, Start Date and End Date columns.',
            inputSchema: {
                type: 'object',
                properties: {
                    path: { type: 'string', description: 'Destination path (.xlsx, .xls or .csv).' }
                },
                required: ['path']
            }
        });
    }

    async run(args: unknown): Promise<ToolResult> {
        const filePath = stringArg(argsObject(args), 'path', true);
        try {
            const written = await writeSampleWorkbook(filePath);
            return textResult(`✅ Sample workbook written: ${written}`, {
                nextActions: [{ action: 'gantt.chart.plan', detail: `Call gantt.chart.plan with path=${written}` }],
                notes: []
            });
        } catch (error) {
            return chartErrorResult(error, 'gantt.workbook.createSample', 'Choose a writable destination path.');
        }
    }
}

export const instance = new GanttCreateSampleTool();
