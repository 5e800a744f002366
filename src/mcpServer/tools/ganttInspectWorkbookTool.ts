import { Tool, argsObject, chartErrorResult, stringArg, textResult } from './Tool';
import type { ToolResult } from './Tool';

/**
 * ワークブックを読み込み、列・マッピング・フェーズ一覧を返す MCP ツール。
 */
export default class GanttInspectWorkbookTool extends Tool {
    constructor() {
        super({
            name: 'gantt.workbook.inspect',
            title: 'Inspect Workbook',
            description: 'Read the first sheet of a workbook and report its columns, detected role mapping, phases and usable row count.',
            inputSchema: {
                type: 'object',
                properties: {
                    path: { type: 'string', description: 'Path to an .xlsx, .xls or .csv file.' }
                },
                required: ['path']
            }
        });
    }

    /**
     * @param args ツール引数
     * @returns MCP ツールレスポンス
     */
    async run(args: unknown): Promise<ToolResult> {
        const filePath = stringArg(argsObject(args), 'path', true);
        try {
            const summary = await this.chartService.inspectFile(filePath);
            const notes = summary.phases.length === 0 ? ['No phase column detected; every bar uses the fallback color.'] : [];
            return textResult(JSON.stringify(summary, null, 2), {
                nextActions: [{ action: 'gantt.colors.generate', detail: 'Generate colors for the listed phases, or call gantt.chart.plan directly.' }],
                notes
            });
        } catch (error) {
            return chartErrorResult(error, 'gantt.workbook.inspect', 'Check the file path and header row, then retry.');
        }
    }
}

export const instance = new GanttInspectWorkbookTool();
