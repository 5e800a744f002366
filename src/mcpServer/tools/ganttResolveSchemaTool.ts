import { Tool, argsObject, chartErrorResult, stringArrayArg, textResult } from './Tool';
import type { ToolResult } from './Tool';
import { ROLE_PATTERNS, resolveSchema } from '../../chart/SchemaResolver';

/**
 * 列名の一覧から役割マッピングを判定する MCP ツール。
 */
export default class GanttResolveSchemaTool extends Tool {
    constructor() {
        super({
            name: 'gantt.schema.resolve',
            title: 'Resolve Column Roles',
            description: 'Map spreadsheet column names to the task, start_date, end_date, phase and duration roles.',
            inputSchema: {
                type: 'object',
                properties: {
                    columns: {
                        type: 'array',
                        items: { type: 'string' },
                        description: 'Column names in header order.'
                    }
                },
                required: ['columns']
            }
        });
    }

    /**
     * 列名からマッピングを求める。必須役割が欠けている場合は不足している役割を列挙して返す。
     * @param args ツール引数
     * @returns MCP ツールレスポンス
     */
    async run(args: unknown): Promise<ToolResult> {
        const columns = stringArrayArg(argsObject(args), 'columns');
        try {
            const mapping = resolveSchema(columns);
            return textResult(JSON.stringify({ mapping }, null, 2), {
                nextActions: [{ action: 'gantt.chart.plan', detail: 'Pass this mapping to gantt.chart.plan to override automatic detection.' }],
                notes: []
            });
        } catch (error) {
            const patterns = ROLE_PATTERNS.map(([role, candidates]) => `${role}: ${candidates.join(', ')}`).join('; ');
            return chartErrorResult(error, 'gantt.schema.resolve', `Rename the header so that it contains one of: ${patterns}`);
        }
    }
}

export const instance = new GanttResolveSchemaTool();
