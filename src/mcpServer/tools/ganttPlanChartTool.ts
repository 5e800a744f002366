import { RpcError, Tool, argsObject, chartErrorResult, stringArg, textResult } from './Tool';
import type { ToolResult } from './Tool';
import { mappingArg, mergeTheme, tableArg, themeArg } from './chartArgs';
import type { ChartResult, PlanOptions, ThemeInput } from '../services/ChartService';
import type { RawTable } from '../../chart/types';

type PlanSource = { kind: 'table'; table: RawTable } | { kind: 'file'; path: string };

/**
 * 処理名: チャート計画ツール
 * 処理概要: ワークブックのパスまたはインラインのテーブルから描画プラン (RenderPlan) を計算して返す。
 *          テーマは themeName の保存済みテーマ、直近の配色設定、theme 引数の順に重ねる。
 */
export default class GanttPlanChartTool extends Tool {
    constructor() {
        super({
            name: 'gantt.chart.plan',
            title: 'Plan Gantt Chart',
            description: 'Compute the render plan (bars, gridlines, axis labels, legend) for a task table read from a workbook path or passed inline.',
            inputSchema: {
                type: 'object',
                properties: {
                    path: { type: 'string', description: 'Workbook path (.xlsx, .xls, .csv). Either path or table is required.' },
                    table: {
                        type: 'object',
                        description: 'Inline table: { columns: string[], rows: (object|array)[] }',
                        properties: {
                            columns: { type: 'array', items: { type: 'string' } },
                            rows: { type: 'array' }
                        },
                        required: ['columns', 'rows']
                    },
                    mapping: { type: 'object', description: 'Role to column name; replaces automatic column detection.' },
                    theme: { type: 'object', description: '{ preset?: "dark" | "light", background?, grid?, phaseColors? }' },
                    themeName: { type: 'string', description: 'Name of a saved theme to start from.' },
                    colormap: { type: 'string', description: 'Colormap used for phases without an assigned color (default Dark2).' },
                    remember: { type: 'boolean', description: 'Store the resulting colors as the last color settings.' }
                }
            }
        });
    }

    /**
     * table があればそれを、なければ path のワークブックを入力にする。
     */
    private sourceArg(params: Record<string, unknown>): PlanSource {
        const table = tableArg(params);
        if (table) return { kind: 'table', table };
        const filePath = stringArg(params, 'path');
        if (filePath) return { kind: 'file', path: filePath };
        throw new RpcError(-32602, 'Invalid params: either path or table is required');
    }

    /**
     * @param args ツール引数
     * @returns MCP ツールレスポンス（RenderPlan を含む JSON テキスト）
     */
    async run(args: unknown): Promise<ToolResult> {
        const params = argsObject(args);
        const source = this.sourceArg(params);
        const themeName = stringArg(params, 'themeName');
        const colormap = stringArg(params, 'colormap');
        const remember = params.remember === true;

        try {
            let base: ThemeInput | undefined;
            if (themeName) {
                const saved = await this.themeRepository.getTheme(themeName);
                if (!saved) {
                    return {
                        content: [{ type: 'text', text: `❌ Theme not found: ${themeName}` }],
                        llmHints: {
                            nextActions: [{ action: 'gantt.themes.list', detail: 'List saved themes and retry with an existing name.' }],
                            notes: []
                        },
                        isError: true
                    };
                }
                base = saved.theme;
            } else if (params.theme === undefined) {
                base = (await this.themeRepository.getLastColorSettings()) ?? undefined;
            }

            const options: PlanOptions = {
                mapping: mappingArg(params),
                theme: mergeTheme(base, themeArg(params)),
                colormap
            };
            const result: ChartResult = source.kind === 'table'
                ? this.chartService.planChart(source.table, options)
                : await this.chartService.planChartFromFile(source.path, options);

            if (remember) await this.themeRepository.saveLastColorSettings(result.theme);

            return textResult(JSON.stringify(result, null, 2), {
                nextActions: [
                    { action: 'gantt.themes.save', detail: 'Save result.theme under a name to reuse these colors.' }
                ],
                notes: [`${result.plan.bars.length} bars between ${result.plan.range.start} and ${result.plan.range.end}`]
            });
        } catch (error) {
            return chartErrorResult(error, 'gantt.chart.plan', 'Fix the table or arguments named in the message, then retry.');
        }
    }
}

export const instance = new GanttPlanChartTool();
