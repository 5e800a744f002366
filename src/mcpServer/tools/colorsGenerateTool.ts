import { Tool, argsObject, chartErrorResult, stringArg, stringArrayArg, textResult } from './Tool';
import type { ToolResult } from './Tool';
import { DEFAULT_COLORMAP, generateColorScheme } from '../../chart/color';

/**
 * 処理名: 配色生成ツール
 * 処理概要: フェーズ一覧の順にカラーマップの色を割り当てた配色を返す。
 */
export default class ColorsGenerateTool extends Tool {
    constructor() {
        super({
            name: 'gantt.colors.generate',
            title: 'Generate Phase Colors',
            description: 'Assign colormap colors to phases in the given order, cycling when there are more phases than colors.',
            inputSchema: {
                type: 'object',
                properties: {
                    phases: { type: 'array', items: { type: 'string' } },
                    colormap: { type: 'string', description: 'Colormap name (default Dark2).' }
                },
                required: ['phases']
            }
        });
    }

    async run(args: unknown): Promise<ToolResult> {
        const params = argsObject(args);
        const phases = stringArrayArg(params, 'phases');
        const colormap = stringArg(params, 'colormap') ?? DEFAULT_COLORMAP;
        try {
            const phaseColors = generateColorScheme(phases, colormap);
            return textResult(JSON.stringify({ colormap, phaseColors }, null, 2), {
                nextActions: [{ action: 'gantt.chart.plan', detail: 'Pass these as theme.phaseColors to gantt.chart.plan.' }],
                notes: []
            });
        } catch (error) {
            return chartErrorResult(error, 'gantt.colors.listColormaps', 'Pick a colormap from gantt.colors.listColormaps.');
        }
    }
}

export const instance = new ColorsGenerateTool();
