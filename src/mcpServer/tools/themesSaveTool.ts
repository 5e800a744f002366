import { Tool, argsObject, chartErrorResult, stringArg, textResult } from './Tool';
import type { ToolResult } from './Tool';
import { themeArg } from './chartArgs';
import { resolveTheme } from '../../chart/color';

/**
 * 処理名: テーマ保存ツール
 * 処理概要: 背景色・グリッド色・フェーズ配色を名前付きで保存する。同名のテーマは上書きする。
 *          省略した背景色・グリッド色はダークプリセットの値になる。
 */
export default class ThemesSaveTool extends Tool {
    constructor() {
        super({
            name: 'gantt.themes.save',
            title: 'Save Theme',
            description: 'Save a chart theme under a name, replacing any theme with the same name.',
            inputSchema: {
                type: 'object',
                properties: {
                    name: { type: 'string' },
                    theme: { type: 'object', description: '{ preset?: "dark" | "light", background?, grid?, phaseColors? }' }
                },
                required: ['name', 'theme']
            }
        });
    }

    async run(args: unknown): Promise<ToolResult> {
        const params = argsObject(args);
        const name = stringArg(params, 'name', true);
        try {
            const theme = resolveTheme(themeArg(params) ?? {});
            const saved = await this.themeRepository.saveTheme(name, theme);
            return textResult(`✅ Theme saved: ${saved.name}\n\n${JSON.stringify(saved, null, 2)}`, {
                nextActions: [{ action: 'gantt.chart.plan', detail: `Call gantt.chart.plan with themeName=${saved.name}` }],
                notes: []
            });
        } catch (error) {
            return chartErrorResult(error, 'gantt.themes.save', 'Colors must be #rgb, #rrggbb, #rrggbbaa, a known name or an RGB(A) array.');
        }
    }
}

export const instance = new ThemesSaveTool();
