import { RpcError, Tool, argsObject, chartErrorResult, textResult } from './Tool';
import type { ToolResult } from './Tool';
import { themeArg } from './chartArgs';
import { resolveTheme } from '../../chart/color';

/**
 * 処理名: 配色設定保存ツール
 * 処理概要: 背景色・グリッド色・フェーズ配色を直近の配色設定として保存する。
 */
export default class SettingsSaveTool extends Tool {
    constructor() {
        super({
            name: 'gantt.settings.save',
            title: 'Save Color Settings',
            description: 'Store color settings used by gantt.chart.plan when neither theme nor themeName is given.',
            inputSchema: {
                type: 'object',
                properties: {
                    theme: { type: 'object', description: '{ preset?: "dark" | "light", background?, grid?, phaseColors? }' }
                },
                required: ['theme']
            }
        });
    }

    async run(args: unknown): Promise<ToolResult> {
        const input = themeArg(argsObject(args));
        if (!input) throw new RpcError(-32602, 'Invalid params: missing theme');
        try {
            const saved = await this.themeRepository.saveLastColorSettings(resolveTheme(input));
            return textResult(`✅ Color settings saved\n\n${JSON.stringify(saved, null, 2)}`, {
                nextActions: [{ action: 'gantt.chart.plan', detail: 'Plans without theme or themeName now use these colors.' }],
                notes: []
            });
        } catch (error) {
            return chartErrorResult(error, 'gantt.settings.save', 'Colors must be #rgb, #rrggbb, #rrggbbaa, a known name or an RGB(A) array.');
        }
    }
}

export const instance = new SettingsSaveTool();
