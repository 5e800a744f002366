import { Tool, textResult } from './Tool';
import type { ToolResult } from './Tool';

/**
 * 直近に保存した配色設定を返す MCP ツール。
 */
export default class SettingsGetTool extends Tool {
    constructor() {
        super({
            name: 'gantt.settings.get',
            title: 'Get Color Settings',
            description: 'Get the last saved color settings; gantt.chart.plan uses them when no theme is given.',
            inputSchema: { type: 'object', properties: {} }
        });
    }

    async run(): Promise<ToolResult> {
        const settings = await this.themeRepository.getLastColorSettings();
        if (!settings) {
            return textResult(JSON.stringify({ settings: null }, null, 2), {
                nextActions: [{ action: 'gantt.settings.save', detail: 'Save color settings to reuse them in later plans.' }],
                notes: ['No color settings saved; the dark preset is used.']
            });
        }
        return textResult(JSON.stringify({ settings }, null, 2), { nextActions: [], notes: [] });
    }
}

export const instance = new SettingsGetTool();
