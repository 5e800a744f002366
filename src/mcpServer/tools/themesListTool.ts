import { Tool, textResult } from './Tool';
import type { ToolResult } from './Tool';
import { THEME_PRESETS } from '../../chart/color';

/**
 * 保存済みテーマとプリセットの一覧を返す MCP ツール。
 */
export default class ThemesListTool extends Tool {
    constructor() {
        super({
            name: 'gantt.themes.list',
            title: 'List Themes',
            description: 'List saved chart themes (ordered by name) and the built-in dark and light presets.',
            inputSchema: { type: 'object', properties: {} }
        });
    }

    async run(): Promise<ToolResult> {
        const themes = await this.themeRepository.listThemes();
        const notes = themes.length === 0 ? ['No saved themes yet.'] : [];
        return textResult(JSON.stringify({ presets: THEME_PRESETS, themes }, null, 2), {
            nextActions: [{ action: 'gantt.chart.plan', detail: 'Pass themeName to gantt.chart.plan to use a saved theme.' }],
            notes
        });
    }
}

export const instance = new ThemesListTool();
