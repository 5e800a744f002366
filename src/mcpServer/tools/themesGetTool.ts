import { Tool, argsObject, chartErrorResult, stringArg, textResult } from './Tool';
import type { ToolResult } from './Tool';

/**
 * 名前を指定して保存済みテーマを取得する MCP ツール。
 */
export default class ThemesGetTool extends Tool {
    constructor() {
        super({
            name: 'gantt.themes.get',
            title: 'Get Theme',
            description: 'Get a saved chart theme by name.',
            inputSchema: {
                type: 'object',
                properties: { name: { type: 'string' } },
                required: ['name']
            }
        });
    }

    async run(args: unknown): Promise<ToolResult> {
        const name = stringArg(argsObject(args), 'name', true);
        try {
            const theme = await this.themeRepository.getTheme(name);
            if (!theme) {
                return {
                    content: [{ type: 'text', text: `❌ Theme not found: ${name.trim()}` }],
                    llmHints: {
                        nextActions: [{ action: 'gantt.themes.list', detail: 'List saved themes to find the right name.' }],
                        notes: []
                    },
                    isError: true
                };
            }
            return textResult(JSON.stringify(theme, null, 2), {
                nextActions: [{ action: 'gantt.chart.plan', detail: `Call gantt.chart.plan with themeName=${theme.name}` }],
                notes: []
            });
        } catch (error) {
            return chartErrorResult(error, 'gantt.themes.get', 'Provide a non-empty theme name.');
        }
    }
}

export const instance = new ThemesGetTool();
