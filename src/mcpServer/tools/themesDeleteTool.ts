import { Tool, argsObject, chartErrorResult, stringArg, textResult } from './Tool';
import type { ToolResult } from './Tool';

/**
 * 保存済みテーマを削除する MCP ツール。
 */
export default class ThemesDeleteTool extends Tool {
    constructor() {
        super({
            name: 'gantt.themes.delete',
            title: 'Delete Theme',
            description: 'Delete a saved chart theme by name.',
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
            const deleted = await this.themeRepository.deleteTheme(name);
            if (!deleted) {
                return {
                    content: [{ type: 'text', text: `❌ Theme not found: ${name.trim()}` }],
                    llmHints: {
                        nextActions: [{ action: 'gantt.themes.list', detail: 'List saved themes to find the right name.' }],
                        notes: []
                    },
                    isError: true
                };
            }
            return textResult(`✅ Theme deleted: ${name.trim()}`, {
                nextActions: [{ action: 'gantt.themes.list', detail: 'Review the remaining themes.' }],
                notes: []
            });
        } catch (error) {
            return chartErrorResult(error, 'gantt.themes.delete', 'Provide a non-empty theme name.');
        }
    }
}

export const instance = new ThemesDeleteTool();
