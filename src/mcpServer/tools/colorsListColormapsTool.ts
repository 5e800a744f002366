import { Tool, textResult } from './Tool';
import type { ToolResult } from './Tool';
import { DEFAULT_COLORMAP, listColormaps } from '../../chart/color';

/**
 * 推奨カラーマップ名を返す MCP ツール。
 */
export default class ColorsListColormapsTool extends Tool {
    constructor() {
        super({
            name: 'gantt.colors.listColormaps',
            title: 'List Colormaps',
            description: 'List the qualitative colormaps available for phase colors.',
            inputSchema: { type: 'object', properties: {} }
        });
    }

    async run(): Promise<ToolResult> {
        return textResult(JSON.stringify({ colormaps: listColormaps(), default: DEFAULT_COLORMAP }, null, 2), {
            nextActions: [{ action: 'gantt.colors.generate', detail: 'Generate phase colors with one of these colormaps.' }],
            notes: []
        });
    }
}

export const instance = new ColorsListColormapsTool();
