import Logger, { errorMessage } from '../logger';
import type { Tool, ToolDeps, ToolMeta, ToolResult } from './Tool';

/**
 * 処理名: ToolRegistry クラス
 * 処理概要: ツール（Tool）インスタンスの登録・解除・取得・実行、および依存注入を管理するレジストリ機能を提供します。
 * @class
 */
export class ToolRegistry {
    tools: Map<string, Tool>;
    deps: ToolDeps;

    constructor() {
        this.tools = new Map();
        this.deps = {};
    }

    /**
     * 処理名: register
     * 処理概要: Tool インスタンスをレジストリに登録し、現在の依存オブジェクトで初期化（init）します。
     *          初期化に失敗した場合は登録を取り消して例外を再スローします。
     * @param {Tool} tool 登録するツールインスタンス
     */
    async register(tool: Tool) {
        if (!tool || !tool.meta || !tool.meta.name) throw new Error('Invalid tool');
        this.tools.set(tool.meta.name, tool);
        try {
            await tool.init(this.deps);
        } catch (err) {
            Logger.error('[ToolRegistry] tool.init failed for', null, { tool: tool.meta.name, err: errorMessage(err) });
            this.tools.delete(tool.meta.name);
            throw err;
        }
    }

    /**
     * 処理名: unregister
     * 処理概要: 指定した名前のツールをレジストリから削除します。
     * @param {string} name ツール名
     * @returns {boolean} 削除に成功したか
     */
    unregister(name: string) {
        return this.tools.delete(name);
    }

    get(name: string) {
        return this.tools.get(name);
    }

    /**
     * 処理名: list
     * 処理概要: 登録済みツールのメタ情報一覧を配列で返します。
     * @returns {ToolMeta[]} メタ情報配列
     */
    list(): ToolMeta[] {
        return Array.from(this.tools.values()).map(t => t.meta);
    }

    /**
     * 処理名: execute
     * 処理概要: 指定したツールを実行し、その実行結果を返却する非同期メソッドです。
     * @param {string} name ツール名
     * @param {unknown} args 実行引数
     * @returns {Promise<ToolResult>} ツールの実行結果
     */
    async execute(name: string, args: unknown): Promise<ToolResult> {
        const tool = this.get(name);
        if (!tool) throw new Error(`Tool not found: ${name}`);
        return tool.run(args);
    }

    /**
     * 処理名: setDeps
     * 処理概要: レジストリに保持しているすべてのツールに依存オブジェクトを注入し、初期化を再実行します。
     *          初期化に失敗したツールは登録を解除します。
     * @param {ToolDeps} deps 注入する依存オブジェクト
     */
    async setDeps(deps: ToolDeps) {
        this.deps = deps || {};
        const tools = Array.from(this.tools.values());
        for (const tool of tools) {
            await this.initToolWithDeps(tool, this.deps);
        }
    }

    /**
     * Initialize a single tool with provided deps.
     * @param {Tool} tool
     * @param {ToolDeps} deps
     * @returns {Promise<void>}
     */
    private async initToolWithDeps(tool: Tool, deps: ToolDeps) {
        try {
            await tool.init(deps);
        } catch (err) {
            Logger.error('[ToolRegistry] tool.init failed during setDeps for', null, { tool: tool.meta.name, err: errorMessage(err) });
            this.tools.delete(tool.meta.name);
        }
    }

    /**
     * Dispose all registered tools by awaiting each dispose call.
     */
    async disposeAll() {
        const tools = Array.from(this.tools.values());
        for (const tool of tools) {
            try {
                await tool.dispose();
            } catch (err) {
                Logger.error('[ToolRegistry] tool.dispose failed for', null, { tool: tool.meta.name, err: errorMessage(err) });
            }
        }
        this.tools.clear();
    }
}
