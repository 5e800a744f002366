import Logger, { errorMessage } from './logger';
import { ToolRegistry } from './tools/ToolRegistry';
import type { Tool, ToolDeps } from './tools/Tool';
import { StdioTransport } from './transport/StdioTransport';
import { parseJsonRpc } from './parser/Parser';
import type { JsonRpcNotification, JsonRpcRequest, JsonRpcResponse } from './parser/Parser';
import { Dispatcher } from './dispatcher/Dispatcher';
import { closeAndClearDatabase, initializeDatabase } from './db/DatabaseManager';
import { ChartService } from './services/ChartService';
import { ThemeRepository } from './repositories/ThemeRepository';
import { instance as resolveSchemaTool } from './tools/ganttResolveSchemaTool';
import { instance as inspectWorkbookTool } from './tools/ganttInspectWorkbookTool';
import { instance as createSampleTool } from './tools/ganttCreateSampleTool';
import { instance as planChartTool } from './tools/ganttPlanChartTool';
import { instance as listColormapsTool } from './tools/colorsListColormapsTool';
import { instance as generateColorsTool } from './tools/colorsGenerateTool';
import { instance as themesListTool } from './tools/themesListTool';
import { instance as themesGetTool } from './tools/themesGetTool';
import { instance as themesSaveTool } from './tools/themesSaveTool';
import { instance as themesDeleteTool } from './tools/themesDeleteTool';
import { instance as settingsGetTool } from './tools/settingsGetTool';
import { instance as settingsSaveTool } from './tools/settingsSaveTool';

/**
 * 組み込みツール。追加するツールはここに import して並べる。
 */
export const BUILT_IN_TOOLS: readonly Tool[] = [
    resolveSchemaTool,
    inspectWorkbookTool,
    createSampleTool,
    planChartTool,
    listColormapsTool,
    generateColorsTool,
    themesListTool,
    themesGetTool,
    themesSaveTool,
    themesDeleteTool,
    settingsGetTool,
    settingsSaveTool,
];

/**
 * 処理名: 組み込みツール登録
 * 処理概要: ツールを順に登録する。1 件の登録失敗はログに残して残りの登録を続ける。
 * @param {ToolRegistry} registry 登録先
 * @param {readonly Tool[]} tools 登録するツール
 */
export async function registerBuiltInTools(registry: ToolRegistry, tools: readonly Tool[] = BUILT_IN_TOOLS) {
    for (const tool of tools) {
        try {
            await registry.register(tool);
        } catch (err) {
            Logger.error('[MCP Server] failed to register tool', null, { tool: tool.meta.name, err: errorMessage(err) });
        }
    }
    Logger.info('[MCP Server] Built-in tools registered: ' + JSON.stringify(registry.list().map(t => t.name)));
}

/**
 * 解析できなかった行から JSON-RPC の id を拾う。拾えなければ undefined。
 */
function idOfMalformedLine(line: string): string | number | undefined {
    let parsed: unknown;
    try {
        parsed = JSON.parse(line);
    } catch {
        return undefined;
    }
    if (parsed === null || typeof parsed !== 'object' || Array.isArray(parsed)) return undefined;
    const id = new Map(Object.entries(parsed)).get('id');
    return typeof id === 'string' || typeof id === 'number' ? id : undefined;
}

/**
 * 処理名: 受信行ハンドラ生成 (createLineHandler)
 * 処理概要: 1 行分の JSON-RPC メッセージを解析して Dispatcher に委譲し、応答があれば send で返す。
 *          解析に失敗した行に id があれば -32600 Invalid Request を返す。
 * 実装理由: id 付きの不正な行に応答を返さないとクライアントが待ち続けるため。
 * @param {Dispatcher} dispatcher
 * @param {(response: JsonRpcResponse) => void} send
 * @returns {(line: string) => Promise<void>}
 */
export function createLineHandler(dispatcher: Dispatcher, send: (response: JsonRpcResponse) => void) {
    return async function handleLine(line: string): Promise<void> {
        if (!line.trim()) return;
        let message: JsonRpcRequest | JsonRpcNotification;
        try {
            message = parseJsonRpc(line);
        } catch (err) {
            Logger.error('[MCP Server] Failed to parse message:', null, { err: errorMessage(err) });
            const id = idOfMalformedLine(line);
            if (id !== undefined) send({ jsonrpc: '2.0', id, error: { code: -32600, message: 'Invalid Request' } });
            return;
        }
        Logger.debug('[MCP Server] Received: ' + message.method, null, { params: message.params ?? null });
        const response = await dispatcher.handle(message);
        if (response) send(response);
    };
}

/**
 * 処理名: サーバ起動 (startServer)
 * 処理概要: DB 初期化、依存注入、組み込みツールの登録を行い、標準入出力のトランスポートを開始する。
 *          受信行は到着順に 1 件ずつ処理する。SIGINT/SIGTERM または stdin の終了でツールを破棄し、
 *          DB 接続を閉じて終了する。
 * 実装理由: 応答の順序を受信順と一致させるため、受信行は直列に処理する。
 * @param {ToolDeps} deps 省略時は既定の ChartService / ThemeRepository
 * @returns {Promise<void>}
 */
export async function startServer(deps?: ToolDeps): Promise<void> {
    Logger.info('[MCP Server] Starting stdio MCP server... PID: ' + process.pid);
    await initializeDatabase();

    const toolRegistry = new ToolRegistry();
    await toolRegistry.setDeps(deps ?? { chartService: new ChartService(), themeRepository: new ThemeRepository() });
    await registerBuiltInTools(toolRegistry);

    const transport = new StdioTransport();
    const dispatcher = new Dispatcher(toolRegistry);
    const handleLine = createLineHandler(dispatcher, response => transport.send(response));

    let queue: Promise<void> = Promise.resolve();
    let shuttingDown = false;

    const shutdown = async (reason: string) => {
        if (shuttingDown) return;
        shuttingDown = true;
        Logger.info('[MCP Server] Shutting down server ' + reason);
        await queue;
        transport.stop();
        await toolRegistry.disposeAll();
        try {
            await closeAndClearDatabase();
        } catch (err) {
            Logger.error('[MCP Server] Error while closing database', null, { err: errorMessage(err) });
        }
        process.exit(0);
    };

    transport.onMessage(line => {
        queue = queue.then(() => handleLine(line)).catch(err => {
            Logger.error('[MCP Server] Failed to handle message:', null, { err: errorMessage(err) });
        });
    });
    transport.onClose(() => {
        void shutdown('(stdin closed)');
    });
    process.on('SIGINT', () => {
        void shutdown('SIGINT');
    });
    process.on('SIGTERM', () => {
        void shutdown('SIGTERM');
    });

    transport.start();
}
