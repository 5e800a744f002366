import { ToolRegistry } from '../tools/ToolRegistry';
import Logger, { errorMessage } from '../logger';
import { isRequest } from '../parser/Parser';
import type { JsonRpcId, JsonRpcRequest, JsonRpcResponse, JsonRpcNotification } from '../parser/Parser';
import { RpcError } from '../tools/Tool';
import type { Tool } from '../tools/Tool';

export const SERVER_INFO = { name: 'sheet-gantt-mcp-server', version: '0.1.0' } as const;

/**
 * Dispatcher routes parsed JSON-RPC messages to the appropriate handlers and
 * delegates tool calls to the ToolRegistry.
 */
export class Dispatcher {
  private toolRegistry: ToolRegistry;

  /**
   * 処理名: Dispatcher 初期化
   * 処理概要: Dispatcher インスタンスを作成し、与えられた ToolRegistry をバインドします。
   * @param {ToolRegistry} toolRegistry
   */
  constructor(toolRegistry: ToolRegistry) {
    this.toolRegistry = toolRegistry;
  }

  /**
   * 処理名: ツール呼び出し処理
   * 処理概要: JSON-RPC の tools/call リクエストを処理します。ツール名の存在確認、ツール取得、入力バリデーションを行い、実行に委譲して結果を JSON-RPC 形式で返却します。
   * @param {unknown} name tool name
   * @param {unknown} args arguments to the tool
   * @param {JsonRpcId} id request id
   * @returns {Promise<JsonRpcResponse>} JSON-RPC response object
   */
  private async handleToolsCall(name: unknown, args: unknown, id: JsonRpcId): Promise<JsonRpcResponse> {
    if (typeof name !== 'string' || !name) {
      return { jsonrpc: '2.0', id, error: { code: -32602, message: 'Invalid params: missing tool name' } };
    }
    const tool = this.toolRegistry.get(name);
    if (!tool) return { jsonrpc: '2.0', id, error: { code: -32601, message: `Tool not found: ${name}` } };

    // Validation
    try {
      await this.validateToolInput(tool, args);
    } catch (e) {
      if (e instanceof RpcError) {
        return { jsonrpc: '2.0', id, error: { code: e.code, message: e.message, data: e.data } };
      }
      return { jsonrpc: '2.0', id, error: { code: -32602, message: errorMessage(e) } };
    }
    return await this.executeTool(name, args, id);
  }

  /**
   * 処理名: ツール実行とレスポンス整形
   * 処理概要: 指定されたツールを実行し、その結果を JSON-RPC のレスポンス形式に整形して返します。RpcError は対応するエラー応答に、
   *          それ以外の例外はログに記録した上で内部エラーとして応答します。
   */
  private async executeTool(name: string, args: unknown, id: JsonRpcId): Promise<JsonRpcResponse> {
    try {
      const toolResult = await this.toolRegistry.execute(name, args);
      return { jsonrpc: '2.0', id, result: toolResult };
    } catch (err) {
      if (err instanceof RpcError) {
        return { jsonrpc: '2.0', id, error: { code: err.code, message: err.message, data: err.data } };
      }
      Logger.error('[MCP Server] Unexpected tool error:', null, { tool: name, err: errorMessage(err) });
      return { jsonrpc: '2.0', id, error: { code: -32603, message: errorMessage(err) } };
    }
  }

  /**
   * 処理名: ツール入力バリデーション
   * 処理概要: ツールに検証関数が設定されていれば呼び出し、valid=false の場合は Invalid params の RpcError をスローします。
   * @param {Tool} tool tool instance
   * @param {unknown} args arguments passed to tool
   */
  private async validateToolInput(tool: Tool, args: unknown) {
    const validator = tool.validator;
    if (!validator) return;
    let res: { valid: boolean; errors?: unknown };
    try {
      res = await validator(args);
    } catch (e) {
      if (e instanceof RpcError) throw e;
      throw new RpcError(-32602, 'Invalid params', errorMessage(e));
    }
    if (res.valid === false) {
      throw new RpcError(-32602, 'Invalid params', res.errors ?? res);
    }
  }

  /**
   * 処理名: JSON-RPC メッセージ振り分け
   * 処理概要: 受信した JSON-RPC メッセージがリクエストか通知かを判定し、適切なハンドラに委譲します。リクエストの場合はレスポンスを返し、通知の場合は undefined を返します。
   * @param {JsonRpcRequest|JsonRpcNotification} message
   * @returns {Promise<JsonRpcResponse|undefined>} response or undefined
   */
  async handle(message: JsonRpcRequest | JsonRpcNotification): Promise<JsonRpcResponse | undefined> {
    if (isRequest(message)) {
      return this.handleRequest(message);
    }
    await this.handleNotification(message);
    return undefined;
  }

  /**
   * 処理名: JSON-RPC リクエスト処理
   * 処理概要: 各 JSON-RPC のメソッド（initialize、tools/list、tools/call、ping など）を受け取り、対応するレスポンスを構築して返却します。未知のメソッドは Method not found エラーを返します。
   * @param {JsonRpcRequest} request
   * @returns {Promise<JsonRpcResponse>} response
   */
  private async handleRequest(request: JsonRpcRequest): Promise<JsonRpcResponse> {
    const { method, params, id } = request;
    try {
      switch (method) {
        case 'initialize':
          return {
            jsonrpc: '2.0',
            id,
            result: {
              protocolVersion: '2024-11-05',
              capabilities: { tools: {} },
              serverInfo: { ...SERVER_INFO }
            }
          };
        case 'tools/list':
          return { jsonrpc: '2.0', id, result: { tools: this.toolRegistry.list() } };
        case 'tools/call':
          return await this.handleToolsCall(params?.name, params?.arguments ?? {}, id);
        case 'ping':
          return { jsonrpc: '2.0', id, result: {} };
        case 'resources/list':
          return { jsonrpc: '2.0', id, result: { resources: [] } };
        case 'prompts/list':
          return { jsonrpc: '2.0', id, result: { prompts: [] } };
        default:
          return { jsonrpc: '2.0', id, error: { code: -32601, message: `Method not found: ${method}` } };
      }
    } catch (err) {
      return { jsonrpc: '2.0', id, error: { code: -32603, message: errorMessage(err) } };
    }
  }

  /**
   * 処理名: 通知ハンドリング
   * 処理概要: レスポンス不要な JSON-RPC 通知を受け取り、ログ出力のみ行います。
   * @param {JsonRpcNotification} notification
   */
  private async handleNotification(notification: JsonRpcNotification) {
    Logger.debug('[MCP Server] Notification received: ' + notification.method);
  }
}
