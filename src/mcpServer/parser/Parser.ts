export type JsonRpcId = number | string;

/**
 * 処理名: JSON-RPC リクエスト型定義
 * 処理概要: JSON-RPC 2.0 に準拠したリクエスト（要求）メッセージの型定義。
 */
export interface JsonRpcRequest {
  jsonrpc: string;
  id: JsonRpcId;
  method: string;
  params?: Record<string, unknown>;
}

/**
 * 処理名: JSON-RPC レスポンス型定義
 * 処理概要: JSON-RPC 2.0 に準拠したレスポンス（応答）メッセージの型定義。
 */
export interface JsonRpcResponse {
  jsonrpc: string;
  id?: JsonRpcId;
  result?: unknown;
  error?: { code: number; message: string; data?: unknown };
}

/**
 * 処理名: JSON-RPC 通知型定義
 * 処理概要: 通知（notification）は応答を期待しない。
 */
export interface JsonRpcNotification {
  jsonrpc: string;
  method: string;
  params?: Record<string, unknown>;
}

/**
 * 処理名: JSON-RPC メッセージ解析
 * 処理概要: 単一行の文字列として渡された JSON-RPC ペイロードをパースし、基本的な検証を行う。
 *           成功時は `JsonRpcRequest`（id を含む）か `JsonRpcNotification`（id を含まない）のいずれかを返す。
 * @param {string} line パース対象の1行 JSON 文字列
 * @returns {JsonRpcRequest | JsonRpcNotification} 解析されたメッセージオブジェクト
 */
export function parseJsonRpc(line: string): JsonRpcRequest | JsonRpcNotification {
  const trimmed = line.trim();
  if (!trimmed) throw new Error('empty line');
  let obj: unknown;
  try {
    obj = JSON.parse(trimmed);
  } catch (err) {
    throw new Error('invalid json');
  }
  if (typeof obj !== 'object' || obj === null || Array.isArray(obj)) throw new Error('not an object');
  const fields = new Map(Object.entries(obj));
  if (fields.get('jsonrpc') !== '2.0') throw new Error('unsupported jsonrpc version');
  const method = fields.get('method');
  if (typeof method !== 'string') throw new Error('missing method');

  const rawParams = fields.get('params');
  let params: Record<string, unknown> | undefined;
  if (rawParams !== undefined && rawParams !== null) {
    if (typeof rawParams !== 'object' || Array.isArray(rawParams)) throw new Error('params must be an object');
    params = Object.fromEntries(Object.entries(rawParams));
  }

  // it's either request (has id) or notification
  if (fields.has('id')) {
    const id = fields.get('id');
    if (typeof id !== 'string' && typeof id !== 'number') throw new Error('invalid id');
    return { jsonrpc: '2.0', id, method, params };
  }
  return { jsonrpc: '2.0', method, params };
}

/**
 * 受信メッセージがリクエスト（id あり）かを判定する。
 */
export function isRequest(message: JsonRpcRequest | JsonRpcNotification): message is JsonRpcRequest {
  return 'id' in message;
}
