import { ChartService } from '../services/ChartService';
import { ThemeRepository } from '../repositories/ThemeRepository';
import { ChartError } from '../../chart/errors';

/**
 * 処理名: ToolDeps インターフェース
 * 処理概要: Tool に注入される依存オブジェクト。未指定のものは既定の実装を使う。
 */
export interface ToolDeps {
    chartService?: ChartService;
    themeRepository?: ThemeRepository;
}

/**
 * 処理名: 入力バリデータ型
 * 処理概要: Dispatcher が tools/call の前に呼び出す検証関数。valid=false で Invalid params になる。
 */
export type InputValidator = (args: unknown) => { valid: boolean; errors?: unknown } | Promise<{ valid: boolean; errors?: unknown }>;

/**
 * 処理名: ToolMeta 型
 * 処理概要: ツールの識別情報や説明、入力スキーマなどを保持するメタデータ型
 */
export type ToolMeta = {
    name: string;
    title?: string;
    description?: string;
    inputSchema?: Record<string, unknown>;
    outputSchema?: Record<string, unknown>;
};

export type LlmHints = {
    nextActions: Array<{ action: string; detail: string }>;
    notes: string[];
};

/**
 * 処理名: ToolResult 型
 * 処理概要: tools/call の result として返す MCP 形式のレスポンス
 */
export type ToolResult = {
    content: Array<{ type: 'text'; text: string }>;
    llmHints?: LlmHints;
    isError?: boolean;
};

/**
 * 処理名: RpcError クラス
 * 処理概要: JSON-RPC のエラーコードとデータを持つ例外。Dispatcher がそのまま error 応答へ変換する。
 */
export class RpcError extends Error {
    readonly code: number;
    readonly data?: unknown;

    constructor(code: number, message: string, data?: unknown) {
        super(message);
        this.name = 'RpcError';
        this.code = code;
        this.data = data;
        Object.setPrototypeOf(this, RpcError.prototype);
    }
}

/**
 * 処理名: 引数オブジェクト取得
 * 処理概要: tools/call の arguments をプレーンオブジェクトとして扱えるようにする。オブジェクト以外は Invalid params。
 */
export function argsObject(args: unknown): Record<string, unknown> {
    if (args === undefined || args === null) return {};
    if (typeof args !== 'object' || Array.isArray(args)) throw new RpcError(-32602, 'Invalid params: arguments must be an object');
    return Object.fromEntries(Object.entries(args));
}

/**
 * 文字列引数を取り出す。必須で欠けている場合は Invalid params。
 */
export function stringArg(args: Record<string, unknown>, key: string, required: true): string;
export function stringArg(args: Record<string, unknown>, key: string, required?: false): string | undefined;
export function stringArg(args: Record<string, unknown>, key: string, required = false): string | undefined {
    const value = args[key];
    if (typeof value === 'string' && value.trim().length > 0) return value;
    if (value !== undefined && typeof value !== 'string') throw new RpcError(-32602, `Invalid params: ${key} must be a string`);
    if (required) throw new RpcError(-32602, `Invalid params: missing ${key}`);
    return undefined;
}

/**
 * 文字列配列引数を取り出す。
 */
export function stringArrayArg(args: Record<string, unknown>, key: string): string[] {
    const value = args[key];
    if (!Array.isArray(value)) throw new RpcError(-32602, `Invalid params: ${key} must be an array of strings`);
    return value.map((item, i) => {
        if (typeof item !== 'string') throw new RpcError(-32602, `Invalid params: ${key}[${i}] must be a string`);
        return item;
    });
}

/**
 * オブジェクト引数 (省略可) を取り出す。
 */
export function objectArg(args: Record<string, unknown>, key: string): Record<string, unknown> | undefined {
    const value = args[key];
    if (value === undefined || value === null) return undefined;
    if (typeof value !== 'object' || Array.isArray(value)) throw new RpcError(-32602, `Invalid params: ${key} must be an object`);
    return Object.fromEntries(Object.entries(value));
}

/**
 * テキスト 1 件のレスポンスを作る。
 */
export function textResult(text: string, llmHints?: LlmHints): ToolResult {
    return llmHints ? { content: [{ type: 'text', text }], llmHints } : { content: [{ type: 'text', text }] };
}

/**
 * 処理名: 業務エラー応答
 * 処理概要: ChartError を ❌ 付きのテキスト応答に変換する。それ以外の例外は再スローして Dispatcher に任せる。
 */
export function chartErrorResult(err: unknown, action: string, detail: string): ToolResult {
    if (!(err instanceof ChartError)) throw err;
    return {
        content: [{ type: 'text', text: `❌ ${err.message}` }],
        llmHints: {
            nextActions: [{ action, detail }],
            notes: [`code=${err.code}`],
        },
        isError: true,
    };
}

/**
 * 処理名: Tool 基底クラス
 * 処理概要: すべてのツール実装が継承する共通のベースクラス。メタ情報と依存注入インターフェース、初期化/破棄/実行の基本契約を提供します。
 */
export class Tool {
    meta: ToolMeta;
    deps: ToolDeps;
    validator?: InputValidator;

    /**
     * 処理名: コンストラクタ
     * 処理概要: メタ情報をセットし、依存オブジェクトを初期化します。
     * @param {ToolMeta} meta ツールのメタ情報
     */
    constructor(meta: ToolMeta = { name: 'unknown' }) {
        this.meta = meta;
        this.deps = {};
    }

    /**
     * 処理名: init
     * 処理概要: 依存注入を受け取り、内部 state を初期化します。
     * @param {ToolDeps} deps DIで注入される依存オブジェクト
     */
    async init(deps?: ToolDeps) {
        this.deps = deps || {};
    }

    /**
     * 処理名: dispose
     * 処理概要: ツールが保持するリソースを解放するためのフック
     */
    async dispose() {
        // override if needed
    }

    protected get chartService(): ChartService {
        if (!this.deps.chartService) this.deps.chartService = new ChartService();
        return this.deps.chartService;
    }

    protected get themeRepository(): ThemeRepository {
        if (!this.deps.themeRepository) this.deps.themeRepository = new ThemeRepository();
        return this.deps.themeRepository;
    }

    /**
     * 処理名: run
     * 処理概要: ツールの主処理を実行する抽象メソッド（サブクラスで実装）
     * @param {unknown} args 実行引数
     */
    async run(args: unknown): Promise<ToolResult> {
        throw new Error(`Tool.run must be implemented by subclass (${this.meta.name}, args: ${typeof args})`);
    }
}
