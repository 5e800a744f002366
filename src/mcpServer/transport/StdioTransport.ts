import readline from 'readline';
import { Readable, Writable } from 'stream';
import Logger, { errorMessage } from '../logger';

/**
 * 処理名: メッセージハンドラ型定義
 * 処理概要: 標準入力から受信した1行分の生データを受け取るコールバックの型。
 * @param {string} line - 受信した1行の文字列
 */
export type MessageHandler = (line: string) => void;

/**
 * StdioTransport provides line-based stdin reading and stdout JSON writing.
 *
 * 処理名: 標準入出力ベースのトランスポート
 * 処理概要: 入力を行単位で読み取り、行ごとに登録されたハンドラへ渡す。送信はオブジェクトを
 *           1行の JSON 文字列として出力へ書き出す。デバッグ情報は Logger（stderr）へ出力する。
 * 実装理由: stdout は JSON-RPC の応答専用で、ログは stderr に出す必要があるため。
 */
export class StdioTransport {
  private rl: readline.Interface | null = null;
  private handler: MessageHandler | null = null;
  private closeHandler: (() => void) | null = null;

  /**
   * @param {Readable} input 入力ストリーム（既定は stdin）
   * @param {Writable} output 出力ストリーム（既定は stdout）
   */
  constructor(
    private readonly input: Readable = process.stdin,
    private readonly output: Writable = process.stdout
  ) {}

  /**
   * 処理名: トランスポート開始
   * 処理概要: readline インターフェースを作成して入力の行イベントを購読し、受信行を登録済みハンドラへ渡す。
   *           入力が閉じられたら close ハンドラを呼ぶ。
   */
  start() {
    this.rl = readline.createInterface({ input: this.input, crlfDelay: Infinity });
    this.rl.on('line', (line) => {
      if (this.handler) this.handler(line);
    });

    this.rl.on('close', () => {
      Logger.info('[MCP Server] StdioTransport: stdin closed');
      if (this.closeHandler) this.closeHandler();
    });
  }

  /**
   * 処理名: メッセージハンドラ登録
   * @param {MessageHandler} handler
   */
  onMessage(handler: MessageHandler) {
    this.handler = handler;
  }

  onClose(handler: () => void) {
    this.closeHandler = handler;
  }

  /**
   * 処理名: メッセージ送信
   * 処理概要: オブジェクトを JSON にシリアライズし、1行分の文字列として出力へ書き出す。
   * @param {unknown} obj 送信するオブジェクト
   */
  send(obj: unknown) {
    const str = JSON.stringify(obj);
    // debug friendly pretty print to stderr
    try {
      Logger.debug('[MCP Server] Sending', null, { pretty: JSON.stringify(obj, null, 2) });
    } catch (e) {
      Logger.error('[MCP Server] Sending (stringify failed)', null, { err: errorMessage(e) });
    }
    this.output.write(str + '\n');
  }

  /**
   * 処理名: トランスポート停止
   * 処理概要: readline インターフェースを閉じ、内部のハンドラ参照をクリアする。
   */
  stop() {
    this.closeHandler = null;
    this.rl?.close();
    this.rl = null;
    this.handler = null;
  }
}
