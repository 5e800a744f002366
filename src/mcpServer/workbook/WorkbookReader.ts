import fs from 'fs';
import path from 'path';
import * as XLSX from 'xlsx';
import Logger from '../logger';
import { WorkbookReadError } from '../../chart/errors';
import type { CellValue, RawRow, RawTable } from '../../chart/types';
import sample from './sample-tasks.json';

/**
 * SheetJS が返すセル値を CellValue に揃える。
 * @param value セル値
 * @returns CellValue
 */
function toCellValue(value: unknown): CellValue {
    if (value === null || value === undefined) return null;
    if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean' || value instanceof Date) return value;
    return String(value);
}

/**
 * 処理名: 先頭シートのテーブル化
 * 処理概要: ワークブックの先頭シートについて、1 行目をヘッダ、以降を行データとして RawTable に変換する。
 *          空のヘッダセルは "Column N" と命名する。空行は含めない。
 * @param workbook SheetJS ワークブック
 * @returns 生データテーブル
 */
export function sheetToTable(workbook: XLSX.WorkBook): RawTable {
    const sheetName = workbook.SheetNames[0];
    const sheet = sheetName === undefined ? undefined : workbook.Sheets[sheetName];
    if (!sheet) throw new WorkbookReadError('Workbook contains no sheets');

    const matrix = XLSX.utils.sheet_to_json<unknown[]>(sheet, { header: 1, defval: null, raw: true, blankrows: false });
    const [header = [], ...body] = matrix;
    const seen = new Map<string, number>();
    const columns = header.map((cell, i) => {
        const text = cell === null || cell === undefined ? '' : String(cell);
        const base = text.length > 0 ? text : `Column ${i + 1}`;
        // 重複ヘッダは SheetJS と同じく _1, _2 ... を付ける
        const count = seen.get(base) ?? 0;
        seen.set(base, count + 1);
        return count === 0 ? base : `${base}_${count}`;
    });

    const rows: RawRow[] = body.map(values => {
        const row: RawRow = {};
        columns.forEach((column, i) => {
            row[column] = toCellValue(values[i]);
        });
        return row;
    });
    return { columns, rows };
}

/**
 * バッファからワークブックを読み込む。CSV の場合も値の自動変換は行わない。
 */
export function readWorkbookBuffer(buffer: Buffer): RawTable {
    let workbook: XLSX.WorkBook;
    try {
        workbook = XLSX.read(buffer, { type: 'buffer', raw: true });
    } catch (err) {
        throw new WorkbookReadError(`Cannot parse workbook: ${err instanceof Error ? err.message : String(err)}`);
    }
    return sheetToTable(workbook);
}

/**
 * 処理名: ワークブックファイル読み込み
 * 処理概要: 指定パスの .xlsx/.xls/.csv を読み込み、先頭シートを RawTable として返す。
 * @param filePath ファイルパス
 * @returns 生データテーブル
 */
export async function readWorkbookFile(filePath: string): Promise<RawTable> {
    const abs = path.resolve(filePath);
    let buffer: Buffer;
    try {
        buffer = await fs.promises.readFile(abs);
    } catch (err) {
        throw new WorkbookReadError(`Cannot read file ${abs}: ${err instanceof Error ? err.message : String(err)}`);
    }
    const table = readWorkbookBuffer(buffer);
    Logger.debug('[Workbook] loaded', null, { path: abs, columns: table.columns, rows: table.rows.length });
    return table;
}

/**
 * 拡張子から SheetJS の出力形式を決める。
 */
function bookTypeFor(filePath: string): XLSX.BookType {
    switch (path.extname(filePath).toLowerCase()) {
        case '.csv':
            return 'csv';
        case '.xls':
            return 'biff8';
        default:
            return 'xlsx';
    }
}

/**
 * 処理名: サンプルワークブック作成
 * 処理概要: 2 フェーズ 14 タスクのサンプル表を指定パスへ書き出す。
 * @param filePath 出力先
 * @returns 書き出した絶対パス
 */
export async function writeSampleWorkbook(filePath: string): Promise<string> {
    const abs = path.resolve(filePath);
    const sheet = XLSX.utils.aoa_to_sheet([sample.columns, ...sample.rows]);
    const workbook = XLSX.utils.book_new();
    XLSX.utils.book_append_sheet(workbook, sheet, sample.sheetName);
    const data: Buffer = XLSX.write(workbook, { type: 'buffer', bookType: bookTypeFor(abs) });
    try {
        await fs.promises.mkdir(path.dirname(abs), { recursive: true });
        await fs.promises.writeFile(abs, data);
    } catch (err) {
        throw new WorkbookReadError(`Cannot write file ${abs}: ${err instanceof Error ? err.message : String(err)}`);
    }
    Logger.info('[Workbook] sample written', null, { path: abs });
    return abs;
}
