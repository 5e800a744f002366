import { normalizeDate } from './dates';
import { EmptyDatasetError, InvalidDateRangeError } from './errors';
import type { CellValue, RawTable, RoleMapping, TaskRecord } from './types';

/**
 * セル値を表示用テキストに変換する。空セルは null。
 * @param value セル値
 * @returns テキストまたは null
 */
export function cellText(value: CellValue | undefined): string | null {
    if (value === null || value === undefined) return null;
    if (value instanceof Date) return Number.isNaN(value.getTime()) ? null : value.toISOString().slice(0, 10);
    const text = String(value);
    return text.trim().length > 0 ? text : null;
}

/**
 * 処理名: タスクレコード生成
 * 処理概要: 役割マッピングに従って各行をタスクレコードへ変換する。マッピング対象のセルが
 *          すべて空の行は読み飛ばす。開始日・終了日を解釈できない行があれば InvalidDateRangeError、
 *          有効な行が 1 件もなければ EmptyDatasetError を投げる。
 * 実装理由: エラーには元の行番号と列を含める必要があるため、空行を読み飛ばしても row は元の位置を保持する。
 * @param table 生データ
 * @param mapping 役割マッピング
 * @returns タスクレコード配列（元の行順）
 */
export function buildTaskRecords(table: RawTable, mapping: RoleMapping): TaskRecord[] {
    const mapped = [mapping.task, mapping.start_date, mapping.end_date, mapping.phase, mapping.duration]
        .filter((column): column is string => column !== undefined);

    const records: TaskRecord[] = [];
    table.rows.forEach((row, index) => {
        if (mapped.every(column => cellText(row[column]) === null)) return;

        const start = normalizeDate(row[mapping.start_date]);
        if (start === null) throw new InvalidDateRangeError(index, mapping.start_date, row[mapping.start_date]);
        const end = normalizeDate(row[mapping.end_date]);
        if (end === null) throw new InvalidDateRangeError(index, mapping.end_date, row[mapping.end_date]);

        const phase = mapping.phase ? cellText(row[mapping.phase]) : null;
        const durationLabel = mapping.duration ? cellText(row[mapping.duration]) : null;
        records.push(Object.freeze({
            row: index,
            name: cellText(row[mapping.task]) ?? '',
            start,
            end,
            ...(phase !== null ? { phase } : {}),
            ...(durationLabel !== null ? { durationLabel } : {}),
        }));
    });

    if (records.length === 0) throw new EmptyDatasetError('No usable rows in the table');
    return records;
}

/**
 * タスクに含まれるフェーズを重複なしで昇順に返す。
 */
export function extractPhases(tasks: readonly TaskRecord[]): string[] {
    const phases = new Set<string>();
    for (const task of tasks) {
        if (task.phase !== undefined) phases.add(task.phase);
    }
    return [...phases].sort(compareText);
}

/**
 * 文字列の辞書順比較 (コードポイント順)。
 */
export function compareText(a: string, b: string): number {
    if (a < b) return -1;
    return a > b ? 1 : 0;
}
