import type { Role } from './types';

export type ChartErrorCode =
    | 'SCHEMA_UNRESOLVED'
    | 'EMPTY_DATASET'
    | 'INVALID_DATE'
    | 'INVALID_COLOR'
    | 'UNKNOWN_COLORMAP'
    | 'WORKBOOK_READ'
    | 'THEME_INVALID';

/**
 * 処理名: ChartError 基底クラス
 * 処理概要: チャート生成の各段階で発生する業務エラーの共通基底。code で種別を判別する。
 */
export class ChartError extends Error {
    readonly code: ChartErrorCode;

    constructor(code: ChartErrorCode, message: string) {
        super(message);
        this.name = new.target.name;
        this.code = code;
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

/**
 * 処理名: SchemaError
 * 処理概要: 必須の役割に対応する列が見つからない場合のエラー。未解決の役割をすべてまとめて保持する。
 */
export class SchemaError extends ChartError {
    readonly missingRoles: Role[];

    constructor(missingRoles: Role[]) {
        super('SCHEMA_UNRESOLVED', `Required columns not found: ${missingRoles.join(', ')}`);
        this.missingRoles = missingRoles;
    }
}

export class EmptyDatasetError extends ChartError {
    constructor(message = 'No tasks to display') {
        super('EMPTY_DATASET', message);
    }
}

/**
 * 処理名: InvalidDateRangeError
 * 処理概要: セル値を日付として解釈できない場合のエラー。終了日が開始日より前であることはエラーにしない。
 */
export class InvalidDateRangeError extends ChartError {
    readonly row: number;
    readonly column: string;
    readonly value: unknown;

    constructor(row: number, column: string, value: unknown) {
        super('INVALID_DATE', `Row ${row + 1}: cannot interpret ${JSON.stringify(value ?? null)} in column "${column}" as a date`);
        this.row = row;
        this.column = column;
        this.value = value;
    }
}

export class InvalidColorError extends ChartError {
    constructor(value: unknown) {
        super('INVALID_COLOR', `Invalid color: ${JSON.stringify(value ?? null)}`);
    }
}

export class UnknownColormapError extends ChartError {
    constructor(name: string) {
        super('UNKNOWN_COLORMAP', `Unknown colormap: ${name}`);
    }
}

export class WorkbookReadError extends ChartError {
    constructor(message: string) {
        super('WORKBOOK_READ', message);
    }
}

export class ThemeValidationError extends ChartError {
    constructor(message: string) {
        super('THEME_INVALID', message);
    }
}
