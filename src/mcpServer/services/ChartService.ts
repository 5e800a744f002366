import Logger from '../logger';
import { readWorkbookFile } from '../workbook/WorkbookReader';
import {
    buildTaskRecords,
    completeColorAssignment,
    DEFAULT_COLORMAP,
    extractPhases,
    layout,
    resolveSchema,
    resolveTheme,
    validateMapping,
} from '../../chart';
import type { ChartTheme, RawTable, RenderPlan, Role, RoleMapping, ThemePresetName } from '../../chart';

export interface ThemeInput {
    /** 背景・グリッド色を省略したときに使うプリセット */
    preset?: ThemePresetName;
    background?: unknown;
    grid?: unknown;
    phaseColors?: Readonly<Record<string, unknown>>;
}

export interface PlanOptions {
    /** 列の自動判定を行わずに使うマッピング */
    mapping?: Partial<Record<Role, string>>;
    theme?: ThemeInput;
    /** 割当のないフェーズを補う際のカラーマップ */
    colormap?: string;
}

export interface TableSummary {
    columns: string[];
    mapping: RoleMapping;
    phases: string[];
    rowCount: number;
}

export interface ChartResult {
    mapping: RoleMapping;
    theme: ChartTheme;
    plan: RenderPlan;
}

/**
 * ChartService
 *
 * 処理名: チャート生成サービス
 * 処理概要: 生データの列判定 → タスクレコード生成 → 配色補完 → レイアウト計算を一続きで行う。
 * 実装理由: ツール層は引数の解析と応答整形だけを行い、読込から描画プランまでの組み立てはこのクラスに集約するため。
 *
 * @example
 * const svc = new ChartService();
 * const { plan } = await svc.planChartFromFile('tasks.xlsx', { colormap: 'Set2' });
 *
 * @class
 */
export class ChartService {
    /**
     * 処理名: マッピング決定
     * 処理概要: 指定があれば検証して使い、なければ列名から自動判定する。
     */
    resolveMapping(table: RawTable, override?: Partial<Record<Role, string>>): RoleMapping {
        return override ? validateMapping(table.columns, override) : resolveSchema(table.columns);
    }

    /**
     * 処理名: テーブル概要
     * 処理概要: 列・マッピング・フェーズ一覧・有効行数を返す（配色ダイアログの初期表示用）。
     * @param {RawTable} table
     * @returns {TableSummary}
     */
    inspectTable(table: RawTable): TableSummary {
        const mapping = this.resolveMapping(table);
        const records = buildTaskRecords(table, mapping);
        return {
            columns: [...table.columns],
            mapping,
            phases: extractPhases(records),
            rowCount: records.length,
        };
    }

    /**
     * 処理名: チャート計画
     * 処理概要: テーブルから描画プランを作る。テーマのフェーズ配色に無いフェーズはカラーマップから補う。
     * 実装理由: 補完の並び順はデータ中のフェーズで決まるため、配色はタスクレコード生成の後に確定させる。
     * @param {RawTable} table
     * @param {PlanOptions} options
     * @returns {ChartResult}
     */
    planChart(table: RawTable, options: PlanOptions = {}): ChartResult {
        const mapping = this.resolveMapping(table, options.mapping);
        Logger.debug('[ChartService] mapping resolved', null, { mapping: { ...mapping } });

        const records = buildTaskRecords(table, mapping);
        const phases = extractPhases(records);

        const base = resolveTheme(options.theme);
        const theme: ChartTheme = {
            ...base,
            phaseColors: completeColorAssignment(phases, base.phaseColors, options.colormap ?? DEFAULT_COLORMAP),
        };

        const plan = layout(records, theme);
        Logger.debug('[ChartService] plan computed', null, { bars: plan.bars.length, gridlines: plan.gridlines.length, phases });
        return { mapping, theme, plan };
    }

    async inspectFile(filePath: string): Promise<TableSummary> {
        const table = await readWorkbookFile(filePath);
        return this.inspectTable(table);
    }

    async planChartFromFile(filePath: string, options: PlanOptions = {}): Promise<ChartResult> {
        const table = await readWorkbookFile(filePath);
        return this.planChart(table, options);
    }
}

export default ChartService;
