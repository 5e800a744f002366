export * from './types';
export * from './errors';
export { ROLE_PATTERNS, resolveSchema, validateMapping } from './SchemaResolver';
export type { RolePatternTable } from './SchemaResolver';
export { normalizeDate, toEpochDay, fromEpochDay, daysBetween, weekBoundaries, monthStarts } from './dates';
export { buildTaskRecords, extractPhases, cellText } from './TaskRecordBuilder';
export {
    FALLBACK_COLOR,
    DEFAULT_COLORMAP,
    THEME_PRESETS,
    normalizeColor,
    listColormaps,
    getPalette,
    generateColorScheme,
    completeColorAssignment,
    isThemePresetName,
    resolveTheme,
} from './color';
export type { ThemePresetName } from './color';
export { layout, colorForPhase, CHART_TITLE, GRID_OPACITY } from './LayoutEngine';
