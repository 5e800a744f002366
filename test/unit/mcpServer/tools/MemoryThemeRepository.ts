import { ThemeRepository } from '../../../../src/mcpServer/repositories/ThemeRepository';
import { ThemeValidationError } from '../../../../src/chart/errors';
import type { SavedTheme } from '../../../../src/mcpServer/db/types';
import type { ChartTheme } from '../../../../src/chart/types';

/**
 * DB を使わないテスト用の ThemeRepository。
 */
export class MemoryThemeRepository extends ThemeRepository {
  themes = new Map<string, SavedTheme>();
  last: ChartTheme | null = null;

  async listThemes(): Promise<SavedTheme[]> {
    return [...this.themes.values()].sort((a, b) => a.name.localeCompare(b.name));
  }

  async getTheme(name: string): Promise<SavedTheme | null> {
    return this.themes.get(name.trim()) ?? null;
  }

  async saveTheme(name: string, theme: ChartTheme): Promise<SavedTheme> {
    const key = name.trim();
    if (!key) throw new ThemeValidationError('Theme name must not be empty');
    const saved: SavedTheme = {
      id: `id-${key}`,
      name: key,
      theme,
      created_at: '2025-01-01T00:00:00.000Z',
      updated_at: '2025-01-01T00:00:00.000Z',
    };
    this.themes.set(key, saved);
    return saved;
  }

  async deleteTheme(name: string): Promise<boolean> {
    return this.themes.delete(name.trim());
  }

  async getLastColorSettings(): Promise<ChartTheme | null> {
    return this.last;
  }

  async saveLastColorSettings(theme: ChartTheme): Promise<ChartTheme> {
    this.last = theme;
    return theme;
  }
}
