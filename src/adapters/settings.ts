import type { SourceSettings } from '../source/types.js';

export function stringSetting(settings: SourceSettings, key: string): string | undefined {
  const value = settings[key];
  return typeof value === 'string' && value.trim() ? value.trim() : undefined;
}

export function numberSetting(settings: SourceSettings, key: string): number | undefined {
  const value = settings[key];
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}
