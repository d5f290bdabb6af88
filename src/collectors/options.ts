import type { CollectorConfig } from './collector.interface.js';

export function stringOption(config: CollectorConfig, key: string, fallback: string): string {
  const value = config[key];
  return typeof value === 'string' && value.trim() !== '' ? value : fallback;
}

export function numberOption(config: CollectorConfig, key: string, fallback: number): number {
  const value = config[key];
  return typeof value === 'number' && Number.isFinite(value) ? value : fallback;
}

export function stringListOption(config: CollectorConfig, key: string, fallback: readonly string[]): string[] {
  const value = config[key];
  if (Array.isArray(value) && value.every((item): item is string => typeof item === 'string')) {
    return [...value];
  }
  if (typeof value === 'string' && value.trim() !== '') {
    return value.split(',').map(item => item.trim()).filter(Boolean);
  }
  return [...fallback];
}
