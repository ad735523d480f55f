import type { LogSettings } from "@/log/config";

export interface FilterSubject {
  level: string;
  module: string;
  functionName: string;
  tags: ReadonlySet<string>;
}

/**
 * Fast path checked before any stack inspection.
 */
export const isLevelEnabled = (settings: LogSettings, level: string): boolean =>
  settings.enabledLevels.has(level);

const allows = (allowed: ReadonlySet<string>, value: string): boolean =>
  allowed.size === 0 || allowed.has(value);

const intersects = (
  allowed: ReadonlySet<string>,
  values: ReadonlySet<string>,
): boolean => {
  if (allowed.size === 0) return true;
  for (const value of values) {
    if (allowed.has(value)) return true;
  }
  return false;
};

/**
 * Whitelist first, then every non-empty filter axis. An empty axis matches
 * everything.
 */
export const passesFilters = (
  settings: LogSettings,
  subject: FilterSubject,
): boolean => {
  const { whitelist, filters } = settings;
  if (whitelist.size > 0 && !whitelist.has(subject.module)) {
    return false;
  }
  return (
    allows(filters.levels, subject.level) &&
    allows(filters.modules, subject.module) &&
    allows(filters.functions, subject.functionName) &&
    intersects(filters.tags, subject.tags)
  );
};
