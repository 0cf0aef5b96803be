// ═══════════════════════════════════════════════════════════════════════════════
// ENVIRONMENT HELPERS
// ═══════════════════════════════════════════════════════════════════════════════

export type Env = Readonly<Record<string, string | undefined>>;

export function envNumber(key: string, env: Env = process.env): number | undefined {
  const value = env[key];
  if (value === undefined || value.trim() === '') return undefined;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? undefined : parsed;
}

/**
 * Like envNumber but keeps the fractional part ("0.25" → 0.25).
 */
export function envFloat(key: string, env: Env = process.env): number | undefined {
  const value = env[key];
  if (value === undefined || value.trim() === '') return undefined;
  const parsed = parseFloat(value);
  return Number.isFinite(parsed) ? parsed : undefined;
}

export function envList(key: string, env: Env = process.env): string[] | undefined {
  const value = env[key];
  if (!value) return undefined;
  const items = value.split(',').map(s => s.trim()).filter(Boolean);
  return items.length > 0 ? items : undefined;
}
