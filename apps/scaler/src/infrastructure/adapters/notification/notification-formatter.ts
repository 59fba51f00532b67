const COLORS: Record<string, number> = {
  'scale-up': 0xe6_7e_22, // Orange
  'scale-down': 0x2e_cc_71, // Green
  status: 0x34_98_db, // Blue
  error: 0xe7_4c_3c, // Red
  info: 0x00_ff_ff, // Cyan
};

export function getColorForType(type: string): number {
  return COLORS[type] ?? 0x80_80_80;
}

export function formatFieldValue(value: unknown): string {
  if (typeof value === 'number') {
    return Number.isInteger(value) ? value.toString() : value.toFixed(2);
  }
  if (typeof value === 'string') {
    return value;
  }
  return JSON.stringify(value) ?? String(value);
}

export function buildFooter(workload: string, at: Date = new Date()): string {
  return `${workload} • ${at.toISOString()}`;
}
