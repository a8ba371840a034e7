import { getConfig } from './config';

export interface CLIResponse<T = unknown> {
  success: boolean;
  data?: T;
  error?: {
    code: string;
    message: string;
    details?: unknown;
  };
  metadata?: {
    timestamp: string;
    durationMs?: number;
  };
}

export function success<T>(data: T, durationMs?: number): CLIResponse<T> {
  return {
    success: true,
    data,
    metadata: {
      timestamp: new Date().toISOString(),
      ...(durationMs !== undefined ? { durationMs } : {}),
    },
  };
}

export function failure(code: string, message: string, details?: unknown): CLIResponse {
  return {
    success: false,
    error: { code, message, ...(details !== undefined ? { details } : {}) },
    metadata: { timestamp: new Date().toISOString() },
  };
}

export function print(response: CLIResponse): void {
  if (getConfig().output === 'text') {
    if (response.success) {
      const text = formatText(response.data);
      if (text.length > 0) console.log(text);
      return;
    }
    const code = response.error?.code ?? 'UNKNOWN';
    const message = response.error?.message ?? 'Unknown error';
    console.error(`Error [${code}]: ${message}`);
    const details = formatText(response.error?.details, '  ');
    if (details.length > 0) console.error(details);
    return;
  }

  console.log(JSON.stringify(response, null, 2));
}

function isObjectRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Plain-text rendering: `key: value` lines, nested records indented, arrays of
 * scalars as `- item` lists.
 */
export function formatText(data: unknown, indent = ''): string {
  if (data === undefined || data === null) return '';
  if (!isObjectRecord(data) && !Array.isArray(data)) return `${indent}${String(data)}`;
  if (Array.isArray(data)) {
    if (data.length === 0) return `${indent}(empty)`;
    return data
      .map((item) => (isObjectRecord(item) ? `${indent}-\n${formatText(item, indent + '  ')}` : `${indent}- ${String(item)}`))
      .join('\n');
  }
  return Object.entries(data)
    .filter(([, v]) => v !== undefined)
    .map(([k, v]) => {
      if (v === null || typeof v !== 'object') return `${indent}${k}: ${String(v)}`;
      if (Array.isArray(v) && v.length === 0) return `${indent}${k}: (empty)`;
      return `${indent}${k}:\n${formatText(v, indent + '  ')}`;
    })
    .join('\n');
}
