import { formatKeyLabel } from './key-utils.js';

export const STATUS_TTL_MS = 3000;

export interface StatusMessage {
  text: string;
  expiresAt: number;
}

export function createStatus(text: string, nowMs: number, ttlMs = STATUS_TTL_MS): StatusMessage {
  return { text, expiresAt: nowMs + ttlMs };
}

export function isStatusActive(status: StatusMessage | null, nowMs: number): status is StatusMessage {
  if (!status) return false;
  return nowMs < status.expiresAt;
}

export function formatHelpHint(helpKey: string): string {
  return `Press ${formatKeyLabel(helpKey)} for help`;
}

export function formatErrorSummary(errors: readonly Error[]): string | null {
  const [first] = errors;
  if (!first) return null;
  return errors.length > 1 ? `${first.message} (+${errors.length - 1} more)` : first.message;
}
