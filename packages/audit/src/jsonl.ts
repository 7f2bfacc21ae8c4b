/**
 * JSON Lines export of the audit log, one entry per line.
 */

import type { AuditEntry, JsonlOptions, JsonlParseOptions } from './types.js';
import { isValidAuditEntry } from './entry.js';

const RAW_PREVIEW = 100;

export function formatJsonlLine(entry: AuditEntry): string {
  return JSON.stringify(entry);
}

export function formatJsonl(entries: readonly AuditEntry[], options?: JsonlOptions): string {
  if (entries.length === 0) {
    return '';
  }
  const body = entries.map(formatJsonlLine).join('\n');
  return options?.trailingNewline ? `${body}\n` : body;
}

/**
 * A line that could not be read back as an audit entry
 */
export interface JsonlLineError {
  /** 1-based, counting blank lines */
  lineNumber: number;
  error: string;
  /** Leading part of the offending line */
  raw: string;
}

export interface JsonlParseResult {
  entries: AuditEntry[];
  errors: JsonlLineError[];
  /** Non-empty lines examined */
  totalLines: number;
}

function preview(text: string): string {
  return text.length > RAW_PREVIEW ? `${text.slice(0, RAW_PREVIEW)}...` : text;
}

function readLine(text: string): AuditEntry | string {
  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch (err) {
    return err instanceof Error ? err.message : 'JSON parse error';
  }
  return isValidAuditEntry(value) ? value : 'Invalid audit entry structure';
}

/**
 * Read entries back from JSONL. Blank lines are ignored. Unless
 * `skipInvalid` is set, reading stops at the first bad line.
 */
export function parseJsonl(content: string, options: JsonlParseOptions = {}): JsonlParseResult {
  const result: JsonlParseResult = { entries: [], errors: [], totalLines: 0 };
  const limit = options.maxLines ?? 0;

  for (const [index, line] of content.split('\n').entries()) {
    const text = line.trim();
    if (text.length === 0) {
      continue;
    }
    if (limit > 0 && result.totalLines >= limit) {
      break;
    }
    result.totalLines++;

    const read = readLine(text);
    if (typeof read !== 'string') {
      result.entries.push(read);
      continue;
    }
    result.errors.push({ lineNumber: index + 1, error: read, raw: preview(text) });
    if (!options.skipInvalid) {
      break;
    }
  }

  return result;
}
