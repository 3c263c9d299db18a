import type { SystemInfo } from '../types/issue.js';

/**
 * Render an issue body from an optional description and system info pairs.
 *
 * Pairs are rendered as a Markdown table in the order given. Pipe characters
 * in keys or values are not escaped and will break the table.
 */
export function formatDescription(description?: string, systemInfo: SystemInfo = []): string {
  let body = '';

  if (description !== undefined) {
    body += description;
    body += '\n\n';
  }

  if (systemInfo.length > 0) {
    body += '## System Info\n\n';
    body += '| Field | Value |\n|-------|-------|\n';
    for (const [key, value] of systemInfo) {
      body += `| ${key} | ${value} |\n`;
    }
  }

  return body.trimEnd();
}
