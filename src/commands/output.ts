/**
 * Shared terminal output for CLI commands.
 */

import { ConfigurationError } from '../core/errors.js';
import type { ExecutionResult } from '../core/types.js';

const STATUS_ICONS: Record<ExecutionResult['status'], string> = {
  success: '✅',
  denied: '🚫',
  failed: '❌',
};

const MAX_LIST_LINES = 200;

export function formatResult(result: ExecutionResult): string[] {
  const lines: string[] = [];
  const head = [STATUS_ICONS[result.status], result.status.toUpperCase()];
  if (result.kind) head.push(result.kind);
  if (result.summary) head.push(`- ${result.summary}`);
  lines.push(head.join(' '));

  if (result.error) {
    lines.push(`   ${result.error.code}: ${result.error.message}`);
    if (result.error.rule) lines.push(`   Rule: ${result.error.rule}`);
  }
  if (result.auditError) {
    lines.push(`   ⚠️  ${result.auditError.message}`);
  }

  for (const item of result.items ?? []) {
    const arrow = item.target ? ` -> ${item.target}` : '';
    lines.push(`   ${item.ok ? '✓' : '✗'} ${item.path}${arrow}${item.error ? `  (${item.error.code})` : ''}`);
  }

  const output = result.output;
  if (!output) return lines;
  switch (output.kind) {
    case 'read':
      lines.push('', output.content);
      if (output.truncated) lines.push(`   ... truncated (${output.bytes} bytes total)`);
      break;
    case 'list':
      lines.push(`   ${output.directory}`);
      for (const entry of output.entries.slice(0, MAX_LIST_LINES)) {
        lines.push(entry.type === 'directory' ? `   📁 ${entry.name}/` : `   📄 ${entry.name}  ${formatSize(entry.size)}`);
      }
      if (output.entries.length > MAX_LIST_LINES) {
        lines.push(`   ... ${output.entries.length - MAX_LIST_LINES} more`);
      }
      if (output.hidden > 0) lines.push(`   (${output.hidden} hidden by policy)`);
      break;
    case 'search':
      if (output.matches.length === 0) lines.push('   No matches');
      for (const match of output.matches) {
        lines.push(match.line === undefined ? `   ${match.path}` : `   ${match.path}:${match.line}  ${match.preview ?? ''}`);
      }
      lines.push(`   ${output.scanned} file(s) scanned${output.truncated ? ', results truncated' : ''}`);
      break;
    case 'execute':
      lines.push(`   Exit code: ${output.exitCode ?? 'none'}`);
      if (output.stdout) lines.push('', output.stdout.trimEnd());
      if (output.stderr) lines.push('', output.stderr.trimEnd());
      break;
  }
  return lines;
}

export function printResult(result: ExecutionResult): void {
  console.log('');
  for (const line of formatResult(result)) {
    console.log(line === '' ? '' : `  ${line}`);
  }
  console.log('');
}

export function formatSize(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`;
  return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
}

/** Print a startup error and exit. ConfigurationError lists every problem. */
export function exitWithError(err: unknown): never {
  if (err instanceof ConfigurationError) {
    console.error(`  ❌ ${err.message}`);
    console.error('  Run `navbuddy init` to create a configuration, or fix the file above.');
  } else {
    console.error(`  ❌ ${err instanceof Error ? err.message : String(err)}`);
  }
  process.exit(1);
}
