import type { ActionRecord, OrchestrationStatus, OrchestrationStatusView } from '../types/index.js';

/**
 * ANSI color codes for terminal output.
 */
const colors = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  dim: '\x1b[2m',

  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  cyan: '\x1b[36m',
  white: '\x1b[37m',
  gray: '\x1b[90m',
} as const;

/**
 * Check if colors should be enabled.
 */
function useColors(): boolean {
  // Respect NO_COLOR environment variable
  if (process.env['NO_COLOR'] !== undefined) {
    return false;
  }
  if (process.env['FORCE_COLOR'] !== undefined) {
    return true;
  }
  return process.stdout.isTTY ?? false;
}

/**
 * Apply color to text if colors are enabled.
 */
function colorize(text: string, color: keyof typeof colors): string {
  if (!useColors()) {
    return text;
  }
  return `${colors[color]}${text}${colors.reset}`;
}

export function bold(text: string): string {
  return colorize(text, 'bold');
}

export function dim(text: string): string {
  return colorize(text, 'dim');
}

export function red(text: string): string {
  return colorize(text, 'red');
}

export function green(text: string): string {
  return colorize(text, 'green');
}

export function yellow(text: string): string {
  return colorize(text, 'yellow');
}

export function blue(text: string): string {
  return colorize(text, 'blue');
}

export function cyan(text: string): string {
  return colorize(text, 'cyan');
}

/**
 * Format an orchestration status with appropriate color.
 */
export function formatStatus(status: OrchestrationStatus): string {
  const statusColors: Record<OrchestrationStatus, keyof typeof colors> = {
    Running: 'blue',
    Pending: 'yellow',
    Completed: 'green',
    Failed: 'red',
  };

  return colorize(status.toUpperCase(), statusColors[status]);
}

/**
 * Format an action status with appropriate color.
 */
export function formatActionStatus(status: ActionRecord['status']): string {
  const statusColors: Record<ActionRecord['status'], keyof typeof colors> = {
    scheduled: 'yellow',
    completed: 'green',
    failed: 'red',
  };

  return colorize(status, statusColors[status]);
}

/**
 * Format an ISO timestamp for display.
 */
export function formatDate(iso: string): string {
  return new Date(iso).toLocaleString('en-US', {
    year: 'numeric',
    month: 'short',
    day: '2-digit',
    hour: '2-digit',
    minute: '2-digit',
    second: '2-digit',
    hour12: false,
  });
}

/**
 * Format a relative time (e.g., "2 hours ago").
 */
export function formatRelativeTime(iso: string, now: number = Date.now()): string {
  const diff = now - new Date(iso).getTime();

  const seconds = Math.floor(diff / 1000);
  const minutes = Math.floor(seconds / 60);
  const hours = Math.floor(minutes / 60);
  const days = Math.floor(hours / 24);

  if (days > 0) {
    return `${days} day${days > 1 ? 's' : ''} ago`;
  }
  if (hours > 0) {
    return `${hours} hour${hours > 1 ? 's' : ''} ago`;
  }
  if (minutes > 0) {
    return `${minutes} minute${minutes > 1 ? 's' : ''} ago`;
  }
  return 'just now';
}

/**
 * Truncate a string to a maximum length.
 */
export function truncate(text: string, maxLength: number): string {
  if (text.length <= maxLength) {
    return text;
  }
  return `${text.slice(0, maxLength - 3)}...`;
}

export function padRight(text: string, width: number): string {
  return text.padEnd(width);
}

export function padLeft(text: string, width: number): string {
  return text.padStart(width);
}

/**
 * Render any value on one line.
 */
export function formatValue(value: unknown): string {
  if (value === undefined) {
    return '';
  }
  return typeof value === 'string' ? value : JSON.stringify(value);
}

/**
 * Format an orchestration instance for detailed display.
 */
export function formatInstanceDetail(view: OrchestrationStatusView): string {
  const lines: string[] = [];

  lines.push(bold('Orchestration Instance'));
  lines.push('');
  lines.push(`${bold('ID:')}           ${view.instanceId}`);
  lines.push(`${bold('Name:')}         ${view.name}`);
  lines.push(`${bold('Status:')}       ${formatStatus(view.status)}`);
  lines.push(`${bold('Created:')}      ${formatDate(view.createdAt)} (${dim(formatRelativeTime(view.createdAt))})`);
  lines.push(`${bold('Updated:')}      ${formatDate(view.lastUpdated)} (${dim(formatRelativeTime(view.lastUpdated))})`);

  if (view.customStatus !== undefined) {
    lines.push('');
    lines.push(bold('Custom Status:'));
    lines.push(`  ${formatValue(view.customStatus)}`);
  }

  if (view.output !== undefined) {
    lines.push('');
    lines.push(bold('Output:'));
    lines.push(`  ${formatValue(view.output)}`);
  }

  if (view.error) {
    lines.push('');
    lines.push(`${bold(red('Error:'))}`);
    lines.push(`  ${red(view.error.code !== undefined ? `[${view.error.code}] ${view.error.message}` : view.error.message)}`);
  }

  return lines.join('\n');
}

/**
 * Table column definition.
 */
interface TableColumn<T> {
  header: string;
  width: number;
  align?: 'left' | 'right';
  value: (item: T) => string;
}

/**
 * Format data as a table.
 */
export function formatTable<T>(items: T[], columns: TableColumn<T>[]): string {
  const lines: string[] = [];

  const headerRow = columns
    .map(col => {
      const header = col.align === 'right'
        ? padLeft(col.header, col.width)
        : padRight(col.header, col.width);
      return bold(header);
    })
    .join('  ');
  lines.push(headerRow);

  const separator = columns.map(col => '-'.repeat(col.width)).join('  ');
  lines.push(dim(separator));

  for (const item of items) {
    const row = columns
      .map(col => {
        const value = truncate(col.value(item), col.width);
        return col.align === 'right'
          ? padLeft(value, col.width)
          : padRight(value, col.width);
      })
      .join('  ');
    lines.push(row);
  }

  return lines.join('\n');
}

/**
 * Format a list of orchestration instances as a table.
 */
export function formatInstanceList(views: OrchestrationStatusView[]): string {
  if (views.length === 0) {
    return dim('No orchestration instances found.');
  }

  const columns: TableColumn<OrchestrationStatusView>[] = [
    { header: 'ID', width: 24, value: v => v.instanceId },
    { header: 'NAME', width: 20, value: v => v.name },
    { header: 'STATUS', width: 10, value: v => v.status },
    { header: 'UPDATED', width: 16, value: v => formatRelativeTime(v.lastUpdated) },
  ];

  return formatTable(views, columns);
}

/**
 * Format folded action records as a table.
 */
export function formatActionList(actions: ActionRecord[]): string {
  if (actions.length === 0) {
    return dim('No actions recorded.');
  }

  const columns: TableColumn<ActionRecord>[] = [
    { header: '#', width: 4, align: 'right', value: a => String(a.sequenceNo) },
    { header: 'KIND', width: 13, value: a => a.kind },
    { header: 'NAME', width: 30, value: a => a.name },
    { header: 'STATUS', width: 9, value: a => a.status },
    {
      header: 'RESULT',
      width: 40,
      value: a => (a.status === 'failed' ? (a.error?.message ?? '') : formatValue(a.result)),
    },
  ];

  return formatTable(actions, columns);
}

export function formatSuccess(message: string): string {
  return `${green('✓')} ${message}`;
}

export function formatError(message: string): string {
  return `${red('✗')} ${red(message)}`;
}

export function formatWarning(message: string): string {
  return `${yellow('!')} ${yellow(message)}`;
}

export function formatInfo(message: string): string {
  return `${blue('i')} ${message}`;
}

export function formatJson(data: unknown): string {
  return JSON.stringify(data, null, 2);
}

/**
 * Print to stdout.
 */
export function print(text: string): void {
  // eslint-disable-next-line no-console -- CLI output function
  console.log(text);
}

/**
 * Print error to stderr.
 */
export function printError(text: string): void {
  // eslint-disable-next-line no-console -- CLI error output function
  console.error(text);
}

/**
 * Format and print validation errors.
 */
export function formatValidationErrors(errors: Array<{ path: string; message: string }>): string {
  const lines = errors.map(e => {
    const path = e.path ? `${bold(e.path)}: ` : '';
    return `  ${red('•')} ${path}${e.message}`;
  });

  return [formatError('Validation failed:'), ...lines].join('\n');
}
