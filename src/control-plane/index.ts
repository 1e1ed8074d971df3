export {
  bold,
  dim,
  red,
  green,
  yellow,
  blue,
  cyan,
  formatStatus,
  formatActionStatus,
  formatDate,
  formatRelativeTime,
  truncate,
  padRight,
  padLeft,
  formatValue,
  formatInstanceDetail,
  formatInstanceList,
  formatActionList,
  formatTable,
  formatSuccess,
  formatError,
  formatWarning,
  formatInfo,
  formatJson,
  formatValidationErrors,
  print,
  printError,
} from './formatter.js';

export {
  createProgram,
  runCli,
  createServeCommand,
  createStatusCommand,
  createHistoryCommand,
  createListCommand,
} from './cli.js';
