/**
 * Inspection commands
 * Read-only views of the active environment
 */

export { healthCommand } from './health';
export { statusCommand } from './status';
export { logsCommand } from './logs';
export { debugLogCommand } from './debug-log';
