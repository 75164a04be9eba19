/**
 * envswitch CLI Commands
 *
 * Commands are organized into groups:
 * - env/      - Environment transitions (switch, stop, setup-worktrees)
 * - inspect/  - Read-only views (health, status, logs, debug-log)
 * - project/  - Project setup (init)
 */

// Environment commands
export { switchCommand, stopCommand, setupWorktreesCommand } from './env';

// Inspection commands
export { healthCommand, statusCommand, logsCommand, debugLogCommand } from './inspect';

// Project commands
export { initCommand } from './project';
