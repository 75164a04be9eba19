/**
 * Environment commands
 * Commands that change which environment is running
 */

export { switchCommand } from './switch';
export { stopCommand } from './stop';
export { setupWorktreesCommand } from './worktrees';
