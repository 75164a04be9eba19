/**
 * Project commands
 * Commands for setting up envswitch in a repository
 */

export { initCommand } from './init';
