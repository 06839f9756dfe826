/**
 * Command infrastructure for the circuit debugger.
 *
 * Provides the ICommand interface and the BaseCommand abstract class used by
 * commands that are driven both through tool calls and from the CLI.
 * @public
 * @see file:./interfaces.ts - Core interface definitions
 * @see file:./base-command.ts - Base command implementation
 */

export type {
  ICommand,
  ICommandMetadata,
  ICommandOptions,
  Tool,
  CallToolResult,
} from './interfaces.js';
export { BaseCommand } from './base-command.js';
