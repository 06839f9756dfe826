import type {
  CallToolResult,
  Tool,
} from '@modelcontextprotocol/sdk/types.js';

export type { CallToolResult, Tool };

/**
 * Options shared by every command, whether invoked as a tool or from the CLI.
 * @public
 */
export interface ICommandOptions {
  verbose?: boolean;
  dryRun?: boolean;
  format?: 'json' | 'text' | 'console';
}

/**
 * Static description of a command.
 * @public
 */
export interface ICommandMetadata {
  name: string;
  description: string;
}

/**
 * A command exposed both as tool calls and as a CLI entry point.
 * @public
 */
export interface ICommand extends ICommandMetadata {
  /**
   * Execute one of the tools returned by {@link ICommand.getMCPDefinitions}.
   * @param toolName - Fully prefixed tool name
   * @param args - Tool arguments as received from the caller
   */
  executeToolViaMCP(
    toolName: string,
    args: Record<string, unknown>,
  ): Promise<CallToolResult>;
  executeViaCLI(args: string[]): Promise<void>;
  getMCPDefinitions(): Tool[];
}
