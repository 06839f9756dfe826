/**
 * Base abstract class for circuit debugger commands.
 *
 * Provides option parsing and logging helpers that behave correctly in both
 * tool-call and CLI execution contexts.
 * @remarks
 * Subclasses implement the ICommand methods to define their tools and CLI.
 * @example Basic command implementation
 * ```typescript
 * export class InspectCommand extends BaseCommand {
 *   readonly name = 'inspect';
 *   readonly description = 'Inspect a compiled circuit';
 *
 *   async executeToolViaMCP(toolName: string, args: Record<string, unknown>) {
 *     const options = this.parseCommonOptions(args);
 *     // Implementation
 *   }
 *
 *   async executeViaCLI(args: string[]) {
 *     const options = this.parseCommonOptions(args);
 *     this.log('Inspecting...', options);
 *   }
 *
 *   getMCPDefinitions() {
 *     return [{ name: this.name, description: this.description, inputSchema: { type: 'object' } }];
 *   }
 * }
 * ```
 * @public
 */

import type {
  CallToolResult,
  ICommand,
  ICommandOptions,
  Tool,
} from './interfaces.js';

const FORMATS = ['json', 'text', 'console'] as const;

function isFormat(value: unknown): value is NonNullable<ICommandOptions['format']> {
  return typeof value === 'string' && (FORMATS as readonly string[]).includes(value);
}

/**
 * Abstract base class that provides common functionality for all commands.
 * @public
 */
export abstract class BaseCommand implements ICommand {
  public abstract readonly name: string;
  public abstract readonly description: string;

  public abstract executeToolViaMCP(
    toolName: string,
    args: Record<string, unknown>,
  ): Promise<CallToolResult>;
  public abstract executeViaCLI(args: string[]): Promise<void>;
  public abstract getMCPDefinitions(): Tool[];

  /**
   * Parse common command options from arguments.
   *
   * Extracts `verbose`, `dryRun` and `format` from either tool arguments
   * (object) or CLI arguments (string array, `--verbose`/`-v`,
   * `--dry-run`, `--format <type>`).
   * @param args - Tool arguments as object or CLI arguments as string array
   * @returns Parsed options
   */
  protected parseCommonOptions(
    args: Record<string, unknown> | string[],
  ): ICommandOptions {
    const options: ICommandOptions = {};

    if (Array.isArray(args)) {
      options.verbose = args.includes('--verbose') || args.includes('-v');
      options.dryRun = args.includes('--dry-run');

      const formatIndex = args.findIndex((arg) => arg === '--format');
      if (formatIndex !== -1 && formatIndex < args.length - 1) {
        const format = args[formatIndex + 1];
        if (isFormat(format)) {
          options.format = format;
        }
      }
    } else {
      options.verbose = Boolean(args.verbose);
      options.dryRun = Boolean(args.dryRun);
      if (isFormat(args.format)) {
        options.format = args.format;
      }
    }

    return options;
  }

  /**
   * Log output based on format preference.
   *
   * Suppressed when the format is 'json' so structured output stays parseable.
   * @param message - The message to log
   * @param options - Command options containing format preference
   */
  protected log(message: string, options: ICommandOptions = {}): void {
    if (options.format === 'json') {
      return;
    }
    console.info(message);
  }

  /**
   * Log error output to stderr, suppressed in 'json' format.
   * @param message - The error message to log
   * @param options - Command options containing format preference
   */
  protected logError(message: string, options: ICommandOptions = {}): void {
    if (options.format === 'json') {
      return;
    }
    console.error(message);
  }
}
