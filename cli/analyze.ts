/**
 * Subtrack Lineage CLI
 *
 * Commands:
 * - location: analyze one `Tracking Result` folder
 * - batch: analyze every `Tracking Result` folder below a parent
 * - tree: print lineage trees from an emitted lineage table
 */

import type { AnalysisConfig } from '../src/core/config/analysis-config.js';
import { resolveAnalysisConfig } from '../src/core/config/analysis-config.js';
import { ConfigurationError } from '../src/core/errors.js';
import type { LineageLogger } from '../src/core/logging/logger.js';
import { createConsoleLogger } from '../src/core/logging/logger.js';
import { decodeLineageTable, groupLineageByTrack } from '../src/emit/tables.js';
import { loadAnalysisConfigFile, readTextFile } from '../src/io/location-files.js';
import { buildLineageTree, renderLineageTree } from '../src/lineage/lineage-tree.js';
import { BatchAnalyzer, LocationStatus } from '../src/pipeline/batch.js';

/**
 * CLI command definition
 */
export interface CLICommand {
  /** Command name */
  readonly name: string;
  /** Command description */
  readonly description: string;
  /** Command options */
  readonly options: readonly CLIOption[];
  /** Execute function */
  readonly execute: (args: Record<string, unknown>) => Promise<CLIResult>;
}

/**
 * CLI option definition
 */
export interface CLIOption {
  /** Option name (e.g., "--folder") */
  readonly name: string;
  /** Short alias (e.g., "-f") */
  readonly alias?: string;
  /** Option description */
  readonly description: string;
  /** Whether the option is required */
  readonly required?: boolean;
  /** Default value */
  readonly defaultValue?: unknown;
  /** Value type */
  readonly type: 'string' | 'number' | 'boolean';
}

/**
 * CLI execution result
 */
export interface CLIResult {
  /** Whether the command succeeded */
  readonly success: boolean;
  /** Exit code */
  readonly exitCode: number;
  /** Output message */
  readonly message: string;
  /** Output data (if any) */
  readonly data?: unknown;
  /** Error (if failed) */
  readonly error?: string;
}

const QC_OPTIONS: readonly CLIOption[] = [
  {
    name: '--max-splits',
    alias: '-s',
    description: 'Reject tracks with more divisions than this',
    type: 'number',
    defaultValue: 3,
  },
  {
    name: '--min-duration',
    alias: '-d',
    description: 'Reject tracks spanning fewer frames than this',
    type: 'number',
    defaultValue: 20,
  },
  {
    name: '--config',
    alias: '-c',
    description: 'JSON analysis configuration file; flags override its values',
    type: 'string',
  },
];

/**
 * Read an integer flag; undefined when absent
 *
 * @throws ConfigurationError when present but not an integer
 */
export function integerOption(args: Record<string, unknown>, key: string): number | undefined {
  const raw = args[key];
  if (raw === undefined) {
    return undefined;
  }
  const value = typeof raw === 'string' ? Number(raw) : Number.NaN;
  if (!Number.isInteger(value)) {
    throw new ConfigurationError([`--${key}: expected an integer, got ${String(raw)}`]);
  }
  return value;
}

/**
 * Subtrack lineage CLI implementation
 */
export class LineageCLI {
  private logger: LineageLogger;
  private commands: Map<string, CLICommand> = new Map();

  constructor(logger?: LineageLogger) {
    this.logger = logger ?? createConsoleLogger();
    this.registerCommands();
  }

  /**
   * Register all CLI commands
   */
  private registerCommands(): void {
    this.commands.set('location', {
      name: 'location',
      description: 'Analyze one Tracking Result folder',
      options: [
        {
          name: '--folder',
          alias: '-f',
          description: 'Path to the Tracking Result folder',
          type: 'string',
          required: true,
        },
        ...QC_OPTIONS,
      ],
      execute: async (args) => this.analyzeLocation(args),
    });

    this.commands.set('batch', {
      name: 'batch',
      description: 'Analyze every Tracking Result folder below a parent folder',
      options: [
        {
          name: '--parent',
          alias: '-p',
          description: 'Folder to search for Tracking Result folders',
          type: 'string',
          required: true,
        },
        {
          name: '--concurrency',
          alias: '-j',
          description: 'Locations analyzed at the same time',
          type: 'number',
          defaultValue: 1,
        },
        ...QC_OPTIONS,
      ],
      execute: async (args) => this.analyzeBatch(args),
    });

    this.commands.set('tree', {
      name: 'tree',
      description: 'Print lineage trees from a subtrack lineage table',
      options: [
        {
          name: '--lineage',
          alias: '-l',
          description: 'Path to a *-subtrack_lineage.csv file',
          type: 'string',
          required: true,
        },
        {
          name: '--track',
          alias: '-t',
          description: 'Only print this track',
          type: 'number',
        },
      ],
      execute: async (args) => this.printTrees(args),
    });
  }

  /**
   * Get available commands
   */
  getCommands(): readonly CLICommand[] {
    return Array.from(this.commands.values());
  }

  /**
   * Execute a command
   */
  async execute(commandName: string, args: Record<string, unknown>): Promise<CLIResult> {
    const command = this.commands.get(commandName);

    if (!command) {
      return {
        success: false,
        exitCode: 1,
        message: `Unknown command: ${commandName}`,
        error: `Available commands: ${Array.from(this.commands.keys()).join(', ')}`,
      };
    }

    // Validate required options
    for (const option of command.options) {
      if (option.required && typeof args[option.name.replace('--', '')] !== 'string') {
        return {
          success: false,
          exitCode: 1,
          message: `Missing required option: ${option.name}`,
          error: option.description,
        };
      }
    }

    try {
      return await command.execute(args);
    } catch (error) {
      return {
        success: false,
        exitCode: 1,
        message: 'Command execution failed',
        error: error instanceof Error ? error.message : 'Unknown error',
      };
    }
  }

  /**
   * Parse command line arguments
   */
  parseArgs(argv: string[]): { command: string; args: Record<string, unknown> } {
    const args: Record<string, unknown> = {};
    let command = '';

    for (let i = 0; i < argv.length; i++) {
      const arg = argv[i];

      if (!arg) continue;

      if (!arg.startsWith('-') && !command) {
        command = arg;
        continue;
      }

      let key: string | undefined;
      if (arg.startsWith('--')) {
        key = arg.substring(2);
      } else if (arg.startsWith('-')) {
        key = this.resolveAlias(command, arg);
      }
      if (key === undefined) continue;

      const nextArg = argv[i + 1];
      if (nextArg && !nextArg.startsWith('-')) {
        args[key] = nextArg;
        i++;
      } else {
        args[key] = true;
      }
    }

    return { command, args };
  }

  private resolveAlias(commandName: string, alias: string): string | undefined {
    if (alias === '-h') {
      return 'help';
    }
    const scoped = this.commands.get(commandName);
    const candidates = scoped ? [scoped] : Array.from(this.commands.values());
    for (const cmd of candidates) {
      const option = cmd.options.find((o) => o.alias === alias);
      if (option) {
        return option.name.replace('--', '');
      }
    }
    return undefined;
  }

  /**
   * Generate help text
   */
  generateHelp(): string {
    const lines: string[] = [
      'Subtrack Lineage - decompose branching tracks into subtracks',
      '',
      'Usage: subtrack-lineage <command> [options]',
      '',
      'Commands:',
    ];

    for (const command of this.commands.values()) {
      lines.push(`  ${command.name.padEnd(15)} ${command.description}`);
    }

    lines.push('', 'Run "subtrack-lineage <command> --help" for command-specific options.');

    return lines.join('\n');
  }

  /**
   * Generate command help
   */
  generateCommandHelp(commandName: string): string | null {
    const command = this.commands.get(commandName);
    if (!command) {
      return null;
    }

    const lines: string[] = [
      `subtrack-lineage ${command.name} - ${command.description}`,
      '',
      'Options:',
    ];

    for (const option of command.options) {
      const aliasStr = option.alias ? `, ${option.alias}` : '';
      const requiredStr = option.required ? ' (required)' : '';
      const defaultStr =
        option.defaultValue !== undefined ? ` [default: ${String(option.defaultValue)}]` : '';
      lines.push(`  ${option.name}${aliasStr}${requiredStr}${defaultStr}`, `      ${option.description}`, '');
    }

    return lines.join('\n');
  }

  /**
   * Build the analysis configuration: defaults, then the config file, then flags
   */
  async resolveConfig(args: Record<string, unknown>): Promise<AnalysisConfig> {
    const configPath = args['config'];
    const base =
      typeof configPath === 'string'
        ? await loadAnalysisConfigFile(configPath)
        : resolveAnalysisConfig({});

    const maxSplits = integerOption(args, 'max-splits');
    const minDuration = integerOption(args, 'min-duration');
    const concurrency = integerOption(args, 'concurrency');

    return resolveAnalysisConfig({
      ...base,
      qc: {
        ...base.qc,
        ...(maxSplits === undefined ? {} : { maxSplitsAllowed: maxSplits }),
        ...(minDuration === undefined ? {} : { minTrackDurationFrames: minDuration }),
      },
      ...(concurrency === undefined ? {} : { concurrency }),
    });
  }

  // Command implementations

  private async analyzeLocation(args: Record<string, unknown>): Promise<CLIResult> {
    const config = await this.resolveConfig(args);
    const analyzer = new BatchAnalyzer(config, this.logger);
    const result = await analyzer.analyzeFolder(String(args['folder']));

    if (result.status === LocationStatus.FAILED) {
      return {
        success: false,
        exitCode: 1,
        message: `Location ${result.locationName} failed`,
        error: result.message,
      };
    }

    const { tracks, subtracks } = result.manifest;
    return {
      success: true,
      exitCode: 0,
      message: `${result.locationName}: ${subtracks} subtracks from ${tracks.processed} of ${tracks.total} tracks (${tracks.rejected} rejected, ${tracks.failed} failed)`,
      data: result.outputs,
    };
  }

  private async analyzeBatch(args: Record<string, unknown>): Promise<CLIResult> {
    const config = await this.resolveConfig(args);
    const analyzer = new BatchAnalyzer(config, this.logger);
    const report = await analyzer.analyzeParent(String(args['parent']), (completed, total) =>
      this.logger.info(`[${completed}/${total}] locations done`)
    );

    const locations = report.locations.map((location) =>
      location.status === LocationStatus.SUCCEEDED
        ? { location: location.locationName, status: location.status, subtracks: location.manifest.subtracks }
        : { location: location.locationName, status: location.status, error: location.message }
    );

    return {
      success: report.failed === 0,
      exitCode: report.failed === 0 ? 0 : 1,
      message: `Processed ${report.locations.length} locations: ${report.succeeded} succeeded, ${report.failed} failed`,
      data: locations,
    };
  }

  private async printTrees(args: Record<string, unknown>): Promise<CLIResult> {
    const rows = decodeLineageTable(await readTextFile(String(args['lineage'])));
    const onlyTrack = integerOption(args, 'track');

    const rendered: string[] = [];
    for (const [trackId, trackRows] of groupLineageByTrack(rows)) {
      if (onlyTrack !== undefined && trackId !== onlyTrack) continue;
      rendered.push(renderLineageTree(buildLineageTree(trackRows)));
    }

    if (onlyTrack !== undefined && rendered.length === 0) {
      return {
        success: false,
        exitCode: 1,
        message: `Track ${onlyTrack} is not in the lineage table`,
      };
    }

    return {
      success: true,
      exitCode: 0,
      message: `Rendered ${rendered.length} lineage trees`,
      data: rendered.join('\n\n'),
    };
  }
}

/**
 * Create a lineage CLI instance
 */
export function createLineageCLI(logger?: LineageLogger): LineageCLI {
  return new LineageCLI(logger);
}

/**
 * Main entry point for CLI
 */
export async function main(argv: string[], logger?: LineageLogger): Promise<number> {
  const cli = createLineageCLI(logger);

  const [first] = argv;
  if (first === undefined || first === '--help' || first === '-h') {
    console.log(cli.generateHelp());
    return 0;
  }

  const { command, args } = cli.parseArgs(argv);

  if (args['help']) {
    const help = cli.generateCommandHelp(command);
    if (help) {
      console.log(help);
      return 0;
    }
  }

  const result = await cli.execute(command, args);

  if (result.data && typeof result.data === 'string') {
    console.log(result.data);
  } else if (result.data) {
    console.log(JSON.stringify(result.data, null, 2));
  }

  if (result.success) {
    console.log(result.message);
  } else {
    console.error(`Error: ${result.message}`);
    if (result.error) {
      console.error(result.error);
    }
  }

  return result.exitCode;
}
