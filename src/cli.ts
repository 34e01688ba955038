import { Command } from 'commander';
import { loadConfig, type PortbankConfig } from './config/index.js';
import { formatError, setColorEnabled } from './pipeline/diagnostics.js';
import { processIO, type PipelineIO } from './pipeline/renderTable.js';
import { handleResolvePorts } from './tools/resolve_ports.js';
import { handleRenderRows } from './tools/render_rows.js';
import type { TableOutputInput } from './tools/output_options.js';

const SORT_HELP = "Sort by column numbers, e.g. '2,1d,4'. Use 'a' & 'd' for ascending/descending.";
const CSV_HELP = 'Export table data to CSV: give a filename for file output, or no value for console output';
const JSON_HELP = 'Export table data to JSON: give a filename for file output, or no value for console output';
const SAVE_HELP = 'Save an auto-named export file (csv or json) in PORTBANK_EXPORT_DIR';

export interface CliDependencies {
  config?: PortbankConfig;
  io?: PipelineIO;
}

function addTableOptions(command: Command): Command {
  return command
    .option('--sort <directive>', SORT_HELP)
    .option('--csv [file]', CSV_HELP)
    .option('--json [file]', JSON_HELP)
    .option('--save <format>', SAVE_HELP);
}

/**
 * Run a command body, printing fatal errors to stderr and setting exit code 1
 */
function run(io: PipelineIO, body: () => void): void {
  try {
    body();
  } catch (error) {
    io.stderr(formatError(error));
    process.exitCode = 1;
  }
}

export function createCli(version: string, deps: CliDependencies = {}): Command {
  const config = deps.config ?? loadConfig();
  const io = deps.io ?? processIO;
  const program = new Command();

  setColorEnabled(config.color);

  program
    .name('portbank')
    .description('Resolve gateway port specifications and render per-port results')
    .version(version, '-v, --version', 'output the version number')
    .option('--no-color', 'disable colored output')
    .hook('preAction', thisCommand => {
      if (thisCommand.opts().color === false) setColorEnabled(false);
    });

  addTableOptions(
    program
      .command('ports')
      .description('Resolve a port specification (e.g. "1A-1D,3,5.02" or ports.csv) into ports')
      .argument('<spec>', 'port specification')
  ).action((spec: string, options: TableOutputInput) => {
    run(io, () => {
      handleResolvePorts({ ...options, spec }, { config, io });
    });
  });

  addTableOptions(
    program
      .command('render')
      .description('Render a JSON results file ({ columns, rows }) as a table, CSV or JSON')
      .argument('<file>', 'results file')
  ).action((file: string, options: TableOutputInput) => {
    run(io, () => {
      handleRenderRows({ ...options, file }, { config, io });
    });
  });

  return program;
}
