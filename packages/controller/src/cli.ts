import { Command } from 'commander';
import { z } from 'zod';
import { ConfigError, loadCellConfig, type CellConfig, type RoutingStep } from '@crane-cell/shared';
import { loadRuntimeConfig, type RuntimeOverrides } from './config.js';
import { startController } from './controller.js';
import { RoutingTable } from './routing.js';

const VERSION = '0.1.0';

const runOptionsSchema = z.object({
  config: z.string().min(1).optional(),
  broker: z.string().min(1).optional(),
  topicPrefix: z.string().min(1).optional(),
  positionLog: z.union([z.string().min(1), z.literal(false)]).optional(),
  events: z.boolean().optional(),
});

const checkOptionsSchema = z.object({
  config: z.string().min(1).optional(),
});

function printError(message: string): void {
  console.error(`Error: ${message}`);
}

function reportError(error: unknown): void {
  if (error instanceof ConfigError) {
    printError(error.source ? `invalid configuration in ${error.source}` : 'invalid configuration');
    for (const issue of error.issues) console.error(`  - ${issue}`);
    return;
  }
  printError(error instanceof Error ? error.message : String(error));
}

function validationMessage(error: z.ZodError): string {
  return error.errors.map(e => `${e.path.join('.')}: ${e.message}`).join('; ');
}

export type RunOptions = z.infer<typeof runOptionsSchema>;

/** Map `run` flags onto runtime overrides; unset flags leave the environment in charge */
export function toOverrides(options: RunOptions): RuntimeOverrides {
  const overrides: RuntimeOverrides = {};
  if (options.config !== undefined) overrides.configPath = options.config;
  if (options.broker !== undefined) overrides.brokerUrl = options.broker;
  if (options.topicPrefix !== undefined) overrides.topicPrefix = options.topicPrefix;
  if (options.positionLog === false) {
    overrides.positionLogEnabled = false;
  } else if (options.positionLog !== undefined) {
    overrides.positionLogEnabled = true;
    overrides.positionLogPath = options.positionLog;
  }
  if (options.events === false) overrides.publishEvents = false;
  return overrides;
}

async function executeRun(rawOptions: Record<string, unknown>): Promise<void> {
  const parsed = runOptionsSchema.safeParse(rawOptions);
  if (!parsed.success) {
    printError(validationMessage(parsed.error));
    process.exitCode = 1;
    return;
  }

  const runtime = loadRuntimeConfig(toOverrides(parsed.data));
  const controller = await startController(runtime);

  let signals = 0;
  const onSignal = (signal: NodeJS.Signals): void => {
    signals++;
    if (signals > 1) {
      console.error(`Received ${signal} again, exiting immediately`);
      process.exit(130);
    }
    console.log(`Received ${signal}, stopping after the current action (repeat to force)`);
    controller.stop();
  };
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);

  try {
    const summary = await controller.done;
    console.log(
      `Stopped: ${summary.completedParts} completed, ${summary.failedParts} failed, ${summary.remainingParts} still queued`,
    );
  } finally {
    process.off('SIGINT', onSignal);
    process.off('SIGTERM', onSignal);
  }
}

function formatStep(step: RoutingStep): string {
  return step.kind === 'sequence' ? step.name : `[station ${step.stationId}]`;
}

/** Human-readable summary of a validated cell */
export function describeCell(config: CellConfig): string[] {
  const lines: string[] = [];
  const routing = new RoutingTable(config);

  lines.push('Sources:');
  for (const source of config.sources) {
    lines.push(`  ${source.sourceId}: presence=${source.presence} partType=${source.partType}`);
  }
  lines.push('Stations:');
  for (const station of config.stations) {
    lines.push(`  ${station.stationId}: run=${station.run} running=${station.running} partPresent=${station.partPresent}`);
  }
  lines.push('Routing:');
  for (const partType of routing.partTypes()) {
    const plan = routing.get(partType);
    if (!plan) continue;
    lines.push(`  ${partType}: ${plan.steps.map(p => formatStep(p.step)).join(' -> ')}`);
  }
  return lines;
}

async function executeCheckConfig(rawOptions: Record<string, unknown>): Promise<void> {
  const parsed = checkOptionsSchema.safeParse(rawOptions);
  if (!parsed.success) {
    printError(validationMessage(parsed.error));
    process.exitCode = 1;
    return;
  }

  const { configPath } = loadRuntimeConfig(parsed.data.config === undefined ? {} : { configPath: parsed.data.config });
  const config = await loadCellConfig(configPath);
  console.log(`${configPath} is valid`);
  for (const line of describeCell(config)) console.log(line);
}

export function createRunCommand(): Command {
  return new Command('run')
    .description('Start the crane cell controller')
    .option('-c, --config <path>', 'Cell configuration file')
    .option('-b, --broker <url>', 'MQTT broker URL')
    .option('--topic-prefix <prefix>', 'Topic prefix of the register image')
    .option('--position-log <path>', 'Write crane positions to this CSV file')
    .option('--no-position-log', 'Disable the position log')
    .option('--no-events', 'Do not publish cell events')
    .action(async (options: Record<string, unknown>) => {
      try {
        await executeRun(options);
      } catch (error) {
        reportError(error);
        process.exitCode = 1;
      }
    });
}

export function createCheckConfigCommand(): Command {
  return new Command('check-config')
    .description('Validate a cell configuration and print its routing plans')
    .option('-c, --config <path>', 'Cell configuration file')
    .action(async (options: Record<string, unknown>) => {
      try {
        await executeCheckConfig(options);
      } catch (error) {
        reportError(error);
        process.exitCode = 1;
      }
    });
}

/**
 * Create and configure the CLI program.
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('crane-cell')
    .description('Supervisory controller for a single-crane material handling cell')
    .version(VERSION, '-v, --version', 'Output the current version');

  program.addCommand(createRunCommand());
  program.addCommand(createCheckConfigCommand());

  program.exitOverride();

  return program;
}

/**
 * Run the CLI program.
 */
export async function runCli(args: string[] = process.argv): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(args);
  } catch (error) {
    // Commander throws on --help and --version
    if (
      error instanceof Error &&
      'code' in error &&
      (error.code === 'commander.helpDisplayed' || error.code === 'commander.version')
    ) {
      return;
    }
    throw error;
  }
}
