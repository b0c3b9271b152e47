import { Command, CommanderError } from 'commander';
import fs from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import { defaultRegistry } from './checks/index.js';
import { loadConfig, type Config, type ConfigOverrides } from './config.js';
import { DockerCliRuntime } from './container.js';
import { runAllChecks, writeArtifact } from './engine.js';
import { GitCliFetcher } from './git.js';
import { getLogger, initLogging, isLogLevel } from './logger.js';
import { newMetrics, recordScan, writeProm } from './metrics.js';
import { isScanFailure, runScan, type ScanResult } from './orchestrator.js';
import { ScanQueue } from './queue.js';
import { startServer } from './server.js';
import { createStore } from './store.js';
import { getErrorMessage } from './types/errors.js';

type GlobalOpts = { logJson?: boolean; logLevel?: string; config?: string };

const PackageSchema = z.object({ version: z.string() });

async function readVersion(): Promise<string | undefined> {
  try {
    const pkg = PackageSchema.safeParse(JSON.parse(await fs.readFile(new URL('../package.json', import.meta.url), 'utf8')));
    return pkg.success ? pkg.data.version : undefined;
  } catch {
    return undefined;
  }
}

const toInt = (v: string) => parseInt(v, 10);

/** Resolves config and configures logging; every command starts here. */
async function setup(globals: GlobalOpts, overrides: ConfigOverrides = {}): Promise<Config> {
  const logLevel = globals.logLevel && isLogLevel(globals.logLevel) ? globals.logLevel : undefined;
  const config = await loadConfig({
    configFile: globals.config,
    overrides: { ...overrides, logLevel, logJson: globals.logJson || undefined },
  });
  // stdout carries command output; logs go to stderr
  initLogging({ level: config.logLevel, json: config.logJson, sink: (line) => console.error(line) }, true);
  return config;
}

export function createScanner(config: Config): (repoUrl: string) => Promise<ScanResult> {
  const runtime = new DockerCliRuntime({ dockerBin: config.dockerBin });
  const fetcher = new GitCliFetcher({ gitBin: config.gitBin });
  return (repoUrl) =>
    runScan(repoUrl, {
      runtime,
      fetcher,
      image: config.scannerImage,
      timeoutMs: config.timeoutMs,
      fetchTimeoutMs: config.fetchTimeoutMs,
      workRoot: config.workRoot,
    });
}

async function emit(body: unknown, out?: string) {
  const text = JSON.stringify(body, null, 2);
  if (out) {
    await fs.mkdir(path.dirname(path.resolve(out)), { recursive: true });
    await fs.writeFile(out, text + '\n', 'utf8');
  } else {
    console.log(text);
  }
}

export async function runCli(argsIn: string[]): Promise<number> {
  let exitCode = 0;
  const program = new Command();
  program
    .name('debtscan')
    .description('Run technical-debt checks against a repository in a disposable container')
    .option('-j, --log-json', 'emit JSON logs', false)
    .option('-l, --log-level <lvl>', 'error | warn | info | debug')
    .option('-c, --config <path>', 'path to a config file (default ./.debtscan.json)');
  // Before .command(): subcommands copy these settings when created.
  program.showHelpAfterError();
  // Prevent process.exit during tests; intercept help/version exits.
  program.exitOverride();

  const version = await readVersion();
  if (version) program.version(version);

  program
    .command('scan')
    .description('clone a repository and scan it inside the scanner container')
    .argument('<repoUrl>', 'repository to clone')
    .option('--image <name>', 'scanner image')
    .option('--timeout <seconds>', 'container run time limit in seconds', toInt)
    .option('--fetch-timeout <seconds>', 'clone time limit in seconds', toInt)
    .option('--out <file>', 'write the scan result to a file instead of stdout')
    .option('--metrics <path>', 'write Prometheus-format metrics to file at end of run')
    .action(async (repoUrl: string, opts: { image?: string; timeout?: number; fetchTimeout?: number; out?: string; metrics?: string }, cmd: Command) => {
      const config = await setup(cmd.optsWithGlobals<GlobalOpts>(), {
        scannerImage: opts.image,
        timeoutMs: opts.timeout !== undefined ? opts.timeout * 1000 : undefined,
        fetchTimeoutMs: opts.fetchTimeout !== undefined ? opts.fetchTimeout * 1000 : undefined,
      });
      const metrics = newMetrics();
      metrics.runtime_info = { image: config.scannerImage, timeoutMs: config.timeoutMs, version };
      const started = Date.now();
      const result = await createScanner(config)(repoUrl);
      recordScan(metrics, result, Date.now() - started);
      await emit(result, opts.out);
      if (opts.metrics) await writeProm(metrics, opts.metrics);
      exitCode = isScanFailure(result) ? 2 : 0;
    });

  program
    .command('check')
    .description('run the checks directly against a local checkout (no container)')
    .argument('[path]', 'repository path', '.')
    .option('--out <file>', 'write the results artifact to a file instead of stdout')
    .option('--disable <ids...>', 'check ids to skip')
    .action(async (target: string, opts: { out?: string; disable?: string[] }, cmd: Command) => {
      const config = await setup(cmd.optsWithGlobals<GlobalOpts>());
      const exclude = [...config.disabledChecks, ...(opts.disable ?? [])];
      const { issues } = await runAllChecks(path.resolve(target), { checks: defaultRegistry.list({ exclude }) });
      if (opts.out) await writeArtifact(issues, opts.out);
      else await emit(issues);
    });

  program
    .command('checks')
    .description('list registered checks in execution order')
    .action(() => {
      for (const c of defaultRegistry.list()) {
        console.log(c.description ? `${c.id}\t${c.description}` : c.id);
      }
    });

  program
    .command('serve')
    .description('serve the scan request API')
    .option('-p, --port <n>', 'listen port', toInt)
    .action(async (opts: { port?: number }, cmd: Command) => {
      const config = await setup(cmd.optsWithGlobals<GlobalOpts>(), { port: opts.port });
      const metrics = newMetrics();
      metrics.runtime_info = { image: config.scannerImage, timeoutMs: config.timeoutMs, version };
      const store = createStore(config.storeDir);
      const queue = new ScanQueue({ scan: createScanner(config), store, metrics });
      const srv = await startServer({ queue, store, metrics, port: config.port });
      await new Promise<void>((resolve) => {
        process.once('SIGINT', () => resolve());
        process.once('SIGTERM', () => resolve());
      });
      getLogger('server').info('shutting down');
      await srv.close();
    });

  try {
    await program.parseAsync(argsIn, { from: 'user' });
  } catch (err) {
    if (err instanceof CommanderError) {
      return err.code === 'commander.helpDisplayed' || err.code === 'commander.version' ? 0 : err.exitCode || 1;
    }
    console.error(getErrorMessage(err));
    return 1;
  }
  return exitCode;
}

export { runScan, isScanFailure, ScanJob } from './orchestrator.js';
export type { JobState, ScanOptions, ScanResult, ScanSuccess, ScanFailure } from './orchestrator.js';
export { runAllChecks, runEngine, writeArtifact } from './engine.js';
export type { CheckOutcome, EngineReport } from './engine.js';
export { CheckRegistry, defaultRegistry, registerCheck, type Check } from './checks/registry.js';
export { IssueSchema, IssueListSchema, parseIssues, normalizeIssue, makeIssue, type Issue, type IssueKind } from './issue.js';
export { DockerCliRuntime, type ContainerRuntime, type ContainerHandle, type ContainerSpec } from './container.js';
export { GitCliFetcher, type RepositoryFetcher } from './git.js';
export { ScanQueue, type TaskStatus, type TaskState } from './queue.js';
export { FileStore, NoopStore, createStore, type ScanStore, type ScanRecord } from './store.js';
export { ScanError, type ScanErrorCode } from './types/errors.js';
export { loadConfig, type Config } from './config.js';
