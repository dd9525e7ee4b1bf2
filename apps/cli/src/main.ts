#!/usr/bin/env node

/**
 * verisql CLI entrypoint.
 */

import { Command } from 'commander';
import { existsSync, readFileSync } from 'node:fs';
import { homedir } from 'node:os';
import { join } from 'node:path';
import {
  ModelPool,
  Orchestrator,
  RateLimiter,
  RunStore,
  SchemaSnapshotSupplier,
  classifyTask,
  configWarnings,
  contextSize,
  createBackends,
  createLogger,
  createTask,
  defaultDbPath,
  loadConfig,
  parseDocuments,
  parseSchemaSnapshot,
  schemaItemCount,
  type ContextItem,
  type LoadedConfig,
  type RunResult,
  type SchemaSnapshot,
} from '@verisql/core';
import {
  EXIT_CODE_SUCCESS,
  errorCode,
  runOutcomeError,
  toExitCode,
  usageError,
} from './errors.js';
import {
  outputOptionsFromCommand,
  printCommandSuccess,
  printError,
  printHuman,
  printHumanTable,
  printJson,
  printWarning,
  withOutputFlags,
} from './output.js';
import { describeClassification, describeRun } from './render.js';
import { truncate } from './util/table.js';

const VERSION = '0.1.0';

const CONFIG_ENV = 'VERISQL_CONFIG';

interface ContextOptions {
  schema?: string;
  docs?: string;
}

interface AskOptions extends ContextOptions {
  dialect?: string;
  maxAttempts?: string;
  verify: boolean;
  history: boolean;
}

// ── Helpers ──────────────────────────────────────────────────────────

function defaultConfigPath(): string {
  return join(homedir(), '.verisql', 'config.json');
}

/** --config, then $VERISQL_CONFIG, then ~/.verisql/config.json when present. */
function configPathFor(command: Command): string | undefined {
  const opts = command.optsWithGlobals();
  if (typeof opts.config === 'string') return opts.config;
  const fromEnv = process.env[CONFIG_ENV];
  if (fromEnv) return fromEnv;
  const fallback = defaultConfigPath();
  return existsSync(fallback) ? fallback : undefined;
}

function loadCommandConfig(command: Command): LoadedConfig {
  return loadConfig({ file: configPathFor(command), env: process.env });
}

function openStore(): RunStore {
  const store = new RunStore(defaultDbPath());
  store.migrate();
  return store;
}

function readJsonFile(file: string, what: string): unknown {
  let raw: string;
  try {
    raw = readFileSync(file, 'utf-8');
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    throw usageError(`Cannot read ${what} file ${file}: ${msg}`, 'INVALID_INPUT');
  }
  try {
    return JSON.parse(raw);
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    throw usageError(`${what} file ${file} is not valid JSON: ${msg}`, 'INVALID_INPUT');
  }
}

function validated<T>(parse: (raw: unknown) => T, raw: unknown): T {
  try {
    return parse(raw);
  } catch (err: unknown) {
    throw usageError(err instanceof Error ? err.message : String(err), 'INVALID_INPUT');
  }
}

function contextItemsFor(question: string, opts: ContextOptions): ContextItem[] {
  const snapshot: SchemaSnapshot = opts.schema
    ? validated(parseSchemaSnapshot, readJsonFile(opts.schema, 'Schema'))
    : { tables: [] };
  const docs = opts.docs ? validated(parseDocuments, readJsonFile(opts.docs, 'Documents')) : [];
  return new SchemaSnapshotSupplier(snapshot, { docs }).supply(question);
}

function parsePositiveInt(value: string, flag: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) {
    throw usageError(`Invalid ${flag}. Expected a positive integer.`);
  }
  return n;
}

async function runCommand(
  command: Command,
  fn: (output: ReturnType<typeof outputOptionsFromCommand>) => Promise<void> | void,
): Promise<void> {
  const output = outputOptionsFromCommand(command);
  try {
    await fn(output);
  } catch (error: unknown) {
    printError(error, output);
    process.exitCode = toExitCode(error);
  }
}

function withExamples(cmd: Command, lines: string[]): Command {
  const rendered = lines.map((line) => `  ${line}`).join('\n');
  cmd.addHelpText('after', `\nExamples:\n${rendered}\n`);
  return cmd;
}

// ── Program ──────────────────────────────────────────────────────────

const program = new Command();

program
  .name('verisql')
  .description('Natural-language questions to SQL, checked by a second model')
  .option('--config <file>', `Config file (default: $${CONFIG_ENV} or ~/.verisql/config.json)`)
  .option('--json', 'Machine-readable JSON output', false)
  .option('--quiet', 'Suppress non-essential output', false)
  .option('--verbose', 'Show signals, attempts and verdicts', false)
  .option('--debug', 'Show internal error details and stacks', false)
  .showHelpAfterError('(run with --help for usage)')
  .helpOption('-h, --help', 'display help')
  .version(VERSION, '-v, --version', 'Show version number');

program.exitOverride();
program.addHelpText(
  'after',
  `
Command groups:
  Setup:    doctor, profiles
  Query:    ask, classify
  History:  history
`,
);

// ── doctor ───────────────────────────────────────────────────────────

withExamples(
  withOutputFlags(
    program
      .command('doctor')
      .description('Check the environment, configuration and model profiles')
      .action(async function (this: Command) {
        await runCommand(this, async (output) => {
          const nodeVersion = process.version;
          const nodeOk = parseInt(nodeVersion.slice(1), 10) >= 20;
          const loaded = loadCommandConfig(this);
          const warnings = configWarnings(loaded);
          const dbPath = defaultDbPath();

          const payload = {
            node: { version: nodeVersion, ok: nodeOk, requiredMajor: 20 },
            config: { source: loaded.source, profiles: loaded.config.profiles.length },
            verificationEnabled: loaded.config.orchestrator.verificationEnabled,
            keys: loaded.endpoints.map((e) => ({
              profile: e.profileId,
              env: e.apiKeyEnv,
              set: e.apiKeyEnv === null || e.apiKey !== null,
            })),
            paths: { dbPath, dbPathExists: existsSync(dbPath) },
            warnings,
          };

          if (output.json) {
            printCommandSuccess(payload, output);
            return;
          }

          printHuman('verisql doctor', output);
          printHuman('==============', output);
          printHuman('', output);
          printHuman(`Node.js:      ${nodeVersion} ${nodeOk ? '✓' : '✗ (requires >=20)'}`, output);
          printHuman(`Config:       ${loaded.source ?? '(defaults only)'}`, output);
          printHuman(`Profiles:     ${loaded.config.profiles.length}`, output);
          printHuman(`Verification: ${loaded.config.orchestrator.verificationEnabled ? 'on' : 'off'}`, output);
          printHuman(`History DB:   ${dbPath} ${existsSync(dbPath) ? '(exists)' : '(will be created)'}`, output);
          printHuman('', output);
          if (warnings.length === 0) {
            printHuman('No problems found.', output);
          }
          for (const warning of warnings) {
            printWarning(warning, output);
          }
        });
      }),
  ),
  ['verisql doctor', 'verisql --config ./verisql.json doctor --json'],
);

// ── profiles ─────────────────────────────────────────────────────────

withExamples(
  withOutputFlags(
    program
      .command('profiles')
      .description('List the configured model profiles')
      .action(async function (this: Command) {
        await runCommand(this, (output) => {
          const loaded = loadCommandConfig(this);
          const rows = loaded.config.profiles.map((p) => {
            const endpoint = loaded.endpoints.find((e) => e.profileId === p.id);
            return {
              id: p.id,
              provider: p.provider,
              model: p.model,
              tiers: p.tiers.join(','),
              cost: p.costWeight,
              critic: p.canCritique ? 'yes' : 'no',
              key: !endpoint?.apiKeyEnv ? 'n/a' : endpoint.apiKey ? 'set' : `missing ${endpoint.apiKeyEnv}`,
            };
          });

          if (output.json) {
            printCommandSuccess(rows, output);
            return;
          }
          if (rows.length === 0) {
            printHuman('No profiles configured. Add them under "profiles" in the config file.', output);
            return;
          }
          printHumanTable(['id', 'provider', 'model', 'tiers', 'cost', 'critic', 'key'], rows, output);
        });
      }),
  ),
  ['verisql profiles', 'verisql profiles --json'],
);

// ── classify ─────────────────────────────────────────────────────────

withExamples(
  withOutputFlags(
    program
      .command('classify')
      .description('Show the complexity tier a question would start at')
      .argument('<question>', 'Natural language question')
      .option('--schema <file>', 'Schema snapshot JSON')
      .option('--docs <file>', 'JSON array of {source, content, relevance?}')
      .action(async function (this: Command, question: string, opts: ContextOptions) {
        await runCommand(this, (output) => {
          const loaded = loadCommandConfig(this);
          const task = createTask(
            question,
            { items: contextItemsFor(question, opts) },
            loaded.config.context.contextMaxSize,
          );
          const result = classifyTask(
            { text: task.text, contextChars: contextSize(task), schemaItems: schemaItemCount(task) },
            loaded.config.classifier,
          );

          if (output.json) {
            printCommandSuccess(result, output);
            return;
          }
          for (const line of describeClassification(result)) {
            printHuman(line, output);
          }
        });
      }),
  ),
  ['verisql classify "total revenue per region last quarter"', 'verisql classify "list users" --json'],
);

// ── ask ──────────────────────────────────────────────────────────────

withExamples(
  withOutputFlags(
    program
      .command('ask')
      .description('Generate SQL for a question and have a second model verify it')
      .argument('<question>', 'Natural language question')
      .option('--schema <file>', 'Schema snapshot JSON')
      .option('--docs <file>', 'JSON array of {source, content, relevance?}')
      .option('--dialect <name>', 'SQL dialect (postgresql, mysql, sqlite, ...)')
      .option('--max-attempts <n>', 'Override orchestrator.maxAttempts')
      .option('--no-verify', 'Skip the critic and accept the first candidate')
      .option('--no-history', 'Do not record the run in the history database')
      .action(async function (this: Command, question: string, opts: AskOptions) {
        await runCommand(this, async (output) => {
          const loaded = loadCommandConfig(this);
          const maxAttempts =
            opts.maxAttempts !== undefined ? parsePositiveInt(opts.maxAttempts, '--max-attempts') : undefined;
          for (const warning of configWarnings(loaded)) {
            if (output.verbose) printWarning(warning, output);
          }

          const { config } = loaded;
          const pool = new ModelPool(config.profiles, createBackends(loaded), config.pool, {
            limiter: new RateLimiter(config.rateLimit),
          });
          const store = opts.history ? openStore() : null;
          try {
            const orchestrator = new Orchestrator({
              config,
              pool,
              logger: createLogger(config.logging),
              metrics: store ?? undefined,
            });
            const task = createTask(
              question,
              { items: contextItemsFor(question, opts), dialect: opts.dialect },
              config.context.contextMaxSize,
            );
            if (output.verbose && task.context.dropped.length > 0) {
              printHuman(`Context left out: ${task.context.dropped.join(', ')}`, output);
            }

            const controller = new AbortController();
            const onSigint = (): void => controller.abort('interrupted');
            process.once('SIGINT', onSigint);
            let result: RunResult;
            try {
              result = await orchestrator.resolve(task, {
                signal: controller.signal,
                maxAttempts,
                verificationEnabled: opts.verify ? undefined : false,
              });
            } finally {
              process.off('SIGINT', onSigint);
            }

            const failure = runOutcomeError(result);
            if (!failure) {
              if (output.json) {
                printCommandSuccess(result, output);
                return;
              }
              for (const line of describeRun(result, output.verbose)) printHuman(line, output);
              return;
            }

            if (output.json) {
              printJson({ ok: false, code: errorCode(failure), message: failure.message, data: result });
              process.exitCode = toExitCode(failure);
              return;
            }
            for (const line of describeRun(result, output.verbose)) printHuman(line, output);
            throw failure;
          } finally {
            store?.close();
          }
        });
      }),
  ),
  [
    'verisql ask "monthly revenue by region" --schema schema.json',
    'verisql ask "users who signed up today" --dialect sqlite --max-attempts 2',
    'verisql ask "top customers" --no-verify --json',
  ],
);

// ── history ─────────────────────────────────────────────────────────

const history = program.command('history').description('Recorded runs');

withExamples(
  withOutputFlags(
    history
      .command('list')
      .description('List recent runs')
      .option('--limit <n>', 'Number of items', '20')
      .action(async function (this: Command, opts: { limit: string }) {
        await runCommand(this, (output) => {
          const limit = parsePositiveInt(opts.limit, '--limit');
          const store = openStore();
          try {
            const runs = store.listRuns(limit);
            if (output.json) {
              printCommandSuccess(runs, output);
              return;
            }
            if (runs.length === 0) {
              printHuman('No runs recorded yet. Use "verisql ask" to create one.', output);
              return;
            }
            printHumanTable(
              ['id', 'recorded_at', 'outcome', 'tier', 'attempts', 'cost', 'request'],
              runs.map((r) => ({
                id: r.task_id.slice(0, 8),
                recorded_at: r.recorded_at,
                outcome: r.failure_kind ? `${r.outcome} (${r.failure_kind})` : r.outcome,
                tier: r.tier,
                attempts: r.attempt_count,
                cost: r.cost_units,
                request: truncate(r.request, 50),
              })),
              output,
            );
          } finally {
            store.close();
          }
        });
      }),
  ),
  ['verisql history list --limit 10', 'verisql history list --json'],
);

withExamples(
  withOutputFlags(
    history
      .command('show <id>')
      .description('Show one run and its attempts')
      .action(async function (this: Command, id: string) {
        await runCommand(this, (output) => {
          const store = openStore();
          try {
            const fullId = store.resolveTaskId(id);
            const detail = fullId ? store.getRun(fullId) : undefined;
            if (!detail) throw usageError(`Run "${id}" not found.`, 'RUN_NOT_FOUND');

            if (output.json) {
              printCommandSuccess(detail, output);
              return;
            }
            const { run, attempts } = detail;
            printHuman(`Task ID:   ${run.task_id}`, output);
            printHuman(`Request:   ${run.request}`, output);
            printHuman(`Recorded:  ${run.recorded_at}`, output);
            printHuman(`Outcome:   ${run.failure_kind ? `${run.outcome} (${run.failure_kind})` : run.outcome}`, output);
            printHuman(`Tier:      ${run.tier}`, output);
            printHuman(`Cost:      ${run.cost_units.toFixed(3)} units in ${Math.round(run.latency_ms)}ms`, output);
            if (run.final_sql) {
              printHuman(`SQL:       ${run.final_sql}`, output);
              printHuman(`Generator: ${run.generator_id ?? '-'}  Critic: ${run.critic_id ?? '-'}`, output);
            }
            if (run.reason) printHuman(`Reason:    ${run.reason}`, output);
            printHuman('', output);
            printHumanTable(
              ['attempt', 'tier', 'generator', 'critic', 'decision', 'reason'],
              attempts.map((a) => ({
                attempt: a.attempt,
                tier: a.tier,
                generator: a.generator_id,
                critic: a.critic_id,
                decision: a.decision,
                reason: a.reason,
              })),
              output,
            );
          } finally {
            store.close();
          }
        });
      }),
  ),
  ['verisql history show <task-id>', 'verisql history show <task-id-prefix> --json'],
);

// ── parse ────────────────────────────────────────────────────────────

function commanderCode(error: unknown): string | null {
  if (typeof error !== 'object' || error === null || !('code' in error)) return null;
  return typeof error.code === 'string' && error.code.startsWith('commander.') ? error.code : null;
}

async function main(): Promise<void> {
  try {
    await program.parseAsync(process.argv);
    if (process.exitCode === undefined) {
      process.exitCode = EXIT_CODE_SUCCESS;
    }
  } catch (error: unknown) {
    const output = outputOptionsFromCommand(program);
    const code = commanderCode(error);
    if (code === 'commander.helpDisplayed' || code === 'commander.version') {
      process.exitCode = EXIT_CODE_SUCCESS;
      return;
    }
    if (code !== null) {
      printError(usageError(error instanceof Error ? error.message : String(error)), output);
      process.exitCode = 1;
      return;
    }
    printError(error, output);
    process.exitCode = toExitCode(error);
  }
}

void main();
