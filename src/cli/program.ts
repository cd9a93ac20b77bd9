import { Command } from 'commander';
import fs from 'fs';
import path from 'path';
import { loadConfig as loadAppConfig, type AppConfig } from '../config/index.js';
import { AuditError, errorName } from '../core/errors.js';
import type { SinkCoordinates } from '../core/types.js';
import { writeMetricsTextfile } from '../metrics/index.js';
import type { IRemoteClassifier } from '../redaction/IRemoteClassifier.js';
import { createRedactor } from '../redaction/RedactorFactory.js';
import { AcknowledgementLedger } from '../repositories/ackLedger.js';
import { ChainStateRepository } from '../repositories/chainStateRepository.js';
import { RecordRepository } from '../repositories/recordRepository.js';
import { AuditPipeline, recordLocator } from '../services/auditPipeline.js';
import { verifyStoredChain } from '../services/chainAudit.js';
import { DeliveryEngine } from '../services/deliveryEngine.js';
import { CloudWatchLogSink, type LogSink } from '../services/logSink.js';
import { generateKeyPair, loadPublicKey } from '../utils/keys.js';
import { getLogger } from '../utils/logging.js';
import { formatTraceId, newTraceId } from '../utils/traceId.js';

export interface CliIo {
  out(text: string): void;
  err(text: string): void;
  setExitCode(code: number): void;
  readStdin(): Promise<string>;
}

export interface CliDeps {
  io?: CliIo;
  loadConfig?: () => AppConfig;
  classifier?: IRemoteClassifier;
  sink?: LogSink;
  sleep?: (ms: number) => Promise<void>;
}

export const processIo: CliIo = {
  out: (text) => process.stdout.write(text + '\n'),
  err: (text) => process.stderr.write(text + '\n'),
  setExitCode: (code) => {
    process.exitCode = code;
  },
  readStdin: async () => {
    const chunks: Buffer[] = [];
    for await (const chunk of process.stdin) {
      chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
    }
    return Buffer.concat(chunks).toString('utf8');
  },
};

const json = (value: unknown) => JSON.stringify(value, null, 2);

export function buildProgram(deps: CliDeps = {}): Command {
  const io = deps.io ?? processIo;
  let cached: AppConfig | undefined;
  const config = () => (cached ??= (deps.loadConfig ?? loadAppConfig)());
  const sinkFor = (cfg: AppConfig) =>
    deps.sink ?? new CloudWatchLogSink({ region: cfg.aws.region, timeoutMs: cfg.sink.timeoutMs });
  const engineFor = (cfg: AppConfig, records: RecordRepository, coords: SinkCoordinates = cfg.sink) =>
    new DeliveryEngine(
      { sink: sinkFor(cfg), records, ledger: new AcknowledgementLedger(cfg.storage.logDir), sleep: deps.sleep },
      {
        coords: { logGroup: coords.logGroup, logStream: coords.logStream },
        maxAttempts: cfg.delivery.maxAttempts,
        backoffUnitMs: cfg.delivery.backoffUnitMs,
        pacingMs: cfg.delivery.pacingMs,
        retentionDays: cfg.delivery.retentionDays,
        sinkTimeoutMs: cfg.sink.timeoutMs,
      },
    );

  // Fatal errors become one line on stderr and a non-zero exit code
  const guarded =
    <A extends unknown[]>(fn: (...args: A) => Promise<void>) =>
    async (...args: A): Promise<void> => {
      try {
        await fn(...args);
      } catch (err) {
        const label = err instanceof AuditError ? err.name : errorName(err);
        io.err(`${label}: ${err instanceof Error ? err.message : String(err)}`);
        getLogger().debug({ error: errorName(err) }, 'cli-command-failed');
        io.setExitCode(1);
      }
    };

  const program = new Command();
  program.name('ai-audit').description('Audit trail for AI assistant exchanges').version('0.1.0');

  program.hook('postAction', async () => {
    if (!cached?.metrics.textfile) return;
    try {
      await writeMetricsTextfile(cached.metrics.textfile);
    } catch (err) {
      getLogger().warn({ error: errorName(err), file: cached.metrics.textfile }, 'metrics-textfile-write-failed');
    }
  });

  program
    .command('trace-id')
    .description('Print a new trace id')
    .action(() => {
      io.out(formatTraceId(newTraceId()));
    });

  program
    .command('keygen')
    .description('Create the record signing key pair (one-time setup)')
    .option('--force', 'Replace an existing key pair', false)
    .action(
      guarded(async (opts: { force?: boolean }) => {
        const paths = generateKeyPair(config().storage.keyDir, { force: !!opts.force });
        io.out(json(paths));
      }),
    );

  program
    .command('mask')
    .argument('[text]', 'Text to mask (read from stdin when omitted)')
    .option('-l, --language <code>', 'Language code of the text')
    .option('--remote', 'Use the remote classifier in addition to local patterns')
    .description('Mask PII in a text and print the result')
    .action(
      guarded(async (text: string | undefined, opts: { language?: string; remote?: boolean }) => {
        const cfg = config();
        const input = text ?? (await io.readStdin());
        const redactor = createRedactor(opts.remote ?? cfg.redaction.useRemote, deps.classifier, cfg);
        const result = await redactor.mask(input, opts.language ?? cfg.redaction.language);
        io.out(
          json({
            maskedText: result.maskedText,
            detectorUsed: result.detectorUsed,
            totalMasked: result.totalMasked,
            score: result.score,
            categories: result.findings.map((f) => f.category),
            ...(result.degradedReason ? { degradedReason: result.degradedReason } : {}),
          }),
        );
      }),
    );

  program
    .command('record')
    .description('Record a completed exchange as a signed audit record')
    .requiredOption('--prompt-file <path>', 'File holding the raw prompt')
    .requiredOption('--response-file <path>', 'File holding the raw response')
    .requiredOption('--method <name>', 'Invocation method, e.g. chat or completion')
    .option('--model <name>', 'Model identifier')
    .option('--status <status>', 'Response status', 'success')
    .action(
      guarded(
        async (opts: { promptFile: string; responseFile: string; method: string; model?: string; status: string }) => {
          const pipeline = AuditPipeline.fromConfig(config(), { classifier: deps.classifier });
          const { record, handle } = await pipeline.recordExchange({
            method: opts.method,
            model: opts.model,
            prompt: await fs.promises.readFile(opts.promptFile, 'utf8'),
            response: await fs.promises.readFile(opts.responseFile, 'utf8'),
            status: opts.status,
          });
          io.out(json({ traceId: record.traceId, recordHash: record.recordHash, file: handle.path }));
        },
      ),
    );

  program
    .command('run')
    .description('Mask a prompt, run the assistant command on it and record the exchange')
    .requiredOption('--method <name>', 'Invocation method')
    .option('--model <name>', 'Model identifier')
    .option('--prompt-file <path>', 'File holding the raw prompt (stdin when omitted)')
    .argument('<command...>', 'Assistant command; {prompt_file} is replaced by the masked prompt path')
    .action(
      guarded(async (command: string[], opts: { method: string; model?: string; promptFile?: string }) => {
        const cfg = config();
        const prompt = opts.promptFile ? await fs.promises.readFile(opts.promptFile, 'utf8') : await io.readStdin();
        const pipeline = AuditPipeline.fromConfig(cfg, { classifier: deps.classifier });
        const { record, result } = await pipeline.runAndRecord({
          method: opts.method,
          model: opts.model,
          prompt,
          command: command[0],
          args: command.slice(1),
          timeoutMs: cfg.assistant.timeoutMs,
        });
        if (result.stdout) io.out(result.stdout);
        io.err(`recorded ${record.traceId}`);
        if (result.exitCode !== 0) io.setExitCode(result.exitCode);
      }),
    );

  program
    .command('send')
    .description('Deliver a single record file to the log sink')
    .requiredOption('--record-file <path>', 'Record file to send')
    .option('--log-group <name>', 'Log group (defaults to config)')
    .option('--log-stream <name>', 'Log stream (defaults to config)')
    .action(
      guarded(async (opts: { recordFile: string; logGroup?: string; logStream?: string }) => {
        const cfg = config();
        const records = new RecordRepository(cfg.storage.logDir);
        const file = path.resolve(opts.recordFile);
        const record = await records.read({ name: path.basename(file), path: file, area: 'pending', createdAtMs: 0 });
        const coords = { logGroup: opts.logGroup ?? cfg.sink.logGroup, logStream: opts.logStream ?? cfg.sink.logStream };
        const outcome = await engineFor(cfg, records, coords).deliverOne(record, coords);
        if (outcome.status === 'failed') {
          const reason = outcome.error instanceof Error ? outcome.error.message : String(outcome.error);
          io.err(`Delivery failed after ${outcome.attempts} attempt(s): ${reason}`);
          io.setExitCode(1);
          return;
        }
        io.out(json({ traceId: record.traceId, attempts: outcome.attempts, ...coords }));
      }),
    );

  program
    .command('upload-all')
    .description('Deliver every pending record, then apply processed-record retention')
    .option('--dry-run', 'Report what would be sent and purged without changing anything', false)
    .action(
      guarded(async (opts: { dryRun?: boolean }) => {
        const cfg = config();
        const report = await engineFor(cfg, new RecordRepository(cfg.storage.logDir)).deliverAll({
          dryRun: !!opts.dryRun,
        });
        io.out(json(report));
        if (report.failed > 0 || report.aborted) io.setExitCode(1);
      }),
    );

  program
    .command('verify-chain')
    .description('Verify hashes, links and signatures of all stored records')
    .action(
      guarded(async () => {
        const cfg = config();
        const records = new RecordRepository(cfg.storage.logDir);
        const state = await new ChainStateRepository(cfg.storage.logDir, recordLocator(records)).read();
        const report = await verifyStoredChain(records, loadPublicKey(cfg.storage.keyDir), { state });
        if (!report.valid) {
          io.err(`Chain INVALID: ${json({ breaks: report.breaks, unreadable: report.unreadable })}`);
          io.setExitCode(2);
          return;
        }
        io.out(`Chain valid. ${report.count} record(s). Last hash: ${report.lastHash ?? 'none'}`);
      }),
    );

  program
    .command('resolve-chain')
    .description('Re-anchor a halted chain on the verified tip of the stored records')
    .action(
      guarded(async () => {
        const cfg = config();
        const records = new RecordRepository(cfg.storage.logDir);
        const report = await verifyStoredChain(records, loadPublicKey(cfg.storage.keyDir));
        if (!report.valid) {
          io.err(`Refusing to resolve: stored chain is invalid ${json(report.breaks)}`);
          io.setExitCode(2);
          return;
        }
        const chain = new ChainStateRepository(cfg.storage.logDir, recordLocator(records));
        const state = await chain.resolve(report.lastHash, report.lastTraceId, report.count);
        io.out(json({ lastHash: state.lastHash, lastTraceId: state.lastTraceId, revision: state.revision }));
      }),
    );

  return program;
}
