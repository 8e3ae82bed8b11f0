/**
 * lipsync 命令行客户端
 *
 * @example
 * # 图生视频，走任务队列（默认命令）
 * lipsync submit --url https://queue.example/run -i face.jpg -a speech.wav
 *
 * # 视频生视频，同步端点
 * lipsync run --url http://127.0.0.1:8000/api/lipsync --mode v2v -v clip.mp4 -a speech.wav
 *
 * # 按 id 取回早先提交的任务
 * lipsync retrieve task_123 --url https://queue.example/run -o rescued.mp4
 */

import { Command, InvalidArgumentError, Option } from 'commander';
import chalk from 'chalk';
import { loadClientConfig, type ClientConfig } from '../../app-config.js';
import {
  buildSubmissionPayload,
  retrieveTaskUseCase,
  runQueuedJobUseCase,
  runSyncJobUseCase,
  type ClientJobOptions,
  type ClientMode,
} from '../../application/client/index.js';
import {
  DEFAULT_PROMPT,
  errorCode,
  errorMessage,
  type JobOutcome,
  type TaskStatusRecord,
} from '../../domain/index.js';
import { downloadArtifact, saveInlineArtifact } from '../../infrastructure/queue/artifact-download.js';
import { SyncEndpointClient } from '../../infrastructure/queue/sync-endpoint-client.js';
import { TaskQueueClient } from '../../infrastructure/queue/task-queue-client.js';
import { LogManager, type Logger } from '../../services/log-manager.js';
import { createSpinnerProgress, noopProgress, type ProgressReporter } from './progress.js';

export const DEFAULT_OUTPUT = 'output.mp4';

interface JobCliOptions {
  url?: string;
  statusUrl?: string;
  mode: ClientMode;
  image?: string;
  video?: string;
  audio?: string;
  prompt: string;
  width?: number;
  height?: number;
  output: string;
  maxFrame?: number;
  forceOffload?: boolean;
  token?: string;
}

interface RetrieveCliOptions {
  url?: string;
  statusUrl?: string;
  output: string;
  token?: string;
}

export interface CliIo {
  out: (line: string) => void;
  err: (line: string) => void;
}

export interface CliContext {
  config?: ClientConfig;
  io?: CliIo;
  logger?: Logger;
  progress?: ProgressReporter;
  sleep?: (ms: number) => Promise<void>;
}

const consoleIo: CliIo = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

function positiveInt(flag: string) {
  return (value: string): number => {
    const parsed = Number.parseInt(value, 10);
    if (!Number.isInteger(parsed) || parsed <= 0 || String(parsed) !== value.trim()) {
      throw new InvalidArgumentError(`${flag} must be a positive integer`);
    }
    return parsed;
  };
}

function addJobOptions(command: Command): Command {
  return command
    .option('-u, --url <url>', 'endpoint URL (defaults to LIPSYNC_QUEUE_URL / LIPSYNC_SYNC_URL)')
    .addOption(new Option('-m, --mode <mode>', 'i2v (image) or v2v (video)').choices(['i2v', 'v2v']).default('i2v'))
    .option('-i, --image <source>', 'image path or http(s) URL (i2v)')
    .option('-v, --video <source>', 'video path or http(s) URL (v2v)')
    .option('-a, --audio <source>', 'audio path or http(s) URL')
    .option('-p, --prompt <text>', 'positive prompt', DEFAULT_PROMPT)
    .option('-w, --width <n>', 'output width (i2v 384, v2v 640)', positiveInt('--width'))
    .option('-H, --height <n>', 'output height (i2v 384, v2v 640)', positiveInt('--height'))
    .option('-o, --output <file>', 'where to save the video', DEFAULT_OUTPUT)
    .option('--max-frame <n>', 'frame budget (default: derived from audio length)', positiveInt('--max-frame'))
    .option('--force-offload', 'offload model weights between steps (omitted: worker default)')
    .option('--no-force-offload', 'keep model weights resident')
    .option('--token <token>', 'Bearer token (defaults to LIPSYNC_TOKEN)');
}

function jobOptions(options: JobCliOptions): ClientJobOptions {
  return {
    mode: options.mode,
    image: options.image,
    video: options.video,
    audio: options.audio,
    prompt: options.prompt,
    width: options.width,
    height: options.height,
    maxFrame: options.maxFrame,
    forceOffload: options.forceOffload,
  };
}

/**
 * 构造命令；每个命令的结果写入 exitCode（0 成功，1 失败）
 */
export function createProgram(context: CliContext = {}): { program: Command; exitCode: () => number } {
  const config = context.config ?? loadClientConfig();
  const io = context.io ?? consoleIo;
  const logger = context.logger ?? new LogManager().createLogger({ component: 'cli' });
  const progress = context.progress ?? (config.progress && process.stderr.isTTY ? createSpinnerProgress() : noopProgress);
  let code = 0;

  const report = (outcome: JobOutcome<{ outputPath: string; bytes: number }>) => {
    if (outcome.ok) {
      progress.succeed('Done');
      io.out(chalk.green(`Saved ${outcome.bytes} bytes to ${outcome.outputPath}`));
      code = 0;
    } else {
      progress.fail(outcome.code);
      io.err(chalk.red(`Error [${outcome.code}]: ${outcome.error}`));
      if (outcome.taskId) io.err(chalk.yellow(`Task id: ${outcome.taskId} (retry with: lipsync retrieve ${outcome.taskId})`));
      code = 1;
    }
  };

  const fail = (message: string, errCode: string) => {
    io.err(chalk.red(`Error [${errCode}]: ${message}`));
    code = 1;
  };

  const queueClient = (url: string, statusUrl: string | undefined, token: string | undefined) =>
    new TaskQueueClient({
      queueUrl: url,
      statusUrlTemplate: statusUrl ?? config.statusUrlTemplate,
      token: token ?? config.token,
      requestTimeoutMs: config.requestTimeoutMs,
      pollRetries: config.pollRetries,
      pollRetryDelayMs: config.pollRetryDelayMs,
      sleep: context.sleep,
      logger,
    });

  const waitOptions = {
    pollIntervalMs: config.pollIntervalMs,
    maxWaitMs: config.maxWaitMs,
    sleep: context.sleep,
    onStatus: (record: TaskStatusRecord) => progress.update(record),
  };
  const download = (url: string, destination: string) =>
    downloadArtifact(url, destination, { timeoutMs: config.downloadTimeoutMs, logger });

  const program = new Command();
  program
    .name('lipsync')
    .description('Submit lip-sync video jobs and fetch the results')
    .version('0.1.0', '-V, --version')
    .exitOverride()
    .configureOutput({ writeOut: (s) => io.out(s.trimEnd()), writeErr: (s) => io.err(s.trimEnd()) });

  addJobOptions(
    program.command('submit', { isDefault: true }).description('submit through the task queue, wait, download')
  )
    .option('--status-url <template>', 'status URL template containing {task_id}')
    .action(async (options: JobCliOptions) => {
      const url = options.url ?? config.queueUrl;
      if (!url) return fail('Queue URL required (--url or LIPSYNC_QUEUE_URL)', 'VALIDATION_ERROR');
      try {
        const payload = await buildSubmissionPayload(jobOptions(options));
        progress.start('Submitting job');
        const outcome = await runQueuedJobUseCase(
          { queue: queueClient(url, options.statusUrl, options.token), download, logger },
          {
            payload,
            output: options.output,
            onSubmitted: (taskId) => io.out(`Task ID: ${taskId}`),
            wait: waitOptions,
          }
        );
        report(outcome);
      } catch (error) {
        fail(errorMessage(error), errorCode(error));
      }
    });

  addJobOptions(program.command('run').description('call the synchronous endpoint and save the inline video')).action(
    async (options: JobCliOptions) => {
      const url = options.url ?? config.syncUrl;
      if (!url) return fail('Endpoint URL required (--url or LIPSYNC_SYNC_URL)', 'VALIDATION_ERROR');
      try {
        const payload = await buildSubmissionPayload(jobOptions(options));
        progress.start('Running job');
        const endpoint = new SyncEndpointClient({
          url,
          token: options.token ?? config.token,
          timeoutMs: config.syncTimeoutMs,
          logger,
        });
        report(await runSyncJobUseCase({ endpoint, saveInline: saveInlineArtifact, logger }, { payload, output: options.output }));
      } catch (error) {
        fail(errorMessage(error), errorCode(error));
      }
    }
  );

  program
    .command('retrieve')
    .description('wait for an earlier task and download its output')
    .argument('<taskId>', 'task id printed by submit')
    .option('-u, --url <url>', 'queue URL (defaults to LIPSYNC_QUEUE_URL)')
    .option('--status-url <template>', 'status URL template containing {task_id}')
    .option('-o, --output <file>', 'where to save the video', DEFAULT_OUTPUT)
    .option('--token <token>', 'Bearer token (defaults to LIPSYNC_TOKEN)')
    .action(async (taskId: string, options: RetrieveCliOptions) => {
      const url = options.url ?? config.queueUrl;
      if (!url && !(options.statusUrl ?? config.statusUrlTemplate)) {
        return fail('Queue URL required (--url, --status-url or LIPSYNC_QUEUE_URL)', 'VALIDATION_ERROR');
      }
      progress.start(`Waiting for ${taskId}`);
      const outcome = await retrieveTaskUseCase(
        { queue: queueClient(url ?? '', options.statusUrl, options.token), download, logger },
        { taskId, output: options.output, wait: waitOptions }
      );
      report(outcome);
    });

  return { program, exitCode: () => code };
}

/** 解析参数并执行；返回进程退出码 */
export async function main(argv: string[] = process.argv.slice(2), context: CliContext = {}): Promise<number> {
  const { program, exitCode } = createProgram(context);
  try {
    await program.parseAsync(argv, { from: 'user' });
  } catch (error) {
    // exitOverride：--help / --version 以 0 退出，参数错误以 1 退出
    if (typeof error === 'object' && error !== null && 'exitCode' in error && typeof error.exitCode === 'number') {
      return error.exitCode === 0 ? 0 : 1;
    }
    (context.io ?? consoleIo).err(chalk.red(errorMessage(error)));
    return 1;
  }
  return exitCode();
}
