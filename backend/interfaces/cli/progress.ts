/**
 * 终端进度展示：RUNNING 期间每次轮询 +1，封顶 99，仅供观感
 */
import ora, { type Ora } from 'ora';
import type { TaskStatusRecord } from '../../domain/index.js';

export const PROGRESS_CAP = 99;

export class ProgressCounter {
  private value = 0;

  get current(): number {
    return this.value;
  }

  advance(status: string): number {
    if (status === 'RUNNING') this.value = Math.min(PROGRESS_CAP, this.value + 1);
    return this.value;
  }
}

export interface ProgressReporter {
  start(text: string): void;
  update(record: TaskStatusRecord): void;
  succeed(text: string): void;
  fail(text: string): void;
}

/** 非交互环境（测试、管道输出）使用 */
export const noopProgress: ProgressReporter = {
  start: () => {},
  update: () => {},
  succeed: () => {},
  fail: () => {},
};

export function createSpinnerProgress(): ProgressReporter {
  const counter = new ProgressCounter();
  let spinner: Ora | null = null;
  return {
    start(text) {
      spinner = ora(text).start();
    },
    update(record) {
      const percent = counter.advance(record.status);
      if (spinner) spinner.text = `Status: ${record.status} ${percent}%`;
    },
    succeed(text) {
      spinner?.succeed(text);
      spinner = null;
    },
    fail(text) {
      spinner?.fail(text);
      spinner = null;
    },
  };
}
