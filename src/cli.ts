#!/usr/bin/env node

import { Command } from 'commander';
import { initApp } from './bootstrap.js';
import { overdueCommand, runOnceCommand } from './commands.js';
import { interval } from './periodical/liveness.js';

const program = new Command();

program
  .name('periodical')
  .description('Periodical task scheduler management tool')
  .version('0.1.0')
  .option('-d, --data-dir <path>', 'Data directory path');

/**
 * 读取全局 --data-dir 选项。
 *
 * @returns 数据目录，未指定时返回 undefined。
 */
function dataDirOption(): string | undefined {
  const { dataDir } = program.opts<{ dataDir?: string }>();
  return dataDir;
}

// --- run-once：供系统 cron 调用，退出码反映执行结果 ---

program
  .command('run-once')
  .description('Run a single task once and exit (non-zero on failure or timeout)')
  .argument('<name>', 'Task name')
  .action(async (name: string) => {
    const { logger: log, registry } = initApp(dataDirOption());
    // 超时的工作单元可能仍在后台运行，必须显式退出。
    process.exit(await runOnceCommand(registry, log, name));
  });

// --- list ---

program
  .command('list')
  .description('List registered tasks')
  .action(() => {
    const { registry } = initApp(dataDirOption());
    for (const task of registry.all()) {
      const every = interval(registry, task.name);
      const schedule = every === false ? 'inactive' : `every ${every}s`;
      console.log(`${task.name}  ${schedule}  timeout=${task.timeoutInterval}s  ${task.description}`);
    }
  });

// --- overdue：供外部健康检查使用，逾期时退出码为 2 ---

program
  .command('overdue')
  .description('Check whether a task last seen at <since> is overdue')
  .argument('<name>', 'Task name')
  .argument('<since>', 'Last observed run time (ISO 8601)')
  .action((name: string, sinceArg: string) => {
    const { registry } = initApp(dataDirOption());
    process.exit(overdueCommand(registry, name, sinceArg));
  });

program.parseAsync().catch((err) => {
  console.error('Fatal error:', err);
  process.exit(1);
});
