import { existsSync, mkdirSync, copyFileSync } from 'fs';
import { resolve } from 'path';
import { initApp } from './bootstrap.js';
import { startScheduler, stopScheduler } from './periodical/runner.js';

/**
 * 从 process.argv 解析 --data-dir 参数。
 *
 * @returns 用户指定的数据目录路径，未指定时返回 undefined。
 */
function parseDataDir(): string | undefined {
  const idx = process.argv.indexOf('--data-dir');
  if (idx === -1 || idx + 1 >= process.argv.length) {
    return undefined;
  }
  return process.argv[idx + 1];
}

/**
 * 确保数据目录就绪。若目录不存在，自动创建并复制 config.example.yaml 作为初始配置。
 *
 * @param dataDir - 数据目录路径。
 */
function ensureDataDir(dataDir: string): void {
  const absDir = resolve(process.cwd(), dataDir);
  const configPath = resolve(absDir, 'config.yaml');

  if (existsSync(configPath)) {
    return;
  }

  mkdirSync(absDir, { recursive: true });

  const examplePath = resolve(process.cwd(), 'config.example.yaml');
  if (existsSync(examplePath)) {
    copyFileSync(examplePath, configPath);
    console.log(`[Periodical] Initialized new data directory: ${absDir}`);
  } else {
    throw new Error(`No config.yaml in ${absDir} and no config.example.yaml to copy`);
  }
}

/**
 * 启动调度进程。
 */
async function main(): Promise<void> {
  const dataDir = parseDataDir();
  ensureDataDir(dataDir ?? 'data');

  const { logger: log, registry } = initApp(dataDir);
  log.info('Periodical scheduler starting...');

  const handles = startScheduler(registry);

  const shutdown = async () => {
    log.info('Shutting down...');
    await stopScheduler(handles);
    process.exit(0);
  };

  process.on('SIGINT', () => void shutdown());
  process.on('SIGTERM', () => void shutdown());
}

main().catch((err) => {
  console.error('Fatal error:', err);
  process.exit(1);
});
