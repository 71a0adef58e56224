import { loadConfig, resolveSearchCredentials } from '../config/loader.js';
import { runShellCommand } from '../tools/execute_command.js';

export interface CheckResult {
  ok: boolean;
  description: string;
  detail: string;
}

async function check(
  description: string,
  fn: () => Promise<string | void>
): Promise<CheckResult> {
  try {
    const detail = (await fn()) ?? '';
    return { ok: true, description, detail: String(detail) };
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    return { ok: false, description, detail };
  }
}

export async function runChecks(cwd: string = process.cwd(), env: NodeJS.ProcessEnv = process.env): Promise<CheckResult[]> {
  return Promise.all([
    check('Node.js version >= 20', () => {
      const version = process.version; // e.g. "v20.0.0"
      const major = parseInt(version.slice(1).split('.')[0] ?? '0', 10);
      if (major < 20) {
        throw new Error(`Node.js ${version} detected — upgrade to v20 or later`);
      }
      return Promise.resolve(version);
    }),

    check('Config file is valid', async () => {
      const config = await loadConfig(cwd, env);
      return `Plan document: ${config.planPath}`;
    }),

    check('Web search credentials are configured', async () => {
      const config = await loadConfig(cwd, env);
      if (resolveSearchCredentials(config) === null) {
        throw new Error('set GOOGLE_API_KEY and GOOGLE_SEARCH_ENGINE_ID');
      }
      return `Endpoint: ${config.search.endpoint}`;
    }),

    check('Host shell runs commands', async () => {
      const result = await runShellCommand('echo ok', cwd, 5000);
      if (result.exit_code !== 0 || result.stdout.trim() !== 'ok') {
        throw new Error(`unexpected shell output: ${result.stdout.trim() || result.stderr.trim()}`);
      }
      return 'echo ok';
    }),
  ]);
}

export async function runDoctor(): Promise<void> {
  const chalk = (await import('chalk')).default;
  const results = await runChecks();

  process.stdout.write('\nToolbox Doctor — system diagnostics\n');
  process.stdout.write(chalk.dim('─'.repeat(60) + '\n\n'));

  for (const result of results) {
    const icon = result.ok ? chalk.green('[✓]') : chalk.red('[✗]');
    const label = result.ok ? chalk.green(result.description) : chalk.red(result.description);
    const detail = result.detail ? chalk.dim(` — ${result.detail}`) : '';
    process.stdout.write(`${icon} ${label}${detail}\n`);
  }

  process.stdout.write('\n');

  const failCount = results.filter((r) => !r.ok).length;
  if (failCount === 0) {
    process.stdout.write(chalk.green('All checks passed.\n'));
    return;
  }

  process.stdout.write(
    chalk.yellow(`${failCount} check${failCount === 1 ? '' : 's'} failed or degraded.\n`)
  );

  const searchFailed = results.find((r) => r.description.includes('Web search') && !r.ok);
  if (searchFailed) {
    process.stdout.write(
      chalk.dim(
        '\nNote: search_web is the only tool that needs credentials; every other tool works without them.\n'
      )
    );
  }
}
