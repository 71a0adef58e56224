import { Command } from 'commander';

/** Builds the `toolbox` program. Command modules load lazily inside each action. */
export function createProgram(version: string): Command {
  const program = new Command();

  // ── Global options ────────────────────────────────────────────────────────────
  // Options must precede the command words: everything from the first word on is
  // handed to the shell untouched (`toolbox ls -la`).
  program
    .name('toolbox')
    .description(
      'Host tool server. Run with words to execute them as a shell command, ' +
        'without arguments to print the tool catalog. Words starting with serve, tools, ' +
        'call, config, doctor or help reach that subcommand instead; use ' +
        '`toolbox call execute_command --args \'{"command": "..."}\'` for those.'
    )
    .version(version)
    .enablePositionalOptions()
    .passThroughOptions()
    .option('--verbose', 'enable debug logging')
    .argument('[command...]', 'shell command to execute');

  // ── Helpers ───────────────────────────────────────────────────────────────────
  function globalOpts() {
    return program.opts<{ verbose?: boolean }>();
  }

  // ── default: execute words / print catalog ───────────────────────────────────
  program.action(async (words: string[]) => {
    const { runDefault } = await import('./commands/exec.js');
    await runDefault(words, { verbose: globalOpts().verbose });
  });

  // ── serve ─────────────────────────────────────────────────────────────────────
  program
    .command('serve')
    .description('Serve the tool catalog over the Model Context Protocol on stdio')
    .action(async () => {
      const { runServe } = await import('./commands/serve.js');
      await runServe(version, { verbose: globalOpts().verbose });
    });

  // ── tools ─────────────────────────────────────────────────────────────────────
  program
    .command('tools')
    .description('List every tool with its parameters')
    .option('--json', 'output the full descriptors as JSON')
    .action(async (cmdOpts: { json?: boolean }) => {
      const { runTools } = await import('./commands/tools.js');
      await runTools({ verbose: globalOpts().verbose, json: cmdOpts.json });
    });

  // ── call ──────────────────────────────────────────────────────────────────────
  program
    .command('call <tool>')
    .description('Invoke a tool by name and print its result envelope')
    .option('--args <json>', 'arguments as a JSON object', '{}')
    .action(async (tool: string, cmdOpts: { args?: string }) => {
      const { runCall } = await import('./commands/call.js');
      await runCall(tool, { verbose: globalOpts().verbose, args: cmdOpts.args });
    });

  // ── config ────────────────────────────────────────────────────────────────────
  const config = program.command('config').description('Inspect toolbox configuration');

  config
    .command('show')
    .description('Show merged configuration (API key masked)')
    .action(async () => {
      const { runConfigShow } = await import('./commands/config.js');
      await runConfigShow();
    });

  // ── doctor ────────────────────────────────────────────────────────────────────
  program
    .command('doctor')
    .description('Run system diagnostics')
    .action(async () => {
      const { runDoctor } = await import('./commands/doctor.js');
      await runDoctor();
    });

  return program;
}
