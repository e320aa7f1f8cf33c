import { Command } from 'commander';
import { withErrorHandling } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { runInstallPipeline } from '../core/install/install-pipeline.js';
import { createCliContext } from '../cli/context.js';

interface InstallCommandOptions {
  fresh?: boolean;
  plan?: string;
}

async function installCommand(spec: string | undefined, options: InstallCommandOptions): Promise<void> {
  logger.debug('Install command invoked', { spec, options });
  if (spec && options.plan) {
    throw new Error('Pass either a tool or --plan <file>, not both');
  }
  if (options.fresh && options.plan) {
    throw new Error('--fresh cannot be combined with --plan; the plan file is used as is');
  }

  const { services } = await createCliContext();

  const abort = new AbortController();
  const onSigint = () => abort.abort(new Error('Interrupted'));
  process.once('SIGINT', onSigint);
  try {
    const result = await runInstallPipeline(
      { spec, fresh: options.fresh, planFile: options.plan, signal: abort.signal },
      services
    );
    if (!result.success) {
      throw new Error(result.error || 'Installation failed');
    }
  } finally {
    process.removeListener('SIGINT', onSigint);
  }
}

export function setupInstallCommand(program: Command): void {
  program
    .command('install')
    .alias('i')
    .description('Install a tool, reusing its stored plan when the version is pinned')
    .argument('[tool]', 'tool to install; supports tool@version syntax')
    .option('--fresh', 'ignore any stored plan and generate a new one')
    .option('--plan <file>', 'install from a plan produced by `quiver eval`')
    .action(withErrorHandling(async (tool: string | undefined, options: InstallCommandOptions) => {
      await installCommand(tool, options);
    }));
}
