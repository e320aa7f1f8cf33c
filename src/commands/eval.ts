import { Command } from 'commander';
import type { Platform } from '../types/index.js';
import { withErrorHandling } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { runEvalPipeline } from '../core/install/install-pipeline.js';
import { serializePlan } from '../core/plan/plan-serializer.js';
import { stderrOutput } from '../core/ports/index.js';
import { createCliContext } from '../cli/context.js';

interface EvalCommandOptions {
  version?: string;
  os?: string;
  arch?: string;
  linuxFamily?: string;
  libc?: string;
  recipe?: string;
  installDeps?: boolean;
}

function platformOverrides(options: EvalCommandOptions): Partial<Platform> {
  const overrides: Partial<Platform> = {};
  if (options.os) overrides.os = options.os;
  if (options.arch) overrides.arch = options.arch;
  if (options.linuxFamily) overrides.linux_family = options.linuxFamily;
  if (options.libc) overrides.libc = options.libc;
  return overrides;
}

/**
 * Print a freshly generated plan as JSON on stdout. Progress and prompts go
 * to the output port, so stdout stays a valid plan document.
 */
async function evalCommand(spec: string, options: EvalCommandOptions): Promise<void> {
  logger.debug('Eval command invoked', { spec, options });
  const { services } = await createCliContext({ output: stderrOutput });

  const result = await runEvalPipeline(
    {
      spec,
      version: options.version,
      platform: platformOverrides(options),
      recipeFile: options.recipe,
      autoAcceptEvalDependencies: options.installDeps
    },
    services
  );
  if (!result.success || !result.data) {
    throw new Error(result.error || 'Eval operation failed');
  }
  process.stdout.write(serializePlan(result.data));
}

export function setupEvalCommand(program: Command): void {
  program
    .command('eval')
    .description('Generate an installation plan without installing anything and print it as JSON')
    .argument('<tool>', 'tool to plan for; supports tool@version syntax')
    .option('--version <constraint>', 'version constraint (overrides tool@version)')
    .option('--os <os>', 'target operating system (linux, darwin)')
    .option('--arch <arch>', 'target architecture (amd64, arm64)')
    .option('--linux-family <family>', 'target linux family (debian, rhel, arch, alpine, suse)')
    .option('--libc <libc>', 'target libc (glibc, musl)')
    .option('--recipe <file>', 'use this recipe file instead of searching recipe directories')
    .option('--install-deps', 'install missing eval-time dependencies without asking')
    .action(withErrorHandling(async (tool: string, options: EvalCommandOptions) => {
      await evalCommand(tool, options);
    }));
}
