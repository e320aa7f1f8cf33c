import { join } from 'path';
import type { QuiverDirectories } from '../../types/index.js';
import type { CommandRunner } from '../../types/execution-context.js';
import { GenerationError } from '../../utils/errors.js';
import { exists, listDirectories } from '../../utils/fs.js';
import { logger } from '../../utils/logger.js';
import type { EvalDependencyHandler } from '../plan/plan-generator.js';
import { resolveOutput, type OutputPort } from '../ports/index.js';

/** Executable that proves an eval-time dependency is present */
const EVAL_DEPENDENCY_BINARIES: Record<string, string> = {
  nodejs: 'node',
  go: 'go'
};

export interface EvalDependencyHandlerOptions {
  dirs: Pick<QuiverDirectories, 'tools'>;
  runCommand: CommandRunner;
  /** Installs a tool through quiver */
  install: (tool: string) => Promise<void>;
  output?: OutputPort;
}

/**
 * A tool counts as present when its executable is on PATH or any installed
 * tools/<tool>-<version>/bin holds it. Missing tools are installed through
 * quiver after confirmation.
 */
export function createEvalDependencyHandler(options: EvalDependencyHandlerOptions): EvalDependencyHandler {
  const output = resolveOutput(options);

  const onPath = async (binary: string): Promise<boolean> => {
    try {
      await options.runCommand('sh', ['-c', `command -v ${binary}`]);
      return true;
    } catch {
      return false;
    }
  };

  const installedByQuiver = async (tool: string, binary: string): Promise<boolean> => {
    let entries: string[];
    try {
      entries = await listDirectories(options.dirs.tools);
    } catch (error) {
      logger.debug(`Could not list ${options.dirs.tools}`, { error });
      return false;
    }
    for (const entry of entries.filter(name => name.startsWith(`${tool}-`))) {
      if (await exists(join(options.dirs.tools, entry, 'bin', binary))) {
        return true;
      }
    }
    return false;
  };

  return {
    async isSatisfied(tool: string): Promise<boolean> {
      const binary = EVAL_DEPENDENCY_BINARIES[tool] ?? tool;
      return (await installedByQuiver(tool, binary)) || (await onPath(binary));
    },

    async provide(tools: string[], autoAccept: boolean): Promise<void> {
      if (!autoAccept) {
        const accepted = await output.confirm(
          `Generating this plan needs ${tools.join(', ')}. Install ${tools.length === 1 ? 'it' : 'them'} now?`,
          { initial: false }
        );
        if (!accepted) {
          throw new GenerationError(
            `Generating this plan needs ${tools.join(', ')}; install ${tools.length === 1 ? 'it' : 'them'} first or pass --install-deps`,
            { evalDependencies: tools }
          );
        }
      }
      for (const tool of tools) {
        output.step(`Installing eval-time dependency ${tool}`);
        await options.install(tool);
      }
    }
  };
}
