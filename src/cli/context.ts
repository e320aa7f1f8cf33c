/**
 * CLI Context Factory
 *
 * Builds the pipeline services for a command: directories, config, and the
 * output port matching the session (Clack on a TTY, plain console in CI or
 * when piped).
 */

import type { QuiverConfig, QuiverDirectories } from '../types/index.js';
import { ensureQuiverDirectories, getQuiverDirectories } from '../core/directory.js';
import { ConfigManager } from '../core/config.js';
import { consoleOutput, type OutputPort } from '../core/ports/index.js';
import { createEvalDependencyHandler } from '../core/install/eval-dependencies.js';
import {
  createPipelineServices,
  runInstallPipeline,
  type PipelineServices
} from '../core/install/install-pipeline.js';
import { runCommand } from '../utils/exec.js';
import { createClackOutput } from './clack-output-adapter.js';

export interface CliContextOptions {
  /** Override interactive mode detection (undefined = auto-detect from TTY) */
  interactive?: boolean;
  /** Use this port instead of the detected one */
  output?: OutputPort;
}

export interface CliContext {
  dirs: QuiverDirectories;
  config: QuiverConfig;
  output: OutputPort;
  services: PipelineServices;
}

let cachedClackOutput: OutputPort | undefined;

/** Detect whether the current session is interactive (TTY, no CI). */
function detectInteractive(override?: boolean): boolean {
  if (override !== undefined) return override;
  const isTTY = process.stdin.isTTY === true && process.stdout.isTTY === true;
  return isTTY && process.env.CI !== 'true';
}

export function getCliOutput(interactive?: boolean): OutputPort {
  if (detectInteractive(interactive)) {
    cachedClackOutput ??= createClackOutput();
    return cachedClackOutput;
  }
  return consoleOutput;
}

export async function createCliContext(options: CliContextOptions = {}): Promise<CliContext> {
  const dirs = await ensureQuiverDirectories(getQuiverDirectories());
  const config = await new ConfigManager(dirs).load();
  const output = options.output ?? getCliOutput(options.interactive);

  const services: PipelineServices = createPipelineServices(dirs, config, { output });
  services.runCommand = runCommand;
  services.evalDependencies = createEvalDependencyHandler({
    dirs,
    runCommand,
    output,
    install: async (tool: string) => {
      await runInstallPipeline({ spec: tool }, services);
    }
  });

  return { dirs, config, output, services };
}
