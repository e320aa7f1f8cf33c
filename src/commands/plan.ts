import { Command } from 'commander';
import pico from 'picocolors';
import type { InstallationPlan, ResolvedStep } from '../types/index.js';
import { withErrorHandling } from '../utils/errors.js';
import { readTextFile } from '../utils/fs.js';
import { logger } from '../utils/logger.js';
import { createBuiltinRegistry, type ActionRegistry } from '../core/actions/registry.js';
import { detectHostPlatform, formatPlatform } from '../core/platforms.js';
import { parsePlan } from '../core/plan/plan-serializer.js';
import { computePlanContentHash } from '../core/plan/plan-generator.js';
import { validatePlan } from '../core/plan/plan-executor.js';
import { dependencyKey } from '../core/dependencies/dependency-resolver.js';

function describeStep(step: ResolvedStep, registry: ActionRegistry): string {
  const network = registry.get(step.action)?.requiresNetwork ? pico.yellow(' [network]') : '';
  const detail = step.url ? ` ${pico.dim(step.url)}` : '';
  const checksum = step.checksum ? `\n      ${pico.dim(`sha256 ${step.checksum}${step.size !== undefined ? `, ${step.size} bytes` : ''}`)}` : '';
  return `${pico.cyan(step.action)}${network}${detail}${checksum}`;
}

/**
 * Human-readable rendering of a plan, dependencies first, the way they run.
 */
export function formatPlan(plan: InstallationPlan, registry: ActionRegistry = createBuiltinRegistry()): string {
  const lines: string[] = [
    `${pico.bold(`${plan.tool}@${plan.version}`)} for ${formatPlatform(plan.platform)}`,
    `  format ${plan.format_version}, generated ${plan.generated_at}`,
    `  recipe ${plan.recipe_source || '(unknown)'} ${pico.dim(plan.recipe_hash)}`,
    `  content hash ${pico.dim(computePlanContentHash(plan))}`,
    `  ${plan.deterministic ? pico.green('deterministic') : pico.yellow('not deterministic')}`
  ];

  for (const node of plan.dependencies) {
    lines.push('', pico.bold(`Dependency ${dependencyKey(node.tool, node.version)}`));
    if (node.dependencies.length > 0) {
      lines.push(`  needs ${node.dependencies.join(', ')}`);
    }
    node.steps.forEach((step, index) => lines.push(`  ${index + 1}. ${describeStep(step, registry)}`));
  }

  lines.push('', pico.bold('Steps'));
  plan.steps.forEach((step, index) => lines.push(`  ${index + 1}. ${describeStep(step, registry)}`));

  if (plan.verify) {
    lines.push('', `${pico.bold('Verify')} ${plan.verify.command}${plan.verify.pattern ? ` ${pico.dim(`(expects "${plan.verify.pattern}")`)}` : ''}`);
  }
  return lines.join('\n');
}

async function loadPlanFile(file: string): Promise<InstallationPlan> {
  logger.debug(`Reading plan ${file}`);
  return parsePlan(await readTextFile(file));
}

export function setupPlanCommand(program: Command): void {
  const plan = program
    .command('plan')
    .description('Inspect installation plans produced by `quiver eval`');

  plan
    .command('validate')
    .description('Check that a plan file can be installed on this machine')
    .argument('<file>', 'plan JSON file')
    .action(withErrorHandling(async (file: string) => {
      const loaded = await loadPlanFile(file);
      validatePlan(loaded, { host: await detectHostPlatform(), registry: createBuiltinRegistry() });
      console.log(`${pico.green('✓')} ${file}: ${loaded.tool}@${loaded.version} is valid for this machine`);
    }));

  plan
    .command('show')
    .description('Print a readable summary of a plan file')
    .argument('<file>', 'plan JSON file')
    .action(withErrorHandling(async (file: string) => {
      console.log(formatPlan(await loadPlanFile(file)));
    }));
}
