import type { StepParams } from '../../../types/index.js';
import type { ExecutionContext } from '../../../types/execution-context.js';
import { PrimitiveAction } from '../base-action.js';
import { requireStringList } from '../params.js';

/**
 * System package manager steps. Installing system packages needs root, so
 * these only report the command the user has to run.
 */
export abstract class SystemPackageAction extends PrimitiveAction {
  /** Command prefix, e.g. ['sudo', 'apt-get', 'install', '-y'] */
  protected abstract readonly command: readonly string[];

  validate(params: StepParams): void {
    requireStringList(params, 'packages');
  }

  commandFor(params: StepParams): string {
    return [...this.command, ...requireStringList(params, 'packages')].join(' ');
  }

  async execute(params: StepParams, ctx: ExecutionContext): Promise<void> {
    const command = this.commandFor(params);
    ctx.logger.info(`${ctx.tool} requires system packages`, { command });
    ctx.output.warn(`${ctx.tool} requires system packages. Run: ${command}`);
  }
}

export class AptInstallAction extends SystemPackageAction {
  readonly name = 'apt_install';
  readonly platformConstraint = { os: 'linux', linuxFamily: 'debian' };
  protected readonly command = ['sudo', 'apt-get', 'install', '-y'];
}

export class DnfInstallAction extends SystemPackageAction {
  readonly name = 'dnf_install';
  readonly platformConstraint = { os: 'linux', linuxFamily: 'rhel' };
  protected readonly command = ['sudo', 'dnf', 'install', '-y'];
}

export class ApkInstallAction extends SystemPackageAction {
  readonly name = 'apk_install';
  readonly platformConstraint = { os: 'linux', linuxFamily: 'alpine' };
  protected readonly command = ['sudo', 'apk', 'add'];
}

export class PacmanInstallAction extends SystemPackageAction {
  readonly name = 'pacman_install';
  readonly platformConstraint = { os: 'linux', linuxFamily: 'arch' };
  protected readonly command = ['sudo', 'pacman', '-S', '--noconfirm'];
}

export class ZypperInstallAction extends SystemPackageAction {
  readonly name = 'zypper_install';
  readonly platformConstraint = { os: 'linux', linuxFamily: 'suse' };
  protected readonly command = ['sudo', 'zypper', 'install', '-y'];
}

export class BrewInstallAction extends SystemPackageAction {
  readonly name = 'brew_install';
  readonly platformConstraint = { os: 'darwin' };
  protected readonly command = ['brew', 'install'];
}
