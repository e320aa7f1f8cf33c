import type { StepParams } from '../../../types/index.js';
import { CompositeAction } from '../base-action.js';
import type { ActionStep } from '../types.js';
import { optionalString, requireString } from '../params.js';

/**
 * Install an npm package. Resolving the package needs Node.js on the
 * generating machine, hence the eval-time dependency.
 */
export class NpmInstallAction extends CompositeAction {
  readonly name = 'npm_install';
  readonly evalDependencies = ['nodejs'];

  decompose(params: StepParams): ActionStep[] {
    return [
      {
        action: 'npm_exec',
        params: {
          package: requireString(params, 'package'),
          version: optionalString(params, 'version') ?? '{version}'
        }
      }
    ];
  }
}

/**
 * Build a Go module from source with `go install`.
 */
export class GoInstallAction extends CompositeAction {
  readonly name = 'go_install';
  readonly evalDependencies = ['go'];

  decompose(params: StepParams): ActionStep[] {
    return [
      {
        action: 'go_build',
        params: {
          module: requireString(params, 'module'),
          version: optionalString(params, 'version') ?? '{version_tag}'
        }
      }
    ];
  }
}
