/**
 * Version constraint classification.
 *
 * Exact constraints name one version and make cached plans reusable.
 * Dynamic ones ("latest", ranges, wildcards) must be re-resolved every time.
 */

export type ConstraintKind = 'exact' | 'dynamic';

const RANGE_OPERATORS = /[\^~<>=*|\s]/;
const WILDCARD_SEGMENT = /(^|\.)[xX*](\.|$)/;

export function classifyConstraint(constraint: string): ConstraintKind {
  const trimmed = constraint.trim();
  if (trimmed === '' || trimmed.toLowerCase() === 'latest') {
    return 'dynamic';
  }
  if (RANGE_OPERATORS.test(trimmed) || WILDCARD_SEGMENT.test(trimmed)) {
    return 'dynamic';
  }
  return 'exact';
}

export function isExactConstraint(constraint: string): boolean {
  return classifyConstraint(constraint) === 'exact';
}

/**
 * Split `tool@constraint` (or a bare `tool`) into its parts.
 */
export function parseToolSpec(spec: string): { tool: string; constraint: string } {
  const at = spec.indexOf('@');
  if (at <= 0) {
    return { tool: spec.trim(), constraint: '' };
  }
  return { tool: spec.slice(0, at).trim(), constraint: spec.slice(at + 1).trim() };
}
