/**
 * Target platform description used for step filtering and plan identity.
 */

export type OperatingSystem = 'linux' | 'darwin';

export type Architecture = 'amd64' | 'arm64';

export type LinuxFamily = 'debian' | 'rhel' | 'arch' | 'alpine' | 'suse';

export type Libc = 'glibc' | 'musl';

export interface Platform {
  os: string;
  arch: string;
  /** Absent means "unknown" and acts as a wildcard when matching */
  linux_family?: string;
  libc?: string;
}

/**
 * Step-level predicate over platform dimensions.
 * Every list that is present must contain the target's value.
 */
export interface WhenClause {
  /** Exact "os/arch" tuples */
  platform?: string[];
  os?: string[];
  arch?: string[];
  linux_family?: string[];
  libc?: string[];
}
