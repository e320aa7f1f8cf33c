import * as os from 'os';
import { promises as fs } from 'fs';
import { Platform, WhenClause } from '../types/index.js';
import { logger } from '../utils/logger.js';

/**
 * Host detection and platform matching
 */

const OS_RELEASE_PATH = '/etc/os-release';
const LIB_DIR = '/lib';

const DISTRO_FAMILIES: Record<string, string> = {
  debian: 'debian',
  ubuntu: 'debian',
  linuxmint: 'debian',
  pop: 'debian',
  elementary: 'debian',
  raspbian: 'debian',
  kali: 'debian',
  fedora: 'rhel',
  rhel: 'rhel',
  centos: 'rhel',
  rocky: 'rhel',
  almalinux: 'rhel',
  ol: 'rhel',
  amzn: 'rhel',
  arch: 'arch',
  manjaro: 'arch',
  endeavouros: 'arch',
  alpine: 'alpine',
  opensuse: 'suse',
  'opensuse-leap': 'suse',
  'opensuse-tumbleweed': 'suse',
  sles: 'suse'
};

const NODE_ARCH_NAMES: Record<string, string> = {
  x64: 'amd64',
  arm64: 'arm64'
};

export interface HostDetectionOptions {
  /** Overrides process.platform */
  platform?: string;
  /** Overrides process.arch */
  arch?: string;
  osReleasePath?: string;
  libDir?: string;
}

/**
 * Parse /etc/os-release style KEY=value content. Quotes around values are
 * removed and comment lines skipped.
 */
export function parseOsRelease(content: string): Record<string, string> {
  const fields: Record<string, string> = {};
  for (const rawLine of content.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line || line.startsWith('#')) {
      continue;
    }
    const eq = line.indexOf('=');
    if (eq <= 0) {
      continue;
    }
    const key = line.slice(0, eq).trim();
    let value = line.slice(eq + 1).trim();
    if (value.length >= 2 && (value.startsWith('"') || value.startsWith("'")) && value.endsWith(value[0])) {
      value = value.slice(1, -1);
    }
    fields[key] = value;
  }
  return fields;
}

/**
 * Map a distro ID (and its ID_LIKE list) to a Linux family.
 * Returns undefined when neither is known.
 */
export function mapDistroToFamily(id: string, idLike: string[] = []): string | undefined {
  const direct = DISTRO_FAMILIES[id.toLowerCase()];
  if (direct) {
    return direct;
  }
  for (const like of idLike) {
    const family = DISTRO_FAMILIES[like.toLowerCase()];
    if (family) {
      return family;
    }
  }
  return undefined;
}

export function normalizeArch(nodeArch: string): string {
  return NODE_ARCH_NAMES[nodeArch] ?? nodeArch;
}

async function detectLinuxFamily(osReleasePath: string): Promise<string | undefined> {
  let content: string;
  try {
    content = await fs.readFile(osReleasePath, 'utf8');
  } catch (error) {
    logger.debug(`Could not read ${osReleasePath}; linux family unknown`, { error });
    return undefined;
  }
  const fields = parseOsRelease(content);
  const idLike = (fields.ID_LIKE ?? '').split(/\s+/).filter(Boolean);
  const family = mapDistroToFamily(fields.ID ?? '', idLike);
  if (!family) {
    logger.debug(`Unrecognized distro '${fields.ID ?? ''}'; linux family unknown`);
  }
  return family;
}

async function detectLibc(libDir: string, family: string | undefined): Promise<string> {
  if (family === 'alpine') {
    return 'musl';
  }
  try {
    const entries = await fs.readdir(libDir);
    if (entries.some(entry => entry.startsWith('ld-musl-'))) {
      return 'musl';
    }
  } catch (error) {
    logger.debug(`Could not list ${libDir}; assuming glibc`, { error });
  }
  return 'glibc';
}

/**
 * Detect the platform this process runs on. Linux hosts also get a family
 * (from os-release) and libc; other hosts leave both unset.
 */
export async function detectHostPlatform(options: HostDetectionOptions = {}): Promise<Platform> {
  const platform: Platform = {
    os: options.platform ?? os.platform(),
    arch: normalizeArch(options.arch ?? os.arch())
  };

  if (platform.os !== 'linux') {
    return platform;
  }

  const family = await detectLinuxFamily(options.osReleasePath ?? OS_RELEASE_PATH);
  if (family) {
    platform.linux_family = family;
  }
  platform.libc = await detectLibc(options.libDir ?? LIB_DIR, family);
  return platform;
}

/**
 * Evaluate a step's `when` clause against a target platform.
 *
 * Every dimension present in the clause must match. A target that does not
 * name its family or libc matches any value of that dimension, but a clause
 * naming either one never matches a non-Linux target.
 */
export function matchesWhen(when: WhenClause | undefined, target: Platform): boolean {
  if (!when) {
    return true;
  }

  if (when.platform && when.platform.length > 0) {
    const tuple = `${target.os}/${target.arch}`;
    if (!when.platform.includes(tuple)) {
      return false;
    }
  }

  if (when.os && when.os.length > 0 && !when.os.includes(target.os)) {
    return false;
  }

  if (when.arch && when.arch.length > 0 && !when.arch.includes(target.arch)) {
    return false;
  }

  if (when.linux_family && when.linux_family.length > 0) {
    if (target.os !== 'linux') {
      return false;
    }
    if (target.linux_family && !when.linux_family.includes(target.linux_family)) {
      return false;
    }
  }

  if (when.libc && when.libc.length > 0) {
    if (target.os !== 'linux') {
      return false;
    }
    if (target.libc && !when.libc.includes(target.libc)) {
      return false;
    }
  }

  return true;
}

/**
 * Exact equality on every dimension, absent equal only to absent.
 */
export function platformsEqual(a: Platform, b: Platform): boolean {
  return a.os === b.os
    && a.arch === b.arch
    && (a.linux_family ?? '') === (b.linux_family ?? '')
    && (a.libc ?? '') === (b.libc ?? '');
}

/**
 * Describe why a plan built for `planned` cannot run on `host`, or return
 * undefined when it can. Family and libc only count when both sides name one.
 */
export function describePlatformMismatch(planned: Platform, host: Platform): string | undefined {
  if (planned.os !== host.os || planned.arch !== host.arch) {
    return `plan targets ${planned.os}/${planned.arch} but host is ${host.os}/${host.arch}`;
  }
  if (planned.linux_family && host.linux_family && planned.linux_family !== host.linux_family) {
    return `plan targets linux family '${planned.linux_family}' but host is '${host.linux_family}'`;
  }
  if (planned.libc && host.libc && planned.libc !== host.libc) {
    return `plan targets libc '${planned.libc}' but host uses '${host.libc}'`;
  }
  return undefined;
}

export function formatPlatform(platform: Platform): string {
  const extras = [platform.linux_family, platform.libc].filter((part): part is string => Boolean(part));
  const tuple = `${platform.os}/${platform.arch}`;
  return extras.length > 0 ? `${tuple} (${extras.join(', ')})` : tuple;
}
