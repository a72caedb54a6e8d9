/**
 * SRE index allocation
 *
 * Each SRE gets a number that picks its 10.<index>.0.0/16 network. The
 * number is kept in the SRE's Pulumi stack settings so redeploying an SRE
 * keeps its network, and a new SRE takes the next free number.
 */

import type { DSHPulumiConfig } from '../config/pulumi-config.js';
import { DataSafeHavenPulumiError } from '../utils/errors.js';
import { MAX_SRE_INDEX } from './common/ip-ranges.js';

export const SRE_INDEX_KEY = 'sre-index';

export function sreIndexConfigKey(projectName: string): string {
  return `${projectName}:${SRE_INDEX_KEY}`;
}

/**
 * Index recorded for a project, if any
 */
export function recordedSreIndex(pulumiConfig: DSHPulumiConfig, projectName: string): number | null {
  const value = pulumiConfig.project(projectName)?.stack_config[sreIndexConfigKey(projectName)];
  const index = typeof value === 'string' || typeof value === 'number' ? Number(value) : NaN;
  return Number.isInteger(index) && index > 0 ? index : null;
}

export function allocateSreIndex(pulumiConfig: DSHPulumiConfig, projectName: string): number {
  const existing = recordedSreIndex(pulumiConfig, projectName);
  if (existing !== null) return existing;

  const used = pulumiConfig.projectNames
    .map((name) => recordedSreIndex(pulumiConfig, name))
    .filter((index): index is number => index !== null);
  const next = Math.max(0, ...used) + 1;
  if (next > MAX_SRE_INDEX) {
    throw new DataSafeHavenPulumiError(`Cannot deploy more than ${MAX_SRE_INDEX} SREs in one context.`);
  }
  return next;
}
